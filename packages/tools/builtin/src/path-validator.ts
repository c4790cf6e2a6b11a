/**
 * Path Validator
 *
 * Validates filesystem paths requested by a model before a tool touches them:
 * - Path traversal
 * - Access to sensitive files
 * - Access outside the allowed directories
 */

import path from 'node:path';

/**
 * Path validator configuration
 */
export interface PathValidatorConfig {
  /** Allowed base paths (e.g., ['./workspace']) */
  allowedPaths: string[];

  /** Directory relative paths resolve against; defaults to the first allowed path */
  baseDir?: string;

  /** Blocked patterns added to the defaults (e.g., [/\.pem$/]) */
  blockedPatterns?: RegExp[];

  /** Whether to allow `..` segments */
  allowTraversal?: boolean;
}

export type PathValidationResult =
  | { valid: true; resolved: string }
  | { valid: false; error: string };

/**
 * Default sensitive path patterns to block
 */
const DEFAULT_BLOCKED_PATTERNS = [
  /\.env$/i,
  /\.env\./i,
  /\.git\//i,
  /\.ssh\//i,
  /\.aws\//i,
  /\.config\/gcloud\//i,
  /credentials/i,
  /password/i,
  /secret/i,
  /private[-_]?key/i,
  /id_rsa/i,
  /id_dsa/i,
  /authorized_keys/i,
  /known_hosts/i,
  /\.npmrc$/i,
  /\.pypirc$/i,
];

function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Path validator for filesystem tools
 */
export class PathValidator {
  private allowedPaths: string[];
  private blockedPatterns: RegExp[];
  private allowTraversal: boolean;
  private baseDir: string;

  constructor(config: PathValidatorConfig) {
    this.allowedPaths = config.allowedPaths.map((p) => path.resolve(p));
    this.blockedPatterns = [...DEFAULT_BLOCKED_PATTERNS, ...(config.blockedPatterns ?? [])];
    this.allowTraversal = config.allowTraversal ?? false;
    this.baseDir = path.resolve(config.baseDir ?? this.allowedPaths[0] ?? process.cwd());
  }

  /**
   * Validate a path for read or write access and resolve it
   */
  validate(requestedPath: string): PathValidationResult {
    if (requestedPath.trim() === '') {
      return { valid: false, error: 'Path cannot be empty' };
    }

    if (requestedPath.includes('\0')) {
      return { valid: false, error: 'Path cannot contain null bytes' };
    }

    if (!this.allowTraversal && requestedPath.split(/[\\/]/).includes('..')) {
      return { valid: false, error: 'Path traversal detected: ".." not allowed' };
    }

    const resolved = this.resolve(requestedPath);

    if (!this.isAllowed(resolved)) {
      return {
        valid: false,
        error: `Path "${requestedPath}" is not in allowed directories: ${this.allowedPaths.join(', ')}`,
      };
    }

    for (const pattern of this.blockedPatterns) {
      if (pattern.test(resolved)) {
        return {
          valid: false,
          error: `Path "${requestedPath}" matches blocked pattern: ${pattern}`,
        };
      }
    }

    return { valid: true, resolved };
  }

  /**
   * Resolve a path against the base directory without validating it
   */
  resolve(requestedPath: string): string {
    return path.resolve(this.baseDir, requestedPath);
  }

  getBaseDir(): string {
    return this.baseDir;
  }

  getAllowedPaths(): string[] {
    return [...this.allowedPaths];
  }

  /**
   * Check if a path is inside an allowed directory (without full validation)
   */
  isAllowed(requestedPath: string): boolean {
    const resolved = this.resolve(requestedPath);
    return this.allowedPaths.some((allowedPath) => isWithin(allowedPath, resolved));
  }
}
