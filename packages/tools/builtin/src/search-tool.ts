/**
 * Workspace Search Tool
 *
 * Case-insensitive substring search over the text files under the workspace
 * root (or a `path` inside it). Results are `file:line: text`.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { describeError, type ToolArgs, type ToolExecutor } from '@crewroom/types';
import { silentLogger, type Logger } from '@crewroom/utils';
import { PathValidator } from './path-validator.js';

const DEFAULT_MAX_RESULTS = 20;
const MAX_SEARCH_FILE_SIZE = 1024 * 1024;

const IGNORED_DIRS = new Set([
  '.git',
  '__pycache__',
  '.venv',
  '.pytest_cache',
  'node_modules',
  '.context',
]);

const IGNORED_EXTENSIONS = new Set(['.pyc', '.pyo', '.pyd', '.so', '.dll', '.exe', '.bin', '.lock']);

export interface SearchToolOptions {
  validator: PathValidator;
  maxResults?: number;
  logger?: Logger;
}

function byName(a: { name: string }, b: { name: string }): number {
  if (a.name < b.name) return -1;
  return a.name > b.name ? 1 : 0;
}

export class SearchTool implements ToolExecutor {
  private readonly validator: PathValidator;
  private readonly maxResults: number;
  private readonly logger: Logger;

  constructor(options: SearchToolOptions) {
    this.validator = options.validator;
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.logger = options.logger ?? silentLogger;
  }

  async execute(args: ToolArgs): Promise<string> {
    const query = args.query?.trim() ?? '';
    if (!query) {
      return 'Error: search requires a query.';
    }

    const check = this.validator.validate(args.path?.trim() || '.');
    if (!check.valid) {
      return `Error: ${check.error}`;
    }

    const root = this.validator.getBaseDir();
    const matches: string[] = [];
    try {
      await this.collect(check.resolved, root, query.toLowerCase(), matches);
    } catch (error) {
      return `Error searching workspace: ${describeError(error)}`;
    }

    if (matches.length === 0) {
      return `No results found for '${query}'.`;
    }

    const shown = matches.slice(0, this.maxResults).join('\n');
    return matches.length > this.maxResults
      ? `${shown}\n... (more results found, please refine your search)`
      : shown;
  }

  /**
   * Walks `dir` in name order, stopping once one match past the limit is found
   */
  private async collect(dir: string, root: string, needle: string, matches: string[]): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort(byName);

    for (const entry of entries) {
      if (matches.length > this.maxResults) return;

      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!IGNORED_DIRS.has(entry.name)) {
          await this.collect(fullPath, root, needle, matches);
        }
        continue;
      }
      if (!entry.isFile() || IGNORED_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) {
        continue;
      }

      const text = await this.readText(fullPath);
      if (text === undefined) continue;

      const relative = path.relative(root, fullPath).split(path.sep).join('/');
      const lines = text.split(/\r?\n/);
      for (let i = 0; i < lines.length; i++) {
        const line = lines[i] ?? '';
        if (line.toLowerCase().includes(needle)) {
          matches.push(`${relative}:${i + 1}: ${line.trim()}`);
          if (matches.length > this.maxResults) return;
        }
      }
    }
  }

  private async readText(filePath: string): Promise<string | undefined> {
    try {
      const stats = await fs.stat(filePath);
      if (stats.size > MAX_SEARCH_FILE_SIZE) return undefined;
      const text = await fs.readFile(filePath, 'utf-8');
      // binary content
      return text.includes('\0') ? undefined : text;
    } catch (error) {
      this.logger.debug(`Skipping unreadable file ${filePath}: ${describeError(error)}`);
      return undefined;
    }
  }
}
