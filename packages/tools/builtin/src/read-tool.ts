/**
 * Filesystem Read Tools
 *
 * Read-only operations with no side effects:
 * - read_file: return a file's contents
 * - list_files: list a directory, directories suffixed with `/`
 */

import fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { describeError, type ToolArgs, type ToolExecutor } from '@crewroom/types';
import { silentLogger, type Logger } from '@crewroom/utils';
import { PathValidator } from './path-validator.js';
import { isNotFound } from './fs-errors.js';

const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;

export interface ReadToolOptions {
  validator: PathValidator;
  /** Largest file read_file returns, in bytes */
  maxFileSize?: number;
  logger?: Logger;
}

/**
 * read_file: the tag body or `path` attribute names the file
 */
export class ReadFileTool implements ToolExecutor {
  private readonly validator: PathValidator;
  private readonly maxFileSize: number;
  private readonly logger: Logger;

  constructor(options: ReadToolOptions) {
    this.validator = options.validator;
    this.maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.logger = options.logger ?? silentLogger;
  }

  async execute(args: ToolArgs): Promise<string> {
    const requested = args.path?.trim() ?? '';
    if (!requested) {
      return "Error: read_file requires a 'path' argument.";
    }

    const check = this.validator.validate(requested);
    if (!check.valid) {
      return `Error: ${check.error}`;
    }

    let stats: Stats;
    try {
      stats = await fs.stat(check.resolved);
    } catch (error) {
      if (isNotFound(error)) {
        return `Error: File '${requested}' does not exist.`;
      }
      return `Error reading file: ${describeError(error)}`;
    }

    if (stats.isDirectory()) {
      return `Error: '${requested}' is a directory, not a file.`;
    }
    if (stats.size > this.maxFileSize) {
      return `Error: File '${requested}' is too large (${stats.size} bytes, limit ${this.maxFileSize}).`;
    }

    try {
      const content = await fs.readFile(check.resolved, 'utf-8');
      this.logger.debug(`Read ${stats.size} bytes from ${check.resolved}`);
      return content;
    } catch (error) {
      return `Error reading file: ${describeError(error)}`;
    }
  }
}

/**
 * list_files: lists `path`, defaulting to the workspace root
 */
export class ListFilesTool implements ToolExecutor {
  private readonly validator: PathValidator;

  constructor(options: Pick<ReadToolOptions, 'validator'>) {
    this.validator = options.validator;
  }

  async execute(args: ToolArgs): Promise<string> {
    const requested = args.path?.trim() || '.';

    const check = this.validator.validate(requested);
    if (!check.valid) {
      return `Error: ${check.error}`;
    }

    try {
      const stats = await fs.stat(check.resolved);
      if (!stats.isDirectory()) {
        return `Error: '${requested}' is not a directory.`;
      }

      const entries = await fs.readdir(check.resolved, { withFileTypes: true });
      if (entries.length === 0) {
        return 'Directory is empty.';
      }

      return entries
        .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name))
        .sort()
        .join('\n');
    } catch (error) {
      if (isNotFound(error)) {
        return `Error: Directory '${requested}' does not exist.`;
      }
      return `Error listing files: ${describeError(error)}`;
    }
  }
}
