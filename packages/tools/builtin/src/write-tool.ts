/**
 * Filesystem Write Tool
 *
 * write_file creates or replaces a file, creating parent directories.
 * Gated: the core shows a diff preview before asking for confirmation.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {
  describeError,
  type FileSnapshot,
  type ToolArgs,
  type ToolExecutor,
} from '@crewroom/types';
import { silentLogger, type Logger } from '@crewroom/utils';
import { PathValidator } from './path-validator.js';
import { isNotFound } from './fs-errors.js';

export interface WriteToolOptions {
  validator: PathValidator;
  logger?: Logger;
}

export class WriteFileTool implements ToolExecutor {
  private readonly validator: PathValidator;
  private readonly logger: Logger;

  constructor(options: WriteToolOptions) {
    this.validator = options.validator;
    this.logger = options.logger ?? silentLogger;
  }

  async execute(args: ToolArgs): Promise<string> {
    const requested = args.path?.trim() ?? '';
    if (!requested) {
      return "Error: write_file requires a 'path' attribute.";
    }

    const check = this.validator.validate(requested);
    if (!check.valid) {
      return `Error: ${check.error}`;
    }

    const content = args.content ?? '';
    try {
      await fs.mkdir(path.dirname(check.resolved), { recursive: true });
      await fs.writeFile(check.resolved, content, 'utf-8');
    } catch (error) {
      return `Error writing file: ${describeError(error)}`;
    }

    this.logger.info(`Wrote ${Buffer.byteLength(content, 'utf-8')} bytes to ${check.resolved}`);
    return `Successfully wrote to ${requested}`;
  }

  /**
   * Content the write would replace; empty for new files and rejected paths
   */
  async readCurrent(args: ToolArgs): Promise<FileSnapshot> {
    const requested = args.path?.trim() ?? '';
    const check = this.validator.validate(requested);
    if (!check.valid) {
      return { path: requested, content: '' };
    }

    try {
      return { path: check.resolved, content: await fs.readFile(check.resolved, 'utf-8') };
    } catch (error) {
      if (isNotFound(error)) {
        return { path: check.resolved, content: '' };
      }
      throw error;
    }
  }
}
