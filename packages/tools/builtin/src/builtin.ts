/**
 * Built-in tool registrations
 */

import type { ToolRegistration } from '@crewroom/types';
import { silentLogger, type Logger } from '@crewroom/utils';
import { PathValidator } from './path-validator.js';
import { ListFilesTool, ReadFileTool } from './read-tool.js';
import { WriteFileTool } from './write-tool.js';
import { SearchTool } from './search-tool.js';
import { ShellTool } from './shell-tool.js';

export interface BuiltinToolsOptions {
  /** Directories filesystem tools may touch; the first is the workspace root */
  allowedPaths: string[];
  /** Register the shell tool (default true) */
  shellEnabled?: boolean;
  shellTimeoutSeconds?: number;
  /** Largest file read_file returns, in bytes */
  maxFileSize?: number;
  logger?: Logger;
}

/**
 * Build the registrations for shell, read_file, write_file, list_files and search
 */
export function createBuiltinTools(options: BuiltinToolsOptions): ToolRegistration[] {
  const logger = options.logger ?? silentLogger;
  const validator = new PathValidator({ allowedPaths: options.allowedPaths });
  const writeTool = new WriteFileTool({ validator, logger });

  const tools: ToolRegistration[] = [];

  if (options.shellEnabled ?? true) {
    tools.push({
      name: 'shell',
      description:
        'Execute a shell command. Use for filesystem operations, git, or running scripts.',
      primaryArg: 'command',
      executor: new ShellTool({
        cwd: validator.getBaseDir(),
        timeoutSeconds: options.shellTimeoutSeconds,
        logger,
      }),
    });
  }

  tools.push(
    {
      name: 'read_file',
      description: 'Read the contents of a file. Provide the path as the tool argument.',
      primaryArg: 'path',
      executor: new ReadFileTool({ validator, maxFileSize: options.maxFileSize, logger }),
    },
    {
      name: 'write_file',
      description: "Write content to a file. Provide 'path' and the content via tag body.",
      primaryArg: 'content',
      preserveBody: true,
      requiresDiffPreview: true,
      readCurrent: (args) => writeTool.readCurrent(args),
      executor: writeTool,
    },
    {
      name: 'list_files',
      description: 'List files in a directory. Provide the path as the tool argument.',
      primaryArg: 'path',
      executor: new ListFilesTool({ validator }),
    },
    {
      name: 'search',
      description: 'Search for a keyword in the workspace. Argument is the query string.',
      primaryArg: 'query',
      executor: new SearchTool({ validator, logger }),
    }
  );

  logger.debug(`Built-in tools: ${tools.map((tool) => tool.name).join(', ')}`);
  return tools;
}
