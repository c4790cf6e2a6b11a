/**
 * Built-in tools for crewroom agents
 */

export { createBuiltinTools, type BuiltinToolsOptions } from './builtin.js';
export { ReadFileTool, ListFilesTool, type ReadToolOptions } from './read-tool.js';
export { WriteFileTool, type WriteToolOptions } from './write-tool.js';
export { SearchTool, type SearchToolOptions } from './search-tool.js';
export { ShellTool, formatShellOutput, type ShellToolOptions } from './shell-tool.js';
export {
  PathValidator,
  type PathValidatorConfig,
  type PathValidationResult,
} from './path-validator.js';
