/**
 * crewroom.toml discovery and parsing
 *
 * Lookup order: $CREWROOM_CONFIG, ./crewroom.toml, ~/.crewroom/crewroom.toml.
 * Relative `tools.allowed_paths` entries are resolved against the directory
 * of the file they were read from.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as TOML from '@iarna/toml';
import type { CrewroomConfig } from './schema.js';

export const CONFIG_FILE_NAME = 'crewroom.toml';
export const CONFIG_PATH_ENV = 'CREWROOM_CONFIG';

export class ConfigLoadError extends Error {
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigLoadError';
    this.cause = cause;
  }
}

export interface LoadedConfig {
  config: CrewroomConfig;
  /** Absolute path of the file the config came from */
  path: string;
}

export function getConfigSearchPaths(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string[] {
  const explicit = env[CONFIG_PATH_ENV];
  const home = env.HOME || env.USERPROFILE || os.homedir();

  return [
    ...(explicit ? [path.resolve(cwd, explicit)] : []),
    path.join(cwd, CONFIG_FILE_NAME),
    path.join(home, '.crewroom', CONFIG_FILE_NAME),
  ];
}

export function findConfigFile(searchPaths: string[] = getConfigSearchPaths()): string | undefined {
  return searchPaths.find((candidate) => fs.existsSync(candidate));
}

/**
 * Parse TOML text. The shape is checked later by validateConfig.
 */
export function parseToml(content: string): CrewroomConfig {
  try {
    return TOML.parse(content) as unknown as CrewroomConfig;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(`Failed to parse TOML: ${reason}`, error instanceof Error ? error : undefined);
  }
}

function resolveAllowedPaths(config: CrewroomConfig, baseDir: string): CrewroomConfig {
  const allowed = config.tools?.allowed_paths;
  if (!allowed) {
    return config;
  }
  return {
    ...config,
    tools: { ...config.tools, allowed_paths: allowed.map((entry) => path.resolve(baseDir, entry)) },
  };
}

/**
 * Read one config file
 */
export function loadTomlFile(filePath: string): LoadedConfig {
  const absolute = path.resolve(filePath);

  let content: string;
  try {
    content = fs.readFileSync(absolute, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(
      `Failed to load config from ${absolute}: ${reason}`,
      error instanceof Error ? error : undefined
    );
  }

  return {
    config: resolveAllowedPaths(parseToml(content), path.dirname(absolute)),
    path: absolute,
  };
}

/**
 * Load from an explicit path, or from the first file on the search path
 *
 * @throws ConfigLoadError when no file is found or it does not parse
 */
export function loadConfig(customPath?: string, env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  if (customPath) {
    if (!fs.existsSync(customPath)) {
      throw new ConfigLoadError(`Configuration file not found: ${customPath}`);
    }
    return loadTomlFile(customPath);
  }

  const searchPaths = getConfigSearchPaths(env);
  const found = findConfigFile(searchPaths);
  if (!found) {
    throw new ConfigLoadError(`No ${CONFIG_FILE_NAME} found; looked in ${searchPaths.join(', ')}`);
  }
  return loadTomlFile(found);
}
