/**
 * Shell Tool
 *
 * Runs a command through the system shell in the workspace directory.
 * Always gated unless the calling agent is trusted.
 */

import { exec } from 'node:child_process';
import type { ToolArgs, ToolExecutor } from '@crewroom/types';
import { silentLogger, type Logger } from '@crewroom/utils';

const DEFAULT_TIMEOUT_SECONDS = 30;
const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

export interface ShellToolOptions {
  /** Working directory for commands */
  cwd: string;
  timeoutSeconds?: number;
  logger?: Logger;
}

interface ShellRun {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  spawnError?: string;
}

export class ShellTool implements ToolExecutor {
  private readonly cwd: string;
  private readonly timeoutSeconds: number;
  private readonly logger: Logger;

  constructor(options: ShellToolOptions) {
    this.cwd = options.cwd;
    this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.logger = options.logger ?? silentLogger;
  }

  async execute(args: ToolArgs): Promise<string> {
    const command = args.command?.trim() ?? '';
    if (!command) {
      return 'Error: shell requires a command.';
    }

    this.logger.debug(`Running shell command in ${this.cwd}: ${command}`);
    const run = await this.run(command);

    if (run.timedOut) {
      return `Error executing command: timed out after ${this.timeoutSeconds}s`;
    }
    if (run.spawnError !== undefined) {
      return `Error executing command: ${run.spawnError}`;
    }

    return formatShellOutput(run);
  }

  private run(command: string): Promise<ShellRun> {
    return new Promise((resolve) => {
      exec(
        command,
        {
          cwd: this.cwd,
          timeout: this.timeoutSeconds * 1000,
          maxBuffer: MAX_OUTPUT_BYTES,
          windowsHide: true,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ stdout, stderr, exitCode: 0, timedOut: false });
            return;
          }
          const exitCode = typeof error.code === 'number' ? error.code : undefined;
          resolve({
            stdout,
            stderr,
            exitCode: exitCode ?? 1,
            timedOut: error.killed === true,
            spawnError: exitCode === undefined && error.killed !== true ? error.message : undefined,
          });
        }
      );
    });
  }
}

/**
 * Render captured output the way agents see it
 */
export function formatShellOutput(run: Pick<ShellRun, 'stdout' | 'stderr' | 'exitCode'>): string {
  const stdout = run.stdout.trim();
  const stderr = run.stderr.trim();

  let text: string;
  if (stderr) {
    text = `Output:\n${stdout}\nErrors:\n${stderr}`;
  } else if (stdout) {
    text = stdout;
  } else {
    text = run.exitCode === 0 ? 'Command executed successfully (no output).' : '';
  }

  if (run.exitCode !== 0) {
    return text ? `${text}\nExit code: ${run.exitCode}` : `Command failed with exit code ${run.exitCode}.`;
  }
  return text;
}
