/**
 * External command execution
 *
 * git and setup scripts run through a CommandRunner so tests can stand in
 * a fake. Calls block the operation until the program exits.
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  /** Exit status, null when killed by a signal */
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  /** Hand the terminal to the child instead of capturing output */
  inherit?: boolean;
}

export interface CommandRunner {
  /**
   * Resolves with the exit status whatever it is; rejects only when the
   * program could not be started.
   */
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

export const spawnRunner: CommandRunner = {
  run(command, args, options = {}) {
    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, {
        cwd: options.cwd,
        env: process.env,
        stdio: options.inherit ? 'inherit' : ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', (code) => {
        resolve({ code, stdout, stderr });
      });

      proc.on('error', (error) => {
        reject(error);
      });
    });
  },
};

/**
 * Short description of a failed run for error messages
 */
export function describeFailure(command: string, args: string[], result: CommandResult): string {
  const output = (result.stderr || result.stdout).trim();
  const status = result.code === null ? 'was killed' : `exited with status ${result.code}`;
  return `${command} ${args.join(' ')} ${status}${output ? `: ${output}` : ''}`;
}
