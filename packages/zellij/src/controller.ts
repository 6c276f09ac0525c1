/**
 * Zellij Controller
 *
 * Thin wrapper over the zellij binary. Listing is parsed from
 * `list-sessions --no-formatting`; an "EXITED" marker on a line means the
 * session is dead but still resurrectable.
 */

import { spawnSync } from 'node:child_process';
import { SessionError } from '@devtree/common';
import type { CreateSessionOptions, Multiplexer, MultiplexerSession } from './types.js';

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function parseSessionList(output: string): MultiplexerSession[] {
  return output
    .replace(ANSI_PATTERN, '')
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line): MultiplexerSession => {
      const name = line.split(/\s+/)[0] ?? line;
      const status = line.slice(name.length);
      return {
        name,
        state: status.includes('EXITED') ? 'exited' : 'alive',
        raw: line,
      };
    });
}

export class ZellijController implements Multiplexer {
  constructor(readonly binary: string = 'zellij') {}

  /**
   * Check if zellij is installed
   */
  isInstalled(): boolean {
    const result = spawnSync(this.binary, ['--version'], { stdio: 'ignore' });
    return !result.error && result.status === 0;
  }

  /**
   * Run a zellij command and return output
   */
  private runZellij(args: string[]): string {
    // array args, no shell: session names reach zellij verbatim
    const result = spawnSync(this.binary, args, {
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
    });
    if (result.error) {
      throw new Error(`zellij command failed: ${result.error.message}`);
    }
    if (result.status !== 0) {
      throw new Error(`zellij command failed: ${(result.stderr || result.stdout || '').trim()}`);
    }
    return (result.stdout || '').trim();
  }

  /**
   * Run zellij attached to this terminal until it exits
   */
  private runInteractive(args: string[], cwd?: string): void {
    const result = spawnSync(this.binary, args, { cwd, stdio: 'inherit' });
    if (result.error) {
      throw new SessionError(`Failed to start ${this.binary}: ${result.error.message}`);
    }
    if (result.status !== 0) {
      throw new SessionError(`${this.binary} ${args.join(' ')} exited with status ${result.status}`);
    }
  }

  // ============ Session Management ============

  /**
   * List all sessions, live and exited
   */
  listSessions(): MultiplexerSession[] {
    try {
      return parseSessionList(this.runZellij(['list-sessions', '--no-formatting']));
    } catch {
      // zellij exits non-zero when there are no sessions at all
      return [];
    }
  }

  createSession(name: string, options: CreateSessionOptions): void {
    const args = ['--session', name];
    if (options.layout) {
      args.push('--layout', options.layout);
    }
    this.runInteractive(args, options.cwd);
  }

  attachSession(name: string): void {
    this.runInteractive(['attach', name]);
  }

  /**
   * Kill a running session
   */
  killSession(name: string): boolean {
    try {
      this.runZellij(['kill-session', name]);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Remove a session record (exited, or killed moments ago)
   */
  deleteSession(name: string): boolean {
    try {
      this.runZellij(['delete-session', name]);
      return true;
    } catch {
      return false;
    }
  }
}
