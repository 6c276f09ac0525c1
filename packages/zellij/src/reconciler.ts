/**
 * Session Reconciler
 *
 * Brings a named multiplexer session to "attached" from whatever state the
 * multiplexer reports:
 *
 *   absent  -> create
 *   alive   -> attach
 *   exited  -> delete, then create (never attach to a dead session)
 *
 * Teardown is best-effort: kill if alive, wait a grace period, delete the
 * record if anything is left.
 */

import { basename } from 'node:path';
import type { Logger, Result, SessionAction, SessionState } from '@devtree/common';
import { DependencyError, SessionError, err, ok, silentLogger, sleep, wrapError } from '@devtree/common';
import type { Multiplexer, OpenSessionRequest } from './types.js';

export interface SessionReconcilerOptions {
  /** Wait after a graceful kill before checking what is left */
  graceMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Deterministic session name for a project worktree
 */
export function sessionName(projectPath: string, branch: string): string {
  return `${basename(projectPath)}-${branch}`;
}

export class SessionReconciler {
  private graceMs: number;
  private logger: Logger;
  private wait: (ms: number) => Promise<void>;

  constructor(
    private readonly multiplexer: Multiplexer,
    options: SessionReconcilerOptions = {}
  ) {
    this.graceMs = options.graceMs ?? 500;
    this.logger = options.logger ?? silentLogger;
    this.wait = options.sleep ?? sleep;
  }

  state(name: string): SessionState {
    const session = this.multiplexer.listSessions().find((s) => s.name === name);
    return session?.state ?? 'absent';
  }

  /**
   * Attach to `name`, creating or recreating it as needed. Blocks while the
   * session is in the foreground.
   */
  open(request: OpenSessionRequest): Result<SessionAction> {
    if (!this.multiplexer.isInstalled()) {
      return err(new DependencyError(this.multiplexer.binary));
    }

    const { name, ...createOptions } = request;
    const current = this.state(name);

    try {
      switch (current) {
        case 'alive':
          this.logger.info(`Attaching to session: ${name}`);
          this.multiplexer.attachSession(name);
          return ok<SessionAction>('attached');

        case 'exited':
          this.logger.info(`Session ${name} has exited, recreating`);
          if (!this.multiplexer.deleteSession(name)) {
            return err(new SessionError(`Failed to delete exited session: ${name}`, { sessionName: name }));
          }
          this.multiplexer.createSession(name, createOptions);
          return ok<SessionAction>('recreated');

        case 'absent':
          this.logger.info(`Creating session: ${name}`);
          this.multiplexer.createSession(name, createOptions);
          return ok<SessionAction>('created');
      }
    } catch (error) {
      const wrapped = wrapError(error);
      return err(wrapped instanceof SessionError
        ? wrapped
        : new SessionError(wrapped.message, { sessionName: name, details: wrapped.details }));
    }
  }

  /**
   * Kill and delete `name`. Succeeds silently when the multiplexer is not
   * installed or the session does not exist.
   */
  async teardown(name: string): Promise<void> {
    if (!this.multiplexer.isInstalled()) return;

    if (this.state(name) === 'alive') {
      this.logger.info(`Killing active session: ${name}`);
      if (!this.multiplexer.killSession(name)) {
        this.logger.warn(`Failed to kill session ${name}`);
      }
      await this.wait(this.graceMs);
    }

    if (this.state(name) !== 'absent') {
      this.logger.info(`Deleting session: ${name}`);
      if (!this.multiplexer.deleteSession(name)) {
        this.logger.warn(`Failed to delete session ${name}`);
      }
    }
  }
}
