/**
 * Multiplexer Types
 */

import type { SessionState } from '@devtree/common';

export interface MultiplexerSession {
  name: string;
  /** 'alive' or 'exited'; absent sessions are not listed */
  state: Exclude<SessionState, 'absent'>;
  /** Listing line as printed by the multiplexer */
  raw: string;
}

export interface CreateSessionOptions {
  /** Working directory of the new session */
  cwd: string;
  /** Layout file, multiplexer default when omitted */
  layout?: string;
}

/**
 * The subset of a terminal multiplexer the reconciler drives. All calls
 * block until the underlying program exits; create and attach hand the
 * terminal to the session until the user detaches.
 */
export interface Multiplexer {
  readonly binary: string;
  isInstalled(): boolean;
  listSessions(): MultiplexerSession[];
  createSession(name: string, options: CreateSessionOptions): void;
  attachSession(name: string): void;
  killSession(name: string): boolean;
  deleteSession(name: string): boolean;
}

export interface OpenSessionRequest extends CreateSessionOptions {
  name: string;
}
