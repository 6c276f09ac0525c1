/**
 * @devtree/zellij - Terminal multiplexer sessions
 *
 * Key modules:
 * - ZellijController: zellij command wrapper
 * - SessionReconciler: create / attach / recreate and teardown
 * - resolveLayout: per-project or default layout file
 */

export { ZellijController, parseSessionList } from './controller.js';
export { SessionReconciler, sessionName } from './reconciler.js';
export type { SessionReconcilerOptions } from './reconciler.js';
export { resolveLayout, projectLayoutPath } from './layout.js';
export type {
  Multiplexer,
  MultiplexerSession,
  CreateSessionOptions,
  OpenSessionRequest,
} from './types.js';
