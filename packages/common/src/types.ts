/**
 * Core type definitions shared across all packages
 */

import type { DevtreeError } from './errors.js';

// ============================================================================
// Result Types
// ============================================================================

export type Result<T, E extends DevtreeError = DevtreeError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function err<E extends DevtreeError>(error: E): { success: false; error: E } {
  return { success: false, error };
}

// ============================================================================
// Recent Access Types
// ============================================================================

export interface RecentAccessEntry {
  /** Unix time in seconds */
  timestamp: number;
  projectPath: string;
  branch: string;
}

// ============================================================================
// Worktree Types
// ============================================================================

export interface WorktreeInfo {
  path: string;
  /** Short branch name, absent for a detached HEAD */
  branch?: string;
  head?: string;
  bare?: boolean;
}

export interface WorktreeEnvironment {
  projectPath: string;
  branch: string;
  path: string;
  offset: number;
  port: number;
  envFile: string;
  sessionName: string;
}

// ============================================================================
// Session Types
// ============================================================================

export type SessionState = 'absent' | 'alive' | 'exited';

export type SessionAction = 'created' | 'attached' | 'recreated';
