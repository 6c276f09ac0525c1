/**
 * Zod validation schemas for all input data
 */

import { isAbsolute, normalize } from 'node:path';
import { z } from 'zod';
import { expandHome } from './utils.js';

// ============================================================================
// Branch Schemas
// ============================================================================

// '|' separates fields in the recent-access registry
const FORBIDDEN_BRANCH_CHARS = /[\s~^:?*[\]\\|]/;

export const branchNameSchema = z.string().superRefine((branch, ctx) => {
  const fail = (message: string) => ctx.addIssue({ code: z.ZodIssueCode.custom, message });

  if (branch.length === 0) {
    fail('Branch name cannot be empty');
    return;
  }
  if (FORBIDDEN_BRANCH_CHARS.test(branch) || branch.includes('..') || branch.includes('@{') || branch.includes('//')) {
    fail(`Invalid branch name: '${branch}'. Branch names cannot contain spaces or special characters like ~^:?*[\\|@{ or ..`);
    return;
  }
  // the branch becomes a single directory name under the worktrees dir
  if (branch.includes('/')) {
    fail(`Invalid branch name: '${branch}'. Branch names cannot contain slashes ('/')`);
    return;
  }
  if (branch.startsWith('.')) {
    fail(`Invalid branch name: '${branch}'. Branch names cannot start with '.'`);
    return;
  }
  if (branch.endsWith('.lock')) {
    fail(`Invalid branch name: '${branch}'. Branch names cannot end with '.lock'`);
  }
});

// ============================================================================
// Path and Port Schemas
// ============================================================================

export const projectPathSchema = z.string()
  .min(1, 'Directory path cannot be empty')
  .transform((value) => normalize(expandHome(value)).replace(/(.)\/+$/, '$1'))
  .refine((value) => isAbsolute(value), (value) => ({ message: `Project path must be absolute: ${value}` }));

export const portSchema = z.number()
  .int('Invalid port number')
  .min(1024, 'Port number out of range (1024-65535)')
  .max(65535, 'Port number out of range (1024-65535)');

// ============================================================================
// Registry Schemas
// ============================================================================

export const recentAccessEntrySchema = z.object({
  timestamp: z.number().int().nonnegative(),
  projectPath: z.string().min(1),
  branch: z.string().min(1),
});

// ============================================================================
// Config Schemas
// ============================================================================

export const configFileSchema = z.object({
  worktreesDirName: z.string().min(1).optional(),
  envFileName: z.string().min(1).optional(),
  envTemplateNames: z.array(z.string().min(1)).optional(),
  basePort: portSchema.optional(),
  portStep: z.number().int().min(1).max(1000).optional(),
  maxAllocationAttempts: z.number().int().min(1).max(10000).optional(),
  staleLockMaxAgeMs: z.number().int().min(0).optional(),
  recentLimit: z.number().int().min(1).max(100).optional(),
  sessionKillGraceMs: z.number().int().min(0).max(60000).optional(),
  multiplexerBinary: z.string().min(1).optional(),
  layoutFileName: z.string().min(1).optional(),
  defaultLayoutFile: z.string().min(1).optional(),
  setupDir: z.string().min(1).optional(),
  sharedResources: z.array(z.string().min(1)).optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================================================
// Utility Functions
// ============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: result.error.errors
      .map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
      .join(', ')
  };
}

/**
 * Strip control characters and markup-ish characters before echoing user input
 */
export function sanitizeForDisplay(input: string): string {
  return input.replace(/[^\x20-\x7e]/g, '').replace(/[<>&]/g, '');
}
