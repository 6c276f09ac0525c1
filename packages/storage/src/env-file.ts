/**
 * Environment files
 *
 * `KEY=value` lines. Only PORT matters to the allocator; everything else in
 * a copied template is kept verbatim.
 */

import { readFile } from 'node:fs/promises';
import { errnoCode } from '@devtree/common';
import { writeFileAtomic } from './atomic-write.js';

const LINE_PATTERN = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=(.*)$/;

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && (trimmed[0] === '"' || trimmed[0] === "'") && trimmed.endsWith(trimmed[0])) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

export function parseEnv(content: string): Map<string, string> {
  const values = new Map<string, string>();
  for (const line of content.split('\n')) {
    if (line.trimStart().startsWith('#')) continue;
    const match = LINE_PATTERN.exec(line);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      values.set(match[1], unquote(match[2]));
    }
  }
  return values;
}

/**
 * Set `key` in env file content, replacing every existing assignment
 */
export function setEnvValue(content: string, key: string, value: string): string {
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  let replaced = false;
  const next: string[] = [];
  for (const line of lines) {
    const match = LINE_PATTERN.exec(line);
    if (match?.[1] === key && !line.trimStart().startsWith('#')) {
      if (!replaced) next.push(`${key}=${value}`);
      replaced = true;
    } else {
      next.push(line);
    }
  }
  if (!replaced) next.push(`${key}=${value}`);
  return `${next.join('\n')}\n`;
}

export async function readEnvFile(path: string): Promise<Map<string, string> | undefined> {
  try {
    return parseEnv(await readFile(path, 'utf-8'));
  } catch (error) {
    if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') return undefined;
    throw error;
  }
}

/**
 * PORT recorded in an env file, if it is a positive integer
 */
export async function readPort(path: string): Promise<number | undefined> {
  const port = (await readEnvFile(path))?.get('PORT');
  if (port === undefined || !/^\d+$/.test(port)) return undefined;
  return parseInt(port, 10);
}

/**
 * Write `path` from `template` (or nothing) with PORT set
 */
export async function writeEnvFile(path: string, port: number, template = ''): Promise<void> {
  await writeFileAtomic(path, setEnvValue(template, 'PORT', String(port)));
}
