/**
 * Env File Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseEnv, readPort, setEnvValue, writeEnvFile } from './env-file.js';

describe('parseEnv', () => {
  it('reads key=value lines', () => {
    const env = parseEnv('PORT=3010\nDATABASE_URL="postgres://localhost/dev"\n# PORT=1\nexport MODE=dev\n');

    expect(env.get('PORT')).toBe('3010');
    expect(env.get('DATABASE_URL')).toBe('postgres://localhost/dev');
    expect(env.get('MODE')).toBe('dev');
    expect(env.size).toBe(3);
  });
});

describe('setEnvValue', () => {
  it('appends to empty content', () => {
    expect(setEnvValue('', 'PORT', '3010')).toBe('PORT=3010\n');
  });

  it('replaces an existing assignment in place', () => {
    expect(setEnvValue('A=1\nPORT=3000\nB=2\n', 'PORT', '3020')).toBe('A=1\nPORT=3020\nB=2\n');
  });

  it('collapses duplicate assignments', () => {
    expect(setEnvValue('PORT=1\nPORT=2\n', 'PORT', '3030')).toBe('PORT=3030\n');
  });

  it('leaves comments alone', () => {
    expect(setEnvValue('# PORT=1\nA=1', 'PORT', '3010')).toBe('# PORT=1\nA=1\nPORT=3010\n');
  });
});

describe('env files on disk', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'devtree-env-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes a template with PORT set', async () => {
    const envFile = join(dir, '.env');
    await writeEnvFile(envFile, 3010, 'RAILS_ENV=development\nPORT=3000\n');

    expect(readFileSync(envFile, 'utf-8')).toBe('RAILS_ENV=development\nPORT=3010\n');
  });

  it('reads the recorded port', async () => {
    const envFile = join(dir, '.env');
    writeFileSync(envFile, 'A=1\nPORT=3040\n');

    expect(await readPort(envFile)).toBe(3040);
  });

  it('ignores missing files and non-numeric ports', async () => {
    expect(await readPort(join(dir, 'missing'))).toBeUndefined();

    const envFile = join(dir, '.env');
    writeFileSync(envFile, 'PORT=abc\n');
    expect(await readPort(envFile)).toBeUndefined();
  });
});
