/**
 * Output Helper Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { NotFoundError, err, ok } from '@devtree/common';

const { answer } = vi.hoisted(() => ({ answer: { value: '' } }));

vi.mock('node:readline', () => ({
  createInterface: vi.fn(() => ({
    question: (_query: string, callback: (reply: string) => void) => callback(answer.value),
    close: vi.fn(),
  })),
}));

vi.mock('chalk', () => ({
  default: {
    gray: (s: string) => s,
    green: (s: string) => s,
    red: (s: string) => s,
    yellow: (s: string) => s,
  },
}));

import { confirm, createCliLogger, unwrap } from './output.js';

class ProcessExit extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${code})`);
  }
}

describe('createCliLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes warnings', () => {
    createCliLogger(false).warn('.env.local not found: /home/dev/shop/.env.local - skipping');
    expect(console.warn).toHaveBeenCalledWith('Warning: .env.local not found: /home/dev/shop/.env.local - skipping');
  });

  it('prints debug lines only when enabled', () => {
    createCliLogger(false).debug('hidden');
    createCliLogger(true).child('PORTS').debug('shown');
    expect(vi.mocked(console.log).mock.calls).toEqual([['shown']]);
  });
});

describe('unwrap', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ProcessExit(code);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the data of a success', () => {
    expect(unwrap(ok(3010))).toBe(3010);
  });

  it('prints the error and exits 1 on failure', () => {
    expect(() => unwrap(err(new NotFoundError('Worktree', 'spike')))).toThrow('process.exit(1)');
    expect(console.error).toHaveBeenCalledWith("Error: Worktree 'spike' not found");
  });
});

describe('confirm', () => {
  it.each([
    ['y', true],
    ['Yes', true],
    [' YES ', true],
    ['', false],
    ['n', false],
    ['yep', false],
  ])('answer %j gives %s', async (reply, expected) => {
    answer.value = reply;
    await expect(confirm('Delete worktree?')).resolves.toBe(expected);
  });
});
