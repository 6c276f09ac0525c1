/**
 * Worktree Commands Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AllocationExhaustedError,
  CancelledError,
  UnsafeLocationError,
} from '@devtree/common';

const { runtime, spinner } = vi.hoisted(() => ({
  spinner: {
    isSpinning: false,
    start: vi.fn(),
    succeed: vi.fn(),
    fail: vi.fn(),
  },
  runtime: {
    manager: {
      create: vi.fn(),
      open: vi.fn(),
      remove: vi.fn(),
      list: vi.fn(),
      recent: vi.fn(),
    },
  },
}));

vi.mock('../runtime.js', () => ({
  loadRuntime: vi.fn(() => runtime),
  resolveProject: vi.fn(async (_ctx: unknown, dir?: string) => dir ?? '/home/dev/shop'),
}));

vi.mock('../output.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../output.js')>()),
  confirm: vi.fn(),
}));

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    yellow: (s: string) => s,
    green: (s: string) => s,
    red: (s: string) => s,
  },
}));

vi.mock('ora', () => ({
  default: vi.fn(() => spinner),
}));

import ora from 'ora';
import { confirm } from '../output.js';
import { createProgram } from '../program.js';
import { createCommand, deleteCommand, listCommand, openCommand } from './worktree.js';

class ProcessExit extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${code})`);
  }
}

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync(args, { from: 'user' });
}

describe('Worktree Commands', () => {
  const logged = () => vi.mocked(console.log).mock.calls.map((call) => call.join(' '));

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ProcessExit(code);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Command Structure', () => {
    it('defines create, open, delete and list', () => {
      expect(createCommand().name()).toBe('create');
      expect(openCommand().name()).toBe('open');
      expect(deleteCommand().name()).toBe('delete');
      expect(listCommand().name()).toBe('list');
    });

    it('aliases delete as rm and list as ls', () => {
      expect(deleteCommand().aliases()).toContain('rm');
      expect(listCommand().aliases()).toContain('ls');
    });

    it('has a --yes option on delete', () => {
      expect(deleteCommand().options.map((o) => o.long)).toContain('--yes');
    });
  });

  describe('create', () => {
    it('creates the worktree in the current project and prints its details', async () => {
      runtime.manager.create.mockResolvedValue({
        success: true,
        data: {
          projectPath: '/home/dev/shop',
          branch: 'feature',
          path: '/home/dev/shop/.worktrees/feature',
          offset: 1,
          port: 3010,
          envFile: '/home/dev/shop/.worktrees/feature/.env',
          sessionName: 'shop-feature',
        },
      });

      await run('create', 'feature');

      expect(runtime.manager.create).toHaveBeenCalledWith('/home/dev/shop', 'feature', {
        onStep: expect.any(Function),
      });
      expect(logged()).toEqual([
        'Worktree "feature" created',
        '  Path: /home/dev/shop/.worktrees/feature',
        '  Port: 3010',
        '  Session: shop-feature',
      ]);
    });

    it('uses the --project option', async () => {
      runtime.manager.create.mockResolvedValue({
        success: true,
        data: { path: '/srv/api/.worktrees/x', port: 3010, sessionName: 'api-x' },
      });

      await run('--project', '/srv/api', 'create', 'x');

      expect(runtime.manager.create).toHaveBeenCalledWith('/srv/api', 'x', { onStep: expect.any(Function) });
    });

    it('spins only while git checks out the worktree', async () => {
      const order: string[] = [];
      spinner.start.mockImplementation(() => order.push('start'));
      spinner.succeed.mockImplementation((text: string) => order.push(`succeed:${text}`));
      runtime.manager.create.mockImplementation(
        async (_project: string, _branch: string, options: { onStep: (step: string) => void }) => {
          options.onStep('checkout');
          order.push('git');
          options.onStep('configure');
          order.push('setup');
          return { success: true, data: { path: '/p/.worktrees/feature', port: 3010, sessionName: 'p-feature' } };
        }
      );

      await run('create', 'feature');

      expect(ora).toHaveBeenCalledWith('Checking out "feature"...');
      expect(order).toEqual(['start', 'git', 'succeed:Checked out "feature"', 'setup']);
    });

    it('prints one error line and exits 1 on failure', async () => {
      runtime.manager.create.mockResolvedValue({ success: false, error: new AllocationExhaustedError(100) });

      await expect(run('create', 'feature')).rejects.toThrow('process.exit(1)');
      expect(console.error).toHaveBeenCalledWith('Error: Failed to allocate port after 100 attempts');
    });
  });

  describe('open', () => {
    it('reports the session action', async () => {
      runtime.manager.open.mockResolvedValue({ success: true, data: 'attached' });

      await run('open', 'feature');

      expect(runtime.manager.open).toHaveBeenCalledWith('/home/dev/shop', 'feature');
      expect(logged()).toEqual(['Session attached']);
    });
  });

  describe('delete', () => {
    const removed = {
      success: true,
      data: { projectPath: '/home/dev/shop', branch: 'feature', path: '/home/dev/shop/.worktrees/feature', forced: false },
    };

    it('asks for confirmation by default', async () => {
      runtime.manager.remove.mockResolvedValue(removed);

      await run('delete', 'feature');

      expect(runtime.manager.remove).toHaveBeenCalledWith('/home/dev/shop', 'feature', { confirm });
      expect(logged()).toEqual(['Deleted worktree "feature"']);
    });

    it('skips confirmation with --yes through the rm alias', async () => {
      runtime.manager.remove.mockResolvedValue(removed);

      await run('rm', 'feature', '-y');

      expect(runtime.manager.remove).toHaveBeenCalledWith('/home/dev/shop', 'feature', { confirm: undefined });
    });

    it('mentions a forced removal', async () => {
      runtime.manager.remove.mockResolvedValue({ success: true, data: { ...removed.data, forced: true } });

      await run('delete', 'feature', '--yes');

      expect(logged()).toEqual([
        'Deleted worktree "feature"',
        '  git could not remove it; the directory was deleted and metadata pruned',
      ]);
    });

    it('treats a declined confirmation as a normal exit', async () => {
      runtime.manager.remove.mockResolvedValue({ success: false, error: new CancelledError() });

      await run('delete', 'feature');

      expect(logged()).toEqual(['Cancelled.']);
      expect(process.exit).not.toHaveBeenCalled();
    });

    it('exits 1 when the safety gate refuses', async () => {
      runtime.manager.remove.mockResolvedValue({
        success: false,
        error: new UnsafeLocationError('/home/dev/shop', '/home/dev/shop/.worktrees'),
      });

      await expect(run('delete', 'main', '-y')).rejects.toThrow('process.exit(1)');
      expect(console.error).toHaveBeenCalledWith(
        "Error: Worktree must be inside '/home/dev/shop/.worktrees'. Got: /home/dev/shop"
      );
    });
  });

  describe('list', () => {
    const listing = [
      {
        branch: 'feature',
        path: '/home/dev/shop/.worktrees/feature',
        port: 3010,
        sessionName: 'shop-feature',
        session: 'alive',
      },
      {
        branch: 'spike',
        path: '/home/dev/shop/.worktrees/spike',
        sessionName: 'shop-spike',
        session: 'absent',
      },
    ];

    it('prints one row per worktree', async () => {
      runtime.manager.list.mockResolvedValue({ success: true, data: listing });

      await run('list');

      expect(logged()).toEqual([
        '\nWorktrees (2):\n',
        `${'feature'.padEnd(24)}${'3010'.padEnd(8)}${'alive'.padEnd(8)}/home/dev/shop/.worktrees/feature`,
        `${'spike'.padEnd(24)}${'-'.padEnd(8)}${'absent'.padEnd(8)}/home/dev/shop/.worktrees/spike`,
        '',
      ]);
    });

    it('prints JSON with --json', async () => {
      runtime.manager.list.mockResolvedValue({ success: true, data: listing });

      await run('ls', '--json');

      expect(console.log).toHaveBeenCalledWith(JSON.stringify(listing, null, 2));
    });

    it('strips control characters from branch names', async () => {
      runtime.manager.list.mockResolvedValue({
        success: true,
        data: [{ ...listing[0], branch: 'feat\u0007ure' }],
      });

      await run('list');

      expect(logged()[1]).toBe(
        `${'feature'.padEnd(24)}${'3010'.padEnd(8)}${'alive'.padEnd(8)}/home/dev/shop/.worktrees/feature`
      );
    });

    it('says so when there are none', async () => {
      runtime.manager.list.mockResolvedValue({ success: true, data: [] });

      await run('list');

      expect(logged()).toEqual(['No worktrees found.']);
    });
  });
});
