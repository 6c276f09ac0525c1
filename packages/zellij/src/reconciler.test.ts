/**
 * SessionReconciler Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DependencyError, SessionError } from '@devtree/common';
import type { Logger } from '@devtree/common';
import { SessionReconciler, sessionName } from './reconciler.js';
import type { CreateSessionOptions, Multiplexer, MultiplexerSession } from './types.js';

class FakeMultiplexer implements Multiplexer {
  readonly binary = 'zellij';
  installed = true;
  sessions = new Map<string, MultiplexerSession['state']>();
  calls: string[] = [];
  failKill = false;
  failDelete = false;
  failCreate = false;
  /** zellij keeps a killed session around as an exited record */
  killLeavesRecord = true;

  isInstalled(): boolean {
    return this.installed;
  }

  listSessions(): MultiplexerSession[] {
    return [...this.sessions].map(([name, state]) => ({ name, state, raw: name }));
  }

  createSession(name: string, options: CreateSessionOptions): void {
    this.calls.push(`create:${name}:${options.cwd}:${options.layout ?? '-'}`);
    if (this.failCreate) throw new Error('zellij crashed');
    this.sessions.set(name, 'alive');
  }

  attachSession(name: string): void {
    this.calls.push(`attach:${name}`);
  }

  killSession(name: string): boolean {
    this.calls.push(`kill:${name}`);
    if (this.failKill) return false;
    if (this.killLeavesRecord) this.sessions.set(name, 'exited');
    else this.sessions.delete(name);
    return true;
  }

  deleteSession(name: string): boolean {
    this.calls.push(`delete:${name}`);
    if (this.failDelete) return false;
    this.sessions.delete(name);
    return true;
  }
}

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  const logger: Logger & { warnings: string[] } = {
    warnings,
    debug: () => {},
    info: () => {},
    warn: (message: string) => {
      warnings.push(message);
    },
    error: () => {},
    child: () => logger,
  };
  return logger;
}

const makeWait = () => vi.fn(async (_ms: number) => {});

describe('sessionName', () => {
  it('joins the project directory name and branch', () => {
    expect(sessionName('/home/dev/shop', 'feature-x')).toBe('shop-feature-x');
  });
});

describe('SessionReconciler', () => {
  let mux: FakeMultiplexer;
  let wait: ReturnType<typeof makeWait>;
  let reconciler: SessionReconciler;

  beforeEach(() => {
    mux = new FakeMultiplexer();
    wait = makeWait();
    reconciler = new SessionReconciler(mux, { graceMs: 500, sleep: wait });
  });

  describe('state()', () => {
    it('reports absent, alive and exited sessions', () => {
      mux.sessions.set('a', 'alive');
      mux.sessions.set('b', 'exited');

      expect(reconciler.state('a')).toBe('alive');
      expect(reconciler.state('b')).toBe('exited');
      expect(reconciler.state('c')).toBe('absent');
    });
  });

  describe('open()', () => {
    it('creates an absent session with cwd and layout', () => {
      const result = reconciler.open({ name: 'shop-x', cwd: '/w/x', layout: '/l.kdl' });

      expect(result).toEqual({ success: true, data: 'created' });
      expect(mux.calls).toEqual(['create:shop-x:/w/x:/l.kdl']);
    });

    it('attaches to a live session', () => {
      mux.sessions.set('shop-x', 'alive');

      const result = reconciler.open({ name: 'shop-x', cwd: '/w/x' });

      expect(result).toEqual({ success: true, data: 'attached' });
      expect(mux.calls).toEqual(['attach:shop-x']);
    });

    it('deletes an exited session and creates a new one, never attaching', () => {
      mux.sessions.set('shop-x', 'exited');

      const result = reconciler.open({ name: 'shop-x', cwd: '/w/x' });

      expect(result).toEqual({ success: true, data: 'recreated' });
      expect(mux.calls).toEqual(['delete:shop-x', 'create:shop-x:/w/x:-']);
    });

    it('fails when the exited record cannot be deleted', () => {
      mux.sessions.set('shop-x', 'exited');
      mux.failDelete = true;

      const result = reconciler.open({ name: 'shop-x', cwd: '/w/x' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(SessionError);
        expect(result.error.message).toBe('Failed to delete exited session: shop-x');
      }
      expect(mux.calls).toEqual(['delete:shop-x']);
    });

    it('reports a missing multiplexer without touching sessions', () => {
      mux.installed = false;

      const result = reconciler.open({ name: 'shop-x', cwd: '/w/x' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(DependencyError);
        expect(result.error.message).toBe('Missing required dependency: zellij');
      }
      expect(mux.calls).toEqual([]);
    });

    it('wraps multiplexer failures as SessionError', () => {
      mux.failCreate = true;

      const result = reconciler.open({ name: 'shop-x', cwd: '/w/x' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(SessionError);
        expect(result.error.message).toBe('zellij crashed');
      }
    });
  });

  describe('teardown()', () => {
    it('kills, waits the grace period, then deletes a live session', async () => {
      mux.sessions.set('shop-x', 'alive');

      await reconciler.teardown('shop-x');

      expect(mux.calls).toEqual(['kill:shop-x', 'delete:shop-x']);
      expect(wait).toHaveBeenCalledWith(500);
      expect(reconciler.state('shop-x')).toBe('absent');
    });

    it('skips delete when the kill left nothing behind', async () => {
      mux.sessions.set('shop-x', 'alive');
      mux.killLeavesRecord = false;

      await reconciler.teardown('shop-x');

      expect(mux.calls).toEqual(['kill:shop-x']);
    });

    it('only deletes an exited session', async () => {
      mux.sessions.set('shop-x', 'exited');

      await reconciler.teardown('shop-x');

      expect(mux.calls).toEqual(['delete:shop-x']);
      expect(wait).not.toHaveBeenCalled();
    });

    it('does nothing for an absent session', async () => {
      await reconciler.teardown('shop-x');

      expect(mux.calls).toEqual([]);
    });

    it('succeeds silently when the multiplexer is not installed', async () => {
      mux.installed = false;
      mux.sessions.set('shop-x', 'alive');

      await expect(reconciler.teardown('shop-x')).resolves.toBeUndefined();
      expect(mux.calls).toEqual([]);
    });

    it('warns and carries on when kill and delete fail', async () => {
      const logger = recordingLogger();
      reconciler = new SessionReconciler(mux, { graceMs: 500, sleep: wait, logger });
      mux.sessions.set('shop-x', 'alive');
      mux.failKill = true;
      mux.failDelete = true;

      await reconciler.teardown('shop-x');

      expect(mux.calls).toEqual(['kill:shop-x', 'delete:shop-x']);
      expect(logger.warnings).toEqual([
        'Failed to kill session shop-x',
        'Failed to delete session shop-x',
      ]);
    });
  });
});
