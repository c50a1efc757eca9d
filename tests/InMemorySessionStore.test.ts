import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InMemorySessionStore } from '../src/infrastructure/session/InMemorySessionStore.js';
import { Session } from '../src/domain/models.js';
import { SessionExpiredError, ResourceNotFoundError } from '../src/domain/errors/index.js';

describe('InMemorySessionStore', () => {
  let store: InMemorySessionStore;

  beforeEach(() => {
    store = new InMemorySessionStore({ enableAutoCleanup: false });
  });

  afterEach(() => {
    store.destroy();
    vi.useRealTimers();
  });

  const makeSession = (id: string, expiresInMs = 5 * 60 * 1000): Session => ({
    sessionId: id,
    cart: {},
    userId: null,
    createdAt: new Date(),
    updatedAt: new Date(),
    expiresAt: new Date(Date.now() + expiresInMs),
  });

  describe('createSession', () => {
    it('stores session in memory', async () => {
      const created = await store.createSession(makeSession('test-001'));

      expect(created.sessionId).toBe('test-001');
      expect(store.getSessionCount()).toBe(1);
    });
  });

  describe('getSession', () => {
    it('retrieves existing session', async () => {
      await store.createSession(makeSession('test-002'));
      const retrieved = await store.getSession('test-002');

      expect(retrieved).not.toBeNull();
      expect(retrieved?.sessionId).toBe('test-002');
    });

    it('returns null for non-existent session', async () => {
      const result = await store.getSession('non-existent');
      expect(result).toBeNull();
    });

    it('hands out copies, not the stored cart', async () => {
      await store.createSession({ ...makeSession('test-copy'), cart: { '1': 2 } });

      const first = await store.getSession('test-copy');
      if (!first) throw new Error('session missing');
      Object.assign(first.cart, { '1': 99 });

      const second = await store.getSession('test-copy');
      expect(second?.cart).toEqual({ '1': 2 });
    });

    it('throws SessionExpiredError past expiresAt', async () => {
      await store.createSession(makeSession('expired', -1000));

      await expect(store.getSession('expired')).rejects.toThrow(SessionExpiredError);
    });

    it('removes expired session from storage', async () => {
      await store.createSession(makeSession('expired-2', -1000));
      expect(store.getSessionCount()).toBe(1);

      await expect(store.getSession('expired-2')).rejects.toThrow(SessionExpiredError);

      expect(store.getSessionCount()).toBe(0);
    });
  });

  describe('updateSession', () => {
    it('updates existing session', async () => {
      const session = makeSession('test-003');
      await store.createSession(session);

      const result = await store.updateSession({ ...session, cart: { '7': 3 }, userId: 12 });
      const stored = await store.getSession('test-003');

      expect(result.cart).toEqual({ '7': 3 });
      expect(stored?.userId).toBe(12);
    });

    it('throws error for non-existent session', async () => {
      await expect(store.updateSession(makeSession('non-existent'))).rejects.toThrow(
        ResourceNotFoundError
      );
    });

    it('accepts a refreshed write after the stored copy lapsed', async () => {
      const session = makeSession('expired-3', -1000);
      await store.createSession(session);
      const expiresAt = new Date(Date.now() + 60 * 1000);

      await store.updateSession({ ...session, cart: { '2': 1 }, expiresAt });

      await expect(store.getSession('expired-3')).resolves.toMatchObject({
        cart: { '2': 1 },
        expiresAt,
      });
    });
  });

  describe('deleteSession', () => {
    it('deletes session from storage', async () => {
      await store.createSession(makeSession('test-004'));
      expect(store.getSessionCount()).toBe(1);

      await store.deleteSession('test-004');
      expect(store.getSessionCount()).toBe(0);
    });

    it('handles deleting non-existent session', async () => {
      await expect(store.deleteSession('non-existent')).resolves.toBeUndefined();
    });
  });

  describe('auto cleanup', () => {
    it('sweeps expired sessions on the interval', async () => {
      vi.useFakeTimers();
      const sweeping = new InMemorySessionStore({ cleanupIntervalMs: 1000 });

      await sweeping.createSession(makeSession('live'));
      await sweeping.createSession(makeSession('stale', 500));
      expect(sweeping.getSessionCount()).toBe(2);

      vi.advanceTimersByTime(1000);

      expect(sweeping.getSessionCount()).toBe(1);
      expect(await sweeping.getSession('live')).not.toBeNull();
      sweeping.destroy();
    });
  });

  describe('utility methods', () => {
    it('tracks session count', async () => {
      expect(store.getSessionCount()).toBe(0);

      await store.createSession(makeSession('s-1'));
      await store.createSession(makeSession('s-2'));
      expect(store.getSessionCount()).toBe(2);

      await store.deleteSession('s-1');
      expect(store.getSessionCount()).toBe(1);
    });

    it('destroy clears everything', async () => {
      await store.createSession(makeSession('s-1'));
      store.destroy();
      expect(store.getSessionCount()).toBe(0);
    });
  });
});
