import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SessionService } from '../src/domain/services/SessionService.js';
import { InMemorySessionStore } from '../src/infrastructure/session/InMemorySessionStore.js';
import {
  AuthenticationRequiredError,
  ResourceNotFoundError,
  SessionExpiredError,
  ValidationError,
} from '../src/domain/errors/index.js';
import type { Cart } from '../src/domain/models.js';

describe('SessionService', () => {
  let store: InMemorySessionStore;
  let sessions: SessionService;

  const increment = (cart: Cart): Cart => ({ ...cart, '1': (cart['1'] ?? 0) + 1 });

  beforeEach(() => {
    store = new InMemorySessionStore({ enableAutoCleanup: false });
    sessions = new SessionService(store);
  });

  afterEach(() => {
    store.destroy();
    vi.useRealTimers();
  });

  describe('create', () => {
    it('starts an anonymous session with an empty cart', async () => {
      const session = await sessions.create();

      expect(session.sessionId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i);
      expect(session.cart).toEqual({});
      expect(session.userId).toBeNull();
    });

    it('sets 30 min expiration by default', async () => {
      const session = await sessions.create();
      const timeDiff = session.expiresAt.getTime() - session.createdAt.getTime();

      expect(timeDiff).toBe(30 * 60 * 1000);
    });

    it('honours a custom TTL', async () => {
      const short = new SessionService(store, { sessionTtlMinutes: 5 });
      const session = await short.create();

      expect(session.expiresAt.getTime() - session.createdAt.getTime()).toBe(5 * 60 * 1000);
    });
  });

  describe('get', () => {
    it('throws error for invalid session ID', async () => {
      await expect(sessions.get('invalid-id')).rejects.toThrow(ValidationError);
    });

    it('throws 404 for an unknown session', async () => {
      await expect(sessions.get('550e8400-e29b-41d4-a716-446655440000')).rejects.toThrow(
        ResourceNotFoundError
      );
    });

    it('throws SessionExpiredError once the TTL has passed without writes', async () => {
      vi.useFakeTimers();
      const session = await sessions.create();

      vi.advanceTimersByTime(31 * 60 * 1000);

      await expect(sessions.get(session.sessionId)).rejects.toThrow(SessionExpiredError);
    });
  });

  describe('updateCart', () => {
    it('persists the new cart', async () => {
      const { sessionId } = await sessions.create();

      await sessions.updateCart(sessionId, increment);

      expect((await sessions.get(sessionId)).cart).toEqual({ '1': 1 });
    });

    it('serializes concurrent writes to one session', async () => {
      const { sessionId } = await sessions.create();

      await Promise.all([
        sessions.updateCart(sessionId, increment),
        sessions.updateCart(sessionId, increment),
        sessions.updateCart(sessionId, increment),
      ]);

      expect((await sessions.get(sessionId)).cart).toEqual({ '1': 3 });
    });

    it('pushes the expiry forward on every write', async () => {
      vi.useFakeTimers();
      const created = await sessions.create();

      vi.advanceTimersByTime(20 * 60 * 1000);
      const updated = await sessions.updateCart(created.sessionId, increment);

      expect(updated.expiresAt.getTime() - created.expiresAt.getTime()).toBe(20 * 60 * 1000);

      vi.advanceTimersByTime(20 * 60 * 1000);
      await expect(sessions.get(created.sessionId)).resolves.toMatchObject({ cart: { '1': 1 } });
    });
  });

  describe('modify', () => {
    it('returns the work result', async () => {
      const { sessionId } = await sessions.create();

      const result = await sessions.modify(sessionId, (session) => ({
        session: { ...session, cart: { '9': 2 } },
        result: 'done',
      }));

      expect(result).toBe('done');
      expect((await sessions.get(sessionId)).cart).toEqual({ '9': 2 });
    });

    it('hands work the refreshed expiry', async () => {
      vi.useFakeTimers();
      const created = await sessions.create();
      vi.advanceTimersByTime(10 * 60 * 1000);

      const seen = await sessions.modify(created.sessionId, (session) => ({
        session,
        result: session.expiresAt.getTime() - created.expiresAt.getTime(),
      }));

      expect(seen).toBe(10 * 60 * 1000);
    });

    it('commits a write that outlasts the TTL once it has started', async () => {
      vi.useFakeTimers();
      const short = new SessionService(store, { sessionTtlMinutes: 1 });
      const { sessionId } = await short.create();
      vi.advanceTimersByTime(60 * 1000 - 1);

      const result = await short.modify(sessionId, (session) => {
        vi.advanceTimersByTime(5);
        return { session: { ...session, cart: {} }, result: 'placed' };
      });

      expect(result).toBe('placed');
      await expect(short.get(sessionId)).resolves.toMatchObject({ cart: {} });
    });

    it('writes nothing when the work throws, and keeps the queue moving', async () => {
      const { sessionId } = await sessions.create();

      const failing = sessions.modify(sessionId, () => {
        throw new Error('boom');
      });
      const following = sessions.updateCart(sessionId, increment);

      await expect(failing).rejects.toThrow('boom');
      await expect(following).resolves.toMatchObject({ cart: { '1': 1 } });
    });
  });

  describe('users', () => {
    it('moves the cart to a new session id bound to the user', async () => {
      const { sessionId } = await sessions.create();
      await sessions.updateCart(sessionId, increment);

      const session = await sessions.login(sessionId, 7);

      expect(session.sessionId).not.toBe(sessionId);
      expect(session.cart).toEqual({ '1': 1 });
      expect(sessions.requireUser(session)).toBe(7);
      await expect(sessions.get(session.sessionId)).resolves.toMatchObject({ userId: 7 });
      await expect(sessions.get(sessionId)).rejects.toThrow(ResourceNotFoundError);
      expect(store.getSessionCount()).toBe(1);
    });

    it('requires a user', async () => {
      const session = await sessions.create();

      expect(() => sessions.requireUser(session)).toThrow(AuthenticationRequiredError);
    });
  });

  describe('destroy', () => {
    it('removes the session', async () => {
      const { sessionId } = await sessions.create();

      await sessions.destroy(sessionId);

      await expect(sessions.get(sessionId)).rejects.toThrow(ResourceNotFoundError);
      expect(store.getSessionCount()).toBe(0);
    });
  });
});
