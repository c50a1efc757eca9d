import { v4 as uuidv4 } from 'uuid';
import type { Cart, Session } from '../models.js';
import type { ISessionStore } from '../../infrastructure/session/ISessionStore.js';
import {
  AuthenticationRequiredError,
  ResourceNotFoundError,
  ValidationError,
} from '../errors/index.js';
import { EMPTY_CART } from './CartService.js';

const UUID_V4_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export interface SessionChange<T> {
  session: Session;
  result: T;
}

// visitor sessions; writes to one session run one at a time
export class SessionService {
  private ttlMinutes: number;
  private queues: Map<string, Promise<void>> = new Map();

  constructor(
    private readonly store: ISessionStore,
    config?: {
      sessionTtlMinutes?: number;
    }
  ) {
    this.ttlMinutes = config?.sessionTtlMinutes ?? 30;
  }

  async create(): Promise<Session> {
    const now = new Date();

    return this.store.createSession({
      sessionId: uuidv4(),
      cart: EMPTY_CART,
      userId: null,
      createdAt: now,
      updatedAt: now,
      expiresAt: this.expiryFrom(now),
    });
  }

  async get(sessionId: string): Promise<Session> {
    this.validateSessionId(sessionId);
    const session = await this.store.getSession(sessionId);
    if (!session) throw new ResourceNotFoundError('Session', sessionId);
    return session;
  }

  /**
   * Read-modify-write on one session. Calls for the same session are queued
   * so concurrent requests (two tabs) never overwrite each other's changes.
   * work receives the session with its expiry already pushed forward, so a
   * slow write cannot lapse between the read and the store update.
   * Nothing is written if work throws.
   */
  async modify<T>(sessionId: string, work: (session: Session) => SessionChange<T>): Promise<T> {
    this.validateSessionId(sessionId);

    return this.serialize(sessionId, async () => {
      const current = await this.get(sessionId);
      const { session, result } = work(this.refresh(current));
      await this.store.updateSession(session);
      return result;
    });
  }

  async updateCart(sessionId: string, mutate: (cart: Cart) => Cart): Promise<Session> {
    return this.modify(sessionId, (session) => {
      const next = { ...session, cart: mutate(session.cart) };
      return { session: next, result: next };
    });
  }

  /**
   * Moves the visitor's cart to a new session id bound to userId. The old id
   * is deleted, so an id handed out before login cannot ride the login.
   */
  async login(sessionId: string, userId: number): Promise<Session> {
    this.validateSessionId(sessionId);

    return this.serialize(sessionId, async () => {
      const current = await this.get(sessionId);
      const rotated = await this.store.createSession({
        ...this.refresh(current),
        sessionId: uuidv4(),
        userId,
      });
      await this.store.deleteSession(sessionId);
      return rotated;
    });
  }

  async destroy(sessionId: string): Promise<void> {
    this.validateSessionId(sessionId);
    await this.serialize(sessionId, () => this.store.deleteSession(sessionId));
  }

  requireUser(session: Session): number {
    if (session.userId === null) throw new AuthenticationRequiredError();
    return session.userId;
  }

  private async serialize<T>(sessionId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const run = previous.then(work);
    const tail: Promise<void> = run.then(
      () => this.release(sessionId, tail),
      () => this.release(sessionId, tail)
    );
    this.queues.set(sessionId, tail);
    return run;
  }

  private release(sessionId: string, tail: Promise<void>): void {
    if (this.queues.get(sessionId) === tail) {
      this.queues.delete(sessionId);
    }
  }

  private refresh(session: Session): Session {
    const now = new Date();
    return { ...session, updatedAt: now, expiresAt: this.expiryFrom(now) };
  }

  private expiryFrom(date: Date): Date {
    return new Date(date.getTime() + this.ttlMinutes * 60 * 1000);
  }

  private validateSessionId(sessionId: string): void {
    if (!UUID_V4_RE.test(sessionId)) {
      throw new ValidationError('Invalid session ID format. Expected UUID v4.', ['sessionId']);
    }
  }
}
