import type { Logger } from 'pino';
import type { Session } from '../../domain/models.js';
import type { ISessionStore } from './ISessionStore.js';
import {
  SessionExpiredError,
  ResourceNotFoundError,
} from '../../domain/errors/index.js';

export interface InMemorySessionStoreOptions {
  enableAutoCleanup?: boolean;
  cleanupIntervalMs?: number;
  logger?: Logger;
}

function copySession(session: Session): Session {
  return { ...session, cart: { ...session.cart } };
}

// process-local session bag with expiry + periodic sweep
export class InMemorySessionStore implements ISessionStore {
  private sessions: Map<string, Session> = new Map();
  private cleanupInterval: NodeJS.Timeout | null = null;
  private readonly logger?: Logger;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.logger = options.logger;

    if (options.enableAutoCleanup ?? true) {
      this.cleanupInterval = setInterval(() => {
        this.cleanupExpiredSessions();
      }, options.cleanupIntervalMs ?? 60 * 1000);
      // a pending sweep must not hold the process open
      this.cleanupInterval.unref();
    }
  }

  async createSession(session: Session): Promise<Session> {
    this.sessions.set(session.sessionId, copySession(session));
    return copySession(session);
  }

  async getSession(sessionId: string): Promise<Session | null> {
    const session = this.sessions.get(sessionId);
    if (!session) return null;

    if (this.isExpired(session)) {
      this.sessions.delete(sessionId);
      throw new SessionExpiredError(sessionId);
    }

    return copySession(session);
  }

  async updateSession(session: Session): Promise<Session> {
    // expiry is enforced on read; a write carries its own refreshed expiresAt
    if (!this.sessions.has(session.sessionId)) {
      throw new ResourceNotFoundError('Session', session.sessionId);
    }

    this.sessions.set(session.sessionId, copySession(session));
    return copySession(session);
  }

  async deleteSession(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  private isExpired(session: Session): boolean {
    return Date.now() > session.expiresAt.getTime();
  }

  private cleanupExpiredSessions(): void {
    const expiredIds: string[] = [];

    // collect first, then delete
    for (const [sessionId, session] of this.sessions.entries()) {
      if (this.isExpired(session)) {
        expiredIds.push(sessionId);
      }
    }

    for (const sessionId of expiredIds) {
      this.sessions.delete(sessionId);
    }

    if (expiredIds.length > 0) {
      this.logger?.debug({ count: expiredIds.length }, 'evicted expired sessions');
    }
  }

  // Utility methods for testing
  getSessionCount(): number {
    return this.sessions.size;
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.sessions.clear();
  }
}
