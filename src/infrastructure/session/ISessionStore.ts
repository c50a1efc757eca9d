import type { Session } from '../../domain/models.js';

export interface ISessionStore {
  createSession(session: Session): Promise<Session>;
  // null when unknown; throws SessionExpiredError once past expiresAt
  getSession(sessionId: string): Promise<Session | null>;
  // replaces a stored session as given; ResourceNotFoundError when unknown
  updateSession(session: Session): Promise<Session>;
  deleteSession(sessionId: string): Promise<void>;
}
