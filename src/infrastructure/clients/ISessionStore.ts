import type { Session } from '../../domain/models.js';

// sessions are keyed by customer identifier; one active session per customer
export interface ISessionStore {
  createSession(session: Session): Promise<Session>;
  getSession(customerId: string): Promise<Session | null>;
  updateSession(session: Session): Promise<Session>;
  deleteSession(customerId: string): Promise<void>;
}
