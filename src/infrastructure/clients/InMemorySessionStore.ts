import type { Logger } from '../logger.js';
import type { Session } from '../../domain/models.js';
import type { ISessionStore } from './ISessionStore.js';
import { ResourceNotFoundError } from '../../domain/errors/index.js';
import { isEvictable, type SessionLifecyclePolicy } from '../../domain/session/lifecycle.js';

// in-memory session store with periodic eviction of finished sessions
export class InMemorySessionStore implements ISessionStore {
  private sessions: Map<string, Session> = new Map();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(
    private readonly policy: SessionLifecyclePolicy,
    private readonly logger?: Logger,
    enableAutoCleanup: boolean = true,
    cleanupIntervalMs: number = 60 * 1000
  ) {
    if (enableAutoCleanup) {
      this.cleanupInterval = setInterval(() => {
        this.cleanupFinishedSessions();
      }, cleanupIntervalMs);
      this.cleanupInterval.unref();
    }
  }

  async createSession(session: Session): Promise<Session> {
    this.sessions.set(session.customerId, structuredClone(session));
    return structuredClone(session);
  }

  async getSession(customerId: string): Promise<Session | null> {
    const session = this.sessions.get(customerId);
    return session ? structuredClone(session) : null;
  }

  async updateSession(session: Session): Promise<Session> {
    if (!this.sessions.has(session.customerId)) {
      throw new ResourceNotFoundError('Session', session.customerId);
    }
    this.sessions.set(session.customerId, structuredClone(session));
    return structuredClone(session);
  }

  async deleteSession(customerId: string): Promise<void> {
    this.sessions.delete(customerId);
  }

  cleanupFinishedSessions(now: Date = new Date()): number {
    const evicted: string[] = [];

    // collect first to avoid modifying map during iteration
    for (const [customerId, session] of this.sessions.entries()) {
      if (isEvictable(session, now, this.policy)) {
        evicted.push(customerId);
      }
    }

    for (const customerId of evicted) {
      this.sessions.delete(customerId);
    }

    if (evicted.length > 0) {
      this.logger?.info({ evicted: evicted.length }, 'evicted finished sessions');
    }
    return evicted.length;
  }

  // Utility methods for testing
  getSessionCount(): number {
    return this.sessions.size;
  }

  clearAllSessions(): void {
    this.sessions.clear();
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }
}
