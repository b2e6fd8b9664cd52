import type { Session } from '../models.js';

export interface SessionLifecyclePolicy {
  continuationWindowMinutes: number;
  idleTtlMinutes: number; // 0 keeps unfinished carts until finalized or cancelled
}

export type AcquireDecision = 'create' | 'continue' | 'amend' | 'reset';

const MINUTE_MS = 60 * 1000;

export function isWithinContinuationWindow(lastFinalizedAt: Date, now: Date, windowMinutes: number): boolean {
  return now.getTime() - lastFinalizedAt.getTime() <= windowMinutes * MINUTE_MS;
}

// what an incoming message does to the stored session
export function decideOnMessage(session: Session | null, now: Date, policy: SessionLifecyclePolicy): AcquireDecision {
  if (!session) return 'create';

  switch (session.state) {
    case 'cancelled':
      return 'reset';
    case 'submitted':
      if (session.lastFinalizedAt && isWithinContinuationWindow(session.lastFinalizedAt, now, policy.continuationWindowMinutes)) {
        return 'amend';
      }
      return 'reset';
    default:
      if (policy.idleTtlMinutes > 0 && now.getTime() - session.lastActivityAt.getTime() > policy.idleTtlMinutes * MINUTE_MS) {
        return 'reset';
      }
      return 'continue';
  }
}

export function isEvictable(session: Session, now: Date, policy: SessionLifecyclePolicy): boolean {
  return decideOnMessage(session, now, policy) === 'reset';
}
