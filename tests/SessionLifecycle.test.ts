import { describe, it, expect } from 'vitest';
import { decideOnMessage, isEvictable, isWithinContinuationWindow } from '../src/domain/session/lifecycle.js';
import { assertOperationAllowed, isTerminal, transition } from '../src/domain/session/stateMachine.js';
import { InvalidStateTransitionError } from '../src/domain/errors/index.js';
import { makeSession } from './fixtures.js';

const policy = { continuationWindowMinutes: 15, idleTtlMinutes: 0 };
const finalizedAt = new Date('2026-03-02T10:00:00Z');

function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60 * 1000);
}

describe('session lifecycle', () => {
  it('creates a session when none exists', () => {
    expect(decideOnMessage(null, finalizedAt, policy)).toBe('create');
  });

  it('amends a submitted order within the continuation window', () => {
    const session = makeSession({ state: 'submitted', lastFinalizedAt: finalizedAt });

    expect(decideOnMessage(session, minutesAfter(finalizedAt, 10), policy)).toBe('amend');
  });

  it('treats the window boundary as inside the window', () => {
    expect(isWithinContinuationWindow(finalizedAt, minutesAfter(finalizedAt, 15), 15)).toBe(true);
    expect(isWithinContinuationWindow(finalizedAt, new Date(minutesAfter(finalizedAt, 15).getTime() + 1), 15)).toBe(false);
  });

  it('starts over once the window has passed', () => {
    const session = makeSession({ state: 'submitted', lastFinalizedAt: finalizedAt });

    expect(decideOnMessage(session, minutesAfter(finalizedAt, 20), policy)).toBe('reset');
  });

  it('starts over after a cancellation', () => {
    const session = makeSession({ state: 'cancelled', lastActivityAt: finalizedAt });

    expect(decideOnMessage(session, minutesAfter(finalizedAt, 1), policy)).toBe('reset');
  });

  it('continues an open cart regardless of idle time by default', () => {
    const session = makeSession({ state: 'reviewing_summary', lastActivityAt: finalizedAt });

    expect(decideOnMessage(session, minutesAfter(finalizedAt, 10000), policy)).toBe('continue');
    expect(isEvictable(session, minutesAfter(finalizedAt, 10000), policy)).toBe(false);
  });

  it('drops an open cart idle past a configured TTL', () => {
    const session = makeSession({ state: 'reviewing_summary', lastActivityAt: finalizedAt });
    const withTtl = { ...policy, idleTtlMinutes: 240 };

    expect(decideOnMessage(session, minutesAfter(finalizedAt, 240), withTtl)).toBe('continue');
    expect(decideOnMessage(session, minutesAfter(finalizedAt, 241), withTtl)).toBe('reset');
  });

  it('marks only reset sessions as evictable', () => {
    const submitted = makeSession({ state: 'submitted', lastFinalizedAt: finalizedAt });

    expect(isEvictable(submitted, minutesAfter(finalizedAt, 5), policy)).toBe(false);
    expect(isEvictable(submitted, minutesAfter(finalizedAt, 16), policy)).toBe(true);
  });
});

describe('session state machine', () => {
  it('moves along allowed transitions', () => {
    const session = makeSession();

    transition(session, 'reviewing_summary');
    transition(session, 'awaiting_delivery_info');
    transition(session, 'awaiting_payment_selection');
    transition(session, 'submitted');

    expect(session.state).toBe('submitted');
    expect(isTerminal(session.state)).toBe(true);
  });

  it('rejects skipping the review step', () => {
    const session = makeSession();

    expect(() => transition(session, 'awaiting_payment_selection')).toThrow(InvalidStateTransitionError);
    expect(session.state).toBe('draft');
  });

  it('treats a transition to the current state as a no-op', () => {
    const session = makeSession({ state: 'awaiting_delivery_info' });

    transition(session, 'awaiting_delivery_info');

    expect(session.state).toBe('awaiting_delivery_info');
  });

  it('goes back to draft from PIX confirmation', () => {
    const session = makeSession({ state: 'awaiting_payment_confirmation' });

    expect(() => assertOperationAllowed('resumeEditing', session)).not.toThrow();
    transition(session, 'draft');

    expect(session.state).toBe('draft');
  });

  it('only lets the cart be edited in draft', () => {
    expect(() => assertOperationAllowed('addItem', makeSession())).not.toThrow();
    expect(() => assertOperationAllowed('addItem', makeSession({ state: 'reviewing_summary' }))).toThrow(
      InvalidStateTransitionError
    );
  });

  it('refuses everything but a fresh message once submitted', () => {
    const session = makeSession({ state: 'submitted' });

    for (const op of ['cancel', 'submit', 'selectPayment', 'requestSummary'] as const) {
      expect(() => assertOperationAllowed(op, session)).toThrow(InvalidStateTransitionError);
    }
  });
});
