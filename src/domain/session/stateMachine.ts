import type { Session, SessionState } from '../models.js';
import { InvalidStateTransitionError } from '../errors/index.js';

export type SessionOperation =
  | 'addItem'
  | 'removeItem'
  | 'clearCart'
  | 'requestSummary'
  | 'resumeEditing'
  | 'setDeliveryInfo'
  | 'selectPayment'
  | 'confirmPayment'
  | 'submit'
  | 'cancel';

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  draft: ['reviewing_summary', 'cancelled'],
  reviewing_summary: ['draft', 'awaiting_delivery_info', 'awaiting_payment_selection', 'cancelled'],
  awaiting_delivery_info: ['draft', 'awaiting_payment_selection', 'cancelled'],
  awaiting_payment_selection: [
    'draft',
    'awaiting_delivery_info',
    'awaiting_payment_confirmation',
    'reviewing_summary',
    'submitted',
    'cancelled',
  ],
  awaiting_payment_confirmation: ['draft', 'reviewing_summary', 'submitted', 'cancelled'],
  submitted: [],
  cancelled: [],
};

const ALLOWED_IN: Record<SessionOperation, readonly SessionState[]> = {
  addItem: ['draft'],
  removeItem: ['draft'],
  clearCart: ['draft'],
  requestSummary: [
    'draft',
    'reviewing_summary',
    'awaiting_delivery_info',
    'awaiting_payment_selection',
    'awaiting_payment_confirmation',
  ],
  resumeEditing: [
    'draft',
    'reviewing_summary',
    'awaiting_delivery_info',
    'awaiting_payment_selection',
    'awaiting_payment_confirmation',
  ],
  setDeliveryInfo: ['reviewing_summary', 'awaiting_delivery_info', 'awaiting_payment_selection'],
  selectPayment: ['awaiting_payment_selection'],
  confirmPayment: ['awaiting_payment_confirmation'],
  submit: ['awaiting_payment_selection'],
  cancel: [
    'draft',
    'reviewing_summary',
    'awaiting_delivery_info',
    'awaiting_payment_selection',
    'awaiting_payment_confirmation',
  ],
};

export function isTerminal(state: SessionState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function assertOperationAllowed(operation: SessionOperation, session: Session): void {
  if (!ALLOWED_IN[operation].includes(session.state)) {
    throw new InvalidStateTransitionError(operation, session.state);
  }
}

export function transition(session: Session, to: SessionState): void {
  if (session.state === to) return;
  if (!TRANSITIONS[session.state].includes(to)) {
    throw new InvalidStateTransitionError(`transition to ${to}`, session.state);
  }
  session.state = to;
}
