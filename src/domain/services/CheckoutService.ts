import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../../infrastructure/logger.js';
import type {
  CartSummary,
  DeliveryInfoRequest,
  LineChange,
  Order,
  PaymentClass,
  PaymentOption,
  SelectPaymentRequest,
  Session,
  SubmitOutcome,
} from '../models.js';
import type { SessionService } from './SessionService.js';
import type { DeliveryZoneCalculator } from './DeliveryZoneCalculator.js';
import type { IPaymentPolicy } from '../strategies/IPaymentPolicy.js';
import type { IPricingOracleClient } from '../../infrastructure/clients/IPricingOracleClient.js';
import type { IOrderIntakeClient, OrderReceipt } from '../../infrastructure/clients/IOrderIntakeClient.js';
import { assertOperationAllowed, transition } from '../session/stateMachine.js';
import {
  InvalidStateTransitionError,
  PixNotAllowedPrepaidError,
  UnservedNeighborhoodError,
  ValidationError,
} from '../errors/index.js';

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !(value instanceof Date) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function hasCompleteDelivery(session: Session): boolean {
  const { recipientName, address, neighborhood, fee } = session.delivery;
  return Boolean(recipientName && address && neighborhood) && fee !== undefined;
}

/**
 * Drives a reviewed cart through delivery details and payment to a submitted
 * order. Prices and stock are checked against the oracle once more right
 * before the order goes out; any difference sends the customer back to review.
 */
export class CheckoutService {
  constructor(
    private readonly sessions: SessionService,
    private readonly zones: DeliveryZoneCalculator,
    private readonly paymentPolicy: IPaymentPolicy,
    private readonly oracle: IPricingOracleClient,
    private readonly orderIntake: IOrderIntakeClient,
    private readonly logger: Logger
  ) {}

  async setDeliveryInfo(customerId: string, request: DeliveryInfoRequest): Promise<Session> {
    const recipientName = request.recipientName?.trim();
    const address = request.address?.trim();
    const neighborhood = request.neighborhood?.trim();

    return this.sessions.withSession(customerId, 'existing', (session, { now }) => {
      assertOperationAllowed('setDeliveryInfo', session);

      if (neighborhood) {
        const lookup = this.zones.feeFor(neighborhood);
        if (!lookup.served) {
          this.logger.info({ customerId, neighborhood }, 'neighborhood not served');
          throw new UnservedNeighborhoodError(neighborhood);
        }
        session.delivery.neighborhood = lookup.zone.neighborhood;
        session.delivery.fee = lookup.zone.fee;
      }
      if (recipientName) session.delivery.recipientName = recipientName;
      if (address) session.delivery.address = address;

      transition(session, hasCompleteDelivery(session) ? 'awaiting_payment_selection' : 'awaiting_delivery_info');
      session.lastActivityAt = now;
      this.sessions.reprice(session);
      return session;
    });
  }

  async paymentOptions(customerId: string): Promise<{ paymentClass: PaymentClass; options: PaymentOption[] }> {
    const session = await this.sessions.getSession(customerId);
    return {
      paymentClass: this.paymentPolicy.classify(session.lines),
      options: this.paymentPolicy.options(session.lines),
    };
  }

  async selectPayment(customerId: string, request: SelectPaymentRequest): Promise<Session> {
    return this.sessions.withSession(customerId, 'existing', (session, { now }) => {
      assertOperationAllowed('selectPayment', session);

      const decision = this.paymentPolicy.evaluate(session.lines, request.method, request.timing);
      if (!decision.allowed) {
        if (decision.reason === 'PIX_NOT_ALLOWED_PREPAID') {
          this.logger.info({ customerId }, 'pix prepayment refused for variable-weight cart');
          throw new PixNotAllowedPrepaidError();
        }
        throw new ValidationError(`Payment by ${request.method} is only taken on delivery.`);
      }

      session.payment = { method: decision.option.method, timing: decision.option.timing };
      if (decision.option.requiresProof) {
        if (session.receivedPaymentProof) {
          // already paid before the cart went back to review
          session.payment.proofRef = session.receivedPaymentProof;
        } else {
          transition(session, 'awaiting_payment_confirmation');
        }
      }
      session.lastActivityAt = now;
      return session;
    });
  }

  // proof of a PIX transfer arrived through the messaging channel
  async confirmPayment(customerId: string, proofRef: string): Promise<SubmitOutcome> {
    const proof = proofRef.trim();
    if (!proof) throw new ValidationError('A payment proof reference is required.');

    return this.sessions.withSession(customerId, 'existing', async (session, { now }) => {
      assertOperationAllowed('confirmPayment', session);
      if (!session.payment) {
        throw new InvalidStateTransitionError('confirmPayment', session.state);
      }
      session.payment.proofRef = proof;
      return this.finalize(session, now);
    });
  }

  async submit(customerId: string): Promise<SubmitOutcome> {
    return this.sessions.withSession(customerId, 'existing', async (session, { now }) => {
      assertOperationAllowed('submit', session);
      if (!session.payment) {
        throw new ValidationError('Choose a payment method before submitting the order.');
      }
      return this.finalize(session, now);
    });
  }

  private async finalize(session: Session, now: Date): Promise<SubmitOutcome> {
    const changes = await this.reverify(session);

    if (changes.length > 0) {
      transition(session, 'reviewing_summary');
      if (session.payment?.proofRef) {
        session.receivedPaymentProof = session.payment.proofRef;
      }
      session.payment = undefined;
      session.pendingOrderId = undefined;
      session.lastActivityAt = now;
      this.sessions.reprice(session);

      this.logger.warn(
        { customerId: session.customerId, changes: changes.map(c => ({ productId: c.productId, reason: c.reason })) },
        'cart changed since it was priced, back to review'
      );
      const summary: CartSummary = this.sessions.summarize(session);
      return { status: 'stale', changes, summary };
    }

    if (!session.pendingOrderId) {
      session.pendingOrderId = uuidv4();
    }
    const order = this.buildOrder(session, session.pendingOrderId, now);

    let receipt: OrderReceipt;
    try {
      receipt = await this.orderIntake.submitOrder(order);
    } catch (err) {
      // intake may have taken the order anyway; a retry must carry the same id
      await this.sessions.save(session);
      throw err;
    }

    transition(session, 'submitted');
    session.lastFinalizedAt = now;
    session.lastActivityAt = now;
    // intake replaces amended orders in place, so later amendments target the first id
    session.lastOrderId = order.amendsOrderId ?? order.orderId;
    session.amendsOrderId = undefined;
    session.pendingOrderId = undefined;
    session.receivedPaymentProof = undefined;

    this.logger.info(
      {
        customerId: session.customerId,
        orderId: order.orderId,
        amendsOrderId: order.amendsOrderId,
        total: order.total,
        externalReference: receipt.externalReference,
      },
      'order submitted'
    );
    return { status: 'submitted', order };
  }

  // fresh quote for every line; mutates the lines that changed
  private async reverify(session: Session): Promise<LineChange[]> {
    const quotes = await Promise.all(session.lines.map(line => this.oracle.getQuote(line.product.productId)));
    const changes: LineChange[] = [];

    session.lines = session.lines.map((line, i) => {
      const quote = quotes[i];

      if (!quote || quote.quantityAvailable < line.chargeableQuantity) {
        changes.push({
          lineId: line.lineId,
          productId: line.product.productId,
          reason: 'out_of_stock',
          previousUnitPrice: line.unitPrice,
          currentUnitPrice: quote ? quote.unitPrice : null,
          quantityAvailable: quote ? quote.quantityAvailable : 0,
        });
        return {
          ...line,
          unitPrice: quote ? quote.unitPrice : line.unitPrice,
          quotedAt: quote ? quote.quotedAt : line.quotedAt,
          stockShortfall: true,
        };
      }

      if (quote.unitPrice !== line.unitPrice) {
        changes.push({
          lineId: line.lineId,
          productId: line.product.productId,
          reason: 'repriced',
          previousUnitPrice: line.unitPrice,
          currentUnitPrice: quote.unitPrice,
          quantityAvailable: quote.quantityAvailable,
        });
      }
      return { ...line, unitPrice: quote.unitPrice, quotedAt: quote.quotedAt, stockShortfall: undefined };
    });

    return changes;
  }

  private buildOrder(session: Session, orderId: string, now: Date): Order {
    const { recipientName, address, neighborhood, fee } = session.delivery;
    if (!recipientName || !address || !neighborhood || fee === undefined || !session.payment) {
      throw new InvalidStateTransitionError('submit', session.state);
    }

    const lines = structuredClone(session.lines);
    return deepFreeze<Order>({
      orderId,
      sessionId: session.sessionId,
      customerId: session.customerId,
      lines,
      delivery: { recipientName, address, neighborhood, fee },
      payment: { ...session.payment },
      subtotal: session.subtotal,
      deliveryFee: session.deliveryFee,
      total: session.total,
      hasEstimatedWeights: lines.some(line => line.massEstimate !== undefined),
      amendsOrderId: session.amendsOrderId,
      receivedPaymentProof: session.receivedPaymentProof,
      createdAt: now,
    });
  }
}
