import { v4 as uuidv4, validate as isUuid } from 'uuid';
import type { Logger } from '../../infrastructure/logger.js';
import type {
  AddItemRequest,
  CartLine,
  CartSummary,
  OpenedSession,
  Product,
  RequestedUnit,
  Session,
  SessionOpenOutcome,
} from '../models.js';
import type { ISessionStore } from '../../infrastructure/clients/ISessionStore.js';
import type { IPricingOracleClient } from '../../infrastructure/clients/IPricingOracleClient.js';
import type { IPricingStrategy } from '../strategies/IPricingStrategy.js';
import type { IPaymentPolicy } from '../strategies/IPaymentPolicy.js';
import type { CatalogIndex } from '../catalog/CatalogIndex.js';
import type { WeightEstimator } from './WeightEstimator.js';
import { KeyedSerialQueue } from '../../infrastructure/concurrency/KeyedSerialQueue.js';
import { decideOnMessage, type SessionLifecyclePolicy } from '../session/lifecycle.js';
import { assertOperationAllowed, transition } from '../session/stateMachine.js';
import {
  InsufficientStockError,
  ResourceNotFoundError,
  ValidationError,
} from '../errors/index.js';

export interface SessionServiceConfig extends SessionLifecyclePolicy {
  maxUnitsPerLine: number;
  maxKgPerLine: number;
}

export type SessionAccess = 'open' | 'existing';

export interface SessionContext {
  outcome: SessionOpenOutcome;
  now: Date;
}

const CUSTOMER_ID_PATTERN = /^[\w+\-.@:]{3,64}$/;

function roundMass(kg: number): number {
  return Math.round(kg * 1000) / 1000;
}

// per-customer session: lifecycle, cart lines and prices, serialized per customer
export class SessionService {
  private readonly queue = new KeyedSerialQueue();
  private readonly config: SessionServiceConfig;

  constructor(
    private readonly store: ISessionStore,
    private readonly oracle: IPricingOracleClient,
    private readonly pricing: IPricingStrategy,
    private readonly paymentPolicy: IPaymentPolicy,
    private readonly weights: WeightEstimator,
    private readonly catalog: CatalogIndex,
    private readonly logger: Logger,
    config?: Partial<SessionServiceConfig>,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.config = {
      continuationWindowMinutes: config?.continuationWindowMinutes ?? 15,
      idleTtlMinutes: config?.idleTtlMinutes ?? 0,
      maxUnitsPerLine: config?.maxUnitsPerLine ?? 99,
      maxKgPerLine: config?.maxKgPerLine ?? 50,
    };
  }

  /**
   * Runs `operation` against the customer's session under the customer's
   * queue and persists the session afterwards. A thrown error leaves the
   * stored session untouched.
   */
  withSession<T>(
    customerId: string,
    access: SessionAccess,
    operation: (session: Session, context: SessionContext) => Promise<T> | T
  ): Promise<T> {
    this.validateCustomerId(customerId);

    return this.queue.run(customerId, async () => {
      const now = this.clock();
      const { session, outcome } = await this.acquire(customerId, access, now);
      const result = await operation(session, { outcome, now });
      await this.store.updateSession(session);
      return result;
    });
  }

  async openSession(customerId: string): Promise<OpenedSession> {
    return this.withSession(customerId, 'open', (session, { outcome, now }) => {
      session.lastActivityAt = now;
      return { session, outcome };
    });
  }

  // read-only view; does not start, reopen or touch anything
  async getSession(customerId: string): Promise<Session> {
    this.validateCustomerId(customerId);
    const session = await this.store.getSession(customerId);
    if (!session) throw new ResourceNotFoundError('Session', customerId);
    return session;
  }

  // merges quantities if the same product is already in the cart in the same unit
  async addItem(customerId: string, request: AddItemRequest): Promise<Session> {
    const product = this.catalog.findById(request.productId);
    if (!product) throw new ResourceNotFoundError('Product', request.productId);

    const unit: RequestedUnit = request.unit ?? (product.unitOfSale === 'kg' ? 'kg' : 'unit');
    this.validateQuantity(product, request.quantity, unit);

    return this.withSession(customerId, 'open', async (session, { now }) => {
      assertOperationAllowed('addItem', session);

      const quote = await this.oracle.getQuote(product.productId);
      if (!quote) throw new ResourceNotFoundError('Price quote', product.productId);

      const existing = session.lines.find(
        line => line.product.productId === product.productId && line.requestedUnit === unit
      );
      const requestedQuantity = existing
        ? unit === 'kg'
          ? roundMass(existing.requestedQuantity + request.quantity)
          : existing.requestedQuantity + request.quantity
        : request.quantity;
      this.validateQuantity(product, requestedQuantity, unit);

      const massEstimate =
        product.unitOfSale === 'kg' && unit === 'unit'
          ? this.weights.estimateMass(product, requestedQuantity)
          : undefined;
      const chargeableQuantity = massEstimate
        ? massEstimate.massKg
        : unit === 'kg'
          ? roundMass(requestedQuantity)
          : requestedQuantity;

      if (chargeableQuantity > quote.quantityAvailable) {
        throw new InsufficientStockError(product.productId, chargeableQuantity, quote.quantityAvailable);
      }

      const note = [existing?.note, request.note?.trim()].filter(Boolean).join('; ');
      const line: CartLine = {
        lineId: existing?.lineId ?? uuidv4(),
        product,
        requestedQuantity,
        requestedUnit: unit,
        massEstimate,
        chargeableQuantity,
        unitPrice: quote.unitPrice,
        subtotal: this.pricing.priceLine(quote.unitPrice, chargeableQuantity),
        note,
        quotedAt: quote.quotedAt,
        addedAt: existing?.addedAt ?? now,
      };

      session.lines = existing
        ? session.lines.map(l => (l.lineId === existing.lineId ? line : l))
        : [...session.lines, line];
      session.lastActivityAt = now;
      this.reprice(session);

      this.logger.info(
        { customerId, productId: product.productId, chargeableQuantity, merged: Boolean(existing) },
        'item added to cart'
      );
      return session;
    });
  }

  async removeItem(customerId: string, lineId: string): Promise<Session> {
    if (!isUuid(lineId)) throw new ValidationError('Invalid line ID format. Expected UUID.');

    return this.withSession(customerId, 'existing', (session, { now }) => {
      assertOperationAllowed('removeItem', session);
      if (!session.lines.some(line => line.lineId === lineId)) {
        throw new ResourceNotFoundError('Line', lineId);
      }

      session.lines = session.lines.filter(line => line.lineId !== lineId);
      session.lastActivityAt = now;
      this.reprice(session);
      return session;
    });
  }

  async clearCart(customerId: string): Promise<Session> {
    return this.withSession(customerId, 'existing', (session, { now }) => {
      assertOperationAllowed('clearCart', session);
      session.lines = []; // keep session alive but empty
      session.lastActivityAt = now;
      this.reprice(session);
      return session;
    });
  }

  // draft -> review; repeat calls only return the summary
  async getSummary(customerId: string): Promise<CartSummary> {
    return this.withSession(customerId, 'existing', (session, { now }) => {
      assertOperationAllowed('requestSummary', session);

      if (session.state === 'draft') {
        if (session.lines.length === 0) {
          throw new ValidationError('Cart is empty. Add items before requesting a summary.');
        }
        transition(session, 'reviewing_summary');
        session.lastActivityAt = now;
      }
      return this.summarize(session);
    });
  }

  async resumeEditing(customerId: string): Promise<Session> {
    return this.withSession(customerId, 'existing', (session, { now }) => {
      assertOperationAllowed('resumeEditing', session);
      transition(session, 'draft');
      session.payment = undefined;
      session.lastActivityAt = now;
      return session;
    });
  }

  async cancel(customerId: string): Promise<Session> {
    return this.withSession(customerId, 'existing', (session, { now }) => {
      assertOperationAllowed('cancel', session);
      transition(session, 'cancelled');
      session.lines = [];
      session.payment = undefined;
      session.lastActivityAt = now;
      this.reprice(session);

      this.logger.info({ customerId, sessionId: session.sessionId }, 'session cancelled');
      return session;
    });
  }

  // persists a session from inside withSession ahead of a step that may throw
  async save(session: Session): Promise<void> {
    await this.store.updateSession(session);
  }

  summarize(session: Session): CartSummary {
    return {
      customerId: session.customerId,
      state: session.state,
      lines: session.lines,
      subtotal: session.subtotal,
      deliveryFee: session.deliveryFee,
      total: session.total,
      paymentClass: this.paymentPolicy.classify(session.lines),
      hasEstimatedWeights: session.lines.some(line => line.massEstimate !== undefined),
    };
  }

  reprice(session: Session): void {
    Object.assign(session, this.pricing.calculatePricing(session));
  }

  private async acquire(
    customerId: string,
    access: SessionAccess,
    now: Date
  ): Promise<{ session: Session; outcome: SessionOpenOutcome }> {
    const existing = await this.store.getSession(customerId);
    const decision = decideOnMessage(existing, now, this.config);

    if (decision === 'continue' && existing) {
      return { session: existing, outcome: 'continued' };
    }

    if (decision === 'amend' && existing) {
      existing.state = 'draft';
      existing.amendsOrderId = existing.lastOrderId;
      existing.payment = undefined;
      existing.lines = existing.lines.map(line => ({ ...line, stockShortfall: undefined }));
      existing.lastActivityAt = now;
      this.logger.info({ customerId, amendsOrderId: existing.lastOrderId }, 'reopening submitted order for amendment');
      return { session: existing, outcome: 'amending' };
    }

    if (access === 'existing') {
      throw new ResourceNotFoundError('Active session', customerId);
    }

    const fresh = this.newSession(customerId, now);
    const outcome: SessionOpenOutcome = existing?.state === 'submitted' ? 'expired_as_new_order' : 'created';
    if (existing) {
      await this.store.deleteSession(customerId);
    }
    await this.store.createSession(fresh);

    this.logger.info({ customerId, sessionId: fresh.sessionId, outcome }, 'session started');
    return { session: fresh, outcome };
  }

  private newSession(customerId: string, now: Date): Session {
    return {
      sessionId: uuidv4(),
      customerId,
      state: 'draft',
      lines: [],
      subtotal: 0,
      deliveryFee: 0,
      total: 0,
      delivery: {},
      createdAt: now,
      lastActivityAt: now,
      lastFinalizedAt: null,
    };
  }

  private validateCustomerId(customerId: string): void {
    if (!CUSTOMER_ID_PATTERN.test(customerId)) {
      throw new ValidationError('Invalid customer ID. Expected 3-64 characters (digits, letters, + - . @ : _).');
    }
  }

  private validateQuantity(product: Product, quantity: number, unit: RequestedUnit): void {
    if (!Number.isFinite(quantity) || quantity <= 0) {
      throw new ValidationError('Quantity must be a positive number.');
    }

    if (unit === 'kg') {
      if (product.unitOfSale !== 'kg') {
        throw new ValidationError(`Product '${product.name}' is sold per unit, not by weight.`);
      }
      if (quantity > this.config.maxKgPerLine) {
        throw new ValidationError(`Quantity must not exceed ${this.config.maxKgPerLine} kg per item.`);
      }
      return;
    }

    if (!Number.isInteger(quantity)) {
      throw new ValidationError('Quantity in units must be an integer.');
    }
    if (quantity > this.config.maxUnitsPerLine) {
      throw new ValidationError(`Quantity must be between 1 and ${this.config.maxUnitsPerLine}.`);
    }
  }
}
