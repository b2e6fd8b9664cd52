import { z } from 'zod';
import type { Logger } from '../logger.js';
import type { CartLine, Order } from '../../domain/models.js';
import { OrderIntakeError } from '../../domain/errors/index.js';
import type { IOrderIntakeClient, OrderReceipt } from './IOrderIntakeClient.js';

const receiptSchema = z
  .object({
    reference: z.string().optional(),
  })
  .passthrough();

export interface HttpOrderIntakeOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export interface IntakeItemPayload {
  productId: string;
  name: string;
  quantity: number;
  unit: 'kg' | 'unit';
  unitPrice: number;
  subtotal: number;
  estimatedWeightKg?: number;
  note: string;
}

export function toIntakeItem(line: Readonly<CartLine>): IntakeItemPayload {
  const notes = line.note ? [line.note] : [];
  if (line.massEstimate) {
    notes.push(
      `Estimated weight ${line.massEstimate.massKg.toFixed(3)}kg (~R$ ${line.subtotal.toFixed(2)}). Weigh to confirm the amount.`
    );
  }

  return {
    productId: line.product.productId,
    name: line.product.name,
    quantity: line.massEstimate ? line.massEstimate.unitCount : line.chargeableQuantity,
    unit: line.massEstimate ? 'unit' : line.product.unitOfSale,
    unitPrice: line.unitPrice,
    subtotal: line.subtotal,
    estimatedWeightKg: line.massEstimate?.massKg,
    note: notes.join('. '),
  };
}

// new orders are POSTed; amendments PUT to the order they replace. never retried
export class HttpOrderIntakeClient implements IOrderIntakeClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly options: HttpOrderIntakeOptions,
    private readonly logger: Logger
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async submitOrder(order: Order): Promise<OrderReceipt> {
    const amending = order.amendsOrderId !== undefined;
    const url = amending
      ? `${this.baseUrl}/orders/${encodeURIComponent(order.amendsOrderId ?? '')}`
      : `${this.baseUrl}/orders`;

    const body = {
      orderId: order.orderId,
      customerPhone: order.customerId,
      recipientName: order.delivery.recipientName,
      address: order.delivery.address,
      neighborhood: order.delivery.neighborhood,
      paymentMethod: order.payment.method,
      paymentTiming: order.payment.timing,
      paymentProof: order.payment.proofRef ?? order.receivedPaymentProof ?? null,
      items: order.lines.map(toIntakeItem),
      subtotal: order.subtotal,
      deliveryFee: order.deliveryFee,
      total: order.total,
      hasEstimatedWeights: order.hasEstimatedWeights,
    };

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: amending ? 'PUT' : 'POST',
        headers: { 'content-type': 'application/json', accept: 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      this.logger.error({ orderId: order.orderId, err: err instanceof Error ? err.message : String(err) }, 'order intake unreachable');
      throw new OrderIntakeError('Order intake is unreachable.', err);
    }

    if (!response.ok) {
      this.logger.error({ orderId: order.orderId, status: response.status }, 'order intake rejected order');
      throw new OrderIntakeError(`Order intake rejected the order with status ${response.status}.`);
    }

    let reference: string | undefined;
    const text = await response.text();
    if (text) {
      try {
        const parsed = receiptSchema.safeParse(JSON.parse(text));
        reference = parsed.success ? parsed.data.reference : undefined;
      } catch (err) {
        // accepted with a non-JSON body; the order went through
        this.logger.warn({ orderId: order.orderId, err: err instanceof Error ? err.message : String(err) }, 'unparseable intake receipt');
      }
    }

    return { orderId: order.orderId, externalReference: reference, acceptedAt: new Date() };
  }
}
