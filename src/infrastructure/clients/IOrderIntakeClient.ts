import type { Order } from '../../domain/models.js';

export interface OrderReceipt {
  orderId: string;
  externalReference?: string;
  acceptedAt: Date;
}

export interface IOrderIntakeClient {
  submitOrder(order: Order): Promise<OrderReceipt>;
}
