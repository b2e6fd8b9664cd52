import type { Order } from '../../domain/models.js';
import { OrderIntakeError } from '../../domain/errors/index.js';
import type { IOrderIntakeClient, OrderReceipt } from './IOrderIntakeClient.js';

export class OrderIntakeClientMock implements IOrderIntakeClient {
  private orders: Order[] = [];
  private failuresRemaining = 0;

  async submitOrder(order: Order): Promise<OrderReceipt> {
    if (this.failuresRemaining > 0) {
      this.failuresRemaining--;
      throw new OrderIntakeError('Order intake is unreachable.');
    }

    this.orders.push(order);
    return {
      orderId: order.orderId,
      externalReference: `intake-${this.orders.length}`,
      acceptedAt: new Date(),
    };
  }

  failNextCalls(count: number): void {
    this.failuresRemaining = count;
  }

  // Utility methods for testing
  getSubmittedOrders(): Order[] {
    return [...this.orders];
  }

  clear(): void {
    this.orders = [];
  }
}
