import type { PriceQuote } from '../../domain/models.js';
import { OracleUnavailableError } from '../../domain/errors/index.js';
import type { IPricingOracleClient } from './IPricingOracleClient.js';
import { sleep } from './retry.js';

interface StockEntry {
  price: number;
  quantityAvailable: number;
}

// in-memory price/stock source for local runs and tests
export class PricingOracleMock implements IPricingOracleClient {
  private stock: Map<string, StockEntry> = new Map();
  private failuresRemaining = 0;
  private calls: string[] = [];

  constructor(
    seed: Array<{ productId: string; price: number; quantityAvailable: number }> = [],
    private readonly latencyMs: number = 0
  ) {
    for (const entry of seed) {
      this.setQuote(entry.productId, entry.price, entry.quantityAvailable);
    }
  }

  async getQuote(productId: string): Promise<PriceQuote | null> {
    this.calls.push(productId);
    if (this.latencyMs > 0) await sleep(this.latencyMs);

    if (this.failuresRemaining > 0) {
      this.failuresRemaining--;
      throw new OracleUnavailableError(productId);
    }

    const entry = this.stock.get(productId);
    if (!entry) return null;

    return {
      productId,
      unitPrice: entry.price,
      quantityAvailable: entry.quantityAvailable,
      quotedAt: new Date(),
    };
  }

  setQuote(productId: string, price: number, quantityAvailable: number): void {
    this.stock.set(productId, { price, quantityAvailable });
  }

  removeQuote(productId: string): void {
    this.stock.delete(productId);
  }

  failNextCalls(count: number): void {
    this.failuresRemaining = count;
  }

  // Utility methods for testing
  getCallCount(productId?: string): number {
    return productId ? this.calls.filter(id => id === productId).length : this.calls.length;
  }

  resetCalls(): void {
    this.calls = [];
  }
}
