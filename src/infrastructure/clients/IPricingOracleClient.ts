import type { PriceQuote } from '../../domain/models.js';

/**
 * Read-only access to live price and stock. Resolves `null` when the oracle
 * has no quote for the product; rejects with `OracleUnavailableError` when it
 * cannot be reached.
 */
export interface IPricingOracleClient {
  getQuote(productId: string): Promise<PriceQuote | null>;
}
