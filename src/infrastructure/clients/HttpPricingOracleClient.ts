import { z } from 'zod';
import type { Logger } from '../logger.js';
import type { PriceQuote } from '../../domain/models.js';
import { OracleUnavailableError } from '../../domain/errors/index.js';
import type { IPricingOracleClient } from './IPricingOracleClient.js';
import { withRetry } from './retry.js';

const quoteResponseSchema = z.object({
  productId: z.string().optional(),
  price: z.number().nonnegative(),
  quantityAvailable: z.number(),
});

class TransientOracleError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'TransientOracleError';
    if (cause !== undefined) this.cause = cause;
  }
}

export interface HttpPricingOracleOptions {
  baseUrl: string;
  timeoutMs: number;
  retryBackoffMs: number;
  fetchImpl?: typeof fetch;
}

// GET {baseUrl}/products/{productId}/quote, one retry on transient failures
export class HttpPricingOracleClient implements IPricingOracleClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly options: HttpPricingOracleOptions,
    private readonly logger: Logger
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async getQuote(productId: string): Promise<PriceQuote | null> {
    const url = `${this.baseUrl}/products/${encodeURIComponent(productId)}/quote`;

    try {
      return await withRetry(() => this.fetchQuote(url, productId), {
        retries: 1,
        backoffMs: this.options.retryBackoffMs,
        isRetryable: err => err instanceof TransientOracleError,
        onRetry: (err, attempt, delayMs) => {
          this.logger.warn(
            { productId, attempt, delayMs, err: err instanceof Error ? err.message : String(err) },
            'oracle quote failed, retrying'
          );
        },
      });
    } catch (err) {
      if (err instanceof TransientOracleError) {
        this.logger.error({ productId, err: err.message }, 'oracle unavailable after retry');
        throw new OracleUnavailableError(productId, err);
      }
      throw err;
    }
  }

  private async fetchQuote(url: string, productId: string): Promise<PriceQuote | null> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new TransientOracleError(`request failed: ${err instanceof Error ? err.message : String(err)}`, err);
    }

    if (response.status === 404) return null;
    if (response.status >= 500 || response.status === 429) {
      throw new TransientOracleError(`oracle responded with status ${response.status}`);
    }
    if (!response.ok) {
      throw new OracleUnavailableError(productId);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new OracleUnavailableError(productId, err);
    }

    const parsed = quoteResponseSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.error({ productId, issues: parsed.error.issues }, 'malformed oracle quote');
      throw new OracleUnavailableError(productId, parsed.error);
    }

    return {
      productId,
      unitPrice: parsed.data.price,
      quantityAvailable: Math.max(0, parsed.data.quantityAvailable),
      quotedAt: new Date(),
    };
  }
}
