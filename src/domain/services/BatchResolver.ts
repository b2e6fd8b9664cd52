import type { Logger } from '../../infrastructure/logger.js';
import type { BatchItemResult } from '../models.js';
import { OracleUnavailableError } from '../errors/index.js';
import type { ProductResolver } from './ProductResolver.js';
import type { IPricingOracleClient } from '../../infrastructure/clients/IPricingOracleClient.js';
import { withTimeout } from '../../infrastructure/concurrency/timeout.js';

export interface BatchResolverOptions {
  itemTimeoutMs: number;
}

// resolve + quote for each query of a shopping list, independently
export class BatchResolver {
  constructor(
    private readonly resolver: ProductResolver,
    private readonly oracle: IPricingOracleClient,
    private readonly options: BatchResolverOptions,
    private readonly logger: Logger
  ) {}

  async resolveOne(query: string): Promise<BatchItemResult> {
    const resolution = this.resolver.resolve(query);
    if (resolution.kind !== 'unique') {
      return { query, resolution, quote: null };
    }

    try {
      const quote = await this.oracle.getQuote(resolution.product.productId);
      return { query, resolution, quote };
    } catch (err) {
      if (!(err instanceof OracleUnavailableError)) {
        this.logger.error(
          { query, productId: resolution.product.productId, err: err instanceof Error ? err.message : String(err) },
          'unexpected quote failure'
        );
      }
      return { query, resolution, quote: null, quoteError: 'ORACLE_UNAVAILABLE' };
    }
  }

  // output order follows input order; one slow or failing item never sinks the rest
  async resolveMany(queries: readonly string[]): Promise<BatchItemResult[]> {
    const started = Date.now();

    const results = await Promise.all(
      queries.map(async (query): Promise<BatchItemResult> => {
        const timed = await withTimeout(this.resolveOne(query), this.options.itemTimeoutMs);
        if (timed.timedOut) {
          this.logger.warn({ query, timeoutMs: this.options.itemTimeoutMs }, 'batch item timed out');
          return { query, resolution: { kind: 'not_found', timedOut: true }, quote: null };
        }
        return timed.value;
      })
    );

    this.logger.info(
      {
        queries: queries.length,
        unique: results.filter(r => r.resolution.kind === 'unique').length,
        durationMs: Date.now() - started,
      },
      'batch resolution finished'
    );
    return results;
  }
}
