import type { Product, StoreSection } from '../models.js';
import { normalizeText, tokenize } from './normalize.js';

export type MatchTier = 'exact' | 'prefix' | 'token' | 'substring';

const TIER_RANK: Record<MatchTier, number> = {
  exact: 0,
  prefix: 1,
  token: 2,
  substring: 3,
};

interface IndexedProduct {
  product: Product;
  normalizedName: string;
  tokens: string[];
}

export interface SearchOptions {
  preferredSections?: readonly StoreSection[];
  stopWords?: ReadonlySet<string>;
}

export interface CatalogMatch {
  product: Product;
  tier: MatchTier;
}

export class CatalogIndex {
  private entries: IndexedProduct[] = [];

  constructor(products: readonly Product[]) {
    this.rebuild(products);
  }

  // swaps the whole index; products are reference data and never mutated here
  rebuild(products: readonly Product[]): void {
    this.entries = products.map(product => {
      const normalizedName = normalizeText(product.name);
      return { product, normalizedName, tokens: tokenize(normalizedName) };
    });
  }

  get size(): number {
    return this.entries.length;
  }

  findById(productId: string): Product | undefined {
    return this.entries.find(e => e.product.productId === productId)?.product;
  }

  search(query: string, options: SearchOptions = {}): Product[] {
    return this.searchWithTiers(query, options).map(m => m.product);
  }

  searchWithTiers(query: string, options: SearchOptions = {}): CatalogMatch[] {
    const normalized = normalizeText(query);
    if (!normalized) return [];

    const stopWords = options.stopWords ?? new Set<string>();
    const queryTokens = tokenize(normalized).filter(t => !stopWords.has(t));
    const preferred = new Set(options.preferredSections ?? []);

    const matches: Array<CatalogMatch & { normalizedName: string }> = [];
    for (const entry of this.entries) {
      const tier = this.matchTier(entry, normalized, queryTokens);
      if (tier) {
        matches.push({ product: entry.product, tier, normalizedName: entry.normalizedName });
      }
    }

    matches.sort((a, b) => {
      const byTier = TIER_RANK[a.tier] - TIER_RANK[b.tier];
      if (byTier !== 0) return byTier;

      const aPreferred = preferred.has(a.product.section) ? 0 : 1;
      const bPreferred = preferred.has(b.product.section) ? 0 : 1;
      if (aPreferred !== bPreferred) return aPreferred - bPreferred;

      const byLength = a.normalizedName.length - b.normalizedName.length;
      if (byLength !== 0) return byLength;

      return a.normalizedName.localeCompare(b.normalizedName);
    });

    return matches.map(({ product, tier }) => ({ product, tier }));
  }

  private matchTier(entry: IndexedProduct, query: string, queryTokens: string[]): MatchTier | null {
    if (entry.normalizedName === query) return 'exact';
    if (entry.normalizedName.startsWith(`${query} `)) return 'prefix';
    if (
      queryTokens.length > 0 &&
      queryTokens.every(qt => entry.tokens.some(token => token.startsWith(qt)))
    ) {
      return 'token';
    }
    if (entry.normalizedName.includes(query)) return 'substring';
    return null;
  }
}
