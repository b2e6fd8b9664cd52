import type { Logger } from '../../infrastructure/logger.js';
import type { Product, Resolution } from '../models.js';
import type { CatalogIndex } from '../catalog/CatalogIndex.js';
import { normalizeText, tokenize } from '../catalog/normalize.js';
import type { QueryPreference, ResolverRules } from '../../infrastructure/reference/ReferenceDataLoader.js';

export interface ProductResolverOptions {
  maxCandidates: number;
}

interface NormalizedPreference {
  pattern: string;
  preferredName?: string;
  preferredSections: QueryPreference['preferredSections'];
}

// free-text query -> one catalog product, a short candidate list, or nothing
export class ProductResolver {
  private readonly preferences: Map<string, NormalizedPreference>;
  private readonly synonyms: Array<[string, string]>;
  private readonly stopWords: Set<string>;
  private readonly processedTerms: Set<string>;
  private readonly promotionTerms: Set<string>;

  constructor(
    private readonly catalog: CatalogIndex,
    rules: ResolverRules,
    private readonly options: ProductResolverOptions,
    private readonly logger: Logger
  ) {
    this.preferences = new Map(
      rules.preferences.map(p => [
        normalizeText(p.pattern),
        {
          pattern: normalizeText(p.pattern),
          preferredName: p.preferredName ? normalizeText(p.preferredName) : undefined,
          preferredSections: p.preferredSections,
        },
      ])
    );
    // multi-word synonyms first
    this.synonyms = Object.entries(rules.synonyms)
      .map(([term, replacement]): [string, string] => [normalizeText(term), normalizeText(replacement)])
      .sort((a, b) => b[0].length - a[0].length);
    this.stopWords = new Set(rules.stopWords.map(normalizeText));
    this.processedTerms = new Set(rules.processedTerms.map(normalizeText));
    this.promotionTerms = new Set(rules.promotionTerms.map(normalizeText));
  }

  resolve(rawQuery: string): Resolution {
    const query = normalizeText(rawQuery);
    if (!query) return { kind: 'not_found' };

    let searched = query;
    let candidates = this.search(query);

    if (candidates.length === 0) {
      const reformulated = this.reformulate(query);
      if (reformulated && reformulated !== query) {
        this.logger.debug({ query, reformulated }, 'no match, retrying with reformulated query');
        searched = reformulated;
        candidates = this.search(reformulated);
      }
    }

    if (candidates.length === 0) {
      this.logger.debug({ query }, 'product not found');
      return { kind: 'not_found' };
    }

    const queryTokens = new Set(tokenize(searched));

    if (!this.mentionsAny(queryTokens, this.promotionTerms)) {
      candidates = candidates.filter(p => p.deliveryEligible);
    }

    const preference = this.preferences.get(searched);
    if (preference?.preferredName) {
      const preferredName = preference.preferredName;
      const preferred =
        candidates.find(p => normalizeText(p.name) === preferredName) ??
        candidates.find(p => normalizeText(p.name).startsWith(preferredName));
      if (preferred) {
        return { kind: 'unique', product: preferred };
      }
    }

    const relevant = candidates.filter(p => this.isRelevant(p, queryTokens));

    if (relevant.length === 0) return { kind: 'not_found' };
    if (relevant.length === 1) return { kind: 'unique', product: relevant[0] };
    return { kind: 'ambiguous', candidates: relevant.slice(0, this.options.maxCandidates) };
  }

  // single pass: catalog synonyms, stop words dropped, plurals to singular
  reformulate(normalizedQuery: string): string {
    let text = ` ${normalizedQuery} `;
    for (const [term, replacement] of this.synonyms) {
      if (text.includes(` ${term} `)) {
        text = text.replace(` ${term} `, ` ${replacement} `);
      }
    }

    const tokens = tokenize(text.trim())
      .filter(token => !this.stopWords.has(token))
      .map(singularize);
    return [...new Set(tokens)].join(' ');
  }

  private search(query: string): Product[] {
    const preference = this.preferences.get(query);
    return this.catalog.search(query, {
      preferredSections: preference?.preferredSections,
      stopWords: this.stopWords,
    });
  }

  // "extrato de tomate" is not what someone asking for "tomate" wants
  private isRelevant(product: Product, queryTokens: Set<string>): boolean {
    const nameTokens = tokenize(normalizeText(product.name));
    return !nameTokens.some(token => this.processedTerms.has(token) && !queryTokens.has(token));
  }

  private mentionsAny(queryTokens: Set<string>, terms: Set<string>): boolean {
    for (const token of queryTokens) {
      if (terms.has(token)) return true;
    }
    return false;
  }
}

// Portuguese plurals: "tomates" -> "tomate", "limoes" -> "limao", "paes" -> "pao"
export function singularize(token: string): string {
  if (token.length <= 3 || /\d/.test(token)) return token;
  if (token.endsWith('oes') || token.endsWith('aes')) return `${token.slice(0, -3)}ao`;
  if (token.endsWith('s') && !token.endsWith('ss')) return token.slice(0, -1);
  return token;
}
