import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { DeliveryZone, Product } from '../../domain/models.js';

const sectionSchema = z.enum([
  'produce',
  'meat',
  'bakery',
  'dairy',
  'grocery',
  'beverages',
  'cleaning',
  'hygiene',
]);

const productSchema = z.object({
  productId: z.string().regex(/^\d{8,14}$/, 'productId must be an EAN'),
  name: z.string().min(1),
  category: z.enum(['loose_weight_perishable', 'fixed_weight']),
  section: sectionSchema,
  unitOfSale: z.enum(['kg', 'unit']),
  deliveryEligible: z.boolean(),
  promotional: z.boolean().optional(),
});

const weightTableSchema = z.object({
  entries: z.array(
    z.object({
      keyword: z.string().min(1),
      unitMassKg: z.number().positive(),
    })
  ),
  sectionDefaults: z.record(sectionSchema, z.number().positive()),
});

const deliveryZoneSchema = z.object({
  neighborhood: z.string().min(1),
  fee: z.number().nonnegative(),
});

const resolverRulesSchema = z.object({
  preferences: z.array(
    z.object({
      pattern: z.string().min(1),
      preferredName: z.string().min(1).optional(),
      preferredSections: z.array(sectionSchema).default([]),
    })
  ),
  synonyms: z.record(z.string(), z.string()),
  stopWords: z.array(z.string()),
  processedTerms: z.array(z.string()),
  promotionTerms: z.array(z.string()),
});

const seedQuoteSchema = z.object({
  productId: z.string().min(1),
  price: z.number().nonnegative(),
  quantityAvailable: z.number().nonnegative(),
});

export type WeightTable = z.infer<typeof weightTableSchema>;
export type ResolverRules = z.infer<typeof resolverRulesSchema>;
export type QueryPreference = ResolverRules['preferences'][number];
export type SeedQuote = z.infer<typeof seedQuoteSchema>;

export interface ReferenceData {
  catalog: Product[];
  weights: WeightTable;
  deliveryZones: DeliveryZone[];
  resolverRules: ResolverRules;
}

export class ReferenceDataError extends Error {
  constructor(file: string, reason: string) {
    super(`Invalid reference data in ${file}: ${reason}`);
    this.name = 'ReferenceDataError';
  }
}

// reads and validates the static tables shipped under DATA_DIR
export class ReferenceDataLoader {
  constructor(private readonly dataDir: string) {}

  loadAll(): ReferenceData {
    return {
      catalog: this.loadCatalog(),
      weights: this.loadWeights(),
      deliveryZones: this.loadDeliveryZones(),
      resolverRules: this.loadResolverRules(),
    };
  }

  loadCatalog(): Product[] {
    return this.read('catalog.json', z.array(productSchema));
  }

  loadWeights(): WeightTable {
    return this.read('weights.json', weightTableSchema);
  }

  loadDeliveryZones(): DeliveryZone[] {
    return this.read('delivery-zones.json', z.array(deliveryZoneSchema));
  }

  loadResolverRules(): ResolverRules {
    return this.read('resolver-rules.json', resolverRulesSchema);
  }

  // only used to seed the in-memory oracle when no live oracle is configured
  loadSeedQuotes(): SeedQuote[] {
    return this.read('price-quotes.json', z.array(seedQuoteSchema));
  }

  private read<T extends z.ZodTypeAny>(file: string, schema: T): z.output<T> {
    const fullPath = path.join(this.dataDir, file);
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(fullPath, 'utf8'));
    } catch (err) {
      throw new ReferenceDataError(file, err instanceof Error ? err.message : String(err));
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ReferenceDataError(file, `${issue.path.join('.')}: ${issue.message}`);
    }
    return parsed.data;
  }
}
