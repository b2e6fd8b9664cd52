import { fileURLToPath } from 'url';
import { ReferenceDataLoader, type ReferenceData, type SeedQuote } from '../src/infrastructure/reference/ReferenceDataLoader.js';
import type { CartLine, Product, Session } from '../src/domain/models.js';

export const DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url));

const loader = new ReferenceDataLoader(DATA_DIR);

export const referenceData: ReferenceData = loader.loadAll();
export const seedQuotes: SeedQuote[] = loader.loadSeedQuotes();

export const IDS = {
  tomate: '2000000000011',
  bananaPrata: '2000000000042',
  paoFrances: '2000000000103',
  frango: '2000000000110',
  frangoPromo: '2000000000127',
  carneMoida: '2000000000141',
  alface: '2000000000097',
  arroz: '7891000000036',
  leite: '7891000000142',
  guarana: '7891000000111',
} as const;

export function product(productId: string): Product {
  const found = referenceData.catalog.find(p => p.productId === productId);
  if (!found) throw new Error(`fixture product ${productId} missing from catalog`);
  return found;
}

export function makeLine(p: Product, overrides: Partial<CartLine> = {}): CartLine {
  return {
    lineId: `line-${p.productId}`,
    product: p,
    requestedQuantity: 1,
    requestedUnit: p.unitOfSale === 'kg' ? 'kg' : 'unit',
    chargeableQuantity: 1,
    unitPrice: 10,
    subtotal: 10,
    note: '',
    quotedAt: new Date('2026-03-02T10:00:00Z'),
    addedAt: new Date('2026-03-02T10:00:00Z'),
    ...overrides,
  };
}

export function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    sessionId: 'session-1',
    customerId: '5511999990000',
    state: 'draft',
    lines: [],
    subtotal: 0,
    deliveryFee: 0,
    total: 0,
    delivery: {},
    createdAt: new Date('2026-03-02T10:00:00Z'),
    lastActivityAt: new Date('2026-03-02T10:00:00Z'),
    lastFinalizedAt: null,
    ...overrides,
  };
}

// settable clock for tests that move through time windows
export class TestClock {
  constructor(private current: Date = new Date('2026-03-02T10:00:00Z')) {}

  now = (): Date => new Date(this.current.getTime());

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60 * 1000);
  }
}
