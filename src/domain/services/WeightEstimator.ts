import { APPROXIMATE_MASS_NOTICE, type MassEstimate, type Product } from '../models.js';
import { NoWeightDataError, ValidationError } from '../errors/index.js';
import { normalizeText } from '../catalog/normalize.js';
import type { WeightTable } from '../../infrastructure/reference/ReferenceDataLoader.js';

interface WeightEntry {
  keyword: string;
  unitMassKg: number;
}

export class WeightEstimator {
  private readonly entries: WeightEntry[];

  constructor(private readonly table: WeightTable) {
    // longest keyword first so "pao frances" wins over a shorter "pao"
    this.entries = table.entries
      .map(e => ({ keyword: normalizeText(e.keyword), unitMassKg: e.unitMassKg }))
      .sort((a, b) => b.keyword.length - a.keyword.length);
  }

  // approximate kg for unitCount pieces of a product sold by the kilo
  estimateMass(product: Product, unitCount: number): MassEstimate {
    if (product.unitOfSale !== 'kg') {
      throw new ValidationError(`Product '${product.productId}' is sold per unit; no mass estimate applies.`);
    }
    if (!Number.isInteger(unitCount) || unitCount < 1) {
      throw new ValidationError('Unit count must be a positive integer.');
    }

    const name = ` ${normalizeText(product.name)} `;
    const entry = this.entries.find(e => name.includes(` ${e.keyword} `));

    let unitMassKg: number;
    let source: MassEstimate['source'];
    if (entry) {
      unitMassKg = entry.unitMassKg;
      source = 'product';
    } else {
      const fallback = this.table.sectionDefaults[product.section];
      if (fallback === undefined) throw new NoWeightDataError(product.productId);
      unitMassKg = fallback;
      source = 'section_default';
    }

    return {
      massKg: Math.round(unitMassKg * unitCount * 1000) / 1000,
      unitMassKg,
      unitCount,
      source,
      approximate: true,
      notice: APPROXIMATE_MASS_NOTICE,
    };
  }
}
