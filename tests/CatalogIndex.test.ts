import { describe, it, expect } from 'vitest';
import { CatalogIndex } from '../src/domain/catalog/CatalogIndex.js';
import { normalizeText, tokenize } from '../src/domain/catalog/normalize.js';
import { IDS, referenceData } from './fixtures.js';

describe('normalizeText', () => {
  it('strips accents and cedillas and lower-cases', () => {
    expect(normalizeText('Pão Francês')).toBe('pao frances');
    expect(normalizeText('AÇÚCAR')).toBe('acucar');
    expect(normalizeText('Conceição')).toBe('conceicao');
  });

  it('collapses punctuation and whitespace', () => {
    expect(normalizeText('  arroz,  tipo-1!! ')).toBe('arroz tipo 1');
  });

  it('tokenizes normalized text', () => {
    expect(tokenize('')).toEqual([]);
    expect(tokenize('banana prata')).toEqual(['banana', 'prata']);
  });
});

describe('CatalogIndex', () => {
  const index = new CatalogIndex(referenceData.catalog);

  it('indexes the whole catalog', () => {
    expect(index.size).toBe(referenceData.catalog.length);
  });

  it('finds products by id', () => {
    expect(index.findById(IDS.tomate)?.name).toBe('TOMATE');
    expect(index.findById('0000000000000')).toBeUndefined();
  });

  it('ranks exact matches before token matches', () => {
    const matches = index.searchWithTiers('tomate');

    expect(matches.map(m => [m.product.name, m.tier])).toEqual([
      ['TOMATE', 'exact'],
      ['MOLHO DE TOMATE POMAROLA 300G', 'token'],
      ['EXTRATO DE TOMATE ELEFANTE 340G', 'token'],
    ]);
  });

  it('orders same-tier matches by shorter name', () => {
    expect(index.search('banana').map(p => p.name)).toEqual(['BANANA PRATA', 'BANANA NANICA']);
  });

  it('puts preferred sections first within a tier', () => {
    const names = index.search('pao', { preferredSections: ['bakery'] }).map(p => p.name);

    expect(names).toEqual(['PAO FRANCES', 'PAO HOT DOG MAXPAES 500G']);
  });

  it('ignores stop words when matching tokens', () => {
    const names = index.search('file de frango', { stopWords: new Set(['de']) }).map(p => p.name);

    expect(names).toEqual(['FILE DE PEITO DE FRANGO']);
  });

  it('matches regardless of accents in the query', () => {
    expect(index.search('Maçã').map(p => p.name)).toEqual(['MACA GALA']);
  });

  it('returns nothing for an empty query', () => {
    expect(index.search('  ')).toEqual([]);
  });
});
