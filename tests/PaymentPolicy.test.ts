import { describe, it, expect } from 'vitest';
import { StandardPaymentPolicy } from '../src/domain/strategies/IPaymentPolicy.js';
import { IDS, makeLine, product } from './fixtures.js';

describe('StandardPaymentPolicy', () => {
  const policy = new StandardPaymentPolicy();
  const fixedOnly = [makeLine(product(IDS.arroz)), makeLine(product(IDS.alface))];
  const withProduce = [makeLine(product(IDS.arroz)), makeLine(product(IDS.tomate))];

  describe('classify', () => {
    it('treats any loose-weight item as variable weight', () => {
      expect(policy.classify(withProduce)).toBe('variable_weight');
    });

    it('treats fixed-weight carts as fixed_weight_only, including unit-sold produce', () => {
      expect(policy.classify(fixedOnly)).toBe('fixed_weight_only');
    });
  });

  describe('options', () => {
    it('offers PIX prepayment only for fixed-weight carts', () => {
      expect(policy.options(fixedOnly)).toEqual([
        { method: 'pix', timing: 'prepaid', requiresProof: true },
        { method: 'pix', timing: 'on_delivery', requiresProof: false },
        { method: 'cash', timing: 'on_delivery', requiresProof: false },
        { method: 'card', timing: 'on_delivery', requiresProof: false },
      ]);
    });

    it('leaves only on-delivery methods for variable-weight carts', () => {
      const options = policy.options(withProduce);

      expect(options.every(o => o.timing === 'on_delivery')).toBe(true);
      expect(options.map(o => o.method)).toEqual(['pix', 'cash', 'card']);
    });
  });

  describe('evaluate', () => {
    it('refuses PIX prepayment on a variable-weight cart', () => {
      expect(policy.evaluate(withProduce, 'pix', 'prepaid')).toEqual({
        allowed: false,
        reason: 'PIX_NOT_ALLOWED_PREPAID',
      });
    });

    it('refuses PIX prepayment for a single loose-weight line in a large cart', () => {
      const bigCart = [
        ...Array.from({ length: 20 }, (_, i) => makeLine(product(IDS.arroz), { lineId: `rice-${i}` })),
        makeLine(product(IDS.paoFrances)),
      ];

      expect(policy.evaluate(bigCart, 'pix', 'prepaid')).toEqual({
        allowed: false,
        reason: 'PIX_NOT_ALLOWED_PREPAID',
      });
    });

    it('defaults PIX to prepayment', () => {
      expect(policy.evaluate(withProduce, 'pix')).toEqual({ allowed: false, reason: 'PIX_NOT_ALLOWED_PREPAID' });
      expect(policy.evaluate(fixedOnly, 'pix')).toEqual({
        allowed: true,
        option: { method: 'pix', timing: 'prepaid', requiresProof: true },
      });
    });

    it('accepts PIX on delivery for any cart', () => {
      expect(policy.evaluate(withProduce, 'pix', 'on_delivery')).toEqual({
        allowed: true,
        option: { method: 'pix', timing: 'on_delivery', requiresProof: false },
      });
    });

    it('takes cash and card on delivery only', () => {
      expect(policy.evaluate(withProduce, 'cash')).toEqual({
        allowed: true,
        option: { method: 'cash', timing: 'on_delivery', requiresProof: false },
      });
      expect(policy.evaluate(fixedOnly, 'card', 'prepaid')).toEqual({
        allowed: false,
        reason: 'TIMING_NOT_SUPPORTED',
      });
    });
  });
});
