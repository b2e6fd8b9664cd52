import type {
  CartLine,
  PaymentClass,
  PaymentMethod,
  PaymentOption,
  PaymentTiming,
} from '../models.js';

export type PaymentDecision =
  | { allowed: true; option: PaymentOption }
  | { allowed: false; reason: 'PIX_NOT_ALLOWED_PREPAID' | 'TIMING_NOT_SUPPORTED' };

export interface IPaymentPolicy {
  classify(lines: readonly CartLine[]): PaymentClass;
  options(lines: readonly CartLine[]): PaymentOption[];
  evaluate(lines: readonly CartLine[], method: PaymentMethod, timing?: PaymentTiming): PaymentDecision;
}

// no PIX prepayment once the cart holds anything sold by weight; cash and card on delivery only
export class StandardPaymentPolicy implements IPaymentPolicy {
  classify(lines: readonly CartLine[]): PaymentClass {
    return lines.some(line => line.product.category === 'loose_weight_perishable')
      ? 'variable_weight'
      : 'fixed_weight_only';
  }

  options(lines: readonly CartLine[]): PaymentOption[] {
    const options: PaymentOption[] = [];
    if (this.classify(lines) === 'fixed_weight_only') {
      options.push({ method: 'pix', timing: 'prepaid', requiresProof: true });
    }
    options.push(
      { method: 'pix', timing: 'on_delivery', requiresProof: false },
      { method: 'cash', timing: 'on_delivery', requiresProof: false },
      { method: 'card', timing: 'on_delivery', requiresProof: false }
    );
    return options;
  }

  evaluate(lines: readonly CartLine[], method: PaymentMethod, timing?: PaymentTiming): PaymentDecision {
    if (method !== 'pix') {
      if (timing === 'prepaid') return { allowed: false, reason: 'TIMING_NOT_SUPPORTED' };
      return { allowed: true, option: { method, timing: 'on_delivery', requiresProof: false } };
    }

    const effectiveTiming = timing ?? 'prepaid';
    if (effectiveTiming === 'on_delivery') {
      return { allowed: true, option: { method, timing: 'on_delivery', requiresProof: false } };
    }

    if (this.classify(lines) === 'variable_weight') {
      return { allowed: false, reason: 'PIX_NOT_ALLOWED_PREPAID' };
    }
    return { allowed: true, option: { method, timing: 'prepaid', requiresProof: true } };
  }
}
