import type { Session } from '../models.js';

export interface IPricingStrategy {
  priceLine(unitPrice: number, chargeableQuantity: number): number;
  calculatePricing(session: Session): Session;
}

// rounding to 2 decimals to avoid floating point weirdness
export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

// standard pricing - every line at its latest quoted price, plus the zone's delivery fee
export class StandardPricingStrategy implements IPricingStrategy {
  priceLine(unitPrice: number, chargeableQuantity: number): number {
    return roundMoney(unitPrice * chargeableQuantity);
  }

  calculatePricing(session: Session): Session {
    const lines = session.lines.map(line => ({
      ...line,
      subtotal: this.priceLine(line.unitPrice, line.chargeableQuantity),
    }));
    const subtotal = roundMoney(lines.reduce((sum, line) => sum + line.subtotal, 0));
    const deliveryFee = roundMoney(session.delivery.fee ?? 0);

    return {
      ...session,
      lines,
      subtotal,
      deliveryFee,
      total: roundMoney(subtotal + deliveryFee),
    };
  }
}
