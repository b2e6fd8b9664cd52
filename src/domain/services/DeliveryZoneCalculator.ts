import type { DeliveryZone, ZoneLookup } from '../models.js';
import { normalizeText } from '../catalog/normalize.js';

export class DeliveryZoneCalculator {
  private readonly zones: Map<string, DeliveryZone>;

  constructor(zones: readonly DeliveryZone[]) {
    this.zones = new Map(zones.map(zone => [normalizeText(zone.neighborhood), zone]));
  }

  // an unmatched neighborhood is unserved, never a free delivery
  feeFor(neighborhood: string): ZoneLookup {
    const zone = this.zones.get(normalizeText(neighborhood));
    return zone ? { served: true, zone: { ...zone } } : { served: false, neighborhood };
  }

  listZones(): DeliveryZone[] {
    return [...this.zones.values()].map(zone => ({ ...zone }));
  }
}
