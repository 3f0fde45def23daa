import type { Direction, LiquidationZone } from './types.js';

export const DEFAULT_LIQUIDATION_BAND_PCT = 5;

export type SupportingZone = { zone: LiquidationZone; distancePct: number; weight: number };

/**
 * Zones that pull price toward the trade: same side as the trade and on the
 * far side of price in the trade's direction, within `maxDistancePct`.
 * Each zone's weight decays linearly to 0 at the band edge.
 */
export function supportingZones(
  zones: readonly LiquidationZone[],
  currentPrice: number,
  direction: Direction,
  maxDistancePct = DEFAULT_LIQUIDATION_BAND_PCT,
): SupportingZone[] {
  if (direction === 'NEUTRAL' || !(currentPrice > 0) || !(maxDistancePct > 0)) return [];
  const out: SupportingZone[] = [];
  for (const zone of zones) {
    if (zone.side !== direction) continue;
    const delta = direction === 'LONG' ? zone.priceLevel - currentPrice : currentPrice - zone.priceLevel;
    if (delta < 0) continue;
    const distancePct = (delta / currentPrice) * 100;
    if (distancePct > maxDistancePct) continue;
    const strength = Math.min(1, Math.max(0, zone.strength));
    out.push({ zone, distancePct, weight: strength * (1 - distancePct / maxDistancePct) });
  }
  return out.sort((a, b) => a.distancePct - b.distancePct || b.weight - a.weight);
}

export function scoreLiquidationSupport(
  zones: readonly LiquidationZone[],
  currentPrice: number,
  direction: Direction,
  maxDistancePct = DEFAULT_LIQUIDATION_BAND_PCT,
): number {
  const total = supportingZones(zones, currentPrice, direction, maxDistancePct)
    .reduce((acc, z) => acc + z.weight, 0);
  return Math.min(1, Math.max(0, total));
}
