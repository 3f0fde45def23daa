import { describe, expect, it } from 'vitest';
import { scoreLiquidationSupport, supportingZones } from '../backend/src/liquidation.js';
import type { LiquidationZone } from '../backend/src/types.js';

const zones: LiquidationZone[] = [
  { priceLevel: 102, strength: 0.5, side: 'LONG' },
  { priceLevel: 101, strength: 1, side: 'LONG' },
  { priceLevel: 98, strength: 1, side: 'LONG' },
  { priceLevel: 97.5, strength: 0.8, side: 'SHORT' },
  { priceLevel: 110, strength: 1, side: 'LONG' },
];

describe('supportingZones', () => {
  it('keeps same-side zones ahead of price within the band, nearest first', () => {
    const out = supportingZones(zones, 100, 'LONG', 5);
    expect(out.map((z) => z.zone.priceLevel)).toEqual([101, 102]);
    expect(out[0].weight).toBeCloseTo(0.8, 10);
    expect(out[1].weight).toBeCloseTo(0.3, 10);
  });

  it('looks below price for shorts', () => {
    const out = supportingZones(zones, 100, 'SHORT', 5);
    expect(out.map((z) => z.zone.priceLevel)).toEqual([97.5]);
    expect(out[0].weight).toBeCloseTo(0.4, 10);
  });

  it('has nothing to offer a neutral direction or an empty map', () => {
    expect(supportingZones(zones, 100, 'NEUTRAL')).toEqual([]);
    expect(scoreLiquidationSupport([], 100, 'LONG')).toBe(0);
  });
});

describe('scoreLiquidationSupport', () => {
  it('sums zone weights and caps at one', () => {
    expect(scoreLiquidationSupport(zones, 100, 'LONG', 5)).toBeCloseTo(1, 10);
    expect(scoreLiquidationSupport(zones.slice(0, 1), 100, 'LONG', 5)).toBeCloseTo(0.3, 10);
  });
});
