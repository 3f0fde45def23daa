import * as fc from 'fast-check';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { defaultScanConfig } from '../backend/src/config.js';
import { compareSetups, createScanner, rankSetups } from '../backend/src/scanner.js';
import type { Candle, Instrument, TradeSetup } from '../backend/src/types.js';
import { createFakeMarket, T0 } from './helpers/fakeMarket.js';
import { makeSetup } from './helpers/setups.js';

const setupArb: fc.Arbitrary<TradeSetup> = fc
  .record({
    symbol: fc.constantFrom('AAAUSDT', 'BBBUSDT', 'CCCUSDT', 'DDDUSDT'),
    score: fc.double({ min: 0, max: 100, noNaN: true }),
    confidence: fc.double({ min: 0, max: 1, noNaN: true }),
  })
  .map((o) => makeSetup(o));

describe('rankSetups', () => {
  it('keeps only passing setups, best first, up to the limit', () => {
    fc.assert(
      fc.property(
        fc.array(setupArb, { maxLength: 20 }),
        fc.double({ min: 0, max: 100, noNaN: true }),
        fc.integer({ min: 0, max: 10 }),
        (setups, minScore, limit) => {
          const { passing, top } = rankSetups(setups, minScore, limit);
          const eligible = setups.filter((s) => s.score >= minScore);

          expect(passing).toBe(eligible.length);
          expect(top).toHaveLength(Math.min(limit, eligible.length));
          for (const s of top) expect(s.score).toBeGreaterThanOrEqual(minScore);
          for (let i = 1; i < top.length; i++) expect(compareSetups(top[i - 1], top[i])).toBeLessThanOrEqual(0);
          // nothing left out ranks above the last kept setup
          const cut = top[top.length - 1];
          if (cut) {
            const dropped = eligible.filter((s) => !top.includes(s));
            for (const s of dropped) expect(compareSetups(cut, s)).toBeLessThanOrEqual(0);
          }
        },
      ),
    );
  });

  it('does not reorder the input', () => {
    fc.assert(
      fc.property(fc.array(setupArb, { maxLength: 10 }), (setups) => {
        const before = [...setups];
        rankSetups(setups, 0, 5);
        expect(setups).toEqual(before);
      }),
    );
  });
});

const INSTRUMENTS: Instrument[] = [
  { symbol: 'AAAUSDT', quoteVolume: 3_000 },
  { symbol: 'BBBUSDT', quoteVolume: 2_000 },
  { symbol: 'CCCUSDT', quoteVolume: 1_000 },
];

const seriesArb = fc.array(fc.double({ min: 50, max: 150, noNaN: true }), { minLength: 40, maxLength: 40 }).map((closes) =>
  closes.map((close, i): Candle => ({ time: T0 + i * 60_000, open: close, high: close * 1.01, low: close * 0.99, close, volume: 1_000 })));

describe('scan results', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('never return a neutral or sub-threshold setup and account for every pair', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.tuple(seriesArb, seriesArb, seriesArb),
        fc.double({ min: 0, max: 100, noNaN: true }),
        fc.integer({ min: 0, max: 3 }),
        async (series, minScore, topSetupsLimit) => {
          const bySymbol = new Map(INSTRUMENTS.map((inst, i) => [inst.symbol, series[i]]));
          const market = createFakeMarket(INSTRUMENTS, (symbol) => bySymbol.get(symbol) ?? []);
          const result = await createScanner({ market, now: () => T0, newId: () => 'scan-prop' }).scan(defaultScanConfig({
            exchange: 'fake',
            minScore,
            topSetupsLimit,
            indicators: [
              { kind: 'EMA', periods: [5, 10] },
              { kind: 'RSI', period: 14, oversold: 30, overbought: 70 },
              { kind: 'MACD', fast: 12, slow: 26, signal: 9 },
              { kind: 'BOLLINGER', period: 20, stdDev: 2 },
            ],
          }));

          expect(result.setups.length).toBeLessThanOrEqual(topSetupsLimit);
          for (const s of result.setups) {
            expect(['LONG', 'SHORT']).toContain(s.direction);
            expect(s.score).toBeGreaterThanOrEqual(minScore);
            expect(s.score).toBeLessThanOrEqual(100);
            expect(s.confidence).toBeGreaterThanOrEqual(0);
            expect(s.confidence).toBeLessThanOrEqual(1);
          }
          const { metadata } = result;
          expect(result.totalSetupsFound + metadata.belowMinScore + metadata.neutralCount + metadata.skipped.count)
            .toBe(result.totalPairsScanned);
          expect(result.totalPairsScanned).toBe(INSTRUMENTS.length);
        },
      ),
      { numRuns: 30 },
    );
  });
});
