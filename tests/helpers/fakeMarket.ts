import type { Candle, Instrument, LiquidationSource, LiquidationZone, MarketDataSource } from '../../backend/src/types.js';

export const T0 = 1_700_000_000_000;

/** Candles whose close grows by `ratio` each bar, starting at `start`. */
export function trendCandles(count: number, ratio: number, start = 100, stepMs = 60_000): Candle[] {
  return Array.from({ length: count }, (_, i) => {
    const close = start * ratio ** i;
    return {
      time: T0 + i * stepMs,
      open: close / ratio,
      high: close * 1.01,
      low: close * 0.99,
      close,
      volume: 1000,
    };
  });
}

type CandleFactory = (symbol: string, timeframe: string) => Candle[] | Error;

export type FakeMarket = MarketDataSource & {
  calls: { listInstruments: number; getCandles: string[] };
};

export function createFakeMarket(
  instruments: Instrument[] | Error,
  candles: CandleFactory,
  opts: { delayMs?: number } = {},
): FakeMarket {
  const calls: FakeMarket['calls'] = { listInstruments: 0, getCandles: [] };
  const pause = () => (opts.delayMs ? new Promise((r) => setTimeout(r, opts.delayMs)) : Promise.resolve());
  return {
    exchange: 'fake',
    calls,
    async listInstruments() {
      calls.listInstruments++;
      await pause();
      if (instruments instanceof Error) throw instruments;
      return instruments;
    },
    async getCandles(symbol, timeframe) {
      calls.getCandles.push(`${symbol}:${timeframe}`);
      await pause();
      const out = candles(symbol, timeframe);
      if (out instanceof Error) throw out;
      return out;
    },
  };
}

export function fixedLiquidations(bySymbol: Record<string, LiquidationZone[] | Error>): LiquidationSource {
  return {
    async getLiquidationZones(symbol) {
      const z = bySymbol[symbol] ?? [];
      if (z instanceof Error) throw z;
      return z;
    },
  };
}
