import fetch from 'node-fetch';
import { z } from 'zod';
import { DataUnavailableError, describeError } from './errors.js';
import type { Candle, Instrument, MarketDataSource } from './types.js';

const BASE = process.env.BINANCE_BASE || 'https://api.binance.com';
const TIMEOUT_MS = Number(process.env.BINANCE_TIMEOUT_MS || 10_000);
// Binance caps klines at 1000 per request
const MAX_KLINES = 1000;

const numeric = z.union([z.string(), z.number()]).transform((v) => Number(v));

const TickerSchema = z.array(
  z.object({ symbol: z.string(), quoteVolume: numeric, lastPrice: numeric.optional() }).passthrough(),
);
// [openTime, open, high, low, close, volume, closeTime, ...]
const KlinesSchema = z.array(z.array(z.union([z.string(), z.number()])).min(6));

async function getJson(url: string, context: { symbol?: string; timeframe?: string } = {}): Promise<unknown> {
  let res;
  try {
    res = await fetch(url, { signal: AbortSignal.timeout(TIMEOUT_MS) });
  } catch (e) {
    throw new DataUnavailableError(`request to ${url} failed: ${describeError(e)}`, context, { cause: e });
  }
  if (!res.ok) {
    throw new DataUnavailableError(`${url} returned HTTP ${res.status}`, context);
  }
  try {
    return await res.json();
  } catch (e) {
    throw new DataUnavailableError(`${url} returned malformed JSON`, context, { cause: e });
  }
}

/** Drops non-finite rows, sorts by open time and keeps the last row per timestamp. */
export function sanitizeCandles(rows: readonly Candle[]): Candle[] {
  const byTime = new Map<number, Candle>();
  for (const c of rows) {
    const values = [c.time, c.open, c.high, c.low, c.close, c.volume];
    if (!values.every(Number.isFinite)) continue;
    if (c.high < c.low || c.close <= 0) continue;
    byTime.set(c.time, c);
  }
  return [...byTime.values()].sort((a, b) => a.time - b.time);
}

export function parseKlines(payload: unknown, context: { symbol?: string; timeframe?: string } = {}): Candle[] {
  const parsed = KlinesSchema.safeParse(payload);
  if (!parsed.success) throw new DataUnavailableError('unexpected klines payload', context, { cause: parsed.error });
  return sanitizeCandles(parsed.data.map((k) => ({
    time: Number(k[0]),
    open: Number(k[1]),
    high: Number(k[2]),
    low: Number(k[3]),
    close: Number(k[4]),
    volume: Number(k[5]),
  })));
}

export function parseTickers(payload: unknown): Instrument[] {
  const parsed = TickerSchema.safeParse(payload);
  if (!parsed.success) throw new DataUnavailableError('unexpected 24h ticker payload', {}, { cause: parsed.error });
  return parsed.data
    .filter((t) => Number.isFinite(t.quoteVolume))
    .map((t) => ({
      symbol: t.symbol,
      quoteVolume: t.quoteVolume,
      lastPrice: t.lastPrice !== undefined && Number.isFinite(t.lastPrice) ? t.lastPrice : undefined,
    }));
}

export function createBinanceSource(base: string = BASE): MarketDataSource {
  return {
    exchange: 'binance',

    async listInstruments() {
      return parseTickers(await getJson(`${base}/api/v3/ticker/24hr`));
    },

    async getCandles(symbol, timeframe, lookback) {
      const limit = Math.min(MAX_KLINES, Math.max(1, Math.floor(lookback)));
      const url = `${base}/api/v3/klines?symbol=${encodeURIComponent(symbol)}&interval=${timeframe}&limit=${limit}`;
      return parseKlines(await getJson(url, { symbol, timeframe }), { symbol, timeframe });
    },
  };
}
