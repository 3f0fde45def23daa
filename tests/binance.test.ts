import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

import fetch, { Response } from 'node-fetch';
import { createBinanceSource, parseKlines, parseTickers, sanitizeCandles } from '../backend/src/binance.js';
import { DataUnavailableError } from '../backend/src/errors.js';

const fetchMock = vi.mocked(fetch);

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

describe('binance payload parsing', () => {
  it('turns kline tuples into candles', () => {
    const candles = parseKlines([
      [1_000, '1.0', '2.0', '0.5', '1.5', '100', 1_999, '150', 10, '50', '75', '0'],
    ]);
    expect(candles).toEqual([{ time: 1_000, open: 1, high: 2, low: 0.5, close: 1.5, volume: 100 }]);
  });

  it('sorts, dedupes and drops broken candles', () => {
    const c = (time: number, close: number) => ({ time, open: close, high: close, low: close, close, volume: 1 });
    const out = sanitizeCandles([c(3, 3), c(1, 1), c(2, 2), c(2, 2.5), c(4, Number.NaN), c(5, 0)]);
    expect(out.map((x) => [x.time, x.close])).toEqual([[1, 1], [2, 2.5], [3, 3]]);
  });

  it('rejects a payload of the wrong shape', () => {
    expect(() => parseKlines({ code: -1121, msg: 'Invalid symbol.' }, { symbol: 'NOPE' })).toThrow(DataUnavailableError);
  });

  it('reads symbols and quote volume from the 24h ticker', () => {
    expect(parseTickers([
      { symbol: 'BTCUSDT', quoteVolume: '123.5', lastPrice: '65000.1', count: 7 },
      { symbol: 'BADUSDT', quoteVolume: 'n/a' },
    ])).toEqual([{ symbol: 'BTCUSDT', quoteVolume: 123.5, lastPrice: 65000.1 }]);
  });
});

describe('createBinanceSource', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('requests klines with the timeframe as the interval', async () => {
    fetchMock.mockResolvedValue(json([[1, '1', '1', '1', '1', '1']]));
    const source = createBinanceSource('http://exchange.test');
    const candles = await source.getCandles('BTCUSDT', '15m', 250);

    expect(candles).toHaveLength(1);
    expect(fetchMock.mock.calls[0][0]).toBe('http://exchange.test/api/v3/klines?symbol=BTCUSDT&interval=15m&limit=250');
  });

  it('caps the lookback at the exchange limit', async () => {
    fetchMock.mockResolvedValue(json([]));
    await createBinanceSource('http://exchange.test').getCandles('ETHUSDT', '1h', 5000);
    expect(String(fetchMock.mock.calls[0][0])).toMatch(/limit=1000$/);
  });

  it('reports HTTP errors as unavailable data', async () => {
    fetchMock.mockResolvedValue(json({ msg: 'rate limited' }, 429));
    const err = await createBinanceSource('http://exchange.test').getCandles('BTCUSDT', '1h', 10).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DataUnavailableError);
    expect(err).toMatchObject({
      message: 'http://exchange.test/api/v3/klines?symbol=BTCUSDT&interval=1h&limit=10 returned HTTP 429',
      context: { symbol: 'BTCUSDT', timeframe: '1h' },
    });
  });

  it('reports network failures as unavailable data', async () => {
    fetchMock.mockRejectedValue(new Error('ECONNRESET'));
    await expect(createBinanceSource('http://exchange.test').listInstruments()).rejects.toBeInstanceOf(DataUnavailableError);
  });
});
