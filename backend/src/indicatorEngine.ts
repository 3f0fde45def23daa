import { bollinger, ema, last, macd, rsi } from './indicators.js';
import type { Candle, Direction, IndicatorKind, IndicatorSignal, IndicatorSpec, SkippedIndicator } from './types.js';

export const DEFAULT_INDICATORS: IndicatorSpec[] = [
  { kind: 'RSI', period: 14, oversold: 30, overbought: 70 },
  { kind: 'MACD', fast: 12, slow: 26, signal: 9 },
  { kind: 'EMA', periods: [20, 50, 200] },
  { kind: 'BOLLINGER', period: 20, stdDev: 2 },
];

type Reading = { value: number; direction: Direction; strength: number; details?: Record<string, number> };

type IndicatorDefinition<K extends IndicatorKind> = {
  name: string;
  minCandles(spec: Extract<IndicatorSpec, { kind: K }>): number;
  read(closes: readonly number[], spec: Extract<IndicatorSpec, { kind: K }>): Reading;
};

const clamp01 = (x: number) => (Number.isFinite(x) ? Math.min(1, Math.max(0, x)) : 0);
const NEUTRAL = { direction: 'NEUTRAL', strength: 0 } as const;

const REGISTRY: { [K in IndicatorKind]: IndicatorDefinition<K> } = {
  RSI: {
    name: 'RSI',
    minCandles: (s) => s.period + 1,
    read(closes, s) {
      const v = last(rsi(closes, s.period)) ?? 50;
      if (v < s.oversold) return { value: v, direction: 'LONG', strength: clamp01((s.oversold - v) / s.oversold) };
      if (v > s.overbought) return { value: v, direction: 'SHORT', strength: clamp01((v - s.overbought) / (100 - s.overbought)) };
      return { value: v, ...NEUTRAL };
    },
  },
  MACD: {
    name: 'MACD',
    minCandles: (s) => s.slow + s.signal - 1,
    read(closes, s) {
      const m = macd(closes, s.fast, s.slow, s.signal);
      const line = last(m.macd) ?? 0;
      const hist = last(m.histogram) ?? 0;
      const details = { macd: line, signal: last(m.signal) ?? 0 };
      if (hist === 0) return { value: hist, ...NEUTRAL, details };
      const strength = line === 0 ? 0.5 : clamp01(Math.abs(hist) / Math.abs(line));
      return { value: hist, direction: hist > 0 ? 'LONG' : 'SHORT', strength, details };
    },
  },
  EMA: {
    name: 'EMA',
    minCandles: (s) => Math.max(...s.periods),
    read(closes, s) {
      const price = closes[closes.length - 1];
      const details: Record<string, number> = {};
      const values = [...s.periods].sort((a, b) => a - b).map((p) => {
        const v = last(ema(closes, p)) ?? price;
        details[`ema${p}`] = v;
        return v;
      });
      if (values.every((v) => price > v)) {
        const top = Math.max(...values);
        return { value: price, direction: 'LONG', strength: clamp01(((price - top) / top) * 10), details };
      }
      if (values.every((v) => price < v)) {
        const bottom = Math.min(...values);
        return { value: price, direction: 'SHORT', strength: clamp01(((bottom - price) / bottom) * 10), details };
      }
      return { value: price, ...NEUTRAL, details };
    },
  },
  BOLLINGER: {
    name: 'BollingerBands',
    minCandles: (s) => s.period,
    read(closes, s) {
      const price = closes[closes.length - 1];
      const bb = bollinger(closes, s.period, s.stdDev);
      const upper = last(bb.upper) ?? price;
      const lower = last(bb.lower) ?? price;
      const details = { upper, middle: last(bb.middle) ?? price, lower };
      const width = upper - lower;
      if (width <= 0) return { value: price, ...NEUTRAL, details };
      if (price < lower) return { value: price, direction: 'LONG', strength: clamp01(((lower - price) / width) * 2), details };
      if (price > upper) return { value: price, direction: 'SHORT', strength: clamp01(((price - upper) / width) * 2), details };
      return { value: price, ...NEUTRAL, details };
    },
  },
};

function definitionOf<K extends IndicatorKind>(kind: K): IndicatorDefinition<K> {
  return REGISTRY[kind];
}

function evaluate(spec: IndicatorSpec, closes: readonly number[]): { name: string; required: number; reading: Reading | null } {
  switch (spec.kind) {
    case 'RSI': return run(definitionOf('RSI'), spec, closes);
    case 'MACD': return run(definitionOf('MACD'), spec, closes);
    case 'EMA': return run(definitionOf('EMA'), spec, closes);
    case 'BOLLINGER': return run(definitionOf('BOLLINGER'), spec, closes);
  }
}

function run<K extends IndicatorKind>(def: IndicatorDefinition<K>, spec: Extract<IndicatorSpec, { kind: K }>, closes: readonly number[]) {
  const required = def.minCandles(spec);
  return { name: def.name, required, reading: closes.length >= required ? def.read(closes, spec) : null };
}

export function minCandlesFor(specs: readonly IndicatorSpec[]): number {
  return Math.max(0, ...specs.map((s) => evaluate(s, []).required));
}

export type IndicatorResult = { signals: IndicatorSignal[]; skipped: SkippedIndicator[] };

/**
 * Runs each configured indicator over one timeframe's candles.
 * Indicators without enough candles land in `skipped` rather than producing a signal.
 */
export function computeIndicators(
  candles: readonly Candle[],
  timeframe: string,
  specs: readonly IndicatorSpec[] = DEFAULT_INDICATORS,
): IndicatorResult {
  const closes = candles.map((c) => c.close);
  const signals: IndicatorSignal[] = [];
  const skipped: SkippedIndicator[] = [];

  for (const spec of specs) {
    const { name, required, reading } = evaluate(spec, closes);
    if (!reading) {
      skipped.push({ name, timeframe, required, available: closes.length });
      continue;
    }
    signals.push({
      name,
      timeframe,
      value: reading.value,
      direction: reading.direction,
      strength: reading.strength,
      ...(reading.details ? { details: reading.details } : {}),
    });
  }
  return { signals, skipped };
}
