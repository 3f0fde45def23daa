import { ConfigurationError } from './errors.js';
import type { TtlClass } from './types.js';

const UNIT_MS: Record<string, number> = {
  m: 60_000,
  h: 60 * 60_000,
  d: 24 * 60 * 60_000,
  w: 7 * 24 * 60 * 60_000,
};

const HOUR_MS = UNIT_MS.h;

/** '15m' -> 900000. Returns null for labels that are not `<n><m|h|d|w>`. */
export function timeframeMs(tf: string): number | null {
  const m = /^(\d+)([mhdw])$/.exec(tf.trim());
  if (!m) return null;
  const n = parseInt(m[1], 10);
  if (n <= 0) return null;
  return n * UNIT_MS[m[2]];
}

export function parseTimeframe(tf: string): number {
  const ms = timeframeMs(tf);
  if (ms === null) throw new ConfigurationError([`unknown timeframe "${tf}"`]);
  return ms;
}

export function normalizeTimeframes(list: readonly string[]): string[] {
  const bad = list.map((t) => t.trim()).filter((t) => timeframeMs(t) === null);
  if (bad.length) throw new ConfigurationError(bad.map((t) => `unknown timeframe "${t}"`));
  const uniq = Array.from(new Set(list.map((t) => t.trim())));
  return uniq.sort((a, b) => parseTimeframe(a) - parseTimeframe(b));
}

// Short candles go stale sooner than long ones.
export function ttlClassForTimeframe(tf: string): TtlClass {
  const ms = parseTimeframe(tf);
  if (ms < HOUR_MS) return 'fastTimeframe';
  if (ms >= 4 * HOUR_MS) return 'slowTimeframe';
  return 'ohlcv';
}
