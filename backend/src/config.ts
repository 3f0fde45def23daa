import { z } from 'zod';
import { DEFAULT_WEIGHTS } from './confluence.js';
import { ConfigurationError } from './errors.js';
import { DEFAULT_INDICATORS } from './indicatorEngine.js';
import { DEFAULT_LIQUIDATION_BAND_PCT } from './liquidation.js';
import { DEFAULT_EXCLUSIONS } from './pairFilter.js';
import { normalizeTimeframes, timeframeMs } from './timeframes.js';
import { DEFAULT_TTL_POLICY } from './ttlCache.js';
import type { ScanConfig, ScoringWeights } from './types.js';

export const DEFAULT_TIMEFRAMES = ['15m', '1h', '4h'];

const positiveInt = z.number().int().positive();
const weight = z.number().finite().nonnegative();
// setTimeout fires at once above this
export const MAX_DEADLINE_MS = 2_147_483_647;

const IndicatorSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('RSI'), period: positiveInt, oversold: z.number().min(0).max(100), overbought: z.number().min(0).max(100) }),
  z.object({ kind: z.literal('MACD'), fast: positiveInt, slow: positiveInt, signal: positiveInt }),
  z.object({ kind: z.literal('EMA'), periods: z.array(positiveInt).nonempty() }),
  z.object({ kind: z.literal('BOLLINGER'), period: positiveInt, stdDev: z.number().positive() }),
]);

export const ScanConfigSchema = z.object({
  exchange: z.string().trim().min(1),
  timeframes: z.array(z.string()).nonempty('at least one timeframe is required'),
  requiredTimeframes: z.array(z.string()),
  minScore: z.number().min(0).max(100),
  maxPairs: z.number().int().nonnegative(),
  maxWorkers: positiveInt,
  topSetupsLimit: z.number().int().nonnegative(),
  candleLookback: positiveInt,
  weights: z.object({
    indicatorAlignment: weight,
    timeframeConfluence: weight,
    liquidationSupport: weight,
    trendStrength: weight,
  }).refine(
    (w) => w.indicatorAlignment + w.timeframeConfluence + w.liquidationSupport + w.trendStrength > 0,
    'scoring weights must not all be zero',
  ),
  cacheTtl: z.object({
    listing: positiveInt,
    ohlcv: positiveInt,
    fastTimeframe: positiveInt,
    slowTimeframe: positiveInt,
  }),
  exclusions: z.object({
    quoteAsset: z.string().min(1).nullable(),
    excludeStablecoins: z.boolean(),
    excludeLeveragedTokens: z.boolean(),
    customExclude: z.array(z.string()),
    minQuoteVolume: z.number().finite().nonnegative(),
  }),
  indicators: z.array(IndicatorSpecSchema).nonempty('at least one indicator is required'),
  liquidationBandPct: z.number().positive(),
  deadlineMs: positiveInt.max(MAX_DEADLINE_MS, `deadline must be at most ${MAX_DEADLINE_MS}ms`).nullable(),
}).superRefine((c, ctx) => {
  for (const tf of c.timeframes) {
    if (timeframeMs(tf) === null) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['timeframes'], message: `unknown timeframe "${tf}"` });
  }
  c.indicators.forEach((spec, i) => {
    const path = ['indicators', i];
    if (spec.kind === 'RSI' && spec.oversold >= spec.overbought) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: 'RSI oversold must be below overbought' });
    }
    if (spec.kind === 'MACD' && spec.fast >= spec.slow) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: 'MACD fast period must be below slow period' });
    }
  });
  for (const tf of c.requiredTimeframes) {
    if (!c.timeframes.includes(tf)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['requiredTimeframes'], message: `"${tf}" is not a configured timeframe` });
    }
  }
});

export function defaultScanConfig(overrides: Partial<ScanConfig> = {}): ScanConfig {
  return {
    exchange: 'binance',
    timeframes: [...DEFAULT_TIMEFRAMES],
    requiredTimeframes: [],
    minScore: 50,
    maxPairs: 50,
    maxWorkers: 5,
    topSetupsLimit: 10,
    candleLookback: 250,
    weights: { ...DEFAULT_WEIGHTS },
    cacheTtl: { ...DEFAULT_TTL_POLICY },
    exclusions: { ...DEFAULT_EXCLUSIONS, customExclude: [] },
    indicators: DEFAULT_INDICATORS.map((s) => ({ ...s })),
    liquidationBandPct: DEFAULT_LIQUIDATION_BAND_PCT,
    deadlineMs: null,
    ...overrides,
  };
}

/**
 * Checks a config before any work starts. Returns a copy with timeframes
 * ordered smallest to largest; throws ConfigurationError listing every problem.
 */
export function validateScanConfig(config: ScanConfig): ScanConfig {
  const parsed = ScanConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`));
  }
  const c = parsed.data;
  return {
    ...c,
    timeframes: normalizeTimeframes(c.timeframes),
    requiredTimeframes: [...c.requiredTimeframes],
    indicators: [...c.indicators],
  };
}

// ── env ────────────────────────────────────────────────────────────────
type Env = Record<string, string | undefined>;

function readStr(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function readNum(env: Env, name: string, fallback: number): number {
  const raw = readStr(env, name);
  return raw === undefined ? fallback : Number(raw);
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = readStr(env, name)?.toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  return fallback;
}

function readList(env: Env, name: string, fallback: string[]): string[] {
  const raw = readStr(env, name);
  if (raw === undefined) return fallback;
  return raw.split(',').map((s) => s.trim()).filter(Boolean);
}

export function loadScanConfig(env: Env = process.env): ScanConfig {
  const d = defaultScanConfig();
  const weights: ScoringWeights = {
    indicatorAlignment: readNum(env, 'WEIGHT_INDICATOR_ALIGNMENT', d.weights.indicatorAlignment),
    timeframeConfluence: readNum(env, 'WEIGHT_TIMEFRAME_CONFLUENCE', d.weights.timeframeConfluence),
    liquidationSupport: readNum(env, 'WEIGHT_LIQUIDATION_SUPPORT', d.weights.liquidationSupport),
    trendStrength: readNum(env, 'WEIGHT_TREND_STRENGTH', d.weights.trendStrength),
  };
  const quote = readStr(env, 'QUOTE_ASSET');
  const deadline = readNum(env, 'SCAN_DEADLINE_MS', 0);

  return validateScanConfig({
    ...d,
    exchange: readStr(env, 'EXCHANGE') ?? d.exchange,
    timeframes: readList(env, 'TIMEFRAMES', d.timeframes),
    requiredTimeframes: readList(env, 'REQUIRED_TIMEFRAMES', d.requiredTimeframes),
    minScore: readNum(env, 'MIN_SCORE', d.minScore),
    maxPairs: readNum(env, 'MAX_PAIRS', d.maxPairs),
    maxWorkers: readNum(env, 'MAX_WORKERS', d.maxWorkers),
    topSetupsLimit: readNum(env, 'TOP_SETUPS_LIMIT', d.topSetupsLimit),
    candleLookback: readNum(env, 'CANDLE_LOOKBACK', d.candleLookback),
    weights,
    cacheTtl: {
      listing: readNum(env, 'MARKETS_TTL_MS', d.cacheTtl.listing),
      ohlcv: readNum(env, 'OHLCV_CACHE_TTL_MS', d.cacheTtl.ohlcv),
      fastTimeframe: readNum(env, 'FAST_TF_TTL_MS', d.cacheTtl.fastTimeframe),
      slowTimeframe: readNum(env, 'SLOW_TF_TTL_MS', d.cacheTtl.slowTimeframe),
    },
    exclusions: {
      quoteAsset: quote === undefined ? d.exclusions.quoteAsset : quote.toUpperCase() === 'ANY' ? null : quote.toUpperCase(),
      excludeStablecoins: readBool(env, 'EXCLUDE_STABLECOINS', d.exclusions.excludeStablecoins),
      excludeLeveragedTokens: readBool(env, 'EXCLUDE_LEVERAGED_TOKENS', d.exclusions.excludeLeveragedTokens),
      customExclude: readList(env, 'CUSTOM_EXCLUDE', d.exclusions.customExclude),
      minQuoteVolume: readNum(env, 'MIN_QUOTE_VOLUME', d.exclusions.minQuoteVolume),
    },
    liquidationBandPct: readNum(env, 'LIQUIDATION_BAND_PCT', d.liquidationBandPct),
    deadlineMs: deadline > 0 ? deadline : null,
  });
}
