import { DEFAULT_LIQUIDATION_BAND_PCT, scoreLiquidationSupport, supportingZones } from './liquidation.js';
import type {
  Direction,
  IndicatorSignal,
  LiquidationZone,
  ScoreComponents,
  ScoringWeights,
  TradeSide,
} from './types.js';

export const DEFAULT_WEIGHTS: ScoringWeights = {
  indicatorAlignment: 0.35,
  timeframeConfluence: 0.30,
  liquidationSupport: 0.20,
  trendStrength: 0.15,
};

// Agreeing signals needed for the signal-count half of confidence to saturate.
const FULL_CORROBORATION = 8;
const NOTABLE_STRENGTH = 0.6;
const MAX_SIGNAL_REASONS = 3;
// Preference order when reading trend strength off the highest timeframe.
const TREND_INDICATORS = ['EMA', 'MACD'];

export type ConfluenceInput = {
  symbol: string;
  timeframes: readonly string[];
  signalsByTimeframe: Readonly<Record<string, readonly IndicatorSignal[]>>;
  zones: readonly LiquidationZone[];
  currentPrice: number;
  weights?: ScoringWeights;
  liquidationBandPct?: number;
};

export type ConfluenceResult = {
  symbol: string;
  direction: Direction;
  score: number;
  confidence: number;
  timeframeConfluence: Record<string, Direction>;
  indicatorSignals: IndicatorSignal[];
  liquidationZones: LiquidationZone[];
  reasons: string[];
  components: ScoreComponents;
  signalCount: number;
  alignedTimeframes: number;
};

const clamp = (x: number, lo: number, hi: number) => (Number.isFinite(x) ? Math.min(hi, Math.max(lo, x)) : lo);

export function opposite(d: TradeSide): TradeSide {
  return d === 'LONG' ? 'SHORT' : 'LONG';
}

/** Strength-weighted vote of one timeframe's signals; equal weight is NEUTRAL. */
export function timeframeDirection(signals: readonly IndicatorSignal[]): Direction {
  let long = 0;
  let short = 0;
  for (const s of signals) {
    if (s.direction === 'LONG') long += s.strength;
    else if (s.direction === 'SHORT') short += s.strength;
  }
  if (long > short) return 'LONG';
  if (short > long) return 'SHORT';
  return 'NEUTRAL';
}

/**
 * Majority of timeframe directions. On a tie the longest timeframe holding one
 * of the tied directions decides.
 */
export function candidateDirection(timeframes: readonly string[], byTimeframe: Readonly<Record<string, Direction>>): Direction {
  let long = 0;
  let short = 0;
  for (const tf of timeframes) {
    if (byTimeframe[tf] === 'LONG') long++;
    else if (byTimeframe[tf] === 'SHORT') short++;
  }
  if (long > short) return 'LONG';
  if (short > long) return 'SHORT';
  if (long === 0) return 'NEUTRAL';
  for (let i = timeframes.length - 1; i >= 0; i--) {
    const d = byTimeframe[timeframes[i]];
    if (d === 'LONG' || d === 'SHORT') return d;
  }
  return 'NEUTRAL';
}

export function normalizeWeights(w: ScoringWeights): ScoringWeights {
  const sum = w.indicatorAlignment + w.timeframeConfluence + w.liquidationSupport + w.trendStrength;
  if (!(sum > 0)) return { ...DEFAULT_WEIGHTS };
  return {
    indicatorAlignment: w.indicatorAlignment / sum,
    timeframeConfluence: w.timeframeConfluence / sum,
    liquidationSupport: w.liquidationSupport / sum,
    trendStrength: w.trendStrength / sum,
  };
}

function trendReading(timeframes: readonly string[], signalsByTimeframe: ConfluenceInput['signalsByTimeframe']) {
  for (let i = timeframes.length - 1; i >= 0; i--) {
    const signals = signalsByTimeframe[timeframes[i]] ?? [];
    for (const name of TREND_INDICATORS) {
      const s = signals.find((x) => x.name === name);
      if (s) return s;
    }
  }
  return null;
}

function scoreBand(score: number) {
  if (score >= 70) return `High composite score ${score.toFixed(1)}/100`;
  if (score >= 50) return `Moderate composite score ${score.toFixed(1)}/100`;
  return `Low composite score ${score.toFixed(1)}/100`;
}

export function scoreConfluence(input: ConfluenceInput): ConfluenceResult {
  const { symbol, timeframes, signalsByTimeframe, zones, currentPrice } = input;
  const weights = normalizeWeights(input.weights ?? DEFAULT_WEIGHTS);
  const band = input.liquidationBandPct ?? DEFAULT_LIQUIDATION_BAND_PCT;

  const timeframeConfluence: Record<string, Direction> = {};
  const allSignals: IndicatorSignal[] = [];
  for (const tf of timeframes) {
    const signals = signalsByTimeframe[tf] ?? [];
    timeframeConfluence[tf] = timeframeDirection(signals);
    allSignals.push(...signals);
  }

  const direction = candidateDirection(timeframes, timeframeConfluence);
  const base = {
    symbol,
    direction,
    timeframeConfluence,
    indicatorSignals: allSignals,
    liquidationZones: [...zones],
    signalCount: allSignals.length,
  };

  if (direction === 'NEUTRAL') {
    return {
      ...base,
      score: 0,
      confidence: 0,
      components: { indicatorAlignment: 0, timeframeConfluence: 0, liquidationSupport: 0, trendStrength: 0 },
      alignedTimeframes: 0,
      reasons: [`No directional confluence across ${timeframes.join(', ')}`, scoreBand(0)],
    };
  }

  const against = opposite(direction);
  const agreeing = allSignals.filter((s) => s.direction === direction);
  const opposing = allSignals.filter((s) => s.direction === against);

  const meanAgreeing = agreeing.length ? agreeing.reduce((a, s) => a + clamp(s.strength, 0, 1), 0) / agreeing.length : 0;
  const indicatorAlignment = clamp(meanAgreeing * (1 - opposing.length / allSignals.length), 0, 1);

  const alignedTfs = timeframes.filter((tf) => timeframeConfluence[tf] === direction);
  const opposingTfs = timeframes.filter((tf) => timeframeConfluence[tf] === against);
  const timeframeScore = timeframes.length ? alignedTfs.length / timeframes.length : 0;

  const liquidationSupport = scoreLiquidationSupport(zones, currentPrice, direction, band);

  const trend = trendReading(timeframes, signalsByTimeframe);
  const trendStrength = trend && trend.direction === direction ? clamp(trend.strength, 0, 1) : 0;

  const components: ScoreComponents = {
    indicatorAlignment,
    timeframeConfluence: timeframeScore,
    liquidationSupport,
    trendStrength,
  };
  const score = clamp(100 * (
    components.indicatorAlignment * weights.indicatorAlignment +
    components.timeframeConfluence * weights.timeframeConfluence +
    components.liquidationSupport * weights.liquidationSupport +
    components.trendStrength * weights.trendStrength
  ), 0, 100);

  const confidence = clamp(0.6 * timeframeScore + 0.4 * Math.min(1, agreeing.length / FULL_CORROBORATION), 0, 1);

  // Reasons read the same values the score was built from.
  const tfIndex = (tf: string) => timeframes.indexOf(tf);
  const reasons = agreeing
    .filter((s) => s.strength >= NOTABLE_STRENGTH)
    .sort((a, b) => b.strength - a.strength || tfIndex(a.timeframe) - tfIndex(b.timeframe) || a.name.localeCompare(b.name))
    .slice(0, MAX_SIGNAL_REASONS)
    .map((s) => `${s.name} favours ${direction} on ${s.timeframe} (strength ${s.strength.toFixed(2)})`);

  if (alignedTfs.length >= 2) {
    reasons.push(`Multi-timeframe alignment: ${alignedTfs.join(', ')} (${alignedTfs.length}/${timeframes.length})`);
  }
  if (opposingTfs.length) {
    reasons.push(`Opposing bias on ${opposingTfs.join(', ')}`);
  }
  const support = supportingZones(zones, currentPrice, direction, band);
  if (support.length) {
    reasons.push(`${support.length} supportive liquidation zone(s) within ${band.toFixed(1)}% (support ${liquidationSupport.toFixed(2)})`);
  }
  if (trend && trendStrength > 0) {
    reasons.push(`${trend.timeframe} trend confirms ${direction} (${trend.name} strength ${trendStrength.toFixed(2)})`);
  }
  reasons.push(scoreBand(score));

  return {
    ...base,
    score,
    confidence,
    components,
    alignedTimeframes: alignedTfs.length,
    reasons,
  };
}
