import { v4 as uuidv4 } from 'uuid';
import { validateScanConfig } from './config.js';
import { computeConfigHash } from './configSnapshot.js';
import { scoreConfluence } from './confluence.js';
import {
  DataUnavailableError,
  describeError,
  InsufficientDataError,
  rootCause,
  ScanCancelledError,
  ScanFailedError,
} from './errors.js';
import { computeIndicators } from './indicatorEngine.js';
import { atr, last } from './indicators.js';
import { selectPairs } from './pairFilter.js';
import { runPool } from './pool.js';
import { ttlClassForTimeframe } from './timeframes.js';
import { planTrade } from './tradePlan.js';
import { createMarketCaches, type MarketCaches } from './ttlCache.js';
import type {
  Candle,
  IndicatorSignal,
  LiquidationSource,
  LiquidationZone,
  MarketDataSource,
  ProgressCallback,
  ScanConfig,
  ScanMetadata,
  ScanResult,
  ScanState,
  SkippedIndicator,
  SkipReason,
  SymbolFailure,
  TradeSetup,
} from './types.js';

const ATR_PERIOD = 14;

export type ScannerDeps = {
  market: MarketDataSource;
  liquidations?: LiquidationSource;
  /** Shared across scans when given; otherwise each scan gets fresh caches. */
  caches?: MarketCaches;
  now?: () => number;
  newId?: () => string;
};

export type ScanOptions = {
  signal?: AbortSignal;
  onStateChange?: (state: ScanState, scanId: string) => void;
  /** Awaited once before pairs are fetched; a rejection is logged and the scan goes on. */
  onStart?: (run: ScanStart) => Promise<void> | void;
};

export type ScanStart = { scanId: string; exchange: string; startedAt: number; configHash: string };

type SymbolOutcome = {
  symbol: string;
  missingTimeframes: string[];
  timeframeFailures: SymbolFailure[];
  skippedIndicators: SkippedIndicator[];
} & (
  | { kind: 'setup'; setup: TradeSetup }
  | { kind: 'neutral' }
  | { kind: 'skipped'; failure: SymbolFailure }
);

export interface Scanner {
  scan(config: ScanConfig, onProgress?: ProgressCallback, options?: ScanOptions): Promise<ScanResult>;
}

const bySymbol = (a: { symbol: string }, b: { symbol: string }) => (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0);

/** Score desc, then confidence desc, then symbol asc. */
export function compareSetups(a: TradeSetup, b: TradeSetup): number {
  return b.score - a.score || b.confidence - a.confidence || bySymbol(a, b);
}

export function rankSetups(setups: readonly TradeSetup[], minScore: number, limit: number) {
  const passing = setups.filter((s) => s.score >= minScore).sort(compareSetups);
  return { passing: passing.length, top: passing.slice(0, Math.max(0, limit)) };
}

function skipReasonOf(e: unknown): SkipReason {
  if (e instanceof ScanCancelledError) return 'CANCELLED';
  if (e instanceof DataUnavailableError) return 'DATA_UNAVAILABLE';
  if (e instanceof InsufficientDataError) return 'INSUFFICIENT_DATA';
  return 'ERROR';
}

export function createScanner(deps: ScannerDeps): Scanner {
  const now = deps.now ?? Date.now;
  const newId = deps.newId ?? uuidv4;

  async function scan(input: ScanConfig, onProgress?: ProgressCallback, options: ScanOptions = {}): Promise<ScanResult> {
    const config = validateScanConfig(input);
    const scanId = newId();
    const startedAt = now();
    const caches = deps.caches ?? createMarketCaches(config.cacheTtl, now);
    // shared caches otherwise keep every symbol ever scanned
    caches.instruments.prune();
    caches.candles.prune();
    const { exchange, timeframes } = config;

    let state: ScanState = 'PENDING';
    const enter = (next: ScanState) => {
      state = next;
      if (!options.onStateChange) return;
      try {
        options.onStateChange(next, scanId);
      } catch (e) {
        console.warn(`[scan] ${scanId} state listener failed:`, describeError(e));
      }
    };
    enter('PENDING');

    const abort = new AbortController();
    const forwardAbort = () => abort.abort();
    if (options.signal?.aborted) abort.abort();
    else options.signal?.addEventListener('abort', forwardAbort, { once: true });
    const deadline = config.deadlineMs === null ? null : setTimeout(() => {
      console.warn(`[scan] ${scanId} deadline of ${config.deadlineMs}ms reached, stopping`);
      abort.abort();
    }, config.deadlineMs);

    const checkCancelled = (symbol: string) => {
      if (abort.signal.aborted) throw new ScanCancelledError(symbol);
    };

    async function scanSymbol(symbol: string): Promise<SymbolOutcome> {
      const candlesByTf: Record<string, Candle[]> = {};
      const timeframeFailures: SymbolFailure[] = [];

      for (const tf of timeframes) {
        checkCancelled(symbol);
        try {
          const candles = await caches.candles.getOrFetch(
            `ohlcv:${exchange}:${symbol}:${tf}:${config.candleLookback}`,
            ttlClassForTimeframe(tf),
            () => deps.market.getCandles(symbol, tf, config.candleLookback),
          );
          // an empty series counts as a missing timeframe
          if (candles.length) candlesByTf[tf] = candles;
          else timeframeFailures.push({ symbol, timeframe: tf, reason: 'INSUFFICIENT_DATA', message: 'no candles returned' });
        } catch (e) {
          const cause = rootCause(e);
          timeframeFailures.push({ symbol, timeframe: tf, reason: skipReasonOf(cause), message: describeError(cause) });
        }
      }
      checkCancelled(symbol);

      const available = timeframes.filter((tf) => candlesByTf[tf] !== undefined);
      const missingTimeframes = timeframes.filter((tf) => candlesByTf[tf] === undefined);
      const missingRequired = missingTimeframes.filter((tf) => config.requiredTimeframes.includes(tf));
      const base = { symbol, missingTimeframes, timeframeFailures };

      if (missingRequired.length || available.length === 0) {
        const first = timeframeFailures.find((f) => missingRequired.length === 0 || f.timeframe === missingRequired[0]);
        return {
          ...base,
          skippedIndicators: [],
          kind: 'skipped',
          failure: {
            symbol,
            reason: first?.reason ?? 'DATA_UNAVAILABLE',
            timeframe: first?.timeframe,
            message: missingRequired.length
              ? `required timeframe(s) unavailable: ${missingRequired.join(', ')}`
              : 'no timeframe returned data',
          },
        };
      }

      const signalsByTimeframe: Record<string, IndicatorSignal[]> = {};
      const skippedIndicators: SkippedIndicator[] = [];
      let signalCount = 0;
      for (const tf of available) {
        const { signals, skipped } = computeIndicators(candlesByTf[tf], tf, config.indicators);
        signalsByTimeframe[tf] = signals;
        skippedIndicators.push(...skipped);
        signalCount += signals.length;
      }
      if (signalCount === 0) {
        return {
          ...base,
          skippedIndicators,
          kind: 'skipped',
          failure: { symbol, reason: 'INSUFFICIENT_DATA', message: 'not enough candles for any indicator' },
        };
      }

      const fastest = candlesByTf[available[0]];
      const currentPrice = last(fastest.map((c) => c.close));
      if (currentPrice === undefined) throw new InsufficientDataError('price', 1, 0);
      const atrValue = last(atr(fastest.map((c) => c.high), fastest.map((c) => c.low), fastest.map((c) => c.close), ATR_PERIOD)) ?? null;

      let zones: LiquidationZone[] = [];
      if (deps.liquidations) {
        try {
          zones = await deps.liquidations.getLiquidationZones(symbol, currentPrice);
        } catch (e) {
          console.warn(`[scan] ${symbol} liquidation zones unavailable:`, describeError(e));
        }
        checkCancelled(symbol);
      }

      const result = scoreConfluence({
        symbol,
        timeframes,
        signalsByTimeframe,
        zones,
        currentPrice,
        weights: config.weights,
        liquidationBandPct: config.liquidationBandPct,
      });
      const direction = result.direction;
      if (direction === 'NEUTRAL') return { ...base, skippedIndicators, kind: 'neutral' };

      const plan = planTrade(direction, currentPrice, atrValue);
      const setup: TradeSetup = {
        symbol,
        exchange,
        direction,
        score: result.score,
        confidence: result.confidence,
        ...plan,
        timeframeConfluence: result.timeframeConfluence,
        indicatorSignals: result.indicatorSignals,
        liquidationZones: result.liquidationZones,
        reasons: result.reasons,
        metadata: {
          currentPrice,
          atr: atrValue,
          components: result.components,
          signalCount: result.signalCount,
          alignedTimeframes: result.alignedTimeframes,
          missingTimeframes,
          skippedIndicators,
          scannedAt: now(),
        },
      };
      return { ...base, skippedIndicators, kind: 'setup', setup };
    }

    const configHash = computeConfigHash(config);
    if (options.onStart) {
      try {
        await options.onStart({ scanId, exchange, startedAt, configHash });
      } catch (e) {
        console.warn(`[scan] ${scanId} start hook failed:`, describeError(e));
      }
    }

    try {
      enter('FETCHING_PAIRS');
      const instruments = await caches.instruments.getOrFetch(`instruments:${exchange}`, 'listing', () => deps.market.listInstruments());
      const selection = selectPairs(instruments, config.exclusions, config.maxPairs);
      const symbols = selection.symbols;
      console.log(`[scan] ${scanId} ${exchange}: ${instruments.length} instruments, ${symbols.length} selected`);

      enter('SCANNING');
      const outcomes: SymbolOutcome[] = [];
      const pool = await runPool(symbols, config.maxWorkers, async (symbol) => {
        let outcome: SymbolOutcome;
        try {
          outcome = await scanSymbol(symbol);
        } catch (e) {
          const reason = skipReasonOf(e);
          if (reason === 'ERROR') console.error(`[scan] ${symbol} failed:`, e);
          outcome = {
            symbol,
            missingTimeframes: [],
            timeframeFailures: [],
            skippedIndicators: [],
            kind: 'skipped',
            failure: { symbol, reason, message: describeError(e) },
          };
        }
        outcomes.push(outcome);
        if (!onProgress) return;
        try {
          onProgress(outcomes.length, symbols.length, symbol);
        } catch (e) {
          console.warn(`[scan] ${scanId} progress callback failed:`, describeError(e));
        }
      }, { signal: abort.signal });

      enter('RANKING');
      outcomes.sort(bySymbol);
      const produced: TradeSetup[] = [];
      const skipped: SymbolFailure[] = [];
      const byReason: Partial<Record<SkipReason, number>> = {};
      let neutralCount = 0;
      for (const o of outcomes) {
        if (o.kind === 'setup') produced.push(o.setup);
        else if (o.kind === 'neutral') neutralCount++;
        else {
          skipped.push(o.failure);
          byReason[o.failure.reason] = (byReason[o.failure.reason] ?? 0) + 1;
        }
      }
      const ranked = rankSetups(produced, config.minScore, config.topSetupsLimit);

      enter('DONE');
      const finishedAt = now();
      const metadata: ScanMetadata = {
        state: 'DONE',
        timeframes: [...timeframes],
        configHash,
        pairsSelected: symbols.length,
        pairsNotStarted: pool.notStarted,
        excludedPairs: selection.excluded,
        finishedAt,
        durationMs: finishedAt - startedAt,
        cancelled: abort.signal.aborted,
        skipped: { count: skipped.length, byReason, symbols: skipped },
        partial: outcomes
          .filter((o) => o.kind !== 'skipped' && o.missingTimeframes.length > 0)
          .map((o) => ({ symbol: o.symbol, missingTimeframes: o.missingTimeframes })),
        timeframeFailures: outcomes.flatMap((o) => o.timeframeFailures),
        neutralCount,
        belowMinScore: produced.length - ranked.passing,
        skippedIndicators: outcomes.reduce((n, o) => n + o.skippedIndicators.length, 0),
      };
      console.log(
        `[scan] ${scanId} done in ${metadata.durationMs}ms: ${outcomes.length} scanned, ${ranked.passing} setups, ` +
        `${skipped.length} skipped${metadata.cancelled ? ' (cancelled)' : ''}`,
      );

      return {
        scanId,
        exchange,
        startedAt,
        totalPairsScanned: outcomes.length - (byReason.CANCELLED ?? 0),
        totalSetupsFound: ranked.passing,
        setups: ranked.top,
        metadata,
      };
    } catch (e) {
      const failedIn = state;
      enter('FAILED');
      const cause = rootCause(e);
      console.error(`[scan] ${scanId} failed during ${failedIn}:`, describeError(cause));
      throw new ScanFailedError(scanId, failedIn, cause);
    } finally {
      if (deadline) clearTimeout(deadline);
      options.signal?.removeEventListener('abort', forwardAbort);
    }
  }

  return { scan };
}
