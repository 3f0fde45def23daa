import type { ScanMetadata, ScanResult, TradeSetup } from '../../backend/src/types.js';

export function makeSetup(overrides: Partial<TradeSetup> = {}): TradeSetup {
  return {
    symbol: 'BTCUSDT',
    exchange: 'binance',
    direction: 'LONG',
    score: 75,
    confidence: 0.8,
    entryPlan: [100, 98.5],
    stopLoss: 97,
    takeProfits: [104.5, 109],
    riskRewardRatio: 1.5,
    timeframeConfluence: { '15m': 'LONG', '1h': 'LONG', '4h': 'NEUTRAL' },
    indicatorSignals: [],
    liquidationZones: [],
    reasons: ['Multi-timeframe alignment: 15m, 1h (2/3)', 'High composite score 75.0/100'],
    metadata: {
      currentPrice: 100,
      atr: 2,
      components: { indicatorAlignment: 0.8, timeframeConfluence: 0.67, liquidationSupport: 0, trendStrength: 0.9 },
      signalCount: 4,
      alignedTimeframes: 2,
      missingTimeframes: [],
      skippedIndicators: [],
      scannedAt: 1_700_000_000_000,
    },
    ...overrides,
  };
}

export function makeResult(overrides: Partial<ScanResult> = {}, metadata: Partial<ScanMetadata> = {}): ScanResult {
  const setups = overrides.setups ?? [makeSetup()];
  return {
    scanId: 'scan-1',
    exchange: 'binance',
    startedAt: 1_700_000_000_000,
    totalPairsScanned: 3,
    totalSetupsFound: setups.length,
    setups,
    ...overrides,
    metadata: {
      state: 'DONE',
      timeframes: ['15m', '1h', '4h'],
      configHash: 'hash-1',
      pairsSelected: 3,
      pairsNotStarted: 0,
      excludedPairs: {},
      finishedAt: 1_700_000_004_000,
      durationMs: 4_000,
      cancelled: false,
      skipped: { count: 0, byReason: {}, symbols: [] },
      partial: [],
      timeframeFailures: [],
      neutralCount: 0,
      belowMinScore: 0,
      skippedIndicators: 0,
      ...metadata,
    },
  };
}
