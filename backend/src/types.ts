export type Direction = 'LONG' | 'SHORT' | 'NEUTRAL';
export type TradeSide = Exclude<Direction, 'NEUTRAL'>;

export type Kline = [number, string, string, string, string, string, number, string, number, string, string, string]; // Binance kline tuple
export type Candle = { time: number; open: number; high: number; low: number; close: number; volume: number };

export type Instrument = { symbol: string; quoteVolume: number; lastPrice?: number };

export interface IndicatorSignal {
  readonly name: string;
  readonly timeframe: string;
  readonly value: number;
  readonly direction: Direction;
  readonly strength: number; // 0..1
  readonly details?: Readonly<Record<string, number>>;
}

export interface SkippedIndicator {
  readonly name: string;
  readonly timeframe: string;
  readonly required: number;
  readonly available: number;
}

export interface LiquidationZone {
  readonly priceLevel: number;
  readonly strength: number; // 0..1
  readonly side: TradeSide;
}

export type ScoringWeights = {
  indicatorAlignment: number;
  timeframeConfluence: number;
  liquidationSupport: number;
  trendStrength: number;
};

export type TtlClass = 'listing' | 'ohlcv' | 'fastTimeframe' | 'slowTimeframe';
export type TtlPolicy = Record<TtlClass, number>; // ms

export type ExclusionRules = {
  quoteAsset: string | null;
  excludeStablecoins: boolean;
  excludeLeveragedTokens: boolean;
  customExclude: string[];
  minQuoteVolume: number;
};

export type IndicatorSpec =
  | { kind: 'RSI'; period: number; oversold: number; overbought: number }
  | { kind: 'MACD'; fast: number; slow: number; signal: number }
  | { kind: 'EMA'; periods: number[] }
  | { kind: 'BOLLINGER'; period: number; stdDev: number };

export type IndicatorKind = IndicatorSpec['kind'];

export interface ScanConfig {
  exchange: string;
  timeframes: string[];            // smallest -> largest
  requiredTimeframes: string[];
  minScore: number;
  maxPairs: number;
  maxWorkers: number;
  topSetupsLimit: number;
  candleLookback: number;
  weights: ScoringWeights;
  cacheTtl: TtlPolicy;
  exclusions: ExclusionRules;
  indicators: IndicatorSpec[];
  liquidationBandPct: number;
  deadlineMs: number | null;
}

export type ScoreComponents = {
  indicatorAlignment: number;
  timeframeConfluence: number;
  liquidationSupport: number;
  trendStrength: number;
};

export interface TradeSetup {
  readonly symbol: string;
  readonly exchange: string;
  readonly direction: TradeSide;
  readonly score: number;          // 0..100
  readonly confidence: number;     // 0..1
  readonly entryPlan: readonly number[];
  readonly stopLoss: number;
  readonly takeProfits: readonly number[];
  readonly riskRewardRatio: number;
  readonly timeframeConfluence: Readonly<Record<string, Direction>>;
  readonly indicatorSignals: readonly IndicatorSignal[];
  readonly liquidationZones: readonly LiquidationZone[];
  readonly reasons: readonly string[];
  readonly metadata: TradeSetupMetadata;
}

export type TradeSetupMetadata = {
  currentPrice: number;
  atr: number | null;
  components: ScoreComponents;
  signalCount: number;
  alignedTimeframes: number;
  missingTimeframes: string[];
  skippedIndicators: SkippedIndicator[];
  scannedAt: number;
};

export type ScanState = 'PENDING' | 'FETCHING_PAIRS' | 'SCANNING' | 'RANKING' | 'DONE' | 'FAILED';

export type SkipReason = 'DATA_UNAVAILABLE' | 'INSUFFICIENT_DATA' | 'CANCELLED' | 'ERROR';

export type SymbolFailure = {
  symbol: string;
  reason: SkipReason;
  message: string;
  timeframe?: string;
};

export type ScanMetadata = {
  state: ScanState;
  timeframes: string[];
  configHash: string;
  pairsSelected: number;
  pairsNotStarted: number;
  excludedPairs: Partial<Record<string, number>>;
  finishedAt: number;
  durationMs: number;
  cancelled: boolean;
  skipped: {
    count: number;
    byReason: Partial<Record<SkipReason, number>>;
    symbols: SymbolFailure[];
  };
  partial: Array<{ symbol: string; missingTimeframes: string[] }>;
  timeframeFailures: SymbolFailure[];
  neutralCount: number;
  belowMinScore: number;
  skippedIndicators: number;
};

export interface ScanResult {
  readonly scanId: string;
  readonly exchange: string;
  readonly startedAt: number;
  readonly totalPairsScanned: number;
  readonly totalSetupsFound: number;
  readonly setups: readonly TradeSetup[];
  readonly metadata: ScanMetadata;
}

export type ProgressCallback = (completed: number, total: number, symbol: string) => void;

export interface MarketDataSource {
  readonly exchange: string;
  listInstruments(): Promise<Instrument[]>;
  getCandles(symbol: string, timeframe: string, lookback: number): Promise<Candle[]>;
}

export interface LiquidationSource {
  getLiquidationZones(symbol: string, currentPrice: number): Promise<LiquidationZone[]>;
}
