import type { ExclusionRules, Instrument } from './types.js';

// Stable-vs-stable pairs have no directional edge worth scanning
export const STABLECOINS = new Set([
  'USDT', 'USDC', 'BUSD', 'DAI', 'TUSD', 'USDP', 'USDD', 'FDUSD',
  'GUSD', 'FRAX', 'LUSD', 'USDK', 'USDJ', 'HUSD', 'CUSD', 'PYUSD',
  'UST', 'USTC', 'SUSD', 'DUSD', 'OUSD', 'MUSD', 'RSV', 'EURT',
]);
const LEVERAGED_BASE = /(UP|DOWN|BULL|BEAR)$/i;
const KNOWN_QUOTES = ['FDUSD', 'USDT', 'USDC', 'BUSD', 'TUSD', 'BTC', 'ETH', 'BNB', 'EUR', 'TRY'];

export const DEFAULT_EXCLUSIONS: ExclusionRules = {
  quoteAsset: 'USDT',
  excludeStablecoins: true,
  excludeLeveragedTokens: true,
  customExclude: [],
  minQuoteVolume: 0,
};

/** 'BTC/USDT:USDT', 'BTC/USDT' and 'BTCUSDT' all split to { base: 'BTC', quote: 'USDT' }. */
export function splitSymbol(symbol: string, quoteHint?: string | null): { base: string; quote: string } | null {
  const s = symbol.toUpperCase();
  if (s.includes('/')) {
    const [base, rest] = s.split('/');
    return { base, quote: rest.split(':')[0] };
  }
  const quotes = quoteHint ? [quoteHint.toUpperCase(), ...KNOWN_QUOTES] : KNOWN_QUOTES;
  for (const q of quotes) {
    if (s.length > q.length && s.endsWith(q)) return { base: s.slice(0, -q.length), quote: q };
  }
  return null;
}

export type ExclusionReason = 'QUOTE' | 'STABLECOIN' | 'LEVERAGED' | 'CUSTOM' | 'VOLUME';

export function exclusionReason(inst: Instrument, rules: ExclusionRules): ExclusionReason | null {
  const parts = splitSymbol(inst.symbol, rules.quoteAsset);
  const sym = inst.symbol.toUpperCase();

  if (rules.quoteAsset && parts?.quote !== rules.quoteAsset.toUpperCase()) return 'QUOTE';
  if (rules.excludeStablecoins && parts && STABLECOINS.has(parts.base) && STABLECOINS.has(parts.quote)) return 'STABLECOIN';
  if (rules.excludeLeveragedTokens && parts && LEVERAGED_BASE.test(parts.base) && parts.base.length > 4) return 'LEVERAGED';
  const custom = rules.customExclude.map((c) => c.trim().toUpperCase()).filter(Boolean);
  if (custom.includes(sym) || (parts && custom.includes(parts.base))) return 'CUSTOM';
  if (!(inst.quoteVolume >= rules.minQuoteVolume)) return 'VOLUME';
  return null;
}

export type PairSelection = {
  symbols: string[];
  excluded: Partial<Record<ExclusionReason, number>>;
};

/** Applies exclusions, then keeps the `maxPairs` most traded symbols. */
export function selectPairs(instruments: readonly Instrument[], rules: ExclusionRules, maxPairs: number): PairSelection {
  const excluded: Partial<Record<ExclusionReason, number>> = {};
  const kept: Instrument[] = [];
  const seen = new Set<string>();
  for (const inst of instruments) {
    if (seen.has(inst.symbol)) continue;
    seen.add(inst.symbol);
    const why = exclusionReason(inst, rules);
    if (why) {
      excluded[why] = (excluded[why] ?? 0) + 1;
      continue;
    }
    kept.push(inst);
  }
  kept.sort((a, b) => b.quoteVolume - a.quoteVolume || (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0));
  return { symbols: kept.slice(0, Math.max(0, maxPairs)).map((i) => i.symbol), excluded };
}
