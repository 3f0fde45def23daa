// Indicator primitives. Each returns only the defined tail of the series:
// the first output corresponds to the first input index with a full lookback.

export function last(series: readonly number[]): number | undefined {
  return series.length ? series[series.length - 1] : undefined;
}

export function sma(series: readonly number[], period: number): number[] {
  if (period <= 0 || series.length < period) return [];
  const out: number[] = [];
  let sum = 0;
  for (let i = 0; i < series.length; i++) {
    sum += series[i];
    if (i >= period) sum -= series[i - period];
    if (i >= period - 1) out.push(sum / period);
  }
  return out;
}

// Seeded with the SMA of the first `period` values.
export function ema(series: readonly number[], period: number): number[] {
  if (period <= 0 || series.length < period) return [];
  const k = 2 / (period + 1);
  let prev = 0;
  for (let i = 0; i < period; i++) prev += series[i];
  prev /= period;
  const out = [prev];
  for (let i = period; i < series.length; i++) {
    prev = series[i] * k + prev * (1 - k);
    out.push(prev);
  }
  return out;
}

/** Population standard deviation of each rolling window. */
export function stdDev(series: readonly number[], period: number): number[] {
  const means = sma(series, period);
  return means.map((mean, j) => {
    let acc = 0;
    for (let i = j; i < j + period; i++) acc += (series[i] - mean) ** 2;
    return Math.sqrt(acc / period);
  });
}

// Wilder's RSI
export function rsi(closes: readonly number[], period = 14): number[] {
  if (period <= 0 || closes.length < period + 1) return [];
  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const ch = closes[i] - closes[i - 1];
    if (ch > 0) avgGain += ch; else avgLoss -= ch;
  }
  avgGain /= period;
  avgLoss /= period;

  const toRsi = (g: number, l: number) => {
    if (l === 0) return g === 0 ? 50 : 100;
    return 100 - 100 / (1 + g / l);
  };

  const out = [toRsi(avgGain, avgLoss)];
  for (let i = period + 1; i < closes.length; i++) {
    const ch = closes[i] - closes[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(ch, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-ch, 0)) / period;
    out.push(toRsi(avgGain, avgLoss));
  }
  return out;
}

export type MacdSeries = { macd: number[]; signal: number[]; histogram: number[] };

export function macd(closes: readonly number[], fast = 12, slow = 26, signalPeriod = 9): MacdSeries {
  const empty = { macd: [], signal: [], histogram: [] };
  if (fast >= slow || closes.length < slow + signalPeriod - 1) return empty;
  const fastE = ema(closes, fast);
  const slowE = ema(closes, slow);
  const offset = slow - fast;
  const line = slowE.map((s, i) => fastE[i + offset] - s);
  const signal = ema(line, signalPeriod);
  const macdTail = line.slice(signalPeriod - 1);
  return {
    macd: macdTail,
    signal,
    histogram: macdTail.map((m, i) => m - signal[i]),
  };
}

export type BollingerSeries = { middle: number[]; upper: number[]; lower: number[] };

export function bollinger(closes: readonly number[], period = 20, mult = 2): BollingerSeries {
  const middle = sma(closes, period);
  const sd = stdDev(closes, period);
  return {
    middle,
    upper: middle.map((m, i) => m + mult * sd[i]),
    lower: middle.map((m, i) => m - mult * sd[i]),
  };
}

// Wilder's ATR over true ranges starting at the second candle.
export function atr(high: readonly number[], low: readonly number[], close: readonly number[], period = 14): number[] {
  const n = Math.min(high.length, low.length, close.length);
  if (period <= 0 || n < period + 1) return [];
  const tr: number[] = [];
  for (let i = 1; i < n; i++) {
    tr.push(Math.max(
      high[i] - low[i],
      Math.abs(high[i] - close[i - 1]),
      Math.abs(low[i] - close[i - 1]),
    ));
  }
  let prev = 0;
  for (let i = 0; i < period; i++) prev += tr[i];
  prev /= period;
  const out = [prev];
  for (let i = period; i < tr.length; i++) {
    prev = (prev * (period - 1) + tr[i]) / period;
    out.push(prev);
  }
  return out;
}
