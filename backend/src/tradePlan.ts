import type { TradeSide } from './types.js';

const ATR_STOP_MULT = 1.5;
const FALLBACK_STOP_PCT = 2;
const FAR_ENTRY_R = 0.5;
const TARGETS_R = [1.5, 3];

export type TradePlan = {
  entryPlan: number[];
  stopLoss: number;
  takeProfits: number[];
  riskRewardRatio: number;
};

/**
 * Entry ladder, stop and targets sized in units of risk (R).
 * Risk is 1.5 ATR of the fastest timeframe, or 2% of price without an ATR.
 */
export function planTrade(direction: TradeSide, price: number, atrValue: number | null): TradePlan {
  const risk = atrValue !== null && atrValue > 0 ? atrValue * ATR_STOP_MULT : price * (FALLBACK_STOP_PCT / 100);
  const sign = direction === 'LONG' ? 1 : -1;

  const entryPlan = [price, price - sign * risk * FAR_ENTRY_R];
  const stopLoss = price - sign * risk;
  const takeProfits = TARGETS_R.map((r) => price + sign * risk * r);
  const reward = Math.abs(takeProfits[0] - price);
  return { entryPlan, stopLoss, takeProfits, riskRewardRatio: risk > 0 ? reward / risk : 0 };
}
