import { describe, expect, it } from 'vitest';
import { planTrade } from '../backend/src/tradePlan.js';

describe('planTrade', () => {
  it('sizes a long from the ATR', () => {
    expect(planTrade('LONG', 100, 2)).toEqual({
      entryPlan: [100, 98.5],
      stopLoss: 97,
      takeProfits: [104.5, 109],
      riskRewardRatio: 1.5,
    });
  });

  it('mirrors a short around the price', () => {
    expect(planTrade('SHORT', 100, 2)).toEqual({
      entryPlan: [100, 101.5],
      stopLoss: 103,
      takeProfits: [95.5, 91],
      riskRewardRatio: 1.5,
    });
  });

  it('falls back to a percentage stop without an ATR', () => {
    const plan = planTrade('LONG', 100, null);
    expect(plan.stopLoss).toBe(98);
    expect(plan.takeProfits).toEqual([103, 106]);
  });
});
