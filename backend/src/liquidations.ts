import fetch from 'node-fetch';
import { z } from 'zod';
import { DataUnavailableError, describeError } from './errors.js';
import type { LiquidationSource, LiquidationZone } from './types.js';

const TIMEOUT_MS = Number(process.env.LIQUIDATION_TIMEOUT_MS || 5_000);

const ZoneSchema = z.object({
  priceLevel: z.number().positive(),
  strength: z.number().min(0).max(1),
  side: z.enum(['LONG', 'SHORT']),
});
// Either a bare array or { zones: [...] }
const ZonesPayload = z.union([
  z.array(ZoneSchema),
  z.object({ zones: z.array(ZoneSchema) }).transform((p) => p.zones),
]);

export const noLiquidationSource: LiquidationSource = {
  async getLiquidationZones() {
    return [];
  },
};

export function parseLiquidationZones(payload: unknown, symbol: string): LiquidationZone[] {
  const parsed = ZonesPayload.safeParse(payload);
  if (!parsed.success) throw new DataUnavailableError(`unexpected liquidation payload for ${symbol}`, { symbol }, { cause: parsed.error });
  return parsed.data.sort((a, b) => a.priceLevel - b.priceLevel);
}

/**
 * Reads zones from a JSON endpoint:
 * GET <url>?symbol=BTCUSDT&price=65000 -> [{ priceLevel, strength, side }]
 */
export function createHttpLiquidationSource(url: string): LiquidationSource {
  return {
    async getLiquidationZones(symbol, currentPrice) {
      const target = `${url}?symbol=${encodeURIComponent(symbol)}&price=${currentPrice}`;
      let res;
      try {
        res = await fetch(target, { signal: AbortSignal.timeout(TIMEOUT_MS) });
      } catch (e) {
        throw new DataUnavailableError(`liquidation request failed: ${describeError(e)}`, { symbol }, { cause: e });
      }
      if (!res.ok) throw new DataUnavailableError(`liquidation source returned HTTP ${res.status}`, { symbol });
      return parseLiquidationZones(await res.json(), symbol);
    },
  };
}

export function liquidationSourceFromEnv(env: Record<string, string | undefined> = process.env): LiquidationSource {
  const url = env.LIQUIDATION_SOURCE_URL?.trim();
  return url ? createHttpLiquidationSource(url) : noLiquidationSource;
}
