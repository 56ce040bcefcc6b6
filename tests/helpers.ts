import type { Candle } from "@/types";

export const BASE_TIMESTAMP = 1_700_000_000_000;
export const WEEK_MS = 7 * 86_400_000;

export function createCandle(index: number, overrides: Partial<Candle> = {}): Candle {
  return {
    timestamp: overrides.timestamp ?? BASE_TIMESTAMP + index * WEEK_MS,
    open: overrides.open ?? 10,
    high: overrides.high ?? 10.5,
    low: overrides.low ?? 9.5,
    close: overrides.close ?? 10,
    volume: overrides.volume ?? 100,
  };
}

/**
 * 35 flat bars, a breakout at 35, a peak at 36 and three lower bearish bars.
 * Weekly defaults turn the last bar into a BUY on the 15-period EMA.
 */
export function buildReversalSeries(overrides: Record<number, Partial<Candle>> = {}): Candle[] {
  const shape: Record<number, Partial<Candle>> = {
    35: { open: 10, high: 14.5, low: 10, close: 14 },
    36: { open: 14, high: 16, low: 14, close: 15 },
    37: { open: 15, high: 15.2, low: 12.8, close: 13 },
    38: { open: 13, high: 13.1, low: 11.9, close: 12 },
    39: { open: 12, high: 12.2, low: 10.5, close: 11.5 },
  };
  const candles: Candle[] = [];
  for (let index = 0; index < 40; index += 1) {
    candles.push(createCandle(index, { ...(shape[index] ?? {}), ...(overrides[index] ?? {}) }));
  }
  return candles;
}
