import type { EmaSeries } from "@/types";

/**
 * Exponential moving average aligned to `prices`. Indices before `period - 1`
 * are null, the seed at `period - 1` is the simple average of the first
 * `period` prices. Fewer prices than `period` yields an all-null series.
 */
export function computeEma(prices: readonly number[], period: number): EmaSeries {
  const result: EmaSeries = new Array<number | null>(prices.length).fill(null);
  if (!Number.isInteger(period) || period < 1 || prices.length < period) {
    return result;
  }

  const alpha = 2 / (period + 1);
  let seed = 0;
  for (let index = 0; index < period; index += 1) {
    seed += prices[index];
  }
  let previous = seed / period;
  result[period - 1] = previous;

  for (let index = period; index < prices.length; index += 1) {
    previous = prices[index] * alpha + previous * (1 - alpha);
    result[index] = previous;
  }

  return result;
}

export function latestDefined(series: EmaSeries): number | null {
  for (let index = series.length - 1; index >= 0; index -= 1) {
    const value = series[index];
    if (value !== null) {
      return value;
    }
  }
  return null;
}

// Simple-average RSI over the last `period` close-to-close changes.
export function computeRsi(closes: readonly number[], period = 14): number | null {
  if (closes.length < period + 1) {
    return null;
  }
  let gains = 0;
  let losses = 0;
  for (let index = closes.length - period; index < closes.length; index += 1) {
    const change = closes[index] - closes[index - 1];
    if (change > 0) {
      gains += change;
    } else {
      losses -= change;
    }
  }
  const avgGain = gains / period;
  const avgLoss = losses / period;
  if (avgLoss === 0) {
    return 100;
  }
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

export function computeVolatility(closes: readonly number[]): number {
  if (closes.length < 2) {
    return 0;
  }
  const returns: number[] = [];
  for (let index = 1; index < closes.length; index += 1) {
    returns.push((closes[index] - closes[index - 1]) / closes[index - 1]);
  }
  const mean = returns.reduce((acc, value) => acc + value, 0) / returns.length;
  const variance = returns.reduce((acc, value) => acc + (value - mean) ** 2, 0) / returns.length;
  return Math.sqrt(variance);
}
