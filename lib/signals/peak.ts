import { computeEma } from "@/lib/indicators";
import type { PeakRejection, Timeframe } from "@/types";

export const PEAK_EMA_PERIOD = 15;
export const PEAK_EMA_RATIO = 1.2;

export interface PeakWindow {
  recentWindow: number;
  totalWindow: number;
}

export const PEAK_PRESETS: Record<Timeframe, PeakWindow> = {
  weekly: { recentWindow: 5, totalWindow: 52 },
  daily: { recentWindow: 7, totalWindow: 200 },
};

export type PeakResult = { index: number } | { reason: PeakRejection };

function maxInRange(values: readonly number[], start: number, end: number): number | null {
  if (end <= start) {
    return null;
  }
  let max = values[start];
  for (let index = start + 1; index < end; index += 1) {
    if (values[index] > max) {
      max = values[index];
    }
  }
  return max;
}

/**
 * Looks for a single breakout high in the last `totalWindow` bars. The
 * returned index is relative to the full input arrays.
 */
export function findPeakDetailed(
  highs: readonly number[],
  closes: readonly number[],
  recentWindow: number,
  totalWindow: number,
): PeakResult {
  const length = Math.min(highs.length, closes.length);
  if (length === 0 || recentWindow < 1 || totalWindow < recentWindow) {
    return { reason: "insufficient-bars" };
  }

  const start = Math.max(0, length - totalWindow);
  const recentStart = Math.max(start, length - recentWindow);

  const maxHigh = maxInRange(highs, start, length);
  if (maxHigh === null) {
    return { reason: "insufficient-bars" };
  }

  let peakIndex = -1;
  let occurrences = 0;
  for (let index = start; index < length; index += 1) {
    if (highs[index] === maxHigh) {
      occurrences += 1;
      peakIndex = index;
    }
  }
  // a shared maximum is ambiguous, not a peak
  if (occurrences !== 1) {
    return { reason: "tied-maximum" };
  }

  if (peakIndex < recentStart) {
    return { reason: "peak-not-recent" };
  }

  const ema = computeEma(closes.slice(0, length), PEAK_EMA_PERIOD)[peakIndex];
  if (ema === null) {
    return { reason: "ema-unavailable" };
  }
  if (highs[peakIndex] < PEAK_EMA_RATIO * ema) {
    return { reason: "peak-below-ema-ratio" };
  }

  const maxBeforeRecent = maxInRange(highs, start, recentStart);
  if (maxBeforeRecent === null) {
    return { reason: "no-prior-breakout" };
  }
  let brokeOut = false;
  for (let index = recentStart; index < length; index += 1) {
    if (closes[index] > maxBeforeRecent) {
      brokeOut = true;
      break;
    }
  }
  if (!brokeOut) {
    return { reason: "no-prior-breakout" };
  }

  const maxBeforePeak = maxInRange(highs, start, peakIndex);
  if (maxBeforePeak === null) {
    return { reason: "peak-not-breakout" };
  }
  const peakClose = closes[peakIndex];
  const priorClose = peakIndex > 0 ? closes[peakIndex - 1] : Number.NEGATIVE_INFINITY;
  if (!(peakClose > maxBeforePeak || priorClose > maxBeforePeak)) {
    return { reason: "peak-not-breakout" };
  }

  return { index: peakIndex };
}

export function findPeak(
  highs: readonly number[],
  closes: readonly number[],
  recentWindow: number,
  totalWindow: number,
): number | null {
  const result = findPeakDetailed(highs, closes, recentWindow, totalWindow);
  return "index" in result ? result.index : null;
}
