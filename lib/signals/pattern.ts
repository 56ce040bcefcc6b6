import type { Candle, PatternTag, Timeframe } from "@/types";

export const MAX_PATTERN_BARS = 7;

export const PATTERN_BUFFER: Record<Timeframe, number> = {
  daily: 0.1,
  weekly: 0.2,
};

const PATTERN_EMA_PERIOD: Record<PatternTag, number | null> = {
  all: 15,
  all_but_one: 33,
  none: null,
};

type PatternBar = Pick<Candle, "open" | "high" | "close">;

export function isBullishBar(bar: PatternBar, previous: PatternBar, buffer: number): boolean {
  if (bar.high > previous.high) {
    return true;
  }
  if (bar.close > bar.open) {
    return true;
  }
  // long upper wick
  return bar.high > bar.open * (1 + buffer);
}

/**
 * Labels up to seven bars following the peak. The first bar is compared to
 * the peak bar, each later one to the bar before it.
 */
export function classifyPattern(
  barsAfterPeak: readonly PatternBar[],
  peakBar: PatternBar,
  buffer: number,
): PatternTag {
  const examined = barsAfterPeak.slice(0, MAX_PATTERN_BARS);
  if (!examined.length) {
    return "none";
  }

  let bearish = 0;
  let previous = peakBar;
  for (const bar of examined) {
    if (!isBullishBar(bar, previous, buffer)) {
      bearish += 1;
    }
    previous = bar;
  }

  if (bearish === examined.length) {
    return "all";
  }
  if (bearish === examined.length - 1) {
    return "all_but_one";
  }
  return "none";
}

export function emaPeriodForPattern(pattern: PatternTag): number | null {
  return PATTERN_EMA_PERIOD[pattern];
}

export function largestPatternEmaPeriod(): number {
  let largest = 0;
  for (const period of Object.values(PATTERN_EMA_PERIOD)) {
    if (period !== null && period > largest) {
      largest = period;
    }
  }
  return largest;
}
