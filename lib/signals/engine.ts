import { computeEma, computeRsi, computeVolatility, latestDefined } from "@/lib/indicators";
import { PEAK_EMA_PERIOD, PEAK_PRESETS, findPeakDetailed, type PeakWindow } from "@/lib/signals/peak";
import { MAX_PATTERN_BARS, PATTERN_BUFFER, classifyPattern, emaPeriodForPattern, largestPatternEmaPeriod } from "@/lib/signals/pattern";
import type {
  Candle,
  NoSignalReason,
  PatternTag,
  SignalDecision,
  SignalStage,
  SignalStrength,
  Timeframe,
} from "@/types";

export const MIN_HISTORY_BARS = 35;
const VOLUME_LOOKBACK = 20;
const VOLATILITY_LOOKBACK = 20;
const RSI_PERIOD = 14;

export interface SignalEngineConfig {
  timeframe: Timeframe;
  tpRatio: number;
  slRatio: number;
  peakWindow?: PeakWindow;
  patternBuffer?: number;
}

export interface SignalQualityFilter {
  minRiskReward: number;
  allowWeak: boolean;
  minVolumeRatio: number;
}

export const DEFAULT_QUALITY_FILTER: SignalQualityFilter = {
  minRiskReward: 1.5,
  allowWeak: false,
  minVolumeRatio: 0.5,
};

interface ResolvedConfig {
  timeframe: Timeframe;
  tpRatio: number;
  slRatio: number;
  peakWindow: PeakWindow;
  patternBuffer: number;
}

function resolveConfig(config: SignalEngineConfig): ResolvedConfig {
  return {
    timeframe: config.timeframe,
    tpRatio: config.tpRatio,
    slRatio: config.slRatio,
    peakWindow: { ...(config.peakWindow ?? PEAK_PRESETS[config.timeframe]) },
    patternBuffer: config.patternBuffer ?? PATTERN_BUFFER[config.timeframe],
  };
}

function noSignal(
  symbol: string,
  timestamp: number | null,
  reason: NoSignalReason,
  context: { peakIndex?: number; pattern?: PatternTag; emaPeriod?: number } = {},
): SignalDecision {
  return {
    symbol,
    timestamp,
    signal: "NO",
    stage: "NO_SIGNAL",
    reason,
    direction: "LONG",
    entryPrice: null,
    tpPrice: null,
    slPrice: null,
    emaPeriodUsed: context.emaPeriod ?? null,
    peakIndex: context.peakIndex ?? null,
    pattern: context.pattern ?? null,
  };
}

export function gradeSignalStrength(args: {
  pullbackPct: number;
  volumeRatio: number;
  volatility: number;
  rsi: number | null;
}): SignalStrength {
  let score = 0;

  const pullback = Math.abs(args.pullbackPct);
  if (pullback >= 0.15 && pullback <= 0.3) {
    score += 2;
  } else if (pullback >= 0.1 && pullback < 0.15) {
    score += 1;
  }

  if (args.volumeRatio > 1.5) {
    score += 2;
  } else if (args.volumeRatio > 1) {
    score += 1;
  }

  if (args.volatility < 0.03) {
    score += 1;
  }

  if (args.rsi !== null && args.rsi < 40) {
    score += 2;
  } else if (args.rsi !== null && args.rsi < 50) {
    score += 1;
  }

  if (score >= 5) {
    return "STRONG";
  }
  if (score >= 3) {
    return "MODERATE";
  }
  return "WEAK";
}

/**
 * Long-only reversal detector: a single breakout peak, a run of bearish bars
 * after it, and the current bar trading below the EMA the pattern selects.
 * Output depends only on the candle window and the configuration.
 */
export class ReversalSignalEngine {
  private options: SignalEngineConfig;

  private config: ResolvedConfig;

  constructor(config: SignalEngineConfig) {
    this.options = { ...config };
    this.config = resolveConfig(this.options);
  }

  updateConfig(partial: Partial<SignalEngineConfig>): void {
    this.options = { ...this.options, ...partial };
    this.config = resolveConfig(this.options);
  }

  get requiredLookback(): number {
    return Math.max(MIN_HISTORY_BARS, largestPatternEmaPeriod(), PEAK_EMA_PERIOD);
  }

  decide(candles: readonly Candle[], symbol: string): SignalDecision {
    let stage: SignalStage = "SCANNING";
    const last = candles.length ? candles[candles.length - 1] : null;
    const timestamp = last ? last.timestamp : null;

    if (!last || candles.length < this.requiredLookback) {
      return noSignal(symbol, timestamp, "insufficient-data");
    }

    const highs = candles.map((candle) => candle.high);
    const closes = candles.map((candle) => candle.close);
    const { recentWindow, totalWindow } = this.config.peakWindow;

    const peak = findPeakDetailed(highs, closes, recentWindow, totalWindow);
    if (!("index" in peak)) {
      return noSignal(symbol, timestamp, peak.reason);
    }
    const peakIndex = peak.index;
    stage = "PEAK_FOUND";

    const afterPeak = candles.slice(peakIndex + 1, peakIndex + 1 + MAX_PATTERN_BARS);
    const pattern = classifyPattern(afterPeak, candles[peakIndex], this.config.patternBuffer);
    const emaPeriod = emaPeriodForPattern(pattern);
    if (emaPeriod === null) {
      return noSignal(symbol, timestamp, "no-bearish-pattern", { peakIndex, pattern });
    }
    stage = "PATTERN_CONFIRMED";

    const ema = latestDefined(computeEma(closes, emaPeriod));
    if (ema === null || last.low >= ema) {
      return noSignal(symbol, timestamp, "price-above-ema", { peakIndex, pattern, emaPeriod });
    }
    stage = "SIGNAL_EMITTED";

    const entryPrice = ema;
    const tpPrice = entryPrice * (1 + this.config.tpRatio);
    const slPrice = entryPrice * (1 - this.config.slRatio);
    const peakPrice = highs[peakIndex];

    const volumeWindow = candles.slice(-VOLUME_LOOKBACK);
    const volumeAvg = volumeWindow.reduce((acc, candle) => acc + candle.volume, 0) / VOLUME_LOOKBACK;
    const volumeRatio = volumeAvg > 0 ? last.volume / volumeAvg : 1;

    const strength = gradeSignalStrength({
      pullbackPct: (last.close - peakPrice) / peakPrice,
      volumeRatio,
      volatility: computeVolatility(closes.slice(-VOLATILITY_LOOKBACK)),
      rsi: computeRsi(closes.slice(-(RSI_PERIOD + 1)), RSI_PERIOD),
    });

    return {
      symbol,
      timestamp,
      signal: "BUY",
      stage,
      direction: "LONG",
      entryPrice,
      tpPrice,
      slPrice,
      emaPeriodUsed: emaPeriod,
      peakIndex,
      pattern,
      strength,
      riskReward: (tpPrice - entryPrice) / (entryPrice - slPrice),
      volumeRatio,
      peakBarsAgo: candles.length - peakIndex - 1,
      priceFromPeakPct: ((last.close - peakPrice) / peakPrice) * 100,
    };
  }
}

export function validateDecision(
  decision: SignalDecision,
  filter: SignalQualityFilter = DEFAULT_QUALITY_FILTER,
): boolean {
  if (decision.signal !== "BUY") {
    return false;
  }
  if (decision.riskReward === undefined || decision.riskReward < filter.minRiskReward) {
    return false;
  }
  if (!filter.allowWeak && decision.strength === "WEAK") {
    return false;
  }
  if (decision.volumeRatio !== undefined && decision.volumeRatio < filter.minVolumeRatio) {
    return false;
  }
  return true;
}
