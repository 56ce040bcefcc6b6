export { runBacktest, type BacktestOptions, type BacktestResult } from "@/lib/backtest/runner";
export { DEFAULT_BACKTEST_SETTINGS, resolveSettings } from "@/lib/config";
export { ConfigurationError, MarketDataError, SimulationFault } from "@/lib/errors";
export { computeEma, computeRsi, computeVolatility, latestDefined } from "@/lib/indicators";
export { TIMEFRAME_INTERVALS, fetchKlines, type FetchKlinesParams, type KlineFetcher } from "@/lib/market/binance";
export { TtlCache, createCachedCandleSource } from "@/lib/market/cache";
export {
  DEFAULT_QUALITY_FILTER,
  MIN_HISTORY_BARS,
  ReversalSignalEngine,
  validateDecision,
  type SignalEngineConfig,
  type SignalQualityFilter,
} from "@/lib/signals/engine";
export { classifyPattern, emaPeriodForPattern, PATTERN_BUFFER } from "@/lib/signals/pattern";
export { findPeak, findPeakDetailed, PEAK_PRESETS } from "@/lib/signals/peak";
export { combineSignals, createReversalStrategy, type EnsembleMode, type Strategy } from "@/lib/signals/strategy";
export { PortfolioManager, type PortfolioManagerOptions, type SimulateFn } from "@/lib/trading/portfolio";
export { createSeededRandom, type RandomSource } from "@/lib/trading/random";
export { computeReturn, createTradeProposal, realize, type RealizeOptions } from "@/lib/trading/simulator";
export { summarizeTrades } from "@/lib/trading/summary";
export type * from "@/types";
