import { resolveSettings } from "@/lib/config";
import { devInfo } from "@/lib/log";
import { validateDecision, type SignalQualityFilter } from "@/lib/signals/engine";
import { createReversalStrategy, type Strategy } from "@/lib/signals/strategy";
import { PortfolioManager, type PortfolioManagerOptions } from "@/lib/trading/portfolio";
import { createTradeProposal } from "@/lib/trading/simulator";
import { summarizeTrades } from "@/lib/trading/summary";
import type {
  BacktestSettings,
  Candle,
  EquitySample,
  Lot,
  PerformanceSummary,
  RejectionRecord,
  SignalDecision,
  TradeLogEntry,
} from "@/types";

export interface BacktestOptions {
  symbol: string;
  candles: readonly Candle[];
  settings?: Partial<BacktestSettings>;
  strategy?: Strategy;
  /** Extra quality gate on BUY decisions; omitted means every BUY is traded. */
  qualityFilter?: SignalQualityFilter;
  hooks?: Pick<PortfolioManagerOptions, "onFill" | "onClose" | "random">;
}

export interface BacktestResult {
  symbol: string;
  settings: BacktestSettings;
  decisions: SignalDecision[];
  trades: TradeLogEntry[];
  equityCurve: EquitySample[];
  rejections: RejectionRecord[];
  openLots: Lot[];
  finalCash: number;
  summary: PerformanceSummary;
}

/**
 * Replays one symbol bar by bar. Each bar past the strategy's lookback is
 * scanned on the history up to and including it; a BUY becomes a proposal
 * over the remaining bars and the scan resumes after the trade exits.
 */
export function runBacktest(options: BacktestOptions): BacktestResult {
  const settings = resolveSettings(options.settings);
  const { symbol, candles } = options;
  const strategy =
    options.strategy ??
    createReversalStrategy({
      timeframe: settings.timeframe,
      tpRatio: settings.tpRatio,
      slRatio: settings.slRatio,
      quoteAsset: null,
    });
  const portfolio = new PortfolioManager({ settings, ...options.hooks });
  const decisions: SignalDecision[] = [];

  let index = Math.max(0, strategy.requiredLookback - 1);
  while (index < candles.length) {
    const bar = candles[index];
    const decision = strategy.decide(candles.slice(0, index + 1), symbol);
    decisions.push(decision);

    const { entryPrice, tpPrice, slPrice } = decision;
    const passesFilter = !options.qualityFilter || validateDecision(decision, options.qualityFilter);

    if (
      decision.signal === "BUY" &&
      entryPrice !== null &&
      tpPrice !== null &&
      slPrice !== null &&
      passesFilter &&
      portfolio.getOpenLots(symbol).length === 0
    ) {
      portfolio.markToMarket({ [symbol]: bar.close }, bar.timestamp);
      const proposal = createTradeProposal(
        {
          symbol,
          entryTime: bar.timestamp,
          entryPrice,
          tpPrice,
          slPrice,
          size: settings.positionSize,
          direction: decision.direction,
        },
        candles.slice(index),
        `${symbol}-${index}`,
      );

      if (portfolio.tryExecute(proposal)) {
        // held to the end of the data; every remaining bar is already sampled
        if (portfolio.getOpenLots(symbol).length) {
          break;
        }
        const trades = portfolio.getState().tradeLog;
        const exitTime = trades[trades.length - 1].exitTime;
        while (index < candles.length - 1 && candles[index].timestamp < exitTime) {
          index += 1;
        }
        index += 1;
        continue;
      }
      index += 1;
      continue;
    }

    portfolio.markToMarket({ [symbol]: bar.close }, bar.timestamp);
    index += 1;
  }

  const state = portfolio.getState();
  devInfo(`[backtest] ${symbol}: ${state.tradeLog.length} closed lots, ${state.guardrails.logs.length} rejected entries`);
  return {
    symbol,
    settings,
    decisions,
    trades: state.tradeLog,
    equityCurve: state.equityCurve,
    rejections: state.guardrails.logs,
    openLots: state.positions[symbol] ?? [],
    finalCash: state.cash,
    summary: summarizeTrades(state.tradeLog, state.equityCurve, settings.initialCash),
  };
}
