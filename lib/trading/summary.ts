import type { EquitySample, PerformanceSummary, TradeLogEntry } from "@/types";

interface SummaryAccumulator {
  trades: number;
  wins: number;
  losses: number;
  returnSum: number;
  winReturn: number;
  lossReturn: number;
  netPnl: number;
}

function createSummaryAccumulator(): SummaryAccumulator {
  return {
    trades: 0,
    wins: 0,
    losses: 0,
    returnSum: 0,
    winReturn: 0,
    lossReturn: 0,
    netPnl: 0,
  };
}

function reduceTrades(trades: readonly TradeLogEntry[]): SummaryAccumulator {
  const acc = createSummaryAccumulator();
  for (const trade of trades) {
    acc.trades += 1;
    acc.returnSum += trade.returnPct;
    acc.netPnl += trade.pnl;
    if (trade.result === "WIN") {
      acc.wins += 1;
      acc.winReturn += trade.returnPct;
    } else {
      acc.losses += 1;
      acc.lossReturn += trade.returnPct;
    }
  }
  return acc;
}

/** Largest peak-to-trough equity decline, in percent of the peak. */
export function computeMaxDrawdownPct(curve: readonly EquitySample[], startingEquity: number): number {
  let peak = startingEquity;
  let maxDrawdown = 0;
  for (const sample of curve) {
    if (sample.equity > peak) {
      peak = sample.equity;
    }
    if (peak > 0) {
      const drawdown = ((peak - sample.equity) / peak) * 100;
      if (drawdown > maxDrawdown) {
        maxDrawdown = drawdown;
      }
    }
  }
  return maxDrawdown;
}

export function summarizeTrades(
  trades: readonly TradeLogEntry[],
  equityCurve: readonly EquitySample[],
  initialCash: number,
): PerformanceSummary {
  const acc = reduceTrades(trades);
  const winRate = acc.trades ? acc.wins / acc.trades : 0;
  const lossRate = acc.trades ? acc.losses / acc.trades : 0;
  const avgWin = acc.wins ? acc.winReturn / acc.wins : 0;
  const avgLoss = acc.losses ? Math.abs(acc.lossReturn / acc.losses) : 0;
  const finalEquity = equityCurve.length ? equityCurve[equityCurve.length - 1].equity : initialCash;

  return {
    trades: acc.trades,
    wins: acc.wins,
    losses: acc.losses,
    winRate,
    avgReturnPct: acc.trades ? acc.returnSum / acc.trades : 0,
    netPnl: acc.netPnl,
    expectancy: winRate * avgWin - lossRate * avgLoss,
    maxDrawdownPct: computeMaxDrawdownPct(equityCurve, initialCash),
    totalReturnPct: initialCash > 0 ? ((finalEquity - initialCash) / initialCash) * 100 : 0,
  };
}
