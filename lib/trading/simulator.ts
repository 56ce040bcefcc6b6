import { SimulationFault } from "@/lib/errors";
import { devWarn } from "@/lib/log";
import { createSeededRandom, type RandomSource } from "@/lib/trading/random";
import type {
  Candle,
  CrossingPolicy,
  ExitType,
  Fill,
  LotKind,
  RealizeOutcome,
  TradeDirection,
  TradeMeta,
  TradeProposal,
  TradeResult,
} from "@/types";

export const DCA_LONG_TRIGGER_RATIO = 0.95;
export const DCA_SHORT_TRIGGER_RATIO = 1.05;
const DEFAULT_RANDOM_SEED = 1;

export interface FillContext {
  proposalId: string;
  symbol: string;
  barIndex: number;
}

export interface RealizeOptions {
  addBuyPct: number;
  fee: number;
  slippage: number;
  executionDelayBars: number;
  crossingPolicy: CrossingPolicy;
  random?: RandomSource;
  onFill?: (fill: Fill, context: FillContext) => void;
}

export function createTradeProposal(meta: TradeMeta, candles: readonly Candle[], id?: string): TradeProposal {
  return Object.freeze({
    id: id ?? `${meta.symbol}-${meta.entryTime}`,
    meta: Object.freeze({ ...meta }),
    candles: Object.freeze([...candles]),
  });
}

function directionSign(direction: TradeDirection): 1 | -1 {
  return direction === "LONG" ? 1 : -1;
}

function applyCosts(direction: TradeDirection, price: number, slippage: number, fee: number): number {
  return direction === "LONG"
    ? price * (1 + slippage) * (1 + fee)
    : price * (1 - slippage) * (1 - fee);
}

// Better of the bar open and the planned level: a gap through the level fills at the open.
function touchPrice(direction: TradeDirection, open: number, level: number): number {
  return direction === "LONG" ? Math.min(open, level) : Math.max(open, level);
}

/** A return of exactly zero counts as a loss. */
export function computeReturn(
  direction: TradeDirection,
  entryPrice: number,
  exitPrice: number,
): { returnPct: number; result: TradeResult } {
  const returnPct = ((exitPrice - entryPrice) / entryPrice) * 100 * directionSign(direction);
  return { returnPct, result: returnPct > 0 ? "WIN" : "LOSS" };
}

export function resolveCrossing(policy: CrossingPolicy, random: RandomSource): ExitType {
  switch (policy) {
    case "prefer_tp":
      return "TP";
    case "random":
      return random() < 0.5 ? "SL" : "TP";
    case "prefer_sl":
    default:
      return "SL";
  }
}

function assertMeta(meta: TradeMeta): void {
  const values = [meta.entryPrice, meta.tpPrice, meta.slPrice, meta.size];
  if (values.some((value) => !Number.isFinite(value) || value <= 0)) {
    throw new SimulationFault(`Proposal for ${meta.symbol} carries a non-positive or non-finite price or size`, {
      symbol: meta.symbol,
    });
  }
}

function assertBar(bar: Candle | undefined, symbol: string, barIndex: number): Candle {
  if (!bar) {
    throw new SimulationFault(`Missing bar ${barIndex} for ${symbol}`, { symbol, barIndex });
  }
  const values = [bar.open, bar.high, bar.low, bar.close];
  if (values.some((value) => !Number.isFinite(value)) || bar.high < bar.low) {
    throw new SimulationFault(`Malformed bar ${barIndex} for ${symbol}`, { symbol, barIndex });
  }
  return bar;
}

/**
 * Walks the proposal's forward candles and returns the fills it would have
 * produced: one entry, at most one averaging-down add, and an exit per open
 * lot. Returns null when the data ends before the entry bar. `open` is true
 * when no exit level was reached.
 */
export function realize(proposal: TradeProposal, options: RealizeOptions): RealizeOutcome | null {
  const { meta, candles } = proposal;
  const { symbol, direction } = meta;
  assertMeta(meta);

  const entryIndex = Math.max(0, Math.floor(options.executionDelayBars));
  if (entryIndex >= candles.length) {
    return null;
  }

  const random = options.random ?? createSeededRandom(DEFAULT_RANDOM_SEED);
  const fills: Fill[] = [];
  const emit = (fill: Fill) => {
    fills.push(fill);
    if (!options.onFill) {
      return;
    }
    try {
      options.onFill(fill, { proposalId: proposal.id, symbol, barIndex: fill.barIndex });
    } catch (error) {
      devWarn("[simulator] onFill hook failed", error);
    }
  };

  const entryBar = assertBar(candles[entryIndex], symbol, entryIndex);
  emit({
    kind: "entry",
    lotKind: "entry",
    price: applyCosts(direction, touchPrice(direction, entryBar.open, meta.entryPrice), options.slippage, options.fee),
    size: meta.size,
    time: entryBar.timestamp,
    barIndex: entryIndex,
    referencePrice: meta.entryPrice,
  });

  const openLots: Array<{ kind: LotKind; referencePrice: number; size: number }> = [
    { kind: "entry", referencePrice: meta.entryPrice, size: meta.size },
  ];

  const dcaSize = meta.size * options.addBuyPct;
  let dcaUsed = !(dcaSize > 0);
  const dcaTrigger = meta.entryPrice * (direction === "LONG" ? DCA_LONG_TRIGGER_RATIO : DCA_SHORT_TRIGGER_RATIO);

  for (let index = entryIndex; index < candles.length; index += 1) {
    const bar = assertBar(candles[index], symbol, index);

    if (!dcaUsed) {
      const crossed = direction === "LONG" ? bar.low <= dcaTrigger : bar.high >= dcaTrigger;
      if (crossed) {
        dcaUsed = true;
        openLots.push({ kind: "dca", referencePrice: dcaTrigger, size: dcaSize });
        emit({
          kind: "dca",
          lotKind: "dca",
          price: applyCosts(direction, touchPrice(direction, bar.open, dcaTrigger), options.slippage, options.fee),
          size: dcaSize,
          time: bar.timestamp,
          barIndex: index,
          referencePrice: dcaTrigger,
        });
      }
    }

    const slHit = direction === "LONG" ? bar.low <= meta.slPrice : bar.high >= meta.slPrice;
    const tpHit = direction === "LONG" ? bar.high >= meta.tpPrice : bar.low <= meta.tpPrice;
    if (!slHit && !tpHit) {
      continue;
    }

    const exitType: ExitType = slHit && tpHit ? resolveCrossing(options.crossingPolicy, random) : slHit ? "SL" : "TP";
    const exitPrice = exitType === "SL" ? meta.slPrice : meta.tpPrice;

    for (const lot of openLots) {
      const { returnPct, result } = computeReturn(direction, lot.referencePrice, exitPrice);
      emit({
        kind: "exit",
        lotKind: lot.kind,
        price: exitPrice,
        size: lot.size,
        time: bar.timestamp,
        barIndex: index,
        referencePrice: lot.referencePrice,
        exitType,
        returnPct,
        result,
      });
    }

    return { fills, open: false, lastBarIndex: index };
  }

  return { fills, open: true, lastBarIndex: candles.length - 1 };
}
