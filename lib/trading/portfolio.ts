import { cloneSettings, resolveSettings } from "@/lib/config";
import { SimulationFault } from "@/lib/errors";
import { devWarn } from "@/lib/log";
import { EntryGuardrails, hasFunds } from "@/lib/trading/guardrails";
import { createSeededRandom, type RandomSource } from "@/lib/trading/random";
import { computeReturn, realize, type RealizeOptions } from "@/lib/trading/simulator";
import type {
  BacktestSettings,
  EquitySample,
  ExitType,
  GuardrailState,
  Lot,
  LotKind,
  PortfolioSnapshot,
  RealizeOutcome,
  TradeLogEntry,
  TradeProposal,
} from "@/types";

const CASH_EPSILON = 1e-9;

export type SimulateFn = (proposal: TradeProposal, options: RealizeOptions) => RealizeOutcome | null;

export interface PortfolioManagerOptions {
  settings?: Partial<BacktestSettings>;
  simulate?: SimulateFn;
  random?: RandomSource;
  onFill?: RealizeOptions["onFill"];
  onClose?: (entry: TradeLogEntry, lot: Lot) => void;
}

interface PortfolioCheckpoint {
  cash: number;
  positions: Map<string, Lot[]>;
  tradeLogLength: number;
  equityCurveLength: number;
  lastPrices: Map<string, number>;
  guardrails: GuardrailState;
  lotCounter: number;
}

interface ClosedLot {
  entry: TradeLogEntry;
  lot: Lot;
}

function directionSign(lot: Lot): 1 | -1 {
  return lot.direction === "LONG" ? 1 : -1;
}

// Long lots are worth size x price; short lots hold their entry margin plus unrealized pnl.
function lotValue(lot: Lot, price: number): number {
  return lot.entryPrice * lot.size + (price - lot.entryPrice) * lot.size * directionSign(lot);
}

function clonePositions(positions: Map<string, Lot[]>): Map<string, Lot[]> {
  const copy = new Map<string, Lot[]>();
  for (const [symbol, lots] of positions) {
    copy.set(symbol, [...lots]);
  }
  return copy;
}

/**
 * Owns cash and open lots for one backtest run. Every `tryExecute` either
 * commits all of its fills or leaves the portfolio exactly as it found it.
 */
export class PortfolioManager {
  private settings: BacktestSettings;

  private cash: number;

  private positions = new Map<string, Lot[]>();

  private tradeLog: TradeLogEntry[] = [];

  private equityCurve: EquitySample[] = [];

  private lastPrices = new Map<string, number>();

  private guardrails: EntryGuardrails;

  private simulate: SimulateFn;

  private random: RandomSource;

  private onFill?: RealizeOptions["onFill"];

  private onClose?: (entry: TradeLogEntry, lot: Lot) => void;

  private simulated = new WeakSet<TradeProposal>();

  private lotCounter = 0;

  constructor(options: PortfolioManagerOptions = {}) {
    this.settings = resolveSettings(options.settings);
    this.cash = this.settings.initialCash;
    this.guardrails = new EntryGuardrails({
      maxPositions: this.settings.maxPositions,
      maxConsecutiveLosses: this.settings.maxConsecutiveLosses,
      lossCooldownMs: this.settings.lossCooldownMs,
    });
    this.simulate = options.simulate ?? realize;
    this.random = options.random ?? createSeededRandom(this.settings.seed);
    this.onFill = options.onFill;
    this.onClose = options.onClose;
  }

  getSettings(): BacktestSettings {
    return cloneSettings(this.settings);
  }

  get openLotCount(): number {
    let count = 0;
    for (const lots of this.positions.values()) {
      count += lots.length;
    }
    return count;
  }

  getCash(): number {
    return this.cash;
  }

  getOpenLots(symbol: string): Lot[] {
    return [...(this.positions.get(symbol) ?? [])];
  }

  canOpen(symbol: string, entryPrice: number, size: number): boolean {
    return this.guardrails.evaluateCapacity({
      symbol,
      cost: entryPrice * size,
      cash: this.cash,
      openLots: this.openLotCount,
      time: 0,
    }).allowed;
  }

  /**
   * Simulates the proposal and books its fills, sampling equity at the close
   * of every bar a lot is held. Returns false when the proposal is rejected
   * or never reaches its entry bar. Faults raised while simulating roll the
   * portfolio back and surface as SimulationFault. `onClose` only hears about
   * lots closed by a committed proposal.
   */
  tryExecute(proposal: TradeProposal, addBuyPct: number = this.settings.addBuyPct): boolean {
    const { meta } = proposal;
    const { symbol } = meta;

    if (this.simulated.has(proposal)) {
      throw new SimulationFault(`Proposal ${proposal.id} was already simulated`, { symbol });
    }

    const reserved = meta.entryPrice * meta.size;
    const evaluation = this.guardrails.evaluateEntry({
      symbol,
      cost: reserved,
      cash: this.cash,
      openLots: this.openLotCount,
      time: meta.entryTime,
    });
    if (!evaluation.allowed) {
      if (evaluation.block) {
        this.guardrails.recordBlock(evaluation.block);
        devWarn(`[portfolio] Rejected ${symbol}: ${evaluation.block.message}`);
      }
      return false;
    }

    const checkpoint = this.checkpoint();
    this.simulated.add(proposal);

    this.cash -= reserved;
    let pending: Lot | null = this.registerLot({
      proposalId: proposal.id,
      symbol,
      kind: "entry",
      direction: meta.direction,
      entryPrice: meta.entryPrice,
      referencePrice: meta.entryPrice,
      size: meta.size,
      entryTime: meta.entryTime,
    });

    try {
      const outcome = this.simulate(proposal, {
        addBuyPct,
        fee: this.settings.fee,
        slippage: this.settings.slippage,
        executionDelayBars: this.settings.executionDelayBars,
        crossingPolicy: this.settings.crossingPolicy,
        random: this.random,
        onFill: this.onFill,
      });

      if (!outcome) {
        this.restore(checkpoint);
        return false;
      }

      const opened = new Map<LotKind, Lot>();
      const closed: ClosedLot[] = [];
      let sampledThrough = -1;
      const sampleHeldBars = (lastBar: number) => {
        for (let barIndex = sampledThrough + 1; barIndex <= lastBar; barIndex += 1) {
          const bar = proposal.candles[barIndex];
          if (bar && opened.size) {
            this.markToMarket({ [symbol]: bar.close }, bar.timestamp);
          }
        }
        sampledThrough = Math.max(sampledThrough, lastBar);
      };

      for (const fill of outcome.fills) {
        sampleHeldBars(fill.barIndex - 1);

        if (fill.kind === "exit") {
          const lot = opened.get(fill.lotKind);
          if (!lot) {
            continue;
          }
          opened.delete(fill.lotKind);
          const result = this.bookClose(symbol, lot.id, fill.price, fill.time, fill.exitType ?? "CLOSE");
          if (result) {
            closed.push(result);
          }
          sampledThrough = Math.max(sampledThrough, fill.barIndex);
          continue;
        }

        const cost = fill.price * fill.size;

        if (fill.kind === "entry") {
          if (!pending) {
            throw new SimulationFault(`Duplicate entry fill for ${proposal.id}`, { symbol, barIndex: fill.barIndex });
          }
          if (!hasFunds(this.cash + reserved, cost)) {
            this.restore(checkpoint);
            const block = {
              symbol,
              reason: "insufficient-cash" as const,
              message: `Entry fill costs ${cost.toFixed(2)}, more than available cash`,
              time: fill.time,
            };
            this.guardrails.recordBlock(block);
            devWarn(`[portfolio] Rejected ${symbol}: ${block.message}`);
            return false;
          }
          this.cash += reserved - cost;
          const settled = this.replaceLot(pending, { entryPrice: fill.price, entryTime: fill.time });
          opened.set("entry", settled);
          pending = null;
          sampledThrough = fill.barIndex - 1;
          continue;
        }

        if (this.openLotCount >= this.settings.maxPositions || !hasFunds(this.cash, cost)) {
          devWarn(`[portfolio] Skipped averaging-down fill for ${symbol}: no capacity or cash`);
          continue;
        }
        this.cash -= cost;
        const lot = this.registerLot({
          proposalId: proposal.id,
          symbol,
          kind: fill.lotKind,
          direction: meta.direction,
          entryPrice: fill.price,
          referencePrice: fill.referencePrice,
          size: fill.size,
          entryTime: fill.time,
        });
        opened.set(fill.lotKind, lot);
      }

      if (pending) {
        throw new SimulationFault(`Simulation of ${proposal.id} produced no entry fill`, { symbol });
      }
      sampleHeldBars(outcome.lastBarIndex);
      if (this.cash < -CASH_EPSILON) {
        throw new SimulationFault(`Cash went negative while booking ${proposal.id}`, { symbol });
      }

      for (const { entry, lot } of closed) {
        this.notifyClose(entry, lot);
      }
      return true;
    } catch (error) {
      this.restore(checkpoint);
      if (error instanceof SimulationFault) {
        throw error;
      }
      throw new SimulationFault(`Simulation of ${proposal.id} failed`, { symbol, cause: error });
    }
  }

  closePosition(
    symbol: string,
    lotId: string,
    exitPrice: number,
    exitTime: number,
    exitType: ExitType,
  ): TradeLogEntry | null {
    const result = this.bookClose(symbol, lotId, exitPrice, exitTime, exitType);
    if (!result) {
      return null;
    }
    this.notifyClose(result.entry, result.lot);
    return result.entry;
  }

  private bookClose(
    symbol: string,
    lotId: string,
    exitPrice: number,
    exitTime: number,
    exitType: ExitType,
  ): ClosedLot | null {
    const lots = this.positions.get(symbol);
    const index = lots ? lots.findIndex((lot) => lot.id === lotId) : -1;
    if (!lots || index < 0) {
      return null;
    }

    const [lot] = lots.splice(index, 1);
    if (!lots.length) {
      this.positions.delete(symbol);
    }

    const pnl = (exitPrice - lot.entryPrice) * lot.size * directionSign(lot);
    this.cash += lotValue(lot, exitPrice);

    const { returnPct, result } = computeReturn(lot.direction, lot.referencePrice, exitPrice);
    const entry: TradeLogEntry = Object.freeze({
      symbol,
      lotKind: lot.kind,
      direction: lot.direction,
      entryTime: lot.entryTime,
      entryPrice: lot.entryPrice,
      exitTime,
      exitPrice,
      size: lot.size,
      exitType,
      result,
      returnPct,
      pnl,
    });

    this.tradeLog.push(entry);
    this.guardrails.recordClosedTrade(entry);
    this.markToMarket({ [symbol]: exitPrice }, exitTime);
    return { entry, lot };
  }

  private notifyClose(entry: TradeLogEntry, lot: Lot): void {
    if (!this.onClose) {
      return;
    }
    try {
      this.onClose(entry, lot);
    } catch (error) {
      devWarn("[portfolio] onClose callback failed", error);
    }
  }

  markToMarket(prices: Record<string, number>, time: number): number {
    for (const [symbol, price] of Object.entries(prices)) {
      if (Number.isFinite(price)) {
        this.lastPrices.set(symbol, price);
      }
    }

    let equity = this.cash;
    for (const [symbol, lots] of this.positions) {
      for (const lot of lots) {
        const price = this.lastPrices.get(symbol) ?? lot.entryPrice;
        equity += lotValue(lot, price);
      }
    }

    this.equityCurve.push({ time, equity });
    return equity;
  }

  getState(): PortfolioSnapshot {
    const positions: Record<string, Lot[]> = {};
    for (const [symbol, lots] of this.positions) {
      positions[symbol] = [...lots];
    }
    return {
      cash: this.cash,
      positions,
      openLotCount: this.openLotCount,
      maxPositions: this.settings.maxPositions,
      tradeLog: [...this.tradeLog],
      equityCurve: this.equityCurve.map((sample) => ({ ...sample })),
      guardrails: this.guardrails.getState(),
    };
  }

  private registerLot(fields: Omit<Lot, "id">): Lot {
    this.lotCounter += 1;
    const lot: Lot = Object.freeze({ id: `lot-${this.lotCounter}`, ...fields });
    const lots = this.positions.get(fields.symbol) ?? [];
    lots.push(lot);
    this.positions.set(fields.symbol, lots);
    return lot;
  }

  private replaceLot(lot: Lot, changes: Pick<Lot, "entryPrice" | "entryTime">): Lot {
    const next: Lot = Object.freeze({ ...lot, ...changes });
    const lots = this.positions.get(lot.symbol) ?? [];
    const index = lots.findIndex((item) => item.id === lot.id);
    if (index < 0) {
      throw new SimulationFault(`Reserved lot ${lot.id} is missing`, { symbol: lot.symbol });
    }
    lots[index] = next;
    return next;
  }

  private checkpoint(): PortfolioCheckpoint {
    return {
      cash: this.cash,
      positions: clonePositions(this.positions),
      tradeLogLength: this.tradeLog.length,
      equityCurveLength: this.equityCurve.length,
      lastPrices: new Map(this.lastPrices),
      guardrails: this.guardrails.getState(),
      lotCounter: this.lotCounter,
    };
  }

  private restore(checkpoint: PortfolioCheckpoint): void {
    this.cash = checkpoint.cash;
    this.positions = clonePositions(checkpoint.positions);
    this.tradeLog.length = checkpoint.tradeLogLength;
    this.equityCurve.length = checkpoint.equityCurveLength;
    this.lastPrices = new Map(checkpoint.lastPrices);
    this.guardrails.restoreState(checkpoint.guardrails);
    this.lotCounter = checkpoint.lotCounter;
  }
}
