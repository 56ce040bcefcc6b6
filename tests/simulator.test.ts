import { afterEach, describe, expect, it, vi } from "vitest";

import { SimulationFault } from "@/lib/errors";
import { createSeededRandom } from "@/lib/trading/random";
import { computeReturn, createTradeProposal, realize, resolveCrossing, type RealizeOptions } from "@/lib/trading/simulator";
import type { Candle, TradeMeta } from "@/types";

const DAY = 86_400_000;

function bar(index: number, open: number, high: number, low: number, close: number): Candle {
  return { timestamp: index * DAY, open, high, low, close, volume: 1 };
}

const baseMeta: TradeMeta = {
  symbol: "BTCUSDT",
  entryTime: 0,
  entryPrice: 100,
  tpPrice: 110,
  slPrice: 95,
  size: 1,
  direction: "LONG",
};

const baseOptions: RealizeOptions = {
  addBuyPct: 0,
  fee: 0,
  slippage: 0,
  executionDelayBars: 1,
  crossingPolicy: "prefer_sl",
};

const signalBar = bar(0, 100, 101, 99, 100);
const wideBar = bar(1, 99, 112, 94, 108);

afterEach(() => {
  vi.restoreAllMocks();
});

describe("realize", () => {
  it("exits at take profit when both levels are touched and TP is preferred", () => {
    const proposal = createTradeProposal({ ...baseMeta, tpPrice: 100 * (1 + 0.1) }, [signalBar, wideBar]);
    const outcome = realize(proposal, { ...baseOptions, crossingPolicy: "prefer_tp" });

    expect(outcome).not.toBeNull();
    expect(outcome?.open).toBe(false);
    expect(outcome?.lastBarIndex).toBe(1);
    const [entry, exit] = outcome?.fills ?? [];
    expect(entry).toMatchObject({ kind: "entry", price: 99, barIndex: 1, referencePrice: 100 });
    expect(exit.kind).toBe("exit");
    expect(exit.exitType).toBe("TP");
    expect(exit.price).toBeCloseTo(110, 10);
    expect(exit.returnPct).toBeCloseTo(10, 10);
    expect(exit.result).toBe("WIN");
  });

  it("exits at stop loss when both levels are touched and SL is preferred", () => {
    const proposal = createTradeProposal(baseMeta, [signalBar, wideBar]);
    const outcome = realize(proposal, baseOptions);
    const exit = outcome?.fills[1];

    expect(exit).toMatchObject({ kind: "exit", exitType: "SL", price: 95, result: "LOSS" });
    expect(exit?.returnPct).toBeCloseTo(-5, 10);
  });

  it("draws from the random source only under the random policy", () => {
    const random = vi.fn(() => 0.99);
    const proposal = createTradeProposal(baseMeta, [signalBar, wideBar]);

    expect(realize(proposal, { ...baseOptions, random })?.fills[1].exitType).toBe("SL");
    expect(random).not.toHaveBeenCalled();

    expect(realize(proposal, { ...baseOptions, crossingPolicy: "random", random })?.fills[1].exitType).toBe("TP");
    expect(realize(proposal, { ...baseOptions, crossingPolicy: "random", random: () => 0.1 })?.fills[1].exitType).toBe("SL");
    expect(random).toHaveBeenCalledTimes(1);
  });

  it("reproduces random crossings for the same seed", () => {
    const proposal = createTradeProposal(baseMeta, [signalBar, wideBar]);
    const run = (seed: number) => {
      const random = createSeededRandom(seed);
      return Array.from({ length: 10 }, () =>
        realize(proposal, { ...baseOptions, crossingPolicy: "random", random })?.fills[1].exitType,
      );
    };
    expect(run(7)).toEqual(run(7));
    expect(resolveCrossing("prefer_tp", () => 0)).toBe("TP");
  });

  it("applies slippage and fees against the better of open and entry", () => {
    const proposal = createTradeProposal(baseMeta, [signalBar, bar(1, 101, 102, 99, 101)]);
    const outcome = realize(proposal, { ...baseOptions, slippage: 0.01, fee: 0.001 });

    expect(outcome?.open).toBe(true);
    expect(outcome?.lastBarIndex).toBe(1);
    expect(outcome?.fills).toHaveLength(1);
    expect(outcome?.fills[0].price).toBeCloseTo(101.101, 8);
  });

  it("mirrors prices and returns for shorts", () => {
    const meta: TradeMeta = { ...baseMeta, direction: "SHORT", tpPrice: 90, slPrice: 105 };
    const proposal = createTradeProposal(meta, [signalBar, bar(1, 102, 103, 89, 91)]);
    const outcome = realize(proposal, { ...baseOptions, slippage: 0.01, fee: 0.001 });
    const [entry, exit] = outcome?.fills ?? [];

    expect(entry.price).toBeCloseTo(102 * 0.99 * 0.999, 8);
    expect(exit).toMatchObject({ exitType: "TP", price: 90, result: "WIN" });
    expect(exit.returnPct).toBeCloseTo(10, 10);
  });

  it("adds one averaging-down lot and closes every lot on exit", () => {
    const meta: TradeMeta = { ...baseMeta, tpPrice: 110, slPrice: 90, size: 2 };
    const candles = [
      signalBar,
      bar(1, 100, 101, 97, 98),
      bar(2, 97, 97.5, 94.5, 95.5),
      bar(3, 95.5, 96, 93, 95),
      bar(4, 96, 111, 95.5, 110),
    ];
    const outcome = realize(createTradeProposal(meta, candles), { ...baseOptions, addBuyPct: 0.5 });
    const fills = outcome?.fills ?? [];

    expect(fills.map((fill) => [fill.kind, fill.lotKind, fill.barIndex])).toEqual([
      ["entry", "entry", 1],
      ["dca", "dca", 2],
      ["exit", "entry", 4],
      ["exit", "dca", 4],
    ]);
    expect(fills[1]).toMatchObject({ price: 95, size: 1, referencePrice: 95 });
    expect(fills[2].returnPct).toBeCloseTo(10, 10);
    expect(fills[3].returnPct).toBeCloseTo((15 / 95) * 100, 10);
  });

  it("returns null when the data ends before the entry bar", () => {
    expect(realize(createTradeProposal(baseMeta, [signalBar]), baseOptions)).toBeNull();
  });

  it("fills on the signal bar without delay", () => {
    const outcome = realize(createTradeProposal(baseMeta, [signalBar]), { ...baseOptions, executionDelayBars: 0 });
    expect(outcome?.fills[0]).toMatchObject({ price: 100, barIndex: 0 });
    expect(outcome?.open).toBe(true);
  });

  it("raises a SimulationFault for a malformed bar", () => {
    const proposal = createTradeProposal(baseMeta, [signalBar, bar(1, 100, 90, 95, 92)]);
    expect(() => realize(proposal, baseOptions)).toThrow(SimulationFault);
  });

  it("raises a SimulationFault for non-positive levels", () => {
    const proposal = createTradeProposal({ ...baseMeta, slPrice: 0 }, [signalBar, wideBar]);
    expect(() => realize(proposal, baseOptions)).toThrow(SimulationFault);
  });

  it("reports fills to the hook without letting it change the outcome", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const proposal = createTradeProposal(baseMeta, [signalBar, wideBar]);
    const onFill = vi.fn(() => {
      throw new Error("hook failure");
    });

    const observed = realize(proposal, { ...baseOptions, onFill });

    expect(onFill).toHaveBeenCalledTimes(2);
    expect(onFill).toHaveBeenCalledWith(expect.objectContaining({ kind: "entry" }), {
      proposalId: "BTCUSDT-0",
      symbol: "BTCUSDT",
      barIndex: 1,
    });
    expect(observed).toEqual(realize(proposal, baseOptions));
  });

  it("freezes proposals", () => {
    const proposal = createTradeProposal(baseMeta, [signalBar]);
    expect(Object.isFrozen(proposal)).toBe(true);
    expect(Object.isFrozen(proposal.meta)).toBe(true);
    expect(proposal.id).toBe("BTCUSDT-0");
  });
});

describe("computeReturn", () => {
  it("counts a flat exit as a loss", () => {
    expect(computeReturn("LONG", 100, 100)).toEqual({ returnPct: 0, result: "LOSS" });
  });

  it("inverts the sign for shorts", () => {
    const { returnPct, result } = computeReturn("SHORT", 100, 95);
    expect(returnPct).toBeCloseTo(5, 10);
    expect(result).toBe("WIN");
  });
});
