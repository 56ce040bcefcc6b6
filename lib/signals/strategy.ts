import { ReversalSignalEngine, type SignalEngineConfig } from "@/lib/signals/engine";
import type { Candle, SignalDecision } from "@/types";

export interface Strategy {
  readonly id: string;
  readonly requiredLookback: number;
  decide(candles: readonly Candle[], symbol: string): SignalDecision;
  filterSymbols(symbols: readonly string[]): string[];
}

export interface ReversalStrategyOptions extends SignalEngineConfig {
  id?: string;
  /** Quote asset a tradable symbol must end with; null accepts every symbol. */
  quoteAsset?: string | null;
}

export function createReversalStrategy(options: ReversalStrategyOptions): Strategy {
  const { id = "ema-reversal", quoteAsset = "USDT", ...engineConfig } = options;
  const engine = new ReversalSignalEngine(engineConfig);
  const suffix = quoteAsset ? quoteAsset.toUpperCase() : null;

  return {
    id,
    requiredLookback: engine.requiredLookback,
    decide: (candles, symbol) => engine.decide(candles, symbol),
    filterSymbols: (symbols) => {
      const unique = new Set<string>();
      for (const raw of symbols) {
        const symbol = raw.trim().toUpperCase();
        if (!symbol) {
          continue;
        }
        if (suffix && (symbol === suffix || !symbol.endsWith(suffix))) {
          continue;
        }
        unique.add(symbol);
      }
      return [...unique];
    },
  };
}

export type EnsembleMode = "any" | "all";

/**
 * Merges decision lists produced by independent strategies into one BUY per
 * symbol. "any" keeps the first BUY seen; "all" requires a BUY in every list
 * and keeps the lowest entry among them.
 */
export function combineSignals(lists: readonly (readonly SignalDecision[])[], mode: EnsembleMode = "any"): SignalDecision[] {
  const perList = lists.map((list) => {
    const bySymbol = new Map<string, SignalDecision>();
    for (const decision of list) {
      if (decision.signal === "BUY" && !bySymbol.has(decision.symbol)) {
        bySymbol.set(decision.symbol, decision);
      }
    }
    return bySymbol;
  });

  const order: string[] = [];
  for (const bySymbol of perList) {
    for (const symbol of bySymbol.keys()) {
      if (!order.includes(symbol)) {
        order.push(symbol);
      }
    }
  }

  const result: SignalDecision[] = [];
  for (const symbol of order) {
    const hits = perList
      .map((bySymbol) => bySymbol.get(symbol))
      .filter((decision): decision is SignalDecision => decision !== undefined);

    if (mode === "any") {
      result.push(hits[0]);
      continue;
    }
    if (hits.length !== perList.length) {
      continue;
    }
    let chosen = hits[0];
    for (const decision of hits) {
      if ((decision.entryPrice ?? Number.POSITIVE_INFINITY) < (chosen.entryPrice ?? Number.POSITIVE_INFINITY)) {
        chosen = decision;
      }
    }
    result.push(chosen);
  }
  return result;
}
