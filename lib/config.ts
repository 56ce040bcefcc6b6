import { z } from "zod";

import { ConfigurationError } from "@/lib/errors";
import type { BacktestSettings } from "@/types";

export const DEFAULT_BACKTEST_SETTINGS: BacktestSettings = {
  timeframe: "weekly",
  tpRatio: 0.1,
  slRatio: 0.05,
  fee: 0,
  slippage: 0,
  executionDelayBars: 1,
  crossingPolicy: "prefer_sl",
  addBuyPct: 0,
  maxPositions: 5,
  initialCash: 10_000,
  positionSize: 1,
  seed: 42,
  maxConsecutiveLosses: null,
  lossCooldownMs: 7 * 86_400_000,
};

const BacktestSettingsSchema = z.object({
  timeframe: z.enum(["daily", "weekly"]),
  tpRatio: z.number().finite().positive(),
  slRatio: z.number().finite().positive().lt(1),
  fee: z.number().finite().min(0).lt(1),
  slippage: z.number().finite().min(0).lt(1),
  executionDelayBars: z.number().int().min(0),
  crossingPolicy: z.enum(["prefer_sl", "prefer_tp", "random"]),
  addBuyPct: z.number().finite().min(0),
  maxPositions: z.number().int().positive(),
  initialCash: z.number().finite().min(0),
  positionSize: z.number().finite().positive(),
  seed: z.number().int(),
  maxConsecutiveLosses: z.number().int().positive().nullable(),
  lossCooldownMs: z.number().finite().min(0),
});

export function cloneSettings(settings: BacktestSettings): BacktestSettings {
  return { ...settings };
}

/**
 * Merges `partial` over the defaults and validates the result.
 * Throws ConfigurationError naming every offending field.
 */
export function resolveSettings(partial?: Partial<BacktestSettings>): BacktestSettings {
  const merged = { ...DEFAULT_BACKTEST_SETTINGS, ...(partial ?? {}) };
  const parsed = BacktestSettingsSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "settings"}: ${issue.message}`);
    throw new ConfigurationError(issues);
  }
  return parsed.data;
}
