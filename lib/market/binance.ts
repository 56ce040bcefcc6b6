import { MarketDataError } from "@/lib/errors";
import { devWarn } from "@/lib/log";
import type { Candle, Timeframe } from "@/types";

const REST_BASE = "https://api.binance.com/api/v3";
const MAX_KLINE_LIMIT = 1000;

export const TIMEFRAME_INTERVALS: Record<Timeframe, string> = {
  daily: "1d",
  weekly: "1w",
};

export interface FetchKlinesParams {
  symbol: string;
  interval: string;
  limit?: number;
  startTime?: number;
}

export type KlineFetcher = (params: FetchKlinesParams) => Promise<Candle[]>;

/** Binance klines, oldest first. Rows that do not parse are dropped. */
export async function fetchKlines(params: FetchKlinesParams): Promise<Candle[]> {
  ensureFetch();
  const { symbol, interval, limit = 100, startTime } = params;
  const url = new URL(`${REST_BASE}/klines`);
  url.searchParams.set("symbol", symbol.toUpperCase());
  url.searchParams.set("interval", interval);
  url.searchParams.set("limit", String(clampKlineLimit(limit)));
  if (typeof startTime === "number" && Number.isFinite(startTime)) {
    url.searchParams.set("startTime", String(Math.max(0, Math.floor(startTime))));
  }

  const response = await fetch(url.toString());
  if (!response.ok) {
    throw new MarketDataError(`Failed to fetch Binance klines for ${symbol.toUpperCase()}: ${response.status}`, response.status);
  }

  const payload: unknown = await response.json();
  if (!Array.isArray(payload)) {
    throw new MarketDataError(`Invalid klines response from Binance for ${symbol.toUpperCase()}`);
  }

  const candles: Candle[] = [];
  let dropped = 0;
  for (const row of payload) {
    const candle = mapKline(row);
    if (candle) {
      candles.push(candle);
    } else {
      dropped += 1;
    }
  }
  if (dropped) {
    devWarn(`[market] Dropped ${dropped} malformed kline rows for ${symbol.toUpperCase()}`);
  }

  candles.sort((a, b) => a.timestamp - b.timestamp);
  return candles;
}

export function clampKlineLimit(limit: number): number {
  if (!Number.isFinite(limit)) {
    return MAX_KLINE_LIMIT;
  }
  return Math.min(Math.max(Math.floor(limit), 1), MAX_KLINE_LIMIT);
}

export function mapKline(row: unknown): Candle | null {
  if (!Array.isArray(row) || row.length < 6) {
    return null;
  }
  const timestamp = safeNumber(row[0]);
  const open = safeNumber(row[1]);
  const high = safeNumber(row[2]);
  const low = safeNumber(row[3]);
  const close = safeNumber(row[4]);
  const volume = safeNumber(row[5]);
  if (timestamp === null || open === null || high === null || low === null || close === null || volume === null) {
    return null;
  }
  if (high < low) {
    return null;
  }
  return { timestamp: Math.trunc(timestamp), open, high, low, close, volume };
}

function safeNumber(value: unknown): number | null {
  if (value === undefined || value === null || value === "") {
    return null;
  }
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

function ensureFetch(): void {
  if (typeof fetch === "undefined") {
    throw new MarketDataError("Global fetch is not available in the current environment");
  }
}
