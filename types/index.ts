export type Timeframe = "daily" | "weekly";

export interface Candle {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type EmaSeries = Array<number | null>;

export type TradeDirection = "LONG" | "SHORT";

export type CrossingPolicy = "prefer_sl" | "prefer_tp" | "random";

export type ExitType = "TP" | "SL" | "CLOSE";

export type TradeResult = "WIN" | "LOSS";

export type LotKind = "entry" | "dca";

export interface BacktestSettings {
  timeframe: Timeframe;
  tpRatio: number;
  slRatio: number;
  fee: number;
  slippage: number;
  executionDelayBars: number;
  crossingPolicy: CrossingPolicy;
  addBuyPct: number;
  maxPositions: number;
  initialCash: number;
  positionSize: number;
  seed: number;
  maxConsecutiveLosses: number | null;
  /** Pause after the losing streak trips, measured from the last losing exit. */
  lossCooldownMs: number;
}

export interface TradeMeta {
  readonly symbol: string;
  readonly entryTime: number;
  readonly entryPrice: number;
  readonly tpPrice: number;
  readonly slPrice: number;
  readonly size: number;
  readonly direction: TradeDirection;
}

export interface TradeProposal {
  readonly id: string;
  readonly meta: TradeMeta;
  /** Forward slice; index 0 is the bar the signal fired on. */
  readonly candles: readonly Candle[];
}

export type FillKind = "entry" | "dca" | "exit";

export interface Fill {
  kind: FillKind;
  lotKind: LotKind;
  price: number;
  size: number;
  time: number;
  barIndex: number;
  /** Price the fill was planned at, before slippage and fees. */
  referencePrice: number;
  exitType?: ExitType;
  returnPct?: number;
  result?: TradeResult;
}

export interface RealizeOutcome {
  fills: Fill[];
  open: boolean;
  /** Forward-slice index of the exit bar, or of the last bar when the trade stays open. */
  lastBarIndex: number;
}

export interface Lot {
  readonly id: string;
  readonly proposalId: string;
  readonly symbol: string;
  readonly kind: LotKind;
  readonly direction: TradeDirection;
  readonly entryPrice: number;
  readonly referencePrice: number;
  readonly size: number;
  readonly entryTime: number;
}

export interface TradeLogEntry {
  readonly symbol: string;
  readonly lotKind: LotKind;
  readonly direction: TradeDirection;
  readonly entryTime: number;
  readonly entryPrice: number;
  readonly exitTime: number;
  readonly exitPrice: number;
  readonly size: number;
  readonly exitType: ExitType;
  readonly result: TradeResult;
  readonly returnPct: number;
  readonly pnl: number;
}

export interface EquitySample {
  time: number;
  equity: number;
}

export type RejectionReason = "max-positions" | "insufficient-cash" | "consecutive-losses";

export interface RejectionRecord {
  symbol: string;
  reason: RejectionReason;
  message: string;
  time: number;
}

export interface GuardrailState {
  consecutiveLosses: number;
  cooldownUntil: number | null;
  lastBlock: RejectionRecord | null;
  logs: RejectionRecord[];
}

export interface PortfolioSnapshot {
  cash: number;
  positions: Record<string, Lot[]>;
  openLotCount: number;
  maxPositions: number;
  tradeLog: TradeLogEntry[];
  equityCurve: EquitySample[];
  guardrails: GuardrailState;
}

export type PatternTag = "all" | "all_but_one" | "none";

export type SignalStage = "SCANNING" | "PEAK_FOUND" | "PATTERN_CONFIRMED" | "SIGNAL_EMITTED" | "NO_SIGNAL";

export type SignalStrength = "STRONG" | "MODERATE" | "WEAK";

export type PeakRejection =
  | "insufficient-bars"
  | "tied-maximum"
  | "peak-not-recent"
  | "ema-unavailable"
  | "peak-below-ema-ratio"
  | "no-prior-breakout"
  | "peak-not-breakout";

export type NoSignalReason =
  | "insufficient-data"
  | PeakRejection
  | "no-bearish-pattern"
  | "price-above-ema";

export interface SignalDecision {
  symbol: string;
  timestamp: number | null;
  signal: "BUY" | "NO";
  stage: SignalStage;
  reason?: NoSignalReason;
  direction: TradeDirection;
  entryPrice: number | null;
  tpPrice: number | null;
  slPrice: number | null;
  emaPeriodUsed: number | null;
  peakIndex: number | null;
  pattern: PatternTag | null;
  strength?: SignalStrength;
  riskReward?: number;
  volumeRatio?: number;
  peakBarsAgo?: number;
  priceFromPeakPct?: number;
}

export interface PerformanceSummary {
  trades: number;
  wins: number;
  losses: number;
  winRate: number;
  avgReturnPct: number;
  netPnl: number;
  expectancy: number;
  maxDrawdownPct: number;
  totalReturnPct: number;
}
