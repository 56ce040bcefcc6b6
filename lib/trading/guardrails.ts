import type { GuardrailState, RejectionReason, RejectionRecord, TradeLogEntry } from "@/types";

const CASH_EPSILON = 1e-9;
const MAX_LOG_ENTRIES = 60;

export interface GuardrailSettings {
  maxPositions: number;
  maxConsecutiveLosses: number | null;
  lossCooldownMs: number;
}

export interface EntryRequest {
  symbol: string;
  cost: number;
  cash: number;
  openLots: number;
  time: number;
}

export interface EntryEvaluation {
  allowed: boolean;
  block?: RejectionRecord;
}

function buildBlock(request: EntryRequest, reason: RejectionReason, message: string): RejectionRecord {
  return { symbol: request.symbol, reason, message, time: request.time };
}

export function hasFunds(cash: number, cost: number): boolean {
  return cash + CASH_EPSILON >= cost;
}

/**
 * Gates new entries on capacity, funds and, when configured, the cooldown
 * that follows a losing streak. Evaluation is side-effect free; blocks are only logged
 * through `recordBlock`.
 */
export class EntryGuardrails {
  private settings: GuardrailSettings;

  private state: GuardrailState = {
    consecutiveLosses: 0,
    cooldownUntil: null,
    lastBlock: null,
    logs: [],
  };

  constructor(settings: GuardrailSettings) {
    this.settings = { ...settings };
  }

  getState(): GuardrailState {
    return {
      consecutiveLosses: this.state.consecutiveLosses,
      cooldownUntil: this.state.cooldownUntil,
      lastBlock: this.state.lastBlock ? { ...this.state.lastBlock } : null,
      logs: this.state.logs.map((entry) => ({ ...entry })),
    };
  }

  restoreState(state: GuardrailState): void {
    this.state = {
      consecutiveLosses: state.consecutiveLosses,
      cooldownUntil: state.cooldownUntil,
      lastBlock: state.lastBlock ? { ...state.lastBlock } : null,
      logs: state.logs.map((entry) => ({ ...entry })),
    };
  }

  evaluateCapacity(request: EntryRequest): EntryEvaluation {
    if (request.openLots >= this.settings.maxPositions) {
      return {
        allowed: false,
        block: buildBlock(request, "max-positions", `Open lot limit reached (${request.openLots}/${this.settings.maxPositions})`),
      };
    }
    if (!hasFunds(request.cash, request.cost)) {
      return {
        allowed: false,
        block: buildBlock(
          request,
          "insufficient-cash",
          `Insufficient cash (${request.cash.toFixed(2)} < ${request.cost.toFixed(2)})`,
        ),
      };
    }
    return { allowed: true };
  }

  evaluateEntry(request: EntryRequest): EntryEvaluation {
    const capacity = this.evaluateCapacity(request);
    if (!capacity.allowed) {
      return capacity;
    }
    const until = this.state.cooldownUntil;
    if (until !== null && request.time < until) {
      return {
        allowed: false,
        block: buildBlock(
          request,
          "consecutive-losses",
          `Consecutive loss limit reached (${this.settings.maxConsecutiveLosses ?? 0}), paused until ${until}`,
        ),
      };
    }
    return { allowed: true };
  }

  recordBlock(block: RejectionRecord): void {
    this.state.lastBlock = { ...block };
    this.state.logs.push({ ...block });
    if (this.state.logs.length > MAX_LOG_ENTRIES) {
      this.state.logs.splice(0, this.state.logs.length - MAX_LOG_ENTRIES);
    }
  }

  /**
   * A loss that completes the configured streak starts a cooldown from its
   * exit time and clears the streak, so a fresh run of losses is needed to
   * pause again.
   */
  recordClosedTrade(entry: TradeLogEntry): void {
    if (entry.result !== "LOSS") {
      this.state.consecutiveLosses = 0;
      return;
    }
    this.state.consecutiveLosses += 1;
    const limit = this.settings.maxConsecutiveLosses;
    if (limit !== null && this.state.consecutiveLosses >= limit) {
      this.state.cooldownUntil = entry.exitTime + this.settings.lossCooldownMs;
      this.state.consecutiveLosses = 0;
    }
  }
}
