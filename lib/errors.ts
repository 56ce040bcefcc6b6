export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid backtest settings: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class SimulationFault extends Error {
  readonly symbol: string;

  readonly barIndex: number | null;

  constructor(message: string, options: { symbol: string; barIndex?: number | null; cause?: unknown }) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SimulationFault";
    this.symbol = options.symbol;
    this.barIndex = options.barIndex ?? null;
  }
}

export class MarketDataError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "MarketDataError";
    this.status = status;
  }
}
