export type TradingErrorCode =
  | 'ANALYSIS_UNAVAILABLE'
  | 'ORDER_REJECTED'
  | 'EXECUTION_UNAVAILABLE'
  | 'RISK_LIMIT_EXCEEDED'
  | 'INSUFFICIENT_FUNDS'
  | 'LEDGER_INCONSISTENCY'
  | 'CLOCK_MISCONFIGURATION'
  | 'NOT_IN_EMERGENCY_STATE'
  | 'INVALID_TRANSITION'
  | 'CONFIG_ERROR';

export class TradingBotError extends Error {
  readonly code: TradingErrorCode;
  readonly symbol: string | undefined;

  constructor(code: TradingErrorCode, message: string, options?: { symbol?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.symbol = options?.symbol;
  }
}

/** Analysis backend failed, timed out or answered with something unusable. Degrades to HOLD. */
export class AnalysisUnavailable extends TradingBotError {
  constructor(symbol: string, message: string, cause?: unknown) {
    super('ANALYSIS_UNAVAILABLE', message, { symbol, cause });
  }
}

/** The brokerage refused the order. */
export class OrderRejected extends TradingBotError {
  constructor(symbol: string, message: string, cause?: unknown) {
    super('ORDER_REJECTED', message, { symbol, cause });
  }
}

/** Network failure or timeout talking to the brokerage. Counts towards the outage threshold. */
export class ExecutionUnavailable extends TradingBotError {
  constructor(message: string, cause?: unknown) {
    super('EXECUTION_UNAVAILABLE', message, { cause });
  }
}

export class RiskLimitExceeded extends TradingBotError {
  constructor(symbol: string, message: string) {
    super('RISK_LIMIT_EXCEEDED', message, { symbol });
  }
}

export class InsufficientFunds extends TradingBotError {
  constructor(symbol: string, message: string) {
    super('INSUFFICIENT_FUNDS', message, { symbol });
  }
}

export class LedgerInconsistency extends TradingBotError {
  readonly positionId: string;

  constructor(symbol: string, positionId: string, message: string) {
    super('LEDGER_INCONSISTENCY', message, { symbol });
    this.positionId = positionId;
  }
}

export class ClockMisconfiguration extends TradingBotError {
  constructor(message: string) {
    super('CLOCK_MISCONFIGURATION', message);
  }
}

export class NotInEmergencyState extends TradingBotError {
  constructor(state: string) {
    super('NOT_IN_EMERGENCY_STATE', `Cannot resume from ${state}: not in EMERGENCY_STOPPED`);
  }
}

export class InvalidTransition extends TradingBotError {
  constructor(from: string, event: string, symbol?: string) {
    super('INVALID_TRANSITION', `No transition from ${from} on ${event}`, symbol ? { symbol } : undefined);
  }
}

export class ConfigError extends TradingBotError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
