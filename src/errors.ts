/**
 * Raised when a fixed-point division or normalization range has a zero denominator.
 */
export class DivisionByZeroError extends Error {
  public readonly code = "E-DIV-ZERO";

  constructor(context: string) {
    super(`division by zero: ${context}`);
    this.name = "DivisionByZeroError";
  }
}

/**
 * Raised when a value leaves [0, 2^256 - 1], subtraction underflow included.
 */
export class ArithmeticOverflowError extends Error {
  public readonly code = "E-OVERFLOW";

  constructor(context: string) {
    super(`arithmetic overflow: ${context}`);
    this.name = "ArithmeticOverflowError";
  }
}

export class AuctionError extends Error {
  public readonly code = "E-AUCTION";
  public readonly details: { epoch: number };

  constructor(epoch: number, reason: string) {
    super(`auction ${epoch}: ${reason}`);
    this.name = "AuctionError";
    this.details = { epoch };
  }
}

export class ReentrancyError extends Error {
  public readonly code = "E-REENTRANT";

  constructor(operation: string) {
    super(`${operation} is already running`);
    this.name = "ReentrancyError";
  }
}

export class ConfigError extends Error {
  public readonly code = "E-CONFIG";
  public readonly details: { key: string; value: string };

  constructor(key: string, value: string, reason: string) {
    super(`invalid ${key}=${JSON.stringify(value)}: ${reason}`);
    this.name = "ConfigError";
    this.details = { key, value };
  }
}

export class LedgerError extends Error {
  public readonly code = "E-LEDGER";
  public readonly details: { account?: string };

  constructor(reason: string, account?: string) {
    super(account === undefined ? reason : `${reason} of ${account}`);
    this.name = "LedgerError";
    this.details = { account };
  }
}
