/**
 * Error taxonomy for the portfolio and risk core.
 *
 * Unavailable market data is not an error: resolvers return null and callers
 * take an explicit "no price" path.
 */

import { TradeSide } from './risk';

/**
 * Thrown when a computed result contradicts a contract the code guarantees,
 * e.g. a stop placed on the wrong side of entry or an equity figure that does
 * not reconcile with cash and positions. Always a programming defect.
 */
export class InvariantViolationError extends Error {
  constructor(message: string, public readonly details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

/**
 * Error thrown when a stop/take pair is on the wrong side of entry
 */
export class StopTakeOrderingError extends InvariantViolationError {
  constructor(side: TradeSide, entryPrice: number, stopPrice: number, takePrice: number) {
    super(
      `Invalid ${side} levels: stop=${stopPrice}, entry=${entryPrice}, take=${takePrice}`,
      { side, entryPrice, stopPrice, takePrice }
    );
    this.name = 'StopTakeOrderingError';
  }
}

/**
 * Error thrown when the persistent store cannot be read or written,
 * or returns an item that does not match the expected layout
 */
export class PersistenceError extends Error {
  constructor(
    public readonly operation: string,
    message: string,
    cause?: unknown
  ) {
    super(`${operation} failed: ${message}`, { cause });
    this.name = 'PersistenceError';
  }
}

/**
 * Error thrown for missing or invalid parameters that have no fallback
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly fields: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a ledger operation is invoked in the wrong lifecycle phase
 */
export class LedgerStateError extends Error {
  constructor(operation: string, phase: string) {
    super(`Cannot ${operation} while ledger is ${phase}`);
    this.name = 'LedgerStateError';
  }
}

/**
 * Error thrown when a buy would overdraw cash and overdraft is disabled
 */
export class InsufficientCashError extends Error {
  constructor(public readonly required: number, public readonly available: number) {
    super(`Insufficient cash: need $${required.toFixed(2)}, have $${available.toFixed(2)}`);
    this.name = 'InsufficientCashError';
  }
}

/**
 * Extracts a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
