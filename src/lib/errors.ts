import type { TradeStatus } from '../types/trade.js';

/** Market-data collaborator returned nothing usable for a symbol. */
export class DataUnavailableError extends Error {
  constructor(readonly symbol: string, message: string, options?: { cause?: unknown }) {
    super(`Data unavailable for ${symbol}: ${message}`, options);
    this.name = 'DataUnavailableError';
  }
}

/** A lifecycle transition was requested from a status that does not allow it. */
export class InvalidTransitionError extends Error {
  constructor(
    readonly tradeId: string,
    readonly currentStatus: TradeStatus,
    readonly attempted: string,
  ) {
    super(`Cannot ${attempted} trade ${tradeId}: status is ${currentStatus}`);
    this.name = 'InvalidTransitionError';
  }
}

export class TradeNotFoundError extends Error {
  constructor(readonly tradeId: string) {
    super(`Trade not found: ${tradeId}`);
    this.name = 'TradeNotFoundError';
  }
}

/**
 * The trade log could not be written (or read). The in-memory ledger may be
 * ahead of disk when this is thrown from a mutation.
 */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** HTTP status for an error surfaced by an exposed operation. */
export function httpStatusFor(err: unknown): number {
  if (err instanceof TradeNotFoundError) return 404;
  if (err instanceof InvalidTransitionError) return 409;
  if (err instanceof PersistenceError) return 503;
  if (err instanceof DataUnavailableError) return 502;
  return 500;
}
