/**
 * Error taxonomy shared by the feed, signal, store and execution layers.
 *
 * Transient errors are retried locally with bounded backoff. Compare-and-swap
 * failures are retried by re-reading. Domain-terminal errors (rejection,
 * drift) are surfaced and never retried automatically.
 */

export type ErrorCode =
  | 'FEED_STALE'
  | 'INSUFFICIENT_HISTORY'
  | 'DUPLICATE_TRADE'
  | 'STALE_STATE'
  | 'INVALID_TRANSITION'
  | 'TRADE_NOT_FOUND'
  | 'ORDER_REJECTED'
  | 'TRANSIENT_EXCHANGE'
  | 'TIMEOUT'
  | 'RECONCILIATION_DRIFT'
  | 'LEASE_LOST'
  | 'CONFIG';

export class StrikewatchError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = 'StrikewatchError';
  }
}

export class FeedStaleError extends StrikewatchError {
  constructor(public readonly lastTickAt: number | null, public readonly staleAfterMs: number) {
    super(
      lastTickAt == null
        ? 'Price feed has not delivered a tick yet'
        : `No price tick for ${Date.now() - lastTickAt}ms (stale after ${staleAfterMs}ms)`,
      'FEED_STALE'
    );
    this.name = 'FeedStaleError';
  }
}

export class InsufficientHistoryError extends StrikewatchError {
  constructor(public readonly haveSeconds: number, public readonly needSeconds: number) {
    super(`Momentum needs ${needSeconds}s of history, have ${haveSeconds}s`, 'INSUFFICIENT_HISTORY');
    this.name = 'InsufficientHistoryError';
  }
}

export class DuplicateTradeError extends StrikewatchError {
  constructor(
    public readonly key: { eventTicker: string; strike: number; side: string },
    public readonly existingTradeId: number | null
  ) {
    super(
      `Non-terminal trade already exists for ${key.eventTicker} ${key.strike} ${key.side}` +
        (existingTradeId != null ? ` (trade ${existingTradeId})` : ''),
      'DUPLICATE_TRADE'
    );
    this.name = 'DuplicateTradeError';
  }
}

export class StaleStateError extends StrikewatchError {
  constructor(
    public readonly tradeId: number,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Trade ${tradeId} expected status ${expected} but is ${actual}`, 'STALE_STATE');
    this.name = 'StaleStateError';
  }
}

export class InvalidTransitionError extends StrikewatchError {
  constructor(public readonly from: string, public readonly to: string) {
    super(`Transition ${from} -> ${to} is not allowed`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

export class TradeNotFoundError extends StrikewatchError {
  constructor(public readonly tradeId: number) {
    super(`Trade ${tradeId} not found`, 'TRADE_NOT_FOUND');
    this.name = 'TradeNotFoundError';
  }
}

export class OrderRejectedError extends StrikewatchError {
  constructor(
    message: string,
    public readonly statusCode: number | null = null,
    public readonly venueCode: string | null = null
  ) {
    super(message, 'ORDER_REJECTED');
    this.name = 'OrderRejectedError';
  }
}

export class TransientExchangeError extends StrikewatchError {
  constructor(message: string, public readonly statusCode: number | null = null) {
    super(message, 'TRANSIENT_EXCHANGE');
    this.name = 'TransientExchangeError';
  }
}

export class TimeoutError extends StrikewatchError {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class ReconciliationDriftError extends StrikewatchError {
  constructor(
    public readonly tradeId: number,
    public readonly localStatus: string,
    public readonly venueState: string,
    public readonly consecutive: number
  ) {
    super(
      `Trade ${tradeId} local=${localStatus} venue=${venueState} disagree for ${consecutive} consecutive polls`,
      'RECONCILIATION_DRIFT'
    );
    this.name = 'ReconciliationDriftError';
  }
}

export class LeaseLostError extends StrikewatchError {
  constructor(public readonly tradeId: number, public readonly owner: string) {
    super(`Transition lock on trade ${tradeId} no longer held by ${owner}`, 'LEASE_LOST');
    this.name = 'LeaseLostError';
  }
}

export class ConfigError extends StrikewatchError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

export function isRetryableError(err: unknown): boolean {
  return err instanceof TransientExchangeError || err instanceof TimeoutError;
}
