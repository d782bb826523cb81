import type { StrikewatchConfig } from '../core/config.js';
import { LeaseLostError, OrderRejectedError, StaleStateError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { PollLoop } from '../core/loop.js';
import { retryWithBackoff, sleep } from '../core/retry.js';
import type { ExchangeAdapter, OrderRequest, VenueFill, VenueOrder } from '../execution/exchange.js';
import { bidCentsFor } from '../execution/exchange.js';
import type { TradeStore } from './db.js';
import { centsToDollars, computePnl, dollarsToCents, outcomeForPnl } from './pnl.js';
import type { CloseReason, Trade } from './types.js';

export type SubmitResult =
  | { kind: 'skipped'; reason: string }
  | { kind: 'filled'; trade: Trade }
  | { kind: 'unconfirmed'; trade: Trade }
  | { kind: 'failed'; trade: Trade; reason: string };

export type CancelResult =
  | { kind: 'cancelled'; trade: Trade }
  | { kind: 'filled'; trade: Trade }
  | { kind: 'noop'; trade: Trade };

export function clientOrderIdFor(tradeId: number): string {
  return `sw-${tradeId}`;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Count-weighted fill price (cents), total contracts and total fees (cents). */
export function aggregateFills(fills: VenueFill[]): { count: number; priceCents: number; feeCents: number } {
  const count = fills.reduce((sum, f) => sum + f.count, 0);
  const notional = fills.reduce((sum, f) => sum + f.count * f.priceCents, 0);
  const feeCents = fills.reduce((sum, f) => sum + f.feeCents, 0);
  return { count, priceCents: count > 0 ? notional / count : 0, feeCents };
}

/**
 * Places and cancels orders and drives pending trades to active or error.
 * Every status write goes through the store's compare-and-swap, so a fill
 * observed twice (stream, poll, reconciliation) promotes a trade once.
 */
export class TradeExecutor {
  private loop: PollLoop;
  private logger: Logger;
  private owner: string;
  private sleepFn: (ms: number) => Promise<void>;
  private clock: () => number;
  private unsubscribe: (() => void) | null = null;
  private inFlight = new Set<number>();
  private exitAttempts = new Map<number, number>();
  // Stream fills seen per entry order, keyed by fill id, until the order is complete.
  private partialFills = new Map<string, Map<string, VenueFill>>();

  constructor(
    private params: {
      store: TradeStore;
      exchange: ExchangeAdapter;
      config: StrikewatchConfig['execution'];
      logger?: Logger;
      owner?: string;
      sleepFn?: (ms: number) => Promise<void>;
      clock?: () => number;
    }
  ) {
    this.logger = params.logger ?? new Logger('info');
    this.owner = params.owner ?? `executor-${process.pid}`;
    this.sleepFn = params.sleepFn ?? sleep;
    this.clock = params.clock ?? Date.now;
    this.loop = new PollLoop({
      name: 'executor',
      tick: () => this.processPending(),
      nextDelayMs: () => params.config.pollIntervalMs,
      logger: this.logger,
    });
  }

  start(): void {
    if (this.params.exchange.onFill && !this.unsubscribe) {
      this.unsubscribe = this.params.exchange.onFill((fill) => {
        try {
          this.handleFill(fill);
        } catch (err) {
          this.logger.error(`Failed to apply fill ${fill.fillId}`, err);
        }
      });
    }
    this.loop.start();
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    await this.loop.stop();
  }

  /** Fire-and-log submission used right after an entry intent is created. */
  enqueue(tradeId: number): void {
    this.submit(tradeId).catch((err) => this.logger.error(`Submit failed for trade ${tradeId}`, err));
  }

  async processPending(): Promise<void> {
    const pending = this.params.store
      .listActiveTrades()
      .filter((view) => view.active.status === 'pending' && !view.active.frozen && !view.trade.orderSubmittedAt);
    for (const view of pending) {
      await this.submit(view.trade.id);
    }
  }

  async submit(tradeId: number): Promise<SubmitResult> {
    const { store, exchange, config } = this.params;
    if (this.inFlight.has(tradeId)) {
      return { kind: 'skipped', reason: 'in_flight' };
    }
    const trade = store.getTrade(tradeId);
    if (!trade || trade.status !== 'pending') {
      return { kind: 'skipped', reason: 'not_pending' };
    }
    if (trade.orderSubmittedAt) {
      return { kind: 'skipped', reason: 'already_submitted' };
    }
    if (!store.acquireLock(tradeId, this.owner, config.lockTtlMs)) {
      return { kind: 'skipped', reason: 'locked' };
    }

    this.inFlight.add(tradeId);
    try {
      const request: OrderRequest = {
        marketTicker: trade.marketTicker,
        side: trade.side,
        action: 'buy',
        count: trade.positionSize,
        priceCents: dollarsToCents(trade.entryPrice),
        timeInForce: 'fill_or_kill',
        clientOrderId: clientOrderIdFor(trade.id),
      };
      // Reconciliation finds an unacknowledged order by this client id.
      store.recordOrderSubmission(tradeId, { clientOrderId: request.clientOrderId, orderId: null });

      let order: VenueOrder;
      try {
        order = await retryWithBackoff(
          () => {
            this.renewLease(tradeId);
            return exchange.placeOrder(request);
          },
          {
            maxRetries: config.maxRetries,
            baseMs: config.retryBaseMs,
            maxMs: config.retryMaxMs,
            sleepFn: this.sleepFn,
            onRetry: (err, attempt, delayMs) =>
              this.logger.warn(`Order for trade ${tradeId} failed (attempt ${attempt}), retrying in ${delayMs}ms`, err),
          }
        );
      } catch (err) {
        if (err instanceof LeaseLostError) {
          this.logger.warn(`Lost the lock on trade ${tradeId} before placing its order; leaving it to the supervisor`);
          return { kind: 'skipped', reason: 'lease_lost' };
        }
        if (err instanceof OrderRejectedError) {
          const reason = `order_rejected: ${describe(err)}`;
          store.recordOrderOutcome(tradeId, 'rejected');
          this.logger.error(`Order for trade ${tradeId} rejected`, err);
          return { kind: 'failed', trade: this.failPending(tradeId, reason), reason };
        }
        // Timeouts and exhausted transient failures may still have reached the venue.
        this.logger.error(`Order for trade ${tradeId} unacknowledged; leaving pending for reconciliation`, err);
        return { kind: 'unconfirmed', trade: store.requireTrade(tradeId) };
      }

      try {
        store.recordOrderSubmission(tradeId, { clientOrderId: request.clientOrderId, orderId: order.orderId });
      } catch (err) {
        if (err instanceof StaleStateError) {
          this.logger.error(`Order ${order.orderId} placed but trade ${tradeId} is now ${err.actual}`, err);
          return { kind: 'skipped', reason: 'superseded' };
        }
        throw err;
      }
      this.logger.info(`Order ${order.orderId} placed for trade ${tradeId} (${order.status})`);

      const settled =
        order.status === 'resting' || order.status === 'pending' ? await this.waitForFill(tradeId, order) : order;
      if (!settled) {
        this.logger.warn(`No fill confirmation for trade ${tradeId} within ${config.fillTimeoutMs}ms; leaving pending`);
        return { kind: 'unconfirmed', trade: store.requireTrade(tradeId) };
      }
      if (settled.status === 'executed') {
        const fills = await exchange.getFills({ orderId: settled.orderId });
        return { kind: 'filled', trade: this.applyEntryFills(tradeId, fills, settled) };
      }
      // Fill-or-kill orders that could not fill come back cancelled.
      store.recordOrderOutcome(tradeId, 'cancelled');
      const failed = this.failPending(tradeId, 'order_killed');
      return { kind: 'failed', trade: failed, reason: 'order_killed' };
    } finally {
      this.inFlight.delete(tradeId);
      store.releaseLock(tradeId, this.owner);
    }
  }

  /** Extends this worker's lease; throws once another worker has taken it. */
  private renewLease(tradeId: number): void {
    if (!this.params.store.acquireLock(tradeId, this.owner, this.params.config.lockTtlMs)) {
      throw new LeaseLostError(tradeId, this.owner);
    }
  }

  /** Polls the venue until the order is terminal or the fill timeout passes. */
  private async waitForFill(tradeId: number, order: VenueOrder): Promise<VenueOrder | null> {
    const { config, exchange, store } = this.params;
    const deadline = this.clock() + config.fillTimeoutMs;
    while (this.clock() < deadline) {
      await this.sleepFn(config.fillPollMs);
      if (!store.acquireLock(tradeId, this.owner, config.lockTtlMs)) {
        return null;
      }
      const current = await exchange.getOrder(order.orderId).catch((err: unknown) => {
        this.logger.warn(`Order status check failed for ${order.orderId}`, err);
        return null;
      });
      if (current && (current.status === 'executed' || current.status === 'canceled')) {
        return current;
      }
    }
    return null;
  }

  handleFill(fill: VenueFill): Trade | null {
    const trade = this.params.store.getTradeByOrderId(fill.orderId);
    if (!trade) {
      this.logger.debug(`Fill ${fill.fillId} for unknown order ${fill.orderId}`);
      return null;
    }
    if (trade.orderId === fill.orderId && fill.action === 'buy') {
      return this.applyStreamEntryFill(trade, fill);
    }
    if (trade.closeOrderId === fill.orderId && trade.status === 'closing') {
      return this.completeClose(trade, [fill]);
    }
    return trade;
  }

  /**
   * An order that matches several price levels arrives as several fills; the
   * trade is promoted once they cover the whole position.
   */
  private applyStreamEntryFill(trade: Trade, fill: VenueFill): Trade {
    if (trade.status !== 'pending') {
      this.partialFills.delete(fill.orderId);
      return trade;
    }
    const seen = this.partialFills.get(fill.orderId) ?? new Map<string, VenueFill>();
    seen.set(fill.fillId, fill);
    this.partialFills.set(fill.orderId, seen);

    const fills = [...seen.values()];
    const filled = aggregateFills(fills).count;
    if (filled < trade.positionSize) {
      this.logger.debug(`Trade ${trade.id} order ${fill.orderId} filled ${filled}/${trade.positionSize}`);
      return trade;
    }
    this.partialFills.delete(fill.orderId);
    return this.applyEntryFills(trade.id, fills);
  }

  /**
   * Promotes pending → active from venue fills. The first recorded order
   * outcome wins; a repeated or late fill leaves the trade untouched.
   */
  applyEntryFills(tradeId: number, fills: VenueFill[], order?: VenueOrder): Trade {
    const { store } = this.params;
    const trade = store.requireTrade(tradeId);
    if (trade.status !== 'pending') {
      return trade;
    }
    const { applied, outcome } = store.recordOrderOutcome(tradeId, 'filled');
    if (!applied && outcome !== 'filled') {
      this.logger.warn(`Fill for trade ${tradeId} arrived after order outcome ${outcome ?? 'unknown'}`);
      return store.requireTrade(tradeId);
    }

    const agg = aggregateFills(fills);
    const count = agg.count > 0 ? agg.count : order?.filledCount || trade.positionSize;
    const priceCents = agg.count > 0 ? agg.priceCents : order?.priceCents ?? dollarsToCents(trade.entryPrice);
    try {
      const next = store.transition(
        tradeId,
        'pending',
        {
          to: 'active',
          entryPrice: Math.round(priceCents) / 100,
          positionSize: count,
          fees: centsToDollars(agg.feeCents),
          orderId: order?.orderId ?? fills[0]?.orderId ?? null,
        },
        { detail: { fills: fills.map((f) => f.fillId) } }
      );
      this.logger.info(`Trade ${tradeId} active at ${next.entryPrice} x${next.positionSize}`);
      return next;
    } catch (err) {
      if (err instanceof StaleStateError) {
        return store.requireTrade(tradeId);
      }
      throw err;
    }
  }

  /** Idempotent cancellation of a pending trade's entry order. */
  async cancel(tradeId: number): Promise<CancelResult> {
    const { store, exchange } = this.params;
    const trade = store.requireTrade(tradeId);
    if (trade.status !== 'pending' || trade.orderOutcome) {
      return { kind: 'noop', trade };
    }
    if (this.inFlight.has(tradeId)) {
      this.logger.debug(`Trade ${tradeId} order still being placed; not cancelling`);
      return { kind: 'noop', trade };
    }
    const orderId =
      trade.orderId ??
      (trade.clientOrderId
        ? (await exchange.findOrderByClientId(trade.clientOrderId, trade.marketTicker))?.orderId ?? null
        : null);
    if (orderId) {
      const venueOrder = await exchange.cancelOrder(orderId);
      if (venueOrder?.status === 'executed') {
        const fills = await exchange.getFills({ orderId });
        return { kind: 'filled', trade: this.applyEntryFills(tradeId, fills, venueOrder) };
      }
    }
    const { applied } = store.recordOrderOutcome(tradeId, 'cancelled');
    if (!applied) {
      return { kind: 'noop', trade: store.requireTrade(tradeId) };
    }
    return { kind: 'cancelled', trade: this.failPending(tradeId, 'cancelled') };
  }

  /**
   * Moves an active trade to closing and, for stop exits, sells the held side
   * at the bid. Expiry closes hold to settlement and place no order.
   */
  async closePosition(trade: Trade, reason: CloseReason): Promise<Trade> {
    const closing = this.params.store.transition(trade.id, 'active', { to: 'closing', closeReason: reason });
    this.logger.info(`Trade ${trade.id} closing (${reason})`);
    if (reason === 'expiry') {
      return closing;
    }
    return this.placeExitOrder(closing);
  }

  async placeExitOrder(trade: Trade): Promise<Trade> {
    const { store, exchange, config } = this.params;
    if (trade.status !== 'closing') return trade;
    const quote = await exchange.getMarket(trade.marketTicker);
    const bid = quote ? bidCentsFor(quote, trade.side) : null;
    if (bid == null || bid <= 0) {
      this.logger.warn(`No bid for ${trade.marketTicker} ${trade.side}; exit for trade ${trade.id} deferred`);
      return trade;
    }

    const attempt = (this.exitAttempts.get(trade.id) ?? 0) + 1;
    this.exitAttempts.set(trade.id, attempt);
    const request: OrderRequest = {
      marketTicker: trade.marketTicker,
      side: trade.side,
      action: 'sell',
      count: trade.positionSize,
      priceCents: bid,
      timeInForce: 'immediate_or_cancel',
      clientOrderId: `${clientOrderIdFor(trade.id)}-x${attempt}`,
    };
    const order = await retryWithBackoff(() => exchange.placeOrder(request), {
      maxRetries: config.maxRetries,
      baseMs: config.retryBaseMs,
      maxMs: config.retryMaxMs,
      sleepFn: this.sleepFn,
    });
    store.setCloseOrder(trade.id, order.orderId);
    if (order.status !== 'executed') {
      this.logger.warn(`Exit order ${order.orderId} for trade ${trade.id} did not fill (${order.status})`);
      return store.requireTrade(trade.id);
    }
    const fills = await exchange.getFills({ orderId: order.orderId });
    return this.completeClose(store.requireTrade(trade.id), fills);
  }

  /** closing → closed from exit fills. */
  completeClose(trade: Trade, fills: VenueFill[]): Trade {
    const { store } = this.params;
    if (trade.status !== 'closing' || fills.length === 0) return trade;
    const agg = aggregateFills(fills);
    const exitPrice = Math.round(agg.priceCents) / 100;
    const fees = centsToDollars(dollarsToCents(trade.fees) + agg.feeCents);
    const pnl = computePnl({ entryPrice: trade.entryPrice, exitPrice, positionSize: trade.positionSize, fees });
    try {
      const closed = store.transition(trade.id, 'closing', {
        to: 'closed',
        exitPrice,
        pnl,
        outcome: outcomeForPnl(pnl),
        fees,
      });
      this.exitAttempts.delete(trade.id);
      this.logger.info(`Trade ${trade.id} closed at ${exitPrice} (pnl ${pnl})`);
      return closed;
    } catch (err) {
      if (err instanceof StaleStateError) {
        return store.requireTrade(trade.id);
      }
      throw err;
    }
  }

  private failPending(tradeId: number, reason: string): Trade {
    try {
      return this.params.store.transition(tradeId, 'pending', { to: 'error', reason });
    } catch (err) {
      if (err instanceof StaleStateError) {
        return this.params.store.requireTrade(tradeId);
      }
      throw err;
    }
  }
}
