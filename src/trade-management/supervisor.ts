import { EventEmitter } from 'eventemitter3';

import type { StrikewatchConfig } from '../core/config.js';
import { ReconciliationDriftError, StaleStateError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { PollLoop } from '../core/loop.js';
import type { ExchangeAdapter, MarketQuote } from '../execution/exchange.js';
import type { TradeStore } from './db.js';
import type { TradeExecutor } from './executor.js';
import { computePnl, outcomeForPnl, settlementExitPrice } from './pnl.js';
import {
  decideReconciliation,
  observeVenue,
  type ReconcileDecision,
  type VenueObservation,
  type VenueState,
} from './reconcile.js';
import type { ActiveTradeView, CloseReason, Trade } from './types.js';

/** Live model inputs used by the stop triggers. */
export interface SupervisorSignals {
  currentProbabilityBps(trade: Trade, market: MarketQuote | null): number | null;
  currentMomentum(): number | null;
}

export interface SupervisorEvents {
  drift: (err: ReconciliationDriftError) => void;
  transition: (trade: Trade) => void;
}

export type SupervisionResult =
  | { tradeId: number; kind: 'skipped'; reason: 'frozen' | 'locked' }
  | { tradeId: number; kind: 'reconciled'; venue: VenueState; decision: ReconcileDecision; trade: Trade };

export class ActiveTradeSupervisor extends EventEmitter<SupervisorEvents> {
  private loop: PollLoop;
  private logger: Logger;
  private owner: string;
  private clock: () => number;
  private hasActive = false;

  constructor(
    private params: {
      store: TradeStore;
      exchange: ExchangeAdapter;
      executor: TradeExecutor;
      config: StrikewatchConfig['supervisor'];
      lockTtlMs: number;
      signals?: SupervisorSignals;
      logger?: Logger;
      owner?: string;
      clock?: () => number;
    }
  ) {
    super();
    this.logger = params.logger ?? new Logger('info');
    this.owner = params.owner ?? `supervisor-${process.pid}`;
    this.clock = params.clock ?? Date.now;
    this.loop = new PollLoop({
      name: 'supervisor',
      tick: async () => {
        await this.poll();
      },
      nextDelayMs: () => (this.hasActive ? params.config.activeIntervalMs : params.config.idleIntervalMs),
      logger: this.logger,
    });
  }

  start(): void {
    this.loop.start();
  }

  async stop(): Promise<void> {
    await this.loop.stop();
  }

  async poll(): Promise<SupervisionResult[]> {
    const views = this.params.store.listActiveTrades();
    this.hasActive = views.length > 0;
    const results: SupervisionResult[] = [];
    for (const view of views) {
      try {
        results.push(await this.supervise(view));
      } catch (err) {
        this.logger.error(`Supervision of trade ${view.trade.id} failed`, err);
      }
    }
    return results;
  }

  async supervise(view: ActiveTradeView): Promise<SupervisionResult> {
    const { store, exchange, config } = this.params;
    const tradeId = view.trade.id;
    if (view.active.frozen) {
      return { tradeId, kind: 'skipped', reason: 'frozen' };
    }
    if (!store.acquireLock(tradeId, this.owner, this.params.lockTtlMs)) {
      return { tradeId, kind: 'skipped', reason: 'locked' };
    }
    try {
      // Re-read under the lock; the view may predate another worker's write.
      const trade = store.requireTrade(tradeId);
      const observation = await observeVenue(exchange, trade);
      const now = this.clock();
      const submittedAt = Date.parse(trade.orderSubmittedAt ?? trade.createdAt);
      let decision = decideReconciliation({
        local: trade.status,
        venue: observation.state,
        pendingAgeMs: Number.isFinite(submittedAt) ? now - submittedAt : 0,
        pendingFillWindowMs: config.pendingFillWindowMs,
      });
      if (decision.kind !== 'drift' && this.pastExpiryGrace(trade, observation, now)) {
        decision = { kind: 'expire', reason: 'expiry_unacknowledged' };
      }

      const next = await this.apply(trade, observation, decision, view.active.driftCount, now);
      if (next.status !== trade.status) {
        this.emit('transition', next);
      }
      return { tradeId, kind: 'reconciled', venue: observation.state, decision, trade: next };
    } finally {
      store.releaseLock(tradeId, this.owner);
    }
  }

  private pastExpiryGrace(trade: Trade, observation: VenueObservation, now: number): boolean {
    if (trade.status !== 'pending' && trade.status !== 'active') return false;
    if (observation.settlementResult || observation.state === 'position_closed') return false;
    const closeMs = this.closeTimeMs(trade, observation.market);
    return closeMs != null && now - closeMs > this.params.config.expiryGraceMs;
  }

  private closeTimeMs(trade: Trade, market: MarketQuote | null): number | null {
    const fromTrade = trade.marketCloseTime ? Date.parse(trade.marketCloseTime) : Number.NaN;
    if (Number.isFinite(fromTrade)) return fromTrade;
    return market && market.closeTime > 0 ? market.closeTime : null;
  }

  private async apply(
    trade: Trade,
    observation: VenueObservation,
    decision: ReconcileDecision,
    driftCount: number,
    now: number
  ): Promise<Trade> {
    const { store, executor } = this.params;
    if (decision.kind !== 'drift' && driftCount > 0) {
      store.clearDrift(trade.id);
    }

    switch (decision.kind) {
      case 'drift':
        return this.recordDisagreement(trade, observation.state);
      case 'promote':
        this.logger.info(`Trade ${trade.id} filled at venue; promoting`);
        return executor.applyEntryFills(trade.id, observation.entryFills, observation.entryOrder ?? undefined);
      case 'fail':
        store.recordOrderOutcome(trade.id, 'cancelled');
        return this.transitionSafely(trade, () =>
          store.transition(trade.id, 'pending', { to: 'error', reason: decision.reason })
        );
      case 'cancel_stale':
        this.logger.warn(`Trade ${trade.id} unfilled past ${this.params.config.pendingFillWindowMs}ms; cancelling`);
        return (await executor.cancel(trade.id)).trade;
      case 'expire':
        if (trade.status !== 'pending' && trade.status !== 'active') return trade;
        return this.transitionSafely(trade, () =>
          store.transition(trade.id, trade.status, { to: 'expired', reason: decision.reason })
        );
      case 'settle':
        return this.settle(trade, observation);
      case 'close_from_fill':
        return executor.completeClose(trade, observation.closeFills);
      case 'in_sync':
        if (trade.status === 'active') {
          return this.checkTriggers(trade, observation.market, now);
        }
        if (trade.status === 'closing' && trade.closeReason !== 'expiry' && observation.closeOrder?.status !== 'resting') {
          return executor.placeExitOrder(trade);
        }
        return trade;
    }
  }

  private settle(trade: Trade, observation: VenueObservation): Trade {
    const result = observation.settlementResult;
    if (!result) return trade;
    const exitPrice = settlementExitPrice(trade.side, result);
    const pnl = computePnl({
      entryPrice: trade.entryPrice,
      exitPrice,
      positionSize: trade.positionSize,
      fees: trade.fees,
    });
    const closed = this.transitionSafely(trade, () =>
      this.params.store.transition(trade.id, 'closing', {
        to: 'closed',
        exitPrice,
        pnl,
        outcome: outcomeForPnl(pnl),
        fees: trade.fees,
      })
    );
    this.logger.info(`Trade ${trade.id} settled ${result} (pnl ${pnl})`);
    return closed;
  }

  private recordDisagreement(trade: Trade, venue: VenueState): Trade {
    const { store, config } = this.params;
    const consecutive = store.recordDrift(trade.id, `${trade.status}:${venue}`);
    this.logger.warn(`Trade ${trade.id} local=${trade.status} venue=${venue} disagree (${consecutive}/${config.driftThreshold})`);
    if (consecutive >= config.driftThreshold) {
      store.freeze(trade.id, {
        localStatus: trade.status,
        venueState: venue,
        consecutive,
        detail: { marketTicker: trade.marketTicker, orderId: trade.orderId },
      });
      const err = new ReconciliationDriftError(trade.id, trade.status, venue, consecutive);
      this.logger.error(`Trade ${trade.id} frozen for review`, err);
      this.emit('drift', err);
    }
    return store.requireTrade(trade.id);
  }

  private async checkTriggers(trade: Trade, market: MarketQuote | null, now: number): Promise<Trade> {
    const { config, signals, executor } = this.params;

    const closeMs = this.closeTimeMs(trade, market);
    if (closeMs != null && (closeMs - now) / 1000 <= config.holdToSettlementTtcSeconds) {
      return this.close(trade, 'expiry', () => executor.closePosition(trade, 'expiry'));
    }

    if (config.autoStop.enabled && signals) {
      const openedAt = trade.openedAt ? Date.parse(trade.openedAt) : Number.NaN;
      const held = Number.isFinite(openedAt) ? (now - openedAt) / 1000 : 0;
      if (held >= config.autoStop.minSecondsSinceEntry) {
        const probability = signals.currentProbabilityBps(trade, market);
        if (probability != null && probability < config.autoStop.thresholdBps) {
          this.logger.warn(`Trade ${trade.id} probability ${probability}bps below stop ${config.autoStop.thresholdBps}bps`);
          return this.close(trade, 'auto_stop', () => executor.closePosition(trade, 'auto_stop'));
        }
      }
    }

    if (config.momentumSpike.enabled && signals) {
      const momentum = signals.currentMomentum();
      const spike = config.momentumSpike.threshold;
      if (momentum != null && ((trade.side === 'no' && momentum >= spike) || (trade.side === 'yes' && momentum <= -spike))) {
        this.logger.warn(`Trade ${trade.id} momentum spike ${momentum.toFixed(3)} against ${trade.side}`);
        return this.close(trade, 'momentum_spike', () => executor.closePosition(trade, 'momentum_spike'));
      }
    }
    return trade;
  }

  private async close(trade: Trade, reason: CloseReason, run: () => Promise<Trade>): Promise<Trade> {
    try {
      return await run();
    } catch (err) {
      if (err instanceof StaleStateError) {
        this.logger.debug(`Trade ${trade.id} moved on before ${reason} close`);
        return this.params.store.requireTrade(trade.id);
      }
      throw err;
    }
  }

  private transitionSafely(trade: Trade, run: () => Trade): Trade {
    try {
      return run();
    } catch (err) {
      if (err instanceof StaleStateError) {
        return this.params.store.requireTrade(trade.id);
      }
      throw err;
    }
  }
}
