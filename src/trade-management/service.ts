import type Database from 'better-sqlite3';

import type { StrikewatchConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import type { ExchangeAdapter, MarketQuote } from '../execution/exchange.js';
import { KalshiPublicMarkets } from '../execution/kalshi/public_markets.js';
import { KalshiExchange } from '../execution/modes/live.js';
import { PaperExchange } from '../execution/modes/paper.js';
import { PriceFeedAdapter } from '../feed/stream.js';
import { TickStore } from '../feed/tick_store.js';
import type { PriceTick } from '../feed/types.js';
import { openDatabase } from '../memory/db.js';
import { MomentumEngine } from '../signals/momentum.js';
import { loadBaseTable, ProbabilityModel } from '../signals/probability.js';
import { TradeStore } from './db.js';
import { AutoEntryEngine } from './entry.js';
import { TradeExecutor } from './executor.js';
import { ActiveTradeSupervisor, type SupervisorSignals } from './supervisor.js';
import type { Trade } from './types.js';

const PRUNE_EVERY_MS = 60_000;

export function createExchange(config: StrikewatchConfig, logger: Logger): ExchangeAdapter & { start?(): void; stop?(): void } {
  if (config.execution.mode === 'live') {
    return new KalshiExchange({ config, logger: logger.child('kalshi') });
  }
  return new PaperExchange({
    startingBalanceCents: config.paper.startingBalanceCents,
    marketSource: config.paper.quotes === 'kalshi' ? new KalshiPublicMarkets(config) : undefined,
  });
}

/**
 * Wires the feed, signal, entry, executor and supervisor workers around one
 * trade store and one exchange adapter.
 */
export class TradeLifecycleService {
  readonly store: TradeStore;
  readonly momentum: MomentumEngine;
  readonly executor: TradeExecutor;
  readonly supervisor: ActiveTradeSupervisor;
  readonly entry: AutoEntryEngine;
  readonly feed: PriceFeedAdapter;
  private tickStore: TickStore;
  private model: ProbabilityModel;
  private exchange: ExchangeAdapter & { start?(): void; stop?(): void };
  private logger: Logger;
  private lastPruneAt = 0;
  private running = false;

  constructor(
    private params: {
      config: StrikewatchConfig;
      logger?: Logger;
      db?: Database.Database;
      exchange?: ExchangeAdapter & { start?(): void; stop?(): void };
      feed?: PriceFeedAdapter;
    }
  ) {
    const { config } = params;
    this.logger = params.logger ?? new Logger(config.logLevel);
    const db = params.db ?? openDatabase(config.storage.dbPath, { busyTimeoutMs: config.storage.busyTimeoutMs });
    this.store = new TradeStore(db);
    this.tickStore = new TickStore(db);
    this.exchange = params.exchange ?? createExchange(config, this.logger);

    this.momentum = new MomentumEngine({
      volatilityWindowSeconds: config.signals.volatilityWindowSeconds,
      volatilityThresholdPct: config.signals.volatilityThresholdPct,
      maxGapSeconds: config.signals.maxGapSeconds,
    });
    this.model = new ProbabilityModel(loadBaseTable(config.signals.baseTablePath), {
      momentumGainBps: config.signals.momentumGainBps,
      momentumFullEffectMinutes: config.signals.momentumFullEffectMinutes,
      volatilityDampening: config.signals.volatilityDampening,
    });

    this.feed =
      params.feed ??
      new PriceFeedAdapter(
        {
          url: config.feed.wsUrl,
          productId: config.feed.productId,
          staleAfterMs: config.feed.staleAfterMs,
          reorderWindowMs: config.feed.reorderWindowMs,
          reconnectBaseMs: config.feed.reconnectBaseMs,
          maxBackoffMs: config.feed.maxBackoffMs,
          connectTimeoutMs: config.feed.connectTimeoutMs,
        },
        { logger: this.logger.child('feed') }
      );
    this.feed.on('tick', (tick) => this.onTick(tick));

    this.executor = new TradeExecutor({
      store: this.store,
      exchange: this.exchange,
      config: config.execution,
      logger: this.logger.child('executor'),
    });
    this.supervisor = new ActiveTradeSupervisor({
      store: this.store,
      exchange: this.exchange,
      executor: this.executor,
      config: config.supervisor,
      lockTtlMs: config.execution.lockTtlMs,
      signals: this.signals(),
      logger: this.logger.child('supervisor'),
    });
    this.entry = new AutoEntryEngine({
      store: this.store,
      exchange: this.exchange,
      momentum: this.momentum,
      model: this.model,
      feed: this.feed,
      config: config.entry,
      seriesTicker: config.kalshi.seriesTicker,
      onIntent: (trade: Trade) => this.executor.enqueue(trade.id),
      logger: this.logger.child('entry'),
    });
  }

  /** Model inputs for the supervisor's stop triggers. */
  private signals(): SupervisorSignals {
    return {
      currentMomentum: () => {
        const result = this.momentum.current();
        return result.kind === 'ready' ? result.sample.momentum : null;
      },
      currentProbabilityBps: (trade: Trade, market: MarketQuote | null) => {
        const result = this.momentum.current();
        const spot = this.momentum.latestPrice();
        if (result.kind !== 'ready' || spot == null) return null;
        const closeMs = trade.marketCloseTime ? Date.parse(trade.marketCloseTime) : market?.closeTime ?? Number.NaN;
        if (!Number.isFinite(closeMs)) return null;
        return this.model.estimate({
          spot,
          strike: trade.strike,
          side: trade.side,
          ttcSeconds: Math.max(0, (closeMs - Date.now()) / 1000),
          momentum: result.sample.momentum,
          volatile: this.momentum.isVolatile(),
        }).adjustedBps;
      },
    };
  }

  private onTick(tick: PriceTick): void {
    this.momentum.addTick(tick);
    try {
      this.tickStore.append(tick);
      if (tick.timestamp - this.lastPruneAt >= PRUNE_EVERY_MS) {
        this.lastPruneAt = tick.timestamp;
        this.tickStore.prune(tick.timestamp - this.params.config.storage.tickRetentionMinutes * 60_000);
      }
    } catch (err) {
      this.logger.error('Failed to persist price tick', err);
    }
  }

  warmUp(nowMs = Date.now()): number {
    const ticks = this.tickStore.loadSince(nowMs - this.params.config.storage.tickRetentionMinutes * 60_000);
    this.momentum.warmUp(ticks);
    return ticks.length;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    const warmed = this.warmUp();
    this.logger.info(`Starting (${this.params.config.execution.mode} mode, ${warmed} ticks restored)`);
    this.exchange.start?.();
    this.feed.start();
    this.executor.start();
    this.supervisor.start();
    this.entry.start();
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.entry.stop();
    await this.supervisor.stop();
    await this.executor.stop();
    this.feed.stop();
    this.exchange.stop?.();
    this.logger.info('Stopped');
  }
}
