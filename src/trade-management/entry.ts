import type { StrikewatchConfig } from '../core/config.js';
import { DuplicateTradeError, FeedStaleError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { PollLoop } from '../core/loop.js';
import { eventTickerFor, nextSettlementMs, ttcSeconds } from '../core/time.js';
import type { ExchangeAdapter, MarketQuote } from '../execution/exchange.js';
import { askCentsFor } from '../execution/exchange.js';
import type { MomentumEngine } from '../signals/momentum.js';
import {
  ENTRY_PROBABILITY_THRESHOLD_BPS,
  type ProbabilityModel,
  venueImpliedBps,
} from '../signals/probability.js';
import type { TradeStore } from './db.js';
import type { Trade, TradeSide } from './types.js';

export interface FreshnessSource {
  assertFresh(): void;
}

export type EntryCheck =
  | { enter: true; adjustedBps: number; venueImpliedBps: number }
  | { enter: false; reason: 'no_ask' | 'ask_too_high' | 'below_threshold' | 'no_edge' };

/**
 * Entry rule: the adjusted probability clears the fixed threshold and beats
 * the venue-implied probability by at least the margin.
 */
export function checkEntry(input: {
  adjustedBps: number;
  askCents: number | null;
  marginBps: number;
  maxEntryPriceCents: number;
}): EntryCheck {
  if (input.askCents == null || input.askCents <= 0) return { enter: false, reason: 'no_ask' };
  if (input.askCents > input.maxEntryPriceCents) return { enter: false, reason: 'ask_too_high' };
  if (input.adjustedBps < ENTRY_PROBABILITY_THRESHOLD_BPS) return { enter: false, reason: 'below_threshold' };
  const implied = venueImpliedBps(input.askCents);
  if (input.adjustedBps < implied + input.marginBps) return { enter: false, reason: 'no_edge' };
  return { enter: true, adjustedBps: input.adjustedBps, venueImpliedBps: implied };
}

export type EntryCycleResult =
  | { kind: 'disabled' }
  | { kind: 'stale' }
  | { kind: 'insufficient'; haveSeconds: number }
  | { kind: 'outside_window'; ttcSeconds: number }
  | { kind: 'evaluated'; eventTicker: string; candidates: number; intents: Trade[] };

const SIDES: TradeSide[] = ['yes', 'no'];

export class AutoEntryEngine {
  private loop: PollLoop;
  private logger: Logger;
  private clock: () => number;
  private staleLogged = false;

  constructor(
    private params: {
      store: TradeStore;
      exchange: ExchangeAdapter;
      momentum: MomentumEngine;
      model: ProbabilityModel;
      feed: FreshnessSource;
      config: StrikewatchConfig['entry'];
      seriesTicker: string;
      onIntent?: (trade: Trade) => void;
      logger?: Logger;
      clock?: () => number;
    }
  ) {
    this.logger = params.logger ?? new Logger('info');
    this.clock = params.clock ?? Date.now;
    this.loop = new PollLoop({
      name: 'auto-entry',
      tick: async () => {
        await this.evaluate();
      },
      nextDelayMs: () => params.config.intervalMs,
      logger: this.logger,
    });
  }

  start(): void {
    if (!this.params.config.enabled) {
      this.logger.info('Auto entry disabled');
      return;
    }
    this.loop.start();
  }

  async stop(): Promise<void> {
    await this.loop.stop();
  }

  async evaluate(): Promise<EntryCycleResult> {
    const { config, momentum, exchange } = this.params;
    if (!config.enabled) return { kind: 'disabled' };

    try {
      this.params.feed.assertFresh();
      this.staleLogged = false;
    } catch (err) {
      if (err instanceof FeedStaleError) {
        if (!this.staleLogged) {
          this.logger.warn('Entry suppressed: price feed stale', err);
          this.staleLogged = true;
        }
        return { kind: 'stale' };
      }
      throw err;
    }

    const result = momentum.current();
    if (result.kind === 'insufficient') {
      return { kind: 'insufficient', haveSeconds: result.haveSeconds };
    }
    const spot = momentum.latestPrice();
    if (spot == null) {
      return { kind: 'insufficient', haveSeconds: 0 };
    }

    const now = this.clock();
    const settlement = nextSettlementMs(now);
    const ttc = ttcSeconds(settlement, now);
    if (ttc < config.minTtcSeconds || ttc > config.maxTtcSeconds) {
      return { kind: 'outside_window', ttcSeconds: ttc };
    }

    const eventTicker = eventTickerFor(this.params.seriesTicker, settlement);
    const markets = await exchange.getEventMarkets(eventTicker);
    const volatile = momentum.isVolatile();
    const candidates = markets.filter(
      (m) => m.status === 'open' && (Math.abs(m.strike - spot) / spot) * 100 <= config.maxStrikeDistancePct
    );

    const intents: Trade[] = [];
    for (const quote of candidates) {
      for (const side of SIDES) {
        const trade = this.considerSide(quote, side, {
          spot,
          momentum: result.sample.momentum,
          volatile,
          now,
          settlement,
        });
        if (trade) intents.push(trade);
      }
    }
    return { kind: 'evaluated', eventTicker, candidates: candidates.length, intents };
  }

  private considerSide(
    quote: MarketQuote,
    side: TradeSide,
    ctx: { spot: number; momentum: number; volatile: boolean; now: number; settlement: number }
  ): Trade | null {
    const { store, model, config } = this.params;
    const askCents = askCentsFor(quote, side);
    if (askCents == null) return null;

    const closeTime = quote.closeTime > 0 ? quote.closeTime : ctx.settlement;
    const estimate = model.estimate({
      spot: ctx.spot,
      strike: quote.strike,
      side,
      ttcSeconds: ttcSeconds(closeTime, ctx.now),
      momentum: ctx.momentum,
      volatile: ctx.volatile,
    });
    const check = checkEntry({
      adjustedBps: estimate.adjustedBps,
      askCents,
      marginBps: config.marginBps,
      maxEntryPriceCents: config.maxEntryPriceCents,
    });
    if (!check.enter) return null;

    const key = { eventTicker: quote.eventTicker, strike: quote.strike, side };
    if (store.findOpenTrade(key)) return null;

    try {
      const trade = store.createPendingTrade(
        {
          ...key,
          marketTicker: quote.marketTicker,
          entryPrice: askCents / 100,
          positionSize: config.positionSize,
          probabilityAtEntry: check.adjustedBps,
          momentumAtEntry: ctx.momentum,
          venueImpliedAtEntry: check.venueImpliedBps,
          marketCloseTime: new Date(closeTime).toISOString(),
        },
        { baseBps: estimate.baseBps, shiftBps: estimate.shiftBps, volatile: ctx.volatile, spot: ctx.spot }
      );
      this.logger.info(
        `Entry intent ${trade.id}: ${quote.marketTicker} ${side} @${askCents}c p=${check.adjustedBps}bps implied=${check.venueImpliedBps}bps`
      );
      this.params.onIntent?.(trade);
      return trade;
    } catch (err) {
      if (err instanceof DuplicateTradeError) {
        this.logger.info(`Entry for ${quote.marketTicker} ${side} lost to an existing trade`);
        return null;
      }
      throw err;
    }
  }
}
