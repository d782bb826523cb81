import type Database from 'better-sqlite3';

import { parseConfig, type StrikewatchConfig } from '../src/core/config.js';
import { Logger } from '../src/core/logger.js';
import type { MarketQuote } from '../src/execution/exchange.js';
import { PaperExchange } from '../src/execution/modes/paper.js';
import { openDatabase } from '../src/memory/db.js';
import { TradeStore } from '../src/trade-management/db.js';
import { TradeExecutor } from '../src/trade-management/executor.js';
import type { NewTradeInput } from '../src/trade-management/types.js';

export const EVENT_TICKER = 'KXBTCD-26OCT1917';
export const MARKET_TICKER = 'KXBTCD-26OCT1917-T67000.00';
export const SETTLEMENT_MS = Date.parse('2026-10-19T21:00:00.000Z');

export const quietLogger = new Logger('error');

export function testConfig(raw: Record<string, unknown> = {}): StrikewatchConfig {
  return parseConfig({ storage: { dbPath: ':memory:' }, ...raw });
}

export function openQuote(overrides: Partial<MarketQuote> = {}): MarketQuote {
  return {
    marketTicker: MARKET_TICKER,
    eventTicker: EVENT_TICKER,
    strike: 67000,
    status: 'open',
    closeTime: SETTLEMENT_MS,
    yesBidCents: 88,
    yesAskCents: 90,
    noBidCents: 9,
    noAskCents: 11,
    result: null,
    ...overrides,
  };
}

export function tradeInput(overrides: Partial<NewTradeInput> = {}): NewTradeInput {
  return {
    eventTicker: EVENT_TICKER,
    marketTicker: MARKET_TICKER,
    strike: 67000,
    side: 'yes',
    entryPrice: 0.9,
    positionSize: 1,
    probabilityAtEntry: 9700,
    momentumAtEntry: 0.02,
    venueImpliedAtEntry: 9000,
    marketCloseTime: new Date(SETTLEMENT_MS).toISOString(),
    ...overrides,
  };
}

/** A mutable clock shared by the store, venue and workers under test. */
export class TestClock {
  constructor(public now: number) {}

  readonly read = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

export interface Harness {
  db: Database.Database;
  clock: TestClock;
  store: TradeStore;
  paper: PaperExchange;
  executor: TradeExecutor;
  config: StrikewatchConfig;
  sleeps: number[];
}

/**
 * In-memory store, paper venue and executor on one fake clock. Sleeping
 * advances the clock instead of waiting.
 */
export interface HarnessOptions {
  startMs?: number;
  config?: Record<string, unknown>;
  /** Replaces the default paper venue. */
  venue?: (clock: () => number) => PaperExchange;
  /** Runs after each executor sleep has advanced the clock. */
  onSleep?: (ms: number, index: number) => Promise<void> | void;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const clock = new TestClock(options.startMs ?? Date.parse('2026-10-19T20:30:00.000Z'));
  const config = testConfig(options.config);
  const db = openDatabase(':memory:');
  const store = new TradeStore(db, { clock: clock.read });
  const paper = options.venue ? options.venue(clock.read) : new PaperExchange({ clock: clock.read });
  paper.setMarket(openQuote());
  const sleeps: number[] = [];
  const executor = new TradeExecutor({
    store,
    exchange: paper,
    config: config.execution,
    logger: quietLogger,
    owner: 'executor-test',
    clock: clock.read,
    sleepFn: async (ms) => {
      sleeps.push(ms);
      clock.advance(ms);
      await options.onSleep?.(ms, sleeps.length - 1);
    },
  });
  return { db, clock, store, paper, executor, config, sleeps };
}
