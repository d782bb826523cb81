import { describe, it, expect, vi, afterEach } from 'vitest';

import { FeedStaleError } from '../../src/core/errors.js';
import type { SocketConnection, SocketHandlers } from '../../src/core/ws.js';
import { PriceFeedAdapter, parseTickerMessage } from '../../src/feed/stream.js';
import type { FeedOptions, PriceTick } from '../../src/feed/types.js';
import { TickStore } from '../../src/feed/tick_store.js';
import { openDatabase } from '../../src/memory/db.js';
import { quietLogger } from '../fixtures.js';

const options: FeedOptions = {
  url: 'wss://feed.test',
  productId: 'BTC-USD',
  staleAfterMs: 5000,
  reorderWindowMs: 250,
  reconnectBaseMs: 500,
  maxBackoffMs: 30_000,
  connectTimeoutMs: 1000,
};

describe('parseTickerMessage', () => {
  it('reads the ticker channel', () => {
    const message = JSON.stringify({
      type: 'ticker',
      product_id: 'BTC-USD',
      price: '67000.50',
      time: '2026-10-19T20:30:00.000Z',
    });
    expect(parseTickerMessage(message, { productId: 'BTC-USD' })).toEqual({
      timestamp: Date.parse('2026-10-19T20:30:00.000Z'),
      price: 67000.5,
    });
  });

  it('falls back to the receive time when the message has none', () => {
    const message = JSON.stringify({ type: 'ticker', product_id: 'BTC-USD', price: '1' });
    expect(parseTickerMessage(message, { receivedAt: 42 })).toEqual({ timestamp: 42, price: 1 });
  });

  it('reads the generic shape', () => {
    expect(parseTickerMessage('{"timestamp":1000,"price":5}')).toEqual({ timestamp: 1000, price: 5 });
  });

  it('ignores other products, heartbeats and garbage', () => {
    const eth = JSON.stringify({ type: 'ticker', product_id: 'ETH-USD', price: '1', time: '2026-10-19T20:30:00Z' });
    expect(parseTickerMessage(eth, { productId: 'BTC-USD' })).toBeNull();
    expect(parseTickerMessage('{"type":"heartbeat"}')).toBeNull();
    expect(parseTickerMessage('not json')).toBeNull();
    expect(parseTickerMessage('{"timestamp":1,"price":-3}')).toBeNull();
  });
});

describe('PriceFeedAdapter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('emits buffered ticks in timestamp order and drops older ones', async () => {
    vi.useFakeTimers();
    const feed = new PriceFeedAdapter(options, { logger: quietLogger });
    const seen: number[] = [];
    feed.on('tick', (tick) => seen.push(tick.timestamp));

    feed.ingest({ timestamp: 3000, price: 3 });
    feed.ingest({ timestamp: 1000, price: 1 });
    feed.ingest({ timestamp: 2000, price: 2 });
    expect(seen).toEqual([]);

    await vi.advanceTimersByTimeAsync(250);
    expect(seen).toEqual([1000, 2000, 3000]);

    feed.ingest({ timestamp: 1500, price: 1.5 });
    await vi.advanceTimersByTimeAsync(250);
    expect(seen).toEqual([1000, 2000, 3000]);
    expect(feed.getDroppedCount()).toBe(1);
  });

  it('emits immediately without a reorder window', () => {
    const feed = new PriceFeedAdapter({ ...options, reorderWindowMs: 0 }, { logger: quietLogger });
    const seen: PriceTick[] = [];
    feed.on('tick', (tick) => seen.push(tick));
    feed.ingest({ timestamp: 10, price: 1 });
    expect(seen).toEqual([{ timestamp: 10, price: 1 }]);
  });

  it('goes stale without ticks and recovers on the next one', () => {
    let now = 0;
    const feed = new PriceFeedAdapter({ ...options, reorderWindowMs: 0 }, { logger: quietLogger, clock: () => now });
    const events: string[] = [];
    feed.on('stale', () => events.push('stale'));
    feed.on('fresh', () => events.push('fresh'));

    expect(() => feed.assertFresh()).toThrow(FeedStaleError);
    feed.ingest({ timestamp: 0, price: 1 });
    now = 5000;
    expect(() => feed.assertFresh()).not.toThrow();
    expect(feed.checkStaleness()).toBe(false);

    now = 5001;
    expect(() => feed.assertFresh()).toThrow(FeedStaleError);
    expect(feed.checkStaleness()).toBe(true);
    expect(feed.checkStaleness()).toBe(true);
    expect(feed.isStale()).toBe(true);

    feed.ingest({ timestamp: 5001, price: 1 });
    expect(feed.isStale()).toBe(false);
    expect(events).toEqual(['stale', 'fresh']);
  });

  it('subscribes on open and reconnects with backoff', async () => {
    vi.useFakeTimers();
    const sent: string[] = [];
    const handlers: SocketHandlers[] = [];
    const connect = vi.fn((_url: string, h: SocketHandlers): SocketConnection => {
      handlers.push(h);
      return { send: (data) => sent.push(data), ping: () => {}, close: () => {}, isOpen: () => true };
    });
    const feed = new PriceFeedAdapter(options, { logger: quietLogger, connect });
    const ticks: PriceTick[] = [];
    feed.on('tick', (tick) => ticks.push(tick));

    feed.start();
    handlers[0]?.onOpen();
    expect(JSON.parse(sent[0] ?? '{}')).toEqual({ type: 'subscribe', product_ids: ['BTC-USD'], channels: ['ticker'] });

    handlers[0]?.onClose(1006);
    await vi.advanceTimersByTimeAsync(499);
    expect(connect).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(connect).toHaveBeenCalledTimes(2);

    handlers[1]?.onClose(1006);
    await vi.advanceTimersByTimeAsync(999);
    expect(connect).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(connect).toHaveBeenCalledTimes(3);

    handlers[2]?.onMessage(JSON.stringify({ timestamp: Date.now(), price: 67000 }));
    expect(feed.nextReconnectDelayMs()).toBe(500);
    await vi.advanceTimersByTimeAsync(250);
    expect(ticks.map((t) => t.price)).toEqual([67000]);

    feed.stop();
  });
});

describe('TickStore', () => {
  it('loads ticks since a cutoff and prunes old ones', () => {
    const store = new TickStore(openDatabase(':memory:'));
    store.append({ timestamp: 1000, price: 1 });
    store.append({ timestamp: 2000, price: 2 });
    store.append({ timestamp: 3000, price: 3 });

    expect(store.loadSince(2000)).toEqual([
      { timestamp: 2000, price: 2 },
      { timestamp: 3000, price: 3 },
    ]);
    store.prune(3000);
    expect(store.loadSince(0)).toEqual([{ timestamp: 3000, price: 3 }]);
  });
});
