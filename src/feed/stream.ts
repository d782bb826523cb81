import { EventEmitter } from 'eventemitter3';

import { FeedStaleError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { backoffDelay } from '../core/retry.js';
import { openWebSocket, type SocketConnection, type SocketFactory } from '../core/ws.js';
import type { FeedEvents, FeedOptions, PriceTick } from './types.js';

function toFiniteNumber(value: unknown): number | null {
  if (typeof value !== 'number' && typeof value !== 'string') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * Accepts the Coinbase `ticker` channel shape and a generic `{timestamp, price}`
 * shape. Anything else (heartbeats, subscriptions acks, other products) is null.
 */
export function parseTickerMessage(
  message: string,
  options?: { productId?: string; receivedAt?: number }
): PriceTick | null {
  let data: unknown;
  try {
    data = JSON.parse(message);
  } catch {
    return null;
  }
  if (!data || typeof data !== 'object' || Array.isArray(data)) {
    return null;
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(data));

  if (record.type === 'ticker') {
    if (options?.productId && record.product_id !== options.productId) {
      return null;
    }
    const price = toFiniteNumber(record.price);
    if (price == null || price <= 0) return null;
    const parsedTime = typeof record.time === 'string' ? Date.parse(record.time) : Number.NaN;
    const timestamp = Number.isFinite(parsedTime) ? parsedTime : options?.receivedAt;
    return timestamp == null ? null : { timestamp, price };
  }

  if ('timestamp' in record && 'price' in record) {
    const timestamp = toFiniteNumber(record.timestamp);
    const price = toFiniteNumber(record.price);
    if (timestamp == null || price == null || price <= 0) return null;
    return { timestamp, price };
  }

  return null;
}

export class PriceFeedAdapter extends EventEmitter<FeedEvents> {
  private connection: SocketConnection | null = null;
  private connectImpl: SocketFactory;
  private clock: () => number;
  private logger: Logger;

  private stopped = true;
  private startedAt: number | null = null;
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private staleTimer: NodeJS.Timeout | null = null;
  private flushTimer: NodeJS.Timeout | null = null;

  private buffer: PriceTick[] = [];
  private lastEmittedAt: number | null = null;
  private lastReceivedAt: number | null = null;
  private stale = false;
  private dropped = 0;

  constructor(
    private options: FeedOptions,
    deps?: { logger?: Logger; connect?: SocketFactory; clock?: () => number }
  ) {
    super();
    this.logger = deps?.logger ?? new Logger('info');
    this.connectImpl = deps?.connect ?? openWebSocket;
    this.clock = deps?.clock ?? Date.now;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.startedAt = this.clock();
    this.connect();
    const checkEvery = Math.max(100, Math.min(1000, Math.floor(this.options.staleAfterMs / 2)));
    this.staleTimer = setInterval(() => this.checkStaleness(), checkEvery);
  }

  stop(): void {
    this.stopped = true;
    for (const timer of [this.reconnectTimer, this.flushTimer]) {
      if (timer) clearTimeout(timer);
    }
    if (this.staleTimer) clearInterval(this.staleTimer);
    this.reconnectTimer = null;
    this.flushTimer = null;
    this.staleTimer = null;
    this.buffer = [];
    if (this.connection) {
      this.connection.close();
      this.connection = null;
    }
  }

  /** Accepts a tick from the socket (or a test) into the reorder buffer. */
  ingest(tick: PriceTick): void {
    this.lastReceivedAt = this.clock();
    this.reconnectAttempts = 0;
    if (this.stale) {
      this.stale = false;
      this.emit('fresh');
    }

    if (this.lastEmittedAt != null && tick.timestamp < this.lastEmittedAt) {
      this.dropped += 1;
      return;
    }
    if (this.options.reorderWindowMs <= 0) {
      this.emitTick(tick);
      return;
    }
    this.buffer.push(tick);
    if (!this.flushTimer) {
      this.flushTimer = setTimeout(() => {
        this.flushTimer = null;
        this.flush();
      }, this.options.reorderWindowMs);
    }
  }

  flush(): void {
    const pending = this.buffer.sort((a, b) => a.timestamp - b.timestamp);
    this.buffer = [];
    for (const tick of pending) {
      if (this.lastEmittedAt != null && tick.timestamp < this.lastEmittedAt) {
        this.dropped += 1;
        continue;
      }
      this.emitTick(tick);
    }
  }

  checkStaleness(nowMs = this.clock()): boolean {
    if (this.stale) return true;
    const reference = this.lastReceivedAt ?? this.startedAt;
    if (reference == null || nowMs - reference <= this.options.staleAfterMs) {
      return false;
    }
    this.stale = true;
    this.logger.warn(`Price feed stale (no tick for ${nowMs - reference}ms)`);
    this.emit('stale', this.lastReceivedAt);
    return true;
  }

  assertFresh(nowMs = this.clock()): void {
    if (this.lastReceivedAt == null || nowMs - this.lastReceivedAt > this.options.staleAfterMs) {
      throw new FeedStaleError(this.lastReceivedAt, this.options.staleAfterMs);
    }
  }

  isStale(): boolean {
    return this.stale;
  }

  getLastTickAt(): number | null {
    return this.lastReceivedAt;
  }

  getDroppedCount(): number {
    return this.dropped;
  }

  nextReconnectDelayMs(): number {
    return backoffDelay(this.reconnectAttempts, this.options.reconnectBaseMs, this.options.maxBackoffMs);
  }

  private emitTick(tick: PriceTick): void {
    this.lastEmittedAt = tick.timestamp;
    this.emit('tick', tick);
  }

  private connect(): void {
    if (this.stopped) return;
    this.connection = this.connectImpl(
      this.options.url,
      {
        onOpen: () => {
          this.connection?.send(
            JSON.stringify({
              type: 'subscribe',
              product_ids: [this.options.productId],
              channels: ['ticker'],
            })
          );
          this.logger.info(`Price feed connected (${this.options.productId})`);
          this.emit('connected');
        },
        onMessage: (text) => {
          const tick = parseTickerMessage(text, {
            productId: this.options.productId,
            receivedAt: this.clock(),
          });
          if (tick) {
            this.ingest(tick);
          }
        },
        onClose: (code) => {
          this.connection = null;
          this.emit('disconnected');
          if (!this.stopped) {
            this.logger.warn(`Price feed closed (code ${code})`);
            this.scheduleReconnect();
          }
        },
        onError: (err) => {
          this.logger.error('Price feed error', err);
          this.emit('error', err);
        },
      },
      { handshakeTimeoutMs: this.options.connectTimeoutMs }
    );
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;
    const delay = this.nextReconnectDelayMs();
    this.reconnectAttempts += 1;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }
}
