import { EventEmitter } from 'eventemitter3';
import { z } from 'zod';

import { KALSHI_WS_URLS, type StrikewatchConfig } from '../../core/config.js';
import { Logger } from '../../core/logger.js';
import { backoffDelay } from '../../core/retry.js';
import { openWebSocket, type SocketConnection, type SocketFactory } from '../../core/ws.js';
import { tradingFeeCents } from '../../trade-management/pnl.js';
import type { VenueFill, VenuePosition } from '../exchange.js';
import type { KalshiSigner } from './signer.js';

export type KalshiChannel = 'fill' | 'market_positions' | 'ticker';

export interface TickerUpdate {
  marketTicker: string;
  yesBidCents: number | null;
  yesAskCents: number | null;
  ts: number;
}

export interface KalshiStreamEvents {
  fill: (fill: VenueFill) => void;
  position: (position: VenuePosition) => void;
  ticker: (update: TickerUpdate) => void;
  connected: () => void;
  disconnected: () => void;
  error: (err: Error) => void;
}

const FillMessage = z.object({
  type: z.literal('fill'),
  msg: z.object({
    trade_id: z.string(),
    order_id: z.string(),
    market_ticker: z.string(),
    side: z.enum(['yes', 'no']),
    action: z.enum(['buy', 'sell']),
    count: z.number().int(),
    yes_price: z.number().int(),
    no_price: z.number().int().optional(),
    ts: z.number().optional(),
  }),
});

const PositionMessage = z.object({
  type: z.literal('market_position'),
  msg: z.object({ market_ticker: z.string(), position: z.number().int() }),
});

const TickerMessage = z.object({
  type: z.literal('ticker'),
  msg: z.object({
    market_ticker: z.string(),
    yes_bid: z.number().int().nullish(),
    yes_ask: z.number().int().nullish(),
    ts: z.number().optional(),
  }),
});

export type KalshiStreamMessage =
  | { type: 'fill'; fill: VenueFill }
  | { type: 'position'; position: VenuePosition }
  | { type: 'ticker'; update: TickerUpdate };

export function parseKalshiMessage(text: string, receivedAt = Date.now()): KalshiStreamMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }

  const fill = FillMessage.safeParse(data);
  if (fill.success) {
    const m = fill.data.msg;
    const priceCents = m.side === 'yes' ? m.yes_price : m.no_price ?? 100 - m.yes_price;
    return {
      type: 'fill',
      fill: {
        fillId: m.trade_id,
        orderId: m.order_id,
        marketTicker: m.market_ticker,
        side: m.side,
        action: m.action,
        count: m.count,
        priceCents,
        feeCents: tradingFeeCents(m.count, priceCents),
        createdAt: m.ts != null ? m.ts * 1000 : receivedAt,
      },
    };
  }

  const position = PositionMessage.safeParse(data);
  if (position.success) {
    return {
      type: 'position',
      position: { marketTicker: position.data.msg.market_ticker, position: position.data.msg.position },
    };
  }

  const ticker = TickerMessage.safeParse(data);
  if (ticker.success) {
    const m = ticker.data.msg;
    return {
      type: 'ticker',
      update: {
        marketTicker: m.market_ticker,
        yesBidCents: m.yes_bid ?? null,
        yesAskCents: m.yes_ask ?? null,
        ts: m.ts != null ? m.ts * 1000 : receivedAt,
      },
    };
  }
  return null;
}

/**
 * Authenticated Kalshi WebSocket. Re-subscribes every channel after a
 * reconnect and pings on the heartbeat interval.
 */
export class KalshiStreamClient extends EventEmitter<KalshiStreamEvents> {
  private connection: SocketConnection | null = null;
  private url: string;
  private channels = new Set<KalshiChannel>();
  private marketTickers = new Set<string>();
  private commandId = 0;
  private attempts = 0;
  private stopped = true;
  private heartbeat: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private logger: Logger;
  private connectImpl: SocketFactory;

  constructor(
    private config: StrikewatchConfig,
    private signer: KalshiSigner,
    deps?: { logger?: Logger; connect?: SocketFactory }
  ) {
    super();
    this.url = config.kalshi.wsUrl ?? KALSHI_WS_URLS[config.kalshi.environment];
    this.logger = deps?.logger ?? new Logger('info');
    this.connectImpl = deps?.connect ?? openWebSocket;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.connect();
  }

  stop(): void {
    this.stopped = true;
    if (this.heartbeat) clearInterval(this.heartbeat);
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.heartbeat = null;
    this.reconnectTimer = null;
    this.connection?.close();
    this.connection = null;
  }

  subscribe(channels: KalshiChannel[], marketTickers: string[] = []): void {
    for (const c of channels) this.channels.add(c);
    for (const t of marketTickers) this.marketTickers.add(t);
    this.sendSubscribe(channels, marketTickers);
  }

  private sendSubscribe(channels: KalshiChannel[], marketTickers: string[]): void {
    if (!this.connection?.isOpen() || channels.length === 0) return;
    this.commandId += 1;
    this.connection.send(
      JSON.stringify({
        id: this.commandId,
        cmd: 'subscribe',
        params: marketTickers.length > 0 ? { channels, market_tickers: marketTickers } : { channels },
      })
    );
  }

  private connect(): void {
    if (this.stopped) return;
    const path = new URL(this.url).pathname;
    this.connection = this.connectImpl(
      this.url,
      {
        onOpen: () => {
          this.attempts = 0;
          this.emit('connected');
          this.sendSubscribe([...this.channels], [...this.marketTickers]);
          this.startHeartbeat();
        },
        onMessage: (text) => {
          const message = parseKalshiMessage(text);
          if (!message) return;
          switch (message.type) {
            case 'fill':
              this.emit('fill', message.fill);
              break;
            case 'position':
              this.emit('position', message.position);
              break;
            case 'ticker':
              this.emit('ticker', message.update);
              break;
          }
        },
        onClose: (code) => {
          this.connection = null;
          if (this.heartbeat) clearInterval(this.heartbeat);
          this.heartbeat = null;
          this.emit('disconnected');
          if (!this.stopped) {
            const delay = backoffDelay(this.attempts, this.config.kalshi.reconnectBaseMs, this.config.kalshi.maxBackoffMs);
            this.attempts += 1;
            this.logger.warn(`Kalshi stream closed (code ${code}); reconnecting in ${delay}ms`);
            this.reconnectTimer = setTimeout(() => {
              this.reconnectTimer = null;
              this.connect();
            }, delay);
          }
        },
        onError: (err) => {
          this.logger.error('Kalshi stream error', err);
          this.emit('error', err);
        },
      },
      { headers: this.signer.headers('GET', path), handshakeTimeoutMs: this.config.kalshi.requestTimeoutMs }
    );
  }

  private startHeartbeat(): void {
    if (this.heartbeat) clearInterval(this.heartbeat);
    this.heartbeat = setInterval(() => this.connection?.ping(), this.config.kalshi.heartbeatSeconds * 1000);
  }
}
