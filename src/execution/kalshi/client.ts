/**
 * Kalshi trade API v2 REST client
 *
 * Signed requests (market data may go unsigned), client-side rate limiting and per-request timeouts. Venue
 * failures are mapped onto the shared error taxonomy: 408/429/5xx and network
 * failures are transient, every other 4xx is a rejection.
 */

import fetch from 'node-fetch';
import { z } from 'zod';

import { KALSHI_BASE_URLS, type StrikewatchConfig } from '../../core/config.js';
import { OrderRejectedError, TimeoutError, TransientExchangeError } from '../../core/errors.js';
import { withTimeout } from '../../core/retry.js';
import {
  KalshiFillSchema,
  KalshiMarketSchema,
  KalshiOrderSchema,
  KalshiPositionSchema,
  KalshiSettlementSchema,
} from './markets.js';
import { TokenBucket } from './rate_limit.js';
import type { KalshiSigner } from './signer.js';

export type KalshiCreateOrderBody = {
  ticker: string;
  client_order_id: string;
  side: 'yes' | 'no';
  action: 'buy' | 'sell';
  count: number;
  type: 'limit';
  yes_price?: number;
  no_price?: number;
  time_in_force: 'fill_or_kill' | 'immediate_or_cancel';
};

const ErrorBodySchema = z.object({
  error: z.object({ code: z.string().optional(), message: z.string().optional() }).optional(),
});

const OrderEnvelope = z.object({ order: KalshiOrderSchema });
const OrdersEnvelope = z.object({ orders: z.array(KalshiOrderSchema).default([]), cursor: z.string().nullish() });
const FillsEnvelope = z.object({ fills: z.array(KalshiFillSchema).default([]), cursor: z.string().nullish() });
const PositionsEnvelope = z.object({
  market_positions: z.array(KalshiPositionSchema).default([]),
  cursor: z.string().nullish(),
});
const SettlementsEnvelope = z.object({
  settlements: z.array(KalshiSettlementSchema).default([]),
  cursor: z.string().nullish(),
});
const MarketEnvelope = z.object({ market: KalshiMarketSchema });
const EventEnvelope = z.object({
  markets: z.array(KalshiMarketSchema).optional(),
  event: z.object({ markets: z.array(KalshiMarketSchema).optional() }).optional(),
});
const BalanceEnvelope = z.object({ balance: z.number() });

export class KalshiApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly venueCode: string | null
  ) {
    super(message);
    this.name = 'KalshiApiError';
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function classifyHttpFailure(status: number, message: string, venueCode: string | null): Error {
  if (isTransientStatus(status)) {
    return new TransientExchangeError(`Kalshi ${status}: ${message}`, status);
  }
  return new OrderRejectedError(`Kalshi ${status}: ${message}`, status, venueCode);
}

type QueryValue = string | number | undefined;

export class KalshiClient {
  private baseUrl: string;
  private basePath: string;
  private bucket: TokenBucket;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(
    config: StrikewatchConfig,
    private signer: KalshiSigner | null,
    deps?: { fetchImpl?: typeof fetch; bucket?: TokenBucket }
  ) {
    this.baseUrl = (config.kalshi.baseUrl ?? KALSHI_BASE_URLS[config.kalshi.environment]).replace(/\/$/, '');
    this.basePath = new URL(this.baseUrl).pathname.replace(/\/$/, '');
    const perMinute = config.kalshi.requestsPerMinute;
    this.bucket = deps?.bucket ?? new TokenBucket(Math.max(1, Math.ceil(perMinute / 6)), perMinute);
    this.timeoutMs = config.kalshi.requestTimeoutMs;
    this.fetchImpl = deps?.fetchImpl ?? fetch;
  }

  // --------------------------------------------------------------------------
  // Orders
  // --------------------------------------------------------------------------

  async createOrder(body: KalshiCreateOrderBody): Promise<z.infer<typeof KalshiOrderSchema>> {
    const data = await this.request('POST', '/portfolio/orders', OrderEnvelope, { body });
    return data.order;
  }

  async cancelOrder(orderId: string): Promise<z.infer<typeof KalshiOrderSchema> | null> {
    const data = await this.requestOrNull('DELETE', `/portfolio/orders/${encodeURIComponent(orderId)}`, OrderEnvelope);
    return data?.order ?? null;
  }

  async getOrder(orderId: string): Promise<z.infer<typeof KalshiOrderSchema> | null> {
    const data = await this.requestOrNull('GET', `/portfolio/orders/${encodeURIComponent(orderId)}`, OrderEnvelope);
    return data?.order ?? null;
  }

  async listOrders(params: { ticker?: string; status?: string }): Promise<Array<z.infer<typeof KalshiOrderSchema>>> {
    const data = await this.request('GET', '/portfolio/orders', OrdersEnvelope, { query: params });
    return data.orders;
  }

  // --------------------------------------------------------------------------
  // Portfolio
  // --------------------------------------------------------------------------

  async getFills(params: { ticker?: string; order_id?: string; limit?: number }): Promise<Array<z.infer<typeof KalshiFillSchema>>> {
    const data = await this.request('GET', '/portfolio/fills', FillsEnvelope, { query: params });
    return data.fills;
  }

  async getPositions(): Promise<Array<z.infer<typeof KalshiPositionSchema>>> {
    const data = await this.request('GET', '/portfolio/positions', PositionsEnvelope, {
      query: { settlement_status: 'unsettled' },
    });
    return data.market_positions;
  }

  async getSettlements(params: { ticker?: string; limit?: number }): Promise<Array<z.infer<typeof KalshiSettlementSchema>>> {
    const data = await this.request('GET', '/portfolio/settlements', SettlementsEnvelope, { query: params });
    return data.settlements;
  }

  async getBalanceCents(): Promise<number> {
    const data = await this.request('GET', '/portfolio/balance', BalanceEnvelope);
    return data.balance;
  }

  // --------------------------------------------------------------------------
  // Markets
  // --------------------------------------------------------------------------

  async getMarket(ticker: string): Promise<z.infer<typeof KalshiMarketSchema> | null> {
    const data = await this.requestOrNull('GET', `/markets/${encodeURIComponent(ticker)}`, MarketEnvelope);
    return data?.market ?? null;
  }

  async getEventMarkets(eventTicker: string): Promise<Array<z.infer<typeof KalshiMarketSchema>>> {
    const data = await this.requestOrNull('GET', `/events/${encodeURIComponent(eventTicker)}`, EventEnvelope, {
      query: { with_nested_markets: 'true' },
    });
    return data?.markets ?? data?.event?.markets ?? [];
  }

  // --------------------------------------------------------------------------
  // Transport
  // --------------------------------------------------------------------------

  private async requestOrNull<T>(
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: { query?: Record<string, QueryValue>; body?: unknown }
  ): Promise<T | null> {
    try {
      return await this.request(method, path, schema, options);
    } catch (err) {
      if (err instanceof OrderRejectedError && err.statusCode === 404) {
        return null;
      }
      throw err;
    }
  }

  private async request<T>(
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: { query?: Record<string, QueryValue>; body?: unknown }
  ): Promise<T> {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(options?.query ?? {})) {
      if (value !== undefined && value !== '') search.set(key, String(value));
    }
    const qs = search.toString();
    const url = `${this.baseUrl}${path}${qs ? `?${qs}` : ''}`;

    await this.bucket.acquire();

    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.signer?.headers(method, `${this.basePath}${path}`),
    };
    if (options?.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const operation = `${method} ${path}`;
    let status: number;
    let text: string;
    try {
      const response = await withTimeout(operation, this.timeoutMs, (signal) =>
        this.fetchImpl(url, {
          method,
          headers,
          body: options?.body === undefined ? undefined : JSON.stringify(options.body),
          signal,
        })
      );
      status = response.status;
      text = await response.text();
    } catch (err) {
      if (err instanceof TimeoutError) throw err;
      throw new TransientExchangeError(
        `${operation} failed: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const payload = parseJson(text);
    if (status < 200 || status >= 300) {
      const errorBody = ErrorBodySchema.safeParse(payload);
      const venueError = errorBody.success ? errorBody.data.error : undefined;
      throw classifyHttpFailure(status, venueError?.message ?? (text || 'request failed'), venueError?.code ?? null);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new KalshiApiError(
        `${operation} returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        status,
        null
      );
    }
    return parsed.data;
  }
}

function parseJson(text: string): unknown {
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}
