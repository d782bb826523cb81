/**
 * Live Kalshi exchange adapter
 *
 * Wraps the signed REST client and (optionally) the authenticated stream
 * behind the ExchangeAdapter interface used by the executor and supervisor.
 */

import type { StrikewatchConfig } from '../../core/config.js';
import { OrderRejectedError } from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import type {
  ExchangeAdapter,
  FillListener,
  MarketQuote,
  OrderRequest,
  VenueFill,
  VenueOrder,
  VenuePosition,
  VenueSettlement,
} from '../exchange.js';
import { KalshiClient, type KalshiCreateOrderBody } from '../kalshi/client.js';
import {
  toMarketQuote,
  toVenueFill,
  toVenueOrder,
  toVenuePosition,
  toVenueSettlement,
} from '../kalshi/markets.js';
import { KalshiSigner } from '../kalshi/signer.js';
import { KalshiStreamClient } from '../kalshi/stream.js';

export interface KalshiExchangeOptions {
  config: StrikewatchConfig;
  client?: KalshiClient;
  stream?: KalshiStreamClient | null;
  logger?: Logger;
}

export class KalshiExchange implements ExchangeAdapter {
  readonly name = 'kalshi';
  private client: KalshiClient;
  private stream: KalshiStreamClient | null;
  private logger: Logger;

  constructor(options: KalshiExchangeOptions) {
    this.logger = options.logger ?? new Logger('info');
    if (options.client && options.stream !== undefined) {
      this.client = options.client;
      this.stream = options.stream;
    } else {
      const signer = KalshiSigner.fromFile(options.config.kalshi.apiKeyId, options.config.kalshi.privateKeyPath);
      this.client = options.client ?? new KalshiClient(options.config, signer);
      this.stream =
        options.stream === undefined
          ? new KalshiStreamClient(options.config, signer, { logger: this.logger.child('kalshi-ws') })
          : options.stream;
    }
  }

  start(): void {
    if (!this.stream) return;
    this.stream.start();
    this.stream.subscribe(['fill', 'market_positions']);
  }

  stop(): void {
    this.stream?.stop();
  }

  async placeOrder(request: OrderRequest): Promise<VenueOrder> {
    const body: KalshiCreateOrderBody = {
      ticker: request.marketTicker,
      client_order_id: request.clientOrderId,
      side: request.side,
      action: request.action,
      count: request.count,
      type: 'limit',
      time_in_force: request.timeInForce,
      ...(request.side === 'yes' ? { yes_price: request.priceCents } : { no_price: request.priceCents }),
    };
    try {
      return toVenueOrder(await this.client.createOrder(body));
    } catch (err) {
      // A resubmitted client order id is rejected as a conflict; the original order stands.
      if (err instanceof OrderRejectedError && err.statusCode === 409) {
        const existing = await this.findOrderByClientId(request.clientOrderId, request.marketTicker);
        if (existing) {
          this.logger.info(`Order ${request.clientOrderId} already exists as ${existing.orderId}`);
          return existing;
        }
      }
      throw err;
    }
  }

  async cancelOrder(orderId: string): Promise<VenueOrder | null> {
    const current = await this.client.getOrder(orderId);
    if (!current) return null;
    const order = toVenueOrder(current);
    if (order.status === 'executed' || order.status === 'canceled') {
      return order;
    }
    const cancelled = await this.client.cancelOrder(orderId);
    if (cancelled) return toVenueOrder(cancelled);
    const after = await this.client.getOrder(orderId);
    return after ? toVenueOrder(after) : null;
  }

  async getOrder(orderId: string): Promise<VenueOrder | null> {
    const order = await this.client.getOrder(orderId);
    return order ? toVenueOrder(order) : null;
  }

  async findOrderByClientId(clientOrderId: string, marketTicker: string): Promise<VenueOrder | null> {
    const orders = await this.client.listOrders({ ticker: marketTicker });
    const match = orders.find((o) => o.client_order_id === clientOrderId);
    return match ? toVenueOrder(match) : null;
  }

  async getFills(filter: { orderId?: string; marketTicker?: string }): Promise<VenueFill[]> {
    const fills = await this.client.getFills({ order_id: filter.orderId, ticker: filter.marketTicker });
    return fills.map(toVenueFill);
  }

  async getPositions(): Promise<VenuePosition[]> {
    return (await this.client.getPositions()).map(toVenuePosition);
  }

  async getSettlements(filter?: { marketTicker?: string }): Promise<VenueSettlement[]> {
    const settlements = await this.client.getSettlements({ ticker: filter?.marketTicker });
    return settlements.map(toVenueSettlement).filter((s): s is VenueSettlement => s !== null);
  }

  async getMarket(marketTicker: string): Promise<MarketQuote | null> {
    const market = await this.client.getMarket(marketTicker);
    return market ? toMarketQuote(market) : null;
  }

  async getEventMarkets(eventTicker: string): Promise<MarketQuote[]> {
    return (await this.client.getEventMarkets(eventTicker)).map(toMarketQuote);
  }

  async getBalanceCents(): Promise<number> {
    return this.client.getBalanceCents();
  }

  onFill(listener: FillListener): () => void {
    const stream = this.stream;
    if (!stream) return () => undefined;
    stream.on('fill', listener);
    return () => {
      stream.off('fill', listener);
    };
  }
}
