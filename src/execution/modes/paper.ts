import { OrderRejectedError } from '../../core/errors.js';
import { tradingFeeCents } from '../../trade-management/pnl.js';
import type { TradeSide } from '../../trade-management/types.js';
import type {
  ExchangeAdapter,
  FillListener,
  MarketQuote,
  MarketSource,
  OrderRequest,
  VenueFill,
  VenueOrder,
  VenuePosition,
  VenueSettlement,
} from '../exchange.js';
import { askCentsFor, bidCentsFor } from '../exchange.js';

/**
 * How the paper venue treats new orders:
 * - `match`: fill against the quoted book (buys at the ask, sells at the bid)
 *   when the limit allows it, otherwise kill the order.
 * - `rest`: acknowledge the order and leave it resting until `fillOrder`.
 * - `reject`: reject every order.
 */
export type PaperFillMode = 'match' | 'rest' | 'reject';

export interface PaperExchangeOptions {
  startingBalanceCents?: number;
  fillMode?: PaperFillMode;
  clock?: () => number;
  /** Live quotes to trade against; without one, quotes come from `setMarket`. */
  marketSource?: MarketSource;
}

/**
 * In-process venue for paper trading and tests. Applies the venue fee
 * schedule and settles markets on demand, or when the market source reports
 * a result.
 */
export class PaperExchange implements ExchangeAdapter {
  readonly name = 'paper';
  private markets = new Map<string, MarketQuote>();
  private orders = new Map<string, VenueOrder>();
  private fills: VenueFill[] = [];
  private positions = new Map<string, number>();
  private settlements: VenueSettlement[] = [];
  private listeners = new Set<FillListener>();
  private failures: Error[] = [];
  private balanceCents: number;
  private fillMode: PaperFillMode;
  private clock: () => number;
  private marketSource: MarketSource | null;
  private nextOrder = 1;
  private nextFill = 1;

  constructor(options: PaperExchangeOptions = {}) {
    this.balanceCents = options.startingBalanceCents ?? 100_000;
    this.fillMode = options.fillMode ?? 'match';
    this.clock = options.clock ?? Date.now;
    this.marketSource = options.marketSource ?? null;
  }

  // --------------------------------------------------------------------------
  // Controls
  // --------------------------------------------------------------------------

  setFillMode(mode: PaperFillMode): void {
    this.fillMode = mode;
  }

  setMarket(quote: MarketQuote): void {
    this.markets.set(quote.marketTicker, { ...quote });
  }

  /** The next `placeOrder` calls throw these errors, in order. */
  failNext(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  /**
   * Fills a resting order, as the venue would when the book crosses. A
   * `count` below the remaining size leaves the order resting.
   */
  fillOrder(orderId: string, priceCents?: number, count?: number): VenueFill {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new Error(`Unknown paper order ${orderId}`);
    }
    if (order.status !== 'resting') {
      throw new Error(`Paper order ${orderId} is ${order.status}`);
    }
    const remaining = order.count - order.filledCount;
    return this.execute(order, priceCents ?? order.priceCents, Math.min(count ?? remaining, remaining));
  }

  /** Re-delivers an already recorded fill to listeners (duplicate stream event). */
  redeliverFill(fillId: string): void {
    const fill = this.fills.find((f) => f.fillId === fillId);
    if (fill) this.notify(fill);
  }

  settleMarket(marketTicker: string, result: TradeSide): void {
    const quote = this.markets.get(marketTicker);
    if (quote) {
      this.markets.set(marketTicker, { ...quote, status: 'settled', result });
    }
    const held = this.positions.get(marketTicker) ?? 0;
    const won = (held > 0 && result === 'yes') || (held < 0 && result === 'no');
    if (won) {
      this.balanceCents += Math.abs(held) * 100;
    }
    this.positions.delete(marketTicker);
    this.settlements.push({ marketTicker, result, settledAt: this.clock() });
  }

  // --------------------------------------------------------------------------
  // ExchangeAdapter
  // --------------------------------------------------------------------------

  async placeOrder(request: OrderRequest): Promise<VenueOrder> {
    const failure = this.failures.shift();
    if (failure) throw failure;
    if (this.marketSource) {
      await this.getMarket(request.marketTicker);
    }

    for (const existing of this.orders.values()) {
      if (existing.clientOrderId === request.clientOrderId) {
        return { ...existing };
      }
    }
    if (this.fillMode === 'reject') {
      throw new OrderRejectedError('Paper venue rejected order', 400, 'paper_reject');
    }
    if (request.count <= 0 || request.priceCents <= 0 || request.priceCents >= 100) {
      throw new OrderRejectedError(`Invalid order price/count for ${request.marketTicker}`, 400, 'invalid_order');
    }
    const quote = this.markets.get(request.marketTicker);
    if (quote && quote.status !== 'open') {
      throw new OrderRejectedError(`Market ${request.marketTicker} is ${quote.status}`, 400, 'market_closed');
    }
    if (request.action === 'buy') {
      const cost = request.count * request.priceCents + tradingFeeCents(request.count, request.priceCents);
      if (cost > this.balanceCents) {
        throw new OrderRejectedError('Insufficient balance', 400, 'insufficient_balance');
      }
    }

    const order: VenueOrder = {
      orderId: `paper-${this.nextOrder++}`,
      clientOrderId: request.clientOrderId,
      marketTicker: request.marketTicker,
      side: request.side,
      action: request.action,
      status: 'resting',
      count: request.count,
      filledCount: 0,
      priceCents: request.priceCents,
    };
    this.orders.set(order.orderId, order);

    if (this.fillMode === 'rest') {
      return { ...order };
    }

    const price = this.matchPrice(request, quote);
    if (price == null) {
      order.status = 'canceled';
      return { ...order };
    }
    this.execute(order, price, order.count);
    return { ...order };
  }

  async cancelOrder(orderId: string): Promise<VenueOrder | null> {
    const order = this.orders.get(orderId);
    if (!order) return null;
    if (order.status === 'resting' || order.status === 'pending') {
      order.status = 'canceled';
    }
    return { ...order };
  }

  async getOrder(orderId: string): Promise<VenueOrder | null> {
    const order = this.orders.get(orderId);
    return order ? { ...order } : null;
  }

  async findOrderByClientId(clientOrderId: string, marketTicker: string): Promise<VenueOrder | null> {
    for (const order of this.orders.values()) {
      if (order.clientOrderId === clientOrderId && order.marketTicker === marketTicker) {
        return { ...order };
      }
    }
    return null;
  }

  async getFills(filter: { orderId?: string; marketTicker?: string }): Promise<VenueFill[]> {
    return this.fills
      .filter((f) => (filter.orderId ? f.orderId === filter.orderId : true))
      .filter((f) => (filter.marketTicker ? f.marketTicker === filter.marketTicker : true))
      .map((f) => ({ ...f }));
  }

  async getPositions(): Promise<VenuePosition[]> {
    return [...this.positions.entries()]
      .filter(([, position]) => position !== 0)
      .map(([marketTicker, position]) => ({ marketTicker, position }));
  }

  async getSettlements(filter?: { marketTicker?: string }): Promise<VenueSettlement[]> {
    return this.settlements
      .filter((s) => (filter?.marketTicker ? s.marketTicker === filter.marketTicker : true))
      .map((s) => ({ ...s }));
  }

  async getMarket(marketTicker: string): Promise<MarketQuote | null> {
    if (this.marketSource) {
      const fresh = await this.marketSource.getMarket(marketTicker);
      if (fresh) this.absorb(fresh);
    }
    const quote = this.markets.get(marketTicker);
    return quote ? { ...quote } : null;
  }

  async getEventMarkets(eventTicker: string): Promise<MarketQuote[]> {
    if (this.marketSource) {
      for (const quote of await this.marketSource.getEventMarkets(eventTicker)) {
        this.absorb(quote);
      }
    }
    return [...this.markets.values()].filter((m) => m.eventTicker === eventTicker).map((m) => ({ ...m }));
  }

  async getBalanceCents(): Promise<number> {
    return this.balanceCents;
  }

  onFill(listener: FillListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  /** A market settled here stays settled; a newly reported result settles held positions. */
  private absorb(quote: MarketQuote): void {
    if (this.markets.get(quote.marketTicker)?.status === 'settled') return;
    this.markets.set(quote.marketTicker, { ...quote });
    if (quote.status === 'settled' && quote.result) {
      this.settleMarket(quote.marketTicker, quote.result);
    }
  }

  private matchPrice(request: OrderRequest, quote: MarketQuote | undefined): number | null {
    if (!quote) return request.priceCents;
    if (request.action === 'buy') {
      const ask = askCentsFor(quote, request.side);
      return ask != null && ask <= request.priceCents ? ask : null;
    }
    const bid = bidCentsFor(quote, request.side);
    return bid != null && bid >= request.priceCents ? bid : null;
  }

  private execute(order: VenueOrder, priceCents: number, count: number): VenueFill {
    const feeCents = tradingFeeCents(count, priceCents);
    const fill: VenueFill = {
      fillId: `paper-fill-${this.nextFill++}`,
      orderId: order.orderId,
      marketTicker: order.marketTicker,
      side: order.side,
      action: order.action,
      count,
      priceCents,
      feeCents,
      createdAt: this.clock(),
    };
    order.filledCount += count;
    if (order.filledCount >= order.count) {
      order.status = 'executed';
    }
    this.fills.push(fill);

    const signed = order.side === 'yes' ? count : -count;
    const delta = order.action === 'buy' ? signed : -signed;
    this.positions.set(order.marketTicker, (this.positions.get(order.marketTicker) ?? 0) + delta);
    const notional = count * priceCents;
    this.balanceCents += order.action === 'buy' ? -(notional + feeCents) : notional - feeCents;

    this.notify(fill);
    return { ...fill };
  }

  private notify(fill: VenueFill): void {
    for (const listener of this.listeners) {
      listener({ ...fill });
    }
  }
}
