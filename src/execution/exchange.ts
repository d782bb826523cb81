import type { TradeSide } from '../trade-management/types.js';

export type OrderAction = 'buy' | 'sell';

export type TimeInForce = 'fill_or_kill' | 'immediate_or_cancel';

export type VenueOrderStatus = 'pending' | 'resting' | 'canceled' | 'executed';

export interface OrderRequest {
  marketTicker: string;
  side: TradeSide;
  action: OrderAction;
  count: number;
  priceCents: number;
  timeInForce: TimeInForce;
  clientOrderId: string;
}

export interface VenueOrder {
  orderId: string;
  clientOrderId: string | null;
  marketTicker: string;
  side: TradeSide;
  action: OrderAction;
  status: VenueOrderStatus;
  count: number;
  filledCount: number;
  priceCents: number;
}

export interface VenueFill {
  fillId: string;
  orderId: string;
  marketTicker: string;
  side: TradeSide;
  action: OrderAction;
  count: number;
  priceCents: number;
  feeCents: number;
  createdAt: number;
}

export interface VenuePosition {
  marketTicker: string;
  // Positive for yes contracts held, negative for no.
  position: number;
}

export interface VenueSettlement {
  marketTicker: string;
  result: TradeSide;
  settledAt: number;
}

export type MarketStatus = 'open' | 'closed' | 'settled';

export interface MarketQuote {
  marketTicker: string;
  eventTicker: string;
  strike: number;
  status: MarketStatus;
  closeTime: number;
  yesBidCents: number | null;
  yesAskCents: number | null;
  noBidCents: number | null;
  noAskCents: number | null;
  result: TradeSide | null;
}

export type FillListener = (fill: VenueFill) => void;

/** Read-only market data, e.g. public venue quotes behind the paper venue. */
export interface MarketSource {
  getMarket(marketTicker: string): Promise<MarketQuote | null>;
  getEventMarkets(eventTicker: string): Promise<MarketQuote[]>;
}

/**
 * Venue operations used by the executor and supervisor. Implementations throw
 * OrderRejectedError for non-retryable failures and TransientExchangeError or
 * TimeoutError for everything worth retrying.
 */
export interface ExchangeAdapter extends MarketSource {
  readonly name: string;
  placeOrder(request: OrderRequest): Promise<VenueOrder>;
  /** Idempotent: cancelling a filled or already cancelled order returns it unchanged. */
  cancelOrder(orderId: string): Promise<VenueOrder | null>;
  getOrder(orderId: string): Promise<VenueOrder | null>;
  findOrderByClientId(clientOrderId: string, marketTicker: string): Promise<VenueOrder | null>;
  getFills(filter: { orderId?: string; marketTicker?: string }): Promise<VenueFill[]>;
  getPositions(): Promise<VenuePosition[]>;
  getSettlements(filter?: { marketTicker?: string }): Promise<VenueSettlement[]>;
  getBalanceCents(): Promise<number>;
  onFill?(listener: FillListener): () => void;
}

export function askCentsFor(quote: MarketQuote, side: TradeSide): number | null {
  return side === 'yes' ? quote.yesAskCents : quote.noAskCents;
}

export function bidCentsFor(quote: MarketQuote, side: TradeSide): number | null {
  return side === 'yes' ? quote.yesBidCents : quote.noBidCents;
}
