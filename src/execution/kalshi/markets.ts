import { z } from 'zod';

import type {
  MarketQuote,
  MarketStatus,
  VenueFill,
  VenueOrder,
  VenueOrderStatus,
  VenuePosition,
  VenueSettlement,
} from '../exchange.js';
import { tradingFeeCents } from '../../trade-management/pnl.js';

const side = z.enum(['yes', 'no']);
const action = z.enum(['buy', 'sell']);
const cents = z.number().int().nullish();

export const KalshiMarketSchema = z.object({
  ticker: z.string(),
  event_ticker: z.string(),
  status: z.string(),
  close_time: z.string().nullish(),
  floor_strike: z.number().nullish(),
  yes_bid: cents,
  yes_ask: cents,
  no_bid: cents,
  no_ask: cents,
  result: z.string().nullish(),
});

export const KalshiOrderSchema = z.object({
  order_id: z.string(),
  client_order_id: z.string().nullish(),
  ticker: z.string(),
  side,
  action,
  status: z.string(),
  yes_price: cents,
  no_price: cents,
  initial_count: z.number().int().nullish(),
  remaining_count: z.number().int().nullish(),
  fill_count: z.number().int().nullish(),
});

export const KalshiFillSchema = z.object({
  trade_id: z.string(),
  order_id: z.string(),
  ticker: z.string(),
  side,
  action,
  count: z.number().int(),
  yes_price: z.number().int(),
  no_price: z.number().int(),
  created_time: z.string().nullish(),
  fee_cost: z.union([z.string(), z.number()]).nullish(),
});

export const KalshiPositionSchema = z.object({
  ticker: z.string(),
  position: z.number().int(),
});

export const KalshiSettlementSchema = z.object({
  ticker: z.string(),
  market_result: z.string(),
  settled_time: z.string().nullish(),
});

export type KalshiMarket = z.infer<typeof KalshiMarketSchema>;
export type KalshiOrder = z.infer<typeof KalshiOrderSchema>;
export type KalshiFill = z.infer<typeof KalshiFillSchema>;

/** Strike from a market ticker such as KXBTCD-26OCT1917-T67249.99. */
export function strikeFromTicker(ticker: string): number | null {
  const match = /-T(\d+(?:\.\d+)?)$/.exec(ticker);
  return match?.[1] ? Number(match[1]) : null;
}

function mapMarketStatus(status: string, result: string | null | undefined): MarketStatus {
  if (status === 'settled' || status === 'finalized' || result === 'yes' || result === 'no') {
    return 'settled';
  }
  if (status === 'closed' || status === 'determined') {
    return 'closed';
  }
  return 'open';
}

function positiveOrNull(value: number | null | undefined): number | null {
  return value != null && value > 0 ? value : null;
}

export function toMarketQuote(market: KalshiMarket): MarketQuote {
  const result = market.result === 'yes' || market.result === 'no' ? market.result : null;
  const closeTime = market.close_time ? Date.parse(market.close_time) : Number.NaN;
  return {
    marketTicker: market.ticker,
    eventTicker: market.event_ticker,
    strike: strikeFromTicker(market.ticker) ?? market.floor_strike ?? 0,
    status: mapMarketStatus(market.status, market.result),
    closeTime: Number.isFinite(closeTime) ? closeTime : 0,
    yesBidCents: positiveOrNull(market.yes_bid),
    yesAskCents: positiveOrNull(market.yes_ask),
    noBidCents: positiveOrNull(market.no_bid),
    noAskCents: positiveOrNull(market.no_ask),
    result,
  };
}

function mapOrderStatus(status: string): VenueOrderStatus {
  switch (status) {
    case 'resting':
      return 'resting';
    case 'canceled':
    case 'cancelled':
      return 'canceled';
    case 'executed':
      return 'executed';
    default:
      return 'pending';
  }
}

export function toVenueOrder(order: KalshiOrder): VenueOrder {
  const initial = order.initial_count ?? (order.fill_count ?? 0) + (order.remaining_count ?? 0);
  const filled = order.fill_count ?? Math.max(0, initial - (order.remaining_count ?? 0));
  return {
    orderId: order.order_id,
    clientOrderId: order.client_order_id ?? null,
    marketTicker: order.ticker,
    side: order.side,
    action: order.action,
    status: mapOrderStatus(order.status),
    count: initial,
    filledCount: filled,
    priceCents: (order.side === 'yes' ? order.yes_price : order.no_price) ?? 0,
  };
}

export function toVenueFill(fill: KalshiFill): VenueFill {
  const priceCents = fill.side === 'yes' ? fill.yes_price : fill.no_price;
  const createdAt = fill.created_time ? Date.parse(fill.created_time) : Number.NaN;
  const reportedFee = fill.fee_cost == null ? Number.NaN : Math.round(Number(fill.fee_cost) * 100);
  return {
    fillId: fill.trade_id,
    orderId: fill.order_id,
    marketTicker: fill.ticker,
    side: fill.side,
    action: fill.action,
    count: fill.count,
    priceCents,
    feeCents: Number.isFinite(reportedFee) ? reportedFee : tradingFeeCents(fill.count, priceCents),
    createdAt: Number.isFinite(createdAt) ? createdAt : Date.now(),
  };
}

export function toVenuePosition(position: z.infer<typeof KalshiPositionSchema>): VenuePosition {
  return { marketTicker: position.ticker, position: position.position };
}

export function toVenueSettlement(settlement: z.infer<typeof KalshiSettlementSchema>): VenueSettlement | null {
  if (settlement.market_result !== 'yes' && settlement.market_result !== 'no') {
    return null;
  }
  const settledAt = settlement.settled_time ? Date.parse(settlement.settled_time) : Number.NaN;
  return {
    marketTicker: settlement.ticker,
    result: settlement.market_result,
    settledAt: Number.isFinite(settledAt) ? settledAt : 0,
  };
}
