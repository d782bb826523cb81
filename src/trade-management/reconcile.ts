import type {
  ExchangeAdapter,
  MarketQuote,
  VenueFill,
  VenueOrder,
  VenueSettlement,
} from '../execution/exchange.js';
import type { Trade, TradeSide, TradeStatus } from './types.js';

export type VenueState =
  | 'no_order'
  | 'order_open'
  | 'order_cancelled'
  | 'filled'
  | 'position_closed'
  | 'settled_win'
  | 'settled_loss';

export interface VenueObservation {
  state: VenueState;
  market: MarketQuote | null;
  entryOrder: VenueOrder | null;
  entryFills: VenueFill[];
  closeOrder: VenueOrder | null;
  closeFills: VenueFill[];
  settlementResult: TradeSide | null;
}

export type ReconcileDecision =
  | { kind: 'in_sync' }
  | { kind: 'promote' }
  | { kind: 'fail'; reason: string }
  | { kind: 'cancel_stale' }
  | { kind: 'expire'; reason: string }
  | { kind: 'settle' }
  | { kind: 'close_from_fill' }
  | { kind: 'drift' };

/**
 * Collapses the venue's orders, fills, settlements and market status into a
 * single view of one trade.
 */
export async function observeVenue(exchange: ExchangeAdapter, trade: Trade): Promise<VenueObservation> {
  const market = await exchange.getMarket(trade.marketTicker);

  let entryOrder: VenueOrder | null = null;
  if (trade.orderId) {
    entryOrder = await exchange.getOrder(trade.orderId);
  } else if (trade.clientOrderId) {
    entryOrder = await exchange.findOrderByClientId(trade.clientOrderId, trade.marketTicker);
  }
  const entryFills = entryOrder ? await exchange.getFills({ orderId: entryOrder.orderId }) : [];

  const closeOrder = trade.closeOrderId ? await exchange.getOrder(trade.closeOrderId) : null;
  const closeFills = closeOrder ? await exchange.getFills({ orderId: closeOrder.orderId }) : [];

  let settlementResult: TradeSide | null = market?.status === 'settled' ? market.result : null;
  if (!settlementResult) {
    const settlements: VenueSettlement[] = await exchange.getSettlements({ marketTicker: trade.marketTicker });
    settlementResult = settlements.find((s) => s.marketTicker === trade.marketTicker)?.result ?? null;
  }

  return {
    state: deriveVenueState({ trade, entryOrder, entryFills, closeFills, settlementResult }),
    market,
    entryOrder,
    entryFills,
    closeOrder,
    closeFills,
    settlementResult,
  };
}

export function deriveVenueState(input: {
  trade: Pick<Trade, 'side'>;
  entryOrder: VenueOrder | null;
  entryFills: VenueFill[];
  closeFills: VenueFill[];
  settlementResult: TradeSide | null;
}): VenueState {
  if (input.closeFills.length > 0) return 'position_closed';
  if (input.settlementResult) {
    return input.settlementResult === input.trade.side ? 'settled_win' : 'settled_loss';
  }
  if (input.entryFills.length > 0 || input.entryOrder?.status === 'executed') return 'filled';
  if (!input.entryOrder) return 'no_order';
  if (input.entryOrder.status === 'canceled') return 'order_cancelled';
  return 'order_open';
}

function isSettled(state: VenueState): boolean {
  return state === 'settled_win' || state === 'settled_loss';
}

/**
 * Local status × venue view. The venue is authoritative for fills and
 * settlement; anything not listed is a disagreement counted towards drift.
 */
export function decideReconciliation(input: {
  local: TradeStatus;
  venue: VenueState;
  pendingAgeMs: number;
  pendingFillWindowMs: number;
}): ReconcileDecision {
  const { local, venue } = input;
  switch (local) {
    case 'pending':
      if (venue === 'filled') return { kind: 'promote' };
      if (venue === 'order_cancelled') return { kind: 'fail', reason: 'venue_cancelled' };
      if (isSettled(venue)) return { kind: 'expire', reason: 'market_settled_before_fill' };
      if (venue === 'no_order' || venue === 'order_open') {
        return input.pendingAgeMs > input.pendingFillWindowMs ? { kind: 'cancel_stale' } : { kind: 'in_sync' };
      }
      return { kind: 'drift' };
    case 'active':
      return venue === 'filled' ? { kind: 'in_sync' } : { kind: 'drift' };
    case 'closing':
      if (isSettled(venue)) return { kind: 'settle' };
      if (venue === 'position_closed') return { kind: 'close_from_fill' };
      if (venue === 'filled') return { kind: 'in_sync' };
      return { kind: 'drift' };
    default:
      return { kind: 'in_sync' };
  }
}
