export type TradeSide = 'yes' | 'no';

export type TradeStatus = 'pending' | 'active' | 'closing' | 'closed' | 'expired' | 'error';

export type NonTerminalStatus = 'pending' | 'active' | 'closing';

export type TradeOutcome = 'win' | 'loss' | 'draw';

export type OrderOutcome = 'filled' | 'cancelled' | 'rejected';

export type CloseReason = 'expiry' | 'auto_stop' | 'momentum_spike' | 'manual';

export type Trade = {
  id: number;
  status: TradeStatus;

  eventTicker: string;
  marketTicker: string;
  strike: number;
  side: TradeSide;

  // Dollars per contract, 0..1.
  entryPrice: number;
  positionSize: number;
  fees: number;

  probabilityAtEntry: number | null; // bps
  momentumAtEntry: number | null;
  venueImpliedAtEntry: number | null; // bps
  marketCloseTime: string | null;

  clientOrderId: string | null;
  orderId: string | null;
  orderSubmittedAt: string | null;
  orderOutcome: OrderOutcome | null;
  closeOrderId: string | null;

  openedAt: string | null;
  closedAt: string | null;
  exitPrice: number | null;
  pnl: number | null;
  outcome: TradeOutcome | null;
  closeReason: CloseReason | null;
  errorReason: string | null;

  version: number;
  createdAt: string;
  updatedAt: string;
};

export type ActiveTrade = {
  tradeId: number;
  status: NonTerminalStatus;
  lockOwner: string | null;
  lockExpiresAt: number | null;
  driftCount: number;
  lastDriftKind: string | null;
  frozen: boolean;
  frozenReason: string | null;
  frozenAt: string | null;
  updatedAt: string;
};

export type ActiveTradeView = {
  trade: Trade;
  active: ActiveTrade;
};

export type NewTradeInput = {
  eventTicker: string;
  marketTicker: string;
  strike: number;
  side: TradeSide;
  entryPrice: number;
  positionSize: number;
  probabilityAtEntry: number | null;
  momentumAtEntry: number | null;
  venueImpliedAtEntry: number | null;
  marketCloseTime: string | null;
};

export type TransitionPatch =
  | { to: 'active'; entryPrice: number; positionSize: number; fees: number; orderId?: string | null }
  | { to: 'closing'; closeReason: CloseReason; closeOrderId?: string | null }
  | { to: 'closed'; exitPrice: number; pnl: number; outcome: TradeOutcome; fees: number }
  | { to: 'expired'; reason: string }
  | { to: 'error'; reason: string };

export type TradeEvent = {
  id: number;
  tradeId: number;
  fromStatus: TradeStatus | null;
  toStatus: TradeStatus;
  reason: string;
  detail: Record<string, unknown> | null;
  at: string;
};

export type ReconciliationAlert = {
  id: number;
  tradeId: number;
  localStatus: TradeStatus;
  venueState: string;
  consecutive: number;
  detail: Record<string, unknown> | null;
  createdAt: string;
  resolvedAt: string | null;
  resolution: string | null;
};

export type TradeQuery = {
  status?: TradeStatus | TradeStatus[];
  since?: string;
  until?: string;
  limit?: number;
};
