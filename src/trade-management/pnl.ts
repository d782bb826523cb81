import type { TradeOutcome, TradeSide } from './types.js';

/**
 * Venue trading fee in cents: ceil(0.07 × C × P × (1 − P)) dollars, evaluated
 * on integer cents so the rounding is exact.
 */
export function tradingFeeCents(count: number, priceCents: number): number {
  if (count <= 0 || priceCents <= 0 || priceCents >= 100) return 0;
  return Math.ceil((7 * count * priceCents * (100 - priceCents)) / 10_000);
}

export function centsToDollars(cents: number): number {
  return Math.round(cents) / 100;
}

export function dollarsToCents(dollars: number): number {
  return Math.round(dollars * 100);
}

/** Realized pnl in dollars: sell value − buy value − fees, rounded to cents. */
export function computePnl(input: {
  entryPrice: number;
  exitPrice: number;
  positionSize: number;
  fees: number;
}): number {
  const cents =
    dollarsToCents(input.exitPrice) * input.positionSize -
    dollarsToCents(input.entryPrice) * input.positionSize -
    dollarsToCents(input.fees);
  return centsToDollars(cents);
}

export function outcomeForPnl(pnl: number): TradeOutcome {
  if (pnl > 0) return 'win';
  if (pnl < 0) return 'loss';
  return 'draw';
}

/** Exit price of a held side once the market settles. */
export function settlementExitPrice(side: TradeSide, result: TradeSide): number {
  return side === result ? 1 : 0;
}
