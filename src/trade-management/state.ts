import { InvalidTransitionError } from '../core/errors.js';
import type { NonTerminalStatus, TradeStatus } from './types.js';

export const NON_TERMINAL_STATUSES: readonly NonTerminalStatus[] = ['pending', 'active', 'closing'];

export const TERMINAL_STATUSES: readonly TradeStatus[] = ['closed', 'expired', 'error'];

const TRANSITIONS: Record<TradeStatus, readonly TradeStatus[]> = {
  pending: ['active', 'error', 'expired'],
  active: ['closing', 'expired', 'error'],
  closing: ['closed'],
  closed: [],
  expired: [],
  error: [],
};

export function isTerminal(status: TradeStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isNonTerminal(status: TradeStatus): status is NonTerminalStatus {
  return status === 'pending' || status === 'active' || status === 'closing';
}

export function canTransition(from: TradeStatus, to: TradeStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: TradeStatus, to: TradeStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function parseTradeStatus(value: unknown): TradeStatus {
  const text = String(value);
  if (
    text === 'pending' ||
    text === 'active' ||
    text === 'closing' ||
    text === 'closed' ||
    text === 'expired' ||
    text === 'error'
  ) {
    return text;
  }
  throw new Error(`Unknown trade status: ${text}`);
}
