import type { ReconciliationAlert, Trade, TradeEvent } from '../trade-management/types.js';

function cents(value: number | null): string {
  return value == null ? '-' : value.toFixed(2);
}

export function formatTradeRow(trade: Trade): string {
  return [
    String(trade.id).padStart(5),
    trade.status.padEnd(8),
    trade.marketTicker.padEnd(30),
    trade.side.padEnd(3),
    `x${trade.positionSize}`.padEnd(5),
    `in ${cents(trade.entryPrice)}`,
    `out ${cents(trade.exitPrice)}`,
    `pnl ${cents(trade.pnl)}`,
    trade.outcome ?? '',
  ]
    .join('  ')
    .trimEnd();
}

export function formatTradeDetail(trade: Trade): string {
  const lines = [
    `Trade ${trade.id} (${trade.status}, v${trade.version})`,
    '─'.repeat(40),
    `Market: ${trade.marketTicker} (${trade.eventTicker}) strike ${trade.strike}`,
    `Side: ${trade.side} x${trade.positionSize} @ ${cents(trade.entryPrice)}  fees ${cents(trade.fees)}`,
    `Model: p=${trade.probabilityAtEntry ?? '-'}bps implied=${trade.venueImpliedAtEntry ?? '-'}bps momentum=${
      trade.momentumAtEntry == null ? '-' : trade.momentumAtEntry.toFixed(4)
    }`,
    `Order: ${trade.clientOrderId ?? '-'} / ${trade.orderId ?? '-'} (${trade.orderOutcome ?? 'open'})`,
    `Opened: ${trade.openedAt ?? '-'}  Closed: ${trade.closedAt ?? '-'}`,
    `Exit: ${cents(trade.exitPrice)}  PnL: ${cents(trade.pnl)}  Outcome: ${trade.outcome ?? '-'}`,
  ];
  if (trade.closeReason) lines.push(`Close reason: ${trade.closeReason}`);
  if (trade.errorReason) lines.push(`Reason: ${trade.errorReason}`);
  return lines.join('\n');
}

export function formatEvent(event: TradeEvent): string {
  return `${event.at}  ${event.fromStatus ?? '∅'} -> ${event.toStatus}  ${event.reason}`;
}

export function formatAlert(alert: ReconciliationAlert): string {
  const state = alert.resolvedAt ? `resolved (${alert.resolution ?? ''})` : 'open';
  return `#${alert.id} trade ${alert.tradeId}: local=${alert.localStatus} venue=${alert.venueState} x${alert.consecutive} ${state}`;
}
