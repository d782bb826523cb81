const HOUR_MS = 60 * 60 * 1000;

const MONTHS = ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'];

const EASTERN = new Intl.DateTimeFormat('en-US', {
  timeZone: 'America/New_York',
  year: '2-digit',
  month: 'numeric',
  day: '2-digit',
  hour: '2-digit',
  hourCycle: 'h23',
});

export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Top of the next hour. Hourly contracts settle on the hour in every zone we
 * trade, so this is computed in UTC.
 */
export function nextSettlementMs(nowMs: number): number {
  return Math.floor(nowMs / HOUR_MS) * HOUR_MS + HOUR_MS;
}

export function ttcSeconds(closeTimeMs: number, nowMs: number): number {
  return Math.max(0, Math.floor((closeTimeMs - nowMs) / 1000));
}

function easternParts(ms: number): { year: string; month: number; day: string; hour: string } {
  const parts = EASTERN.formatToParts(new Date(ms));
  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';
  return {
    year: get('year'),
    month: Number(get('month')),
    day: get('day'),
    hour: get('hour'),
  };
}

/**
 * Event ticker for the contract settling at `settlementMs`, e.g. KXBTCD-26OCT1917
 * for 17:00 New York time on 2026-10-19.
 */
export function eventTickerFor(series: string, settlementMs: number): string {
  const { year, month, day, hour } = easternParts(settlementMs);
  return `${series}-${year}${MONTHS[month - 1] ?? '???'}${day}${hour}`;
}

export function marketTickerFor(eventTicker: string, strike: number): string {
  return `${eventTicker}-T${strike.toFixed(2)}`;
}
