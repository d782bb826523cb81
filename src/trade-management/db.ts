import type Database from 'better-sqlite3';

import {
  DuplicateTradeError,
  StaleStateError,
  TradeNotFoundError,
} from '../core/errors.js';
import { assertTransition, isTerminal, parseTradeStatus } from './state.js';
import type {
  ActiveTrade,
  ActiveTradeView,
  CloseReason,
  NewTradeInput,
  NonTerminalStatus,
  OrderOutcome,
  ReconciliationAlert,
  Trade,
  TradeEvent,
  TradeOutcome,
  TradeQuery,
  TradeSide,
  TradeStatus,
  TransitionPatch,
} from './types.js';

type Row = Record<string, unknown>;

function toNumberOrNull(value: unknown): number | null {
  if (value == null) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function toStringOrNull(value: unknown): string | null {
  return value == null ? null : String(value);
}

function parseJsonObject(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'string' || !value) return null;
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed && typeof parsed === 'object' && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : null;
  } catch {
    return null;
  }
}

function parseSide(value: unknown): TradeSide {
  return String(value) === 'no' ? 'no' : 'yes';
}

function parseOrderOutcome(value: unknown): OrderOutcome | null {
  const text = toStringOrNull(value);
  return text === 'filled' || text === 'cancelled' || text === 'rejected' ? text : null;
}

function parseOutcome(value: unknown): TradeOutcome | null {
  const text = toStringOrNull(value);
  return text === 'win' || text === 'loss' || text === 'draw' ? text : null;
}

function parseCloseReason(value: unknown): CloseReason | null {
  const text = toStringOrNull(value);
  return text === 'expiry' || text === 'auto_stop' || text === 'momentum_spike' || text === 'manual'
    ? text
    : null;
}

function parseNonTerminal(value: unknown): NonTerminalStatus {
  const status = parseTradeStatus(value);
  if (status === 'pending' || status === 'active' || status === 'closing') return status;
  throw new Error(`Active trade row has terminal status ${status}`);
}

function hydrateTrade(row: Row): Trade {
  return {
    id: Number(row.id),
    status: parseTradeStatus(row.status),
    eventTicker: String(row.event_ticker ?? ''),
    marketTicker: String(row.market_ticker ?? ''),
    strike: Number(row.strike),
    side: parseSide(row.side),
    entryPrice: Number(row.entry_price),
    positionSize: Number(row.position_size),
    fees: Number(row.fees ?? 0),
    probabilityAtEntry: toNumberOrNull(row.probability_at_entry),
    momentumAtEntry: toNumberOrNull(row.momentum_at_entry),
    venueImpliedAtEntry: toNumberOrNull(row.venue_implied_at_entry),
    marketCloseTime: toStringOrNull(row.market_close_time),
    clientOrderId: toStringOrNull(row.client_order_id),
    orderId: toStringOrNull(row.order_id),
    orderSubmittedAt: toStringOrNull(row.order_submitted_at),
    orderOutcome: parseOrderOutcome(row.order_outcome),
    closeOrderId: toStringOrNull(row.close_order_id),
    openedAt: toStringOrNull(row.opened_at),
    closedAt: toStringOrNull(row.closed_at),
    exitPrice: toNumberOrNull(row.exit_price),
    pnl: toNumberOrNull(row.pnl),
    outcome: parseOutcome(row.outcome),
    closeReason: parseCloseReason(row.close_reason),
    errorReason: toStringOrNull(row.error_reason),
    version: Number(row.version ?? 1),
    createdAt: String(row.created_at ?? ''),
    updatedAt: String(row.updated_at ?? ''),
  };
}

function hydrateActive(row: Row): ActiveTrade {
  return {
    tradeId: Number(row.trade_id),
    status: parseNonTerminal(row.active_status ?? row.status),
    lockOwner: toStringOrNull(row.lock_owner),
    lockExpiresAt: toNumberOrNull(row.lock_expires_at),
    driftCount: Number(row.drift_count ?? 0),
    lastDriftKind: toStringOrNull(row.last_drift_kind),
    frozen: Number(row.frozen ?? 0) === 1,
    frozenReason: toStringOrNull(row.frozen_reason),
    frozenAt: toStringOrNull(row.frozen_at),
    updatedAt: String(row.active_updated_at ?? row.updated_at ?? ''),
  };
}

function hydrateEvent(row: Row): TradeEvent {
  return {
    id: Number(row.id),
    tradeId: Number(row.trade_id),
    fromStatus: row.from_status == null ? null : parseTradeStatus(row.from_status),
    toStatus: parseTradeStatus(row.to_status),
    reason: String(row.reason ?? ''),
    detail: parseJsonObject(row.detail_json),
    at: String(row.at ?? ''),
  };
}

function hydrateAlert(row: Row): ReconciliationAlert {
  return {
    id: Number(row.id),
    tradeId: Number(row.trade_id),
    localStatus: parseTradeStatus(row.local_status),
    venueState: String(row.venue_state ?? ''),
    consecutive: Number(row.consecutive ?? 0),
    detail: parseJsonObject(row.detail_json),
    createdAt: String(row.created_at ?? ''),
    resolvedAt: toStringOrNull(row.resolved_at),
    resolution: toStringOrNull(row.resolution),
  };
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * Authoritative trade state. Every status change is a compare-and-swap on
 * (id, expected status) executed inside an IMMEDIATE transaction together with
 * the active_trades projection and the trade_events audit row.
 */
export class TradeStore {
  private clock: () => number;

  constructor(
    private db: Database.Database,
    options?: { clock?: () => number }
  ) {
    this.clock = options?.clock ?? Date.now;
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  private nowIso(): string {
    return new Date(this.clock()).toISOString();
  }

  createPendingTrade(input: NewTradeInput, detail?: Record<string, unknown>): Trade {
    const key = { eventTicker: input.eventTicker, strike: input.strike, side: input.side };
    const create = this.db.transaction((): number => {
      const existing = this.findOpenTrade(key);
      if (existing) {
        throw new DuplicateTradeError(key, existing.id);
      }
      const now = this.nowIso();
      const result = this.db
        .prepare(
          `
            INSERT INTO trades (
              status,
              event_ticker,
              market_ticker,
              strike,
              side,
              entry_price,
              position_size,
              fees,
              probability_at_entry,
              momentum_at_entry,
              venue_implied_at_entry,
              market_close_time,
              version,
              created_at,
              updated_at
            ) VALUES (
              'pending',
              @eventTicker,
              @marketTicker,
              @strike,
              @side,
              @entryPrice,
              @positionSize,
              0,
              @probabilityAtEntry,
              @momentumAtEntry,
              @venueImpliedAtEntry,
              @marketCloseTime,
              1,
              @now,
              @now
            )
          `
        )
        .run({ ...input, now });
      const tradeId = Number(result.lastInsertRowid);
      this.db
        .prepare(
          `INSERT INTO active_trades (trade_id, status, updated_at) VALUES (?, 'pending', ?)`
        )
        .run(tradeId, now);
      this.insertEvent(tradeId, null, 'pending', 'entry_intent', detail ?? null, now);
      return tradeId;
    });

    let tradeId: number;
    try {
      tradeId = create.immediate();
    } catch (err) {
      // Another process won the race between our check and insert.
      if (isUniqueViolation(err)) {
        throw new DuplicateTradeError(key, this.findOpenTrade(key)?.id ?? null);
      }
      throw err;
    }
    return this.requireTrade(tradeId);
  }

  transition(
    tradeId: number,
    expected: TradeStatus,
    patch: TransitionPatch,
    meta?: { reason?: string; detail?: Record<string, unknown> }
  ): Trade {
    assertTransition(expected, patch.to);
    const apply = this.db.transaction(() => {
      const current = this.readStatus(tradeId);
      if (current !== expected) {
        throw new StaleStateError(tradeId, expected, current);
      }
      const now = this.nowIso();
      const changes = this.applyPatch(tradeId, expected, patch, now);
      if (changes !== 1) {
        throw new StaleStateError(tradeId, expected, this.readStatus(tradeId));
      }
      if (isTerminal(patch.to)) {
        this.db.prepare(`DELETE FROM active_trades WHERE trade_id = ?`).run(tradeId);
      } else {
        this.db
          .prepare(
            `
              UPDATE active_trades
              SET status = ?, drift_count = 0, last_drift_kind = NULL, updated_at = ?
              WHERE trade_id = ?
            `
          )
          .run(patch.to, now, tradeId);
      }
      const reason = meta?.reason ?? this.defaultReason(patch);
      this.insertEvent(tradeId, expected, patch.to, reason, { ...patch, ...(meta?.detail ?? {}) }, now);
    });
    apply.immediate();
    return this.requireTrade(tradeId);
  }

  private defaultReason(patch: TransitionPatch): string {
    switch (patch.to) {
      case 'active':
        return 'fill_confirmed';
      case 'closing':
        return patch.closeReason;
      case 'closed':
        return 'settlement_confirmed';
      case 'expired':
      case 'error':
        return patch.reason;
    }
  }

  private applyPatch(tradeId: number, expected: TradeStatus, patch: TransitionPatch, now: string): number {
    switch (patch.to) {
      case 'active':
        return this.db
          .prepare(
            `
              UPDATE trades
              SET status = 'active',
                  entry_price = ?,
                  position_size = ?,
                  fees = ?,
                  order_id = COALESCE(?, order_id),
                  opened_at = ?,
                  version = version + 1,
                  updated_at = ?
              WHERE id = ? AND status = ?
            `
          )
          .run(patch.entryPrice, patch.positionSize, patch.fees, patch.orderId ?? null, now, now, tradeId, expected)
          .changes;
      case 'closing':
        return this.db
          .prepare(
            `
              UPDATE trades
              SET status = 'closing',
                  close_reason = ?,
                  close_order_id = COALESCE(?, close_order_id),
                  version = version + 1,
                  updated_at = ?
              WHERE id = ? AND status = ?
            `
          )
          .run(patch.closeReason, patch.closeOrderId ?? null, now, tradeId, expected).changes;
      case 'closed':
        return this.db
          .prepare(
            `
              UPDATE trades
              SET status = 'closed',
                  exit_price = ?,
                  pnl = ?,
                  outcome = ?,
                  fees = ?,
                  closed_at = ?,
                  version = version + 1,
                  updated_at = ?
              WHERE id = ? AND status = ?
            `
          )
          .run(patch.exitPrice, patch.pnl, patch.outcome, patch.fees, now, now, tradeId, expected).changes;
      case 'expired':
      case 'error':
        return this.db
          .prepare(
            `
              UPDATE trades
              SET status = ?,
                  error_reason = ?,
                  closed_at = ?,
                  version = version + 1,
                  updated_at = ?
              WHERE id = ? AND status = ?
            `
          )
          .run(patch.to, patch.reason, now, now, tradeId, expected).changes;
    }
  }

  /**
   * Records the order placed for a pending trade. Guarded on status so a
   * trade that moved on meanwhile is never annotated with a late order.
   */
  recordOrderSubmission(tradeId: number, order: { clientOrderId: string; orderId: string | null }): Trade {
    const now = this.nowIso();
    const changes = this.db
      .prepare(
        `
          UPDATE trades
          SET client_order_id = ?,
              order_id = COALESCE(?, order_id),
              order_submitted_at = COALESCE(order_submitted_at, ?),
              version = version + 1,
              updated_at = ?
          WHERE id = ? AND status = 'pending'
        `
      )
      .run(order.clientOrderId, order.orderId, now, now, tradeId).changes;
    if (changes !== 1) {
      throw new StaleStateError(tradeId, 'pending', this.readStatus(tradeId));
    }
    return this.requireTrade(tradeId);
  }

  /**
   * First terminal order outcome wins. Returns whether this call set it and
   * the outcome now on record.
   */
  recordOrderOutcome(tradeId: number, outcome: OrderOutcome): { applied: boolean; outcome: OrderOutcome | null } {
    const now = this.nowIso();
    const changes = this.db
      .prepare(
        `
          UPDATE trades
          SET order_outcome = ?, version = version + 1, updated_at = ?
          WHERE id = ? AND order_outcome IS NULL
        `
      )
      .run(outcome, now, tradeId).changes;
    const trade = this.requireTrade(tradeId);
    return { applied: changes === 1, outcome: trade.orderOutcome };
  }

  setCloseOrder(tradeId: number, closeOrderId: string): void {
    this.db
      .prepare(
        `
          UPDATE trades
          SET close_order_id = ?, version = version + 1, updated_at = ?
          WHERE id = ? AND status = 'closing'
        `
      )
      .run(closeOrderId, this.nowIso(), tradeId);
  }

  acquireLock(tradeId: number, owner: string, ttlMs: number): boolean {
    const nowMs = this.clock();
    const changes = this.db
      .prepare(
        `
          UPDATE active_trades
          SET lock_owner = ?, lock_expires_at = ?
          WHERE trade_id = ?
            AND (lock_owner IS NULL OR lock_owner = ? OR lock_expires_at < ?)
        `
      )
      .run(owner, nowMs + ttlMs, tradeId, owner, nowMs).changes;
    return changes === 1;
  }

  releaseLock(tradeId: number, owner: string): void {
    this.db
      .prepare(
        `
          UPDATE active_trades
          SET lock_owner = NULL, lock_expires_at = NULL
          WHERE trade_id = ? AND lock_owner = ?
        `
      )
      .run(tradeId, owner);
  }

  recordDrift(tradeId: number, kind: string): number {
    const bump = this.db.transaction((): number => {
      this.db
        .prepare(
          `
            UPDATE active_trades
            SET drift_count = CASE WHEN last_drift_kind = ? OR last_drift_kind IS NULL THEN drift_count + 1 ELSE 1 END,
                last_drift_kind = ?,
                updated_at = ?
            WHERE trade_id = ?
          `
        )
        .run(kind, kind, this.nowIso(), tradeId);
      const row = this.db
        .prepare<[number], Row>(`SELECT drift_count FROM active_trades WHERE trade_id = ?`)
        .get(tradeId);
      return Number(row?.drift_count ?? 0);
    });
    return bump.immediate();
  }

  clearDrift(tradeId: number): void {
    this.db
      .prepare(
        `
          UPDATE active_trades
          SET drift_count = 0, last_drift_kind = NULL
          WHERE trade_id = ? AND drift_count <> 0
        `
      )
      .run(tradeId);
  }

  freeze(
    tradeId: number,
    alert: { localStatus: TradeStatus; venueState: string; consecutive: number; detail?: Record<string, unknown> }
  ): ReconciliationAlert {
    const run = this.db.transaction((): number => {
      const now = this.nowIso();
      this.db
        .prepare(
          `
            UPDATE active_trades
            SET frozen = 1, frozen_reason = ?, frozen_at = ?, updated_at = ?
            WHERE trade_id = ?
          `
        )
        .run(`reconciliation_drift:${alert.venueState}`, now, now, tradeId);
      const result = this.db
        .prepare(
          `
            INSERT INTO reconciliation_alerts (
              trade_id, local_status, venue_state, consecutive, detail_json, created_at
            ) VALUES (?, ?, ?, ?, ?, ?)
          `
        )
        .run(
          tradeId,
          alert.localStatus,
          alert.venueState,
          alert.consecutive,
          alert.detail ? JSON.stringify(alert.detail) : null,
          now
        );
      return Number(result.lastInsertRowid);
    });
    const alertId = run.immediate();
    const row = this.db
      .prepare<[number], Row>(`SELECT * FROM reconciliation_alerts WHERE id = ?`)
      .get(alertId);
    if (!row) {
      throw new Error(`Reconciliation alert ${alertId} missing after insert`);
    }
    return hydrateAlert(row);
  }

  resolveFreeze(tradeId: number, resolution: string): boolean {
    const run = this.db.transaction((): boolean => {
      const now = this.nowIso();
      const changes = this.db
        .prepare(
          `
            UPDATE active_trades
            SET frozen = 0, frozen_reason = NULL, frozen_at = NULL,
                drift_count = 0, last_drift_kind = NULL, updated_at = ?
            WHERE trade_id = ? AND frozen = 1
          `
        )
        .run(now, tradeId).changes;
      this.db
        .prepare(
          `
            UPDATE reconciliation_alerts
            SET resolved_at = ?, resolution = ?
            WHERE trade_id = ? AND resolved_at IS NULL
          `
        )
        .run(now, resolution, tradeId);
      return changes === 1;
    });
    return run.immediate();
  }

  // --------------------------------------------------------------------------
  // Read contract
  // --------------------------------------------------------------------------

  getTrade(tradeId: number): Trade | null {
    const row = this.db.prepare<[number], Row>(`SELECT * FROM trades WHERE id = ?`).get(tradeId);
    return row ? hydrateTrade(row) : null;
  }

  requireTrade(tradeId: number): Trade {
    const trade = this.getTrade(tradeId);
    if (!trade) {
      throw new TradeNotFoundError(tradeId);
    }
    return trade;
  }

  getTradeByClientOrderId(clientOrderId: string): Trade | null {
    const row = this.db
      .prepare<[string], Row>(`SELECT * FROM trades WHERE client_order_id = ?`)
      .get(clientOrderId);
    return row ? hydrateTrade(row) : null;
  }

  getTradeByOrderId(orderId: string): Trade | null {
    const row = this.db
      .prepare<[string, string], Row>(`SELECT * FROM trades WHERE order_id = ? OR close_order_id = ? LIMIT 1`)
      .get(orderId, orderId);
    return row ? hydrateTrade(row) : null;
  }

  findOpenTrade(key: { eventTicker: string; strike: number; side: TradeSide }): Trade | null {
    const row = this.db
      .prepare<[string, number, string], Row>(
        `
          SELECT *
          FROM trades
          WHERE event_ticker = ? AND strike = ? AND side = ?
            AND status IN ('pending', 'active', 'closing')
          LIMIT 1
        `
      )
      .get(key.eventTicker, key.strike, key.side);
    return row ? hydrateTrade(row) : null;
  }

  listTrades(query: TradeQuery = {}): Trade[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    const statuses = query.status == null ? [] : Array.isArray(query.status) ? query.status : [query.status];
    if (statuses.length > 0) {
      clauses.push(`status IN (${statuses.map(() => '?').join(', ')})`);
      params.push(...statuses);
    }
    if (query.since) {
      clauses.push('created_at >= ?');
      params.push(query.since);
    }
    if (query.until) {
      clauses.push('created_at < ?');
      params.push(query.until);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const limit = Math.max(1, Math.min(10_000, Math.floor(query.limit ?? 500)));
    const rows = this.db
      .prepare<Array<string | number>, Row>(`SELECT * FROM trades ${where} ORDER BY id DESC LIMIT ${limit}`)
      .all(...params);
    return rows.map(hydrateTrade);
  }

  listActiveTrades(): ActiveTradeView[] {
    const rows = this.db
      .prepare<[], Row>(
        `
          SELECT t.*,
                 a.trade_id,
                 a.status AS active_status,
                 a.lock_owner,
                 a.lock_expires_at,
                 a.drift_count,
                 a.last_drift_kind,
                 a.frozen,
                 a.frozen_reason,
                 a.frozen_at,
                 a.updated_at AS active_updated_at
          FROM active_trades a
          JOIN trades t ON t.id = a.trade_id
          ORDER BY t.id ASC
        `
      )
      .all();
    return rows.map((row) => ({ trade: hydrateTrade(row), active: hydrateActive(row) }));
  }

  getActiveTrade(tradeId: number): ActiveTrade | null {
    const row = this.db
      .prepare<[number], Row>(`SELECT * FROM active_trades WHERE trade_id = ?`)
      .get(tradeId);
    return row ? hydrateActive(row) : null;
  }

  listTradeEvents(tradeId: number): TradeEvent[] {
    const rows = this.db
      .prepare<[number], Row>(`SELECT * FROM trade_events WHERE trade_id = ? ORDER BY id ASC`)
      .all(tradeId);
    return rows.map(hydrateEvent);
  }

  listAlerts(options?: { unresolvedOnly?: boolean }): ReconciliationAlert[] {
    const where = options?.unresolvedOnly ? 'WHERE resolved_at IS NULL' : '';
    const rows = this.db
      .prepare<[], Row>(`SELECT * FROM reconciliation_alerts ${where} ORDER BY id DESC`)
      .all();
    return rows.map(hydrateAlert);
  }

  private readStatus(tradeId: number): TradeStatus {
    const row = this.db.prepare<[number], Row>(`SELECT status FROM trades WHERE id = ?`).get(tradeId);
    if (!row) {
      throw new TradeNotFoundError(tradeId);
    }
    return parseTradeStatus(row.status);
  }

  private insertEvent(
    tradeId: number,
    from: TradeStatus | null,
    to: TradeStatus,
    reason: string,
    detail: Record<string, unknown> | null,
    at: string
  ): void {
    this.db
      .prepare(
        `
          INSERT INTO trade_events (trade_id, from_status, to_status, reason, detail_json, at)
          VALUES (?, ?, ?, ?, ?, ?)
        `
      )
      .run(tradeId, from, to, reason, detail ? JSON.stringify(detail) : null, at);
  }
}
