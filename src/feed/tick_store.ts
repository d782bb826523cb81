import type Database from 'better-sqlite3';

import type { PriceTick } from './types.js';

type TickRow = { ts: number; price: number };

/** Persists ticks so a restarted process can warm the momentum window. */
export class TickStore {
  constructor(private db: Database.Database) {}

  append(tick: PriceTick): void {
    this.db.prepare(`INSERT INTO price_ticks (ts, price) VALUES (?, ?)`).run(tick.timestamp, tick.price);
  }

  loadSince(sinceMs: number): PriceTick[] {
    return this.db
      .prepare<[number], TickRow>(`SELECT ts, price FROM price_ticks WHERE ts >= ? ORDER BY ts ASC`)
      .all(sinceMs)
      .map((row) => ({ timestamp: Number(row.ts), price: Number(row.price) }));
  }

  prune(olderThanMs: number): number {
    return this.db.prepare(`DELETE FROM price_ticks WHERE ts < ?`).run(olderThanMs).changes;
  }
}
