import type { PriceTick } from '../feed/types.js';

/**
 * Per-second price ring. Each slot holds the last price seen in that second;
 * seconds without a tick are forward-filled from the previous slot, up to
 * `maxGapSeconds`. A longer silence restarts the window at the new tick.
 */
export class PriceSeries {
  private slots: Float64Array;
  private firstSecond: number | null = null;
  private lastSecond: number | null = null;

  constructor(
    private capacity: number,
    private maxGapSeconds: number = capacity
  ) {
    if (!Number.isInteger(capacity) || capacity < 2) {
      throw new Error(`PriceSeries capacity must be an integer >= 2, got ${capacity}`);
    }
    this.slots = new Float64Array(capacity);
  }

  record(tick: PriceTick): void {
    const second = Math.floor(tick.timestamp / 1000);
    if (this.lastSecond == null || this.firstSecond == null || second - this.lastSecond > this.maxGapSeconds) {
      this.firstSecond = second;
      this.lastSecond = second;
      this.slots[this.index(second)] = tick.price;
      return;
    }
    if (second < this.lastSecond) {
      // Late tick for a second we already forward-filled past.
      if (second >= this.oldestSecond()) {
        this.slots[this.index(second)] = tick.price;
      }
      return;
    }
    if (second > this.lastSecond) {
      const previous = this.slots[this.index(this.lastSecond)] ?? tick.price;
      const fillFrom = Math.max(this.lastSecond + 1, second - this.capacity + 1);
      for (let s = fillFrom; s < second; s += 1) {
        this.slots[this.index(s)] = previous;
      }
      this.lastSecond = second;
    }
    this.slots[this.index(second)] = tick.price;
  }

  /** Seconds of history behind the latest slot, capped by the ring size. */
  historySeconds(): number {
    if (this.lastSecond == null) return 0;
    return this.lastSecond - this.oldestSecond();
  }

  latest(): { second: number; price: number } | null {
    if (this.lastSecond == null) return null;
    return { second: this.lastSecond, price: this.slots[this.index(this.lastSecond)] ?? 0 };
  }

  /** Price `secondsAgo` seconds before the latest slot, or null outside the window. */
  priceSecondsAgo(secondsAgo: number): number | null {
    if (this.lastSecond == null || secondsAgo < 0) return null;
    const second = this.lastSecond - secondsAgo;
    if (second < this.oldestSecond()) return null;
    return this.slots[this.index(second)] ?? null;
  }

  /** The last `count` slot prices, oldest first. */
  recent(count: number): number[] {
    const prices: number[] = [];
    const available = Math.min(count, this.historySeconds() + 1);
    for (let ago = available - 1; ago >= 0; ago -= 1) {
      const price = this.priceSecondsAgo(ago);
      if (price != null) prices.push(price);
    }
    return prices;
  }

  private oldestSecond(): number {
    if (this.lastSecond == null || this.firstSecond == null) return 0;
    return Math.max(this.firstSecond, this.lastSecond - this.capacity + 1);
  }

  private index(second: number): number {
    return ((second % this.capacity) + this.capacity) % this.capacity;
  }
}

/**
 * Relative standard deviation (percent of mean) of the given prices.
 */
export function relativeStdDevPct(prices: number[]): number {
  if (prices.length < 2) return 0;
  const mean = prices.reduce((sum, p) => sum + p, 0) / prices.length;
  if (mean <= 0) return 0;
  const variance = prices.reduce((sum, p) => sum + (p - mean) ** 2, 0) / prices.length;
  return (Math.sqrt(variance) / mean) * 100;
}

export function isVolatile(series: PriceSeries, windowSeconds: number, thresholdPct: number): boolean {
  return relativeStdDevPct(series.recent(windowSeconds)) > thresholdPct;
}
