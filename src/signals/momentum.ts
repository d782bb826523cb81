import { InsufficientHistoryError } from '../core/errors.js';
import type { PriceTick } from '../feed/types.js';
import { PriceSeries, isVolatile } from './series.js';

export type MomentumInterval = '1m' | '2m' | '3m' | '4m' | '15m' | '30m';

export const MOMENTUM_INTERVAL_SECONDS: Record<MomentumInterval, number> = {
  '1m': 60,
  '2m': 120,
  '3m': 180,
  '4m': 240,
  '15m': 900,
  '30m': 1800,
};

// Basis points; the weights sum to exactly 10000.
export const MOMENTUM_WEIGHTS_BPS: Record<MomentumInterval, number> = {
  '1m': 3000,
  '2m': 2500,
  '3m': 2000,
  '4m': 1500,
  '15m': 500,
  '30m': 500,
};

export const MOMENTUM_HISTORY_SECONDS = 1800;

const INTERVALS: MomentumInterval[] = ['1m', '2m', '3m', '4m', '15m', '30m'];

export interface MomentumSample {
  timestamp: number;
  momentum: number;
  deltas: Record<MomentumInterval, number>;
}

export type MomentumResult =
  | { kind: 'ready'; sample: MomentumSample }
  | { kind: 'insufficient'; haveSeconds: number; needSeconds: number };

export interface MomentumOptions {
  volatilityWindowSeconds: number;
  volatilityThresholdPct: number;
  /** Longest feed silence that is forward-filled; longer gaps restart history. */
  maxGapSeconds: number;
}

const DEFAULT_OPTIONS: MomentumOptions = {
  volatilityWindowSeconds: 30,
  volatilityThresholdPct: 0.03,
  maxGapSeconds: 60,
};

export class MomentumEngine {
  private options: MomentumOptions;
  private series: PriceSeries;

  constructor(options: Partial<MomentumOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.series = new PriceSeries(MOMENTUM_HISTORY_SECONDS + 1, this.options.maxGapSeconds);
  }

  addTick(tick: PriceTick): void {
    this.series.record(tick);
  }

  warmUp(ticks: PriceTick[]): void {
    for (const tick of ticks) {
      this.series.record(tick);
    }
  }

  latestPrice(): number | null {
    return this.series.latest()?.price ?? null;
  }

  historySeconds(): number {
    return this.series.historySeconds();
  }

  isVolatile(): boolean {
    return isVolatile(this.series, this.options.volatilityWindowSeconds, this.options.volatilityThresholdPct);
  }

  current(): MomentumResult {
    const latest = this.series.latest();
    const have = this.series.historySeconds();
    if (!latest || have < MOMENTUM_HISTORY_SECONDS) {
      return { kind: 'insufficient', haveSeconds: have, needSeconds: MOMENTUM_HISTORY_SECONDS };
    }

    let weighted = 0;
    const deltas: Partial<Record<MomentumInterval, number>> = {};
    for (const interval of INTERVALS) {
      const past = this.series.priceSecondsAgo(MOMENTUM_INTERVAL_SECONDS[interval]);
      if (past == null || past <= 0) {
        return { kind: 'insufficient', haveSeconds: have, needSeconds: MOMENTUM_HISTORY_SECONDS };
      }
      const delta = ((latest.price - past) / past) * 100;
      deltas[interval] = delta;
      weighted += MOMENTUM_WEIGHTS_BPS[interval] * delta;
    }

    return {
      kind: 'ready',
      sample: {
        timestamp: latest.second * 1000,
        momentum: weighted / 10_000,
        deltas: {
          '1m': deltas['1m'] ?? 0,
          '2m': deltas['2m'] ?? 0,
          '3m': deltas['3m'] ?? 0,
          '4m': deltas['4m'] ?? 0,
          '15m': deltas['15m'] ?? 0,
          '30m': deltas['30m'] ?? 0,
        },
      },
    };
  }

  requireMomentum(): MomentumSample {
    const result = this.current();
    if (result.kind === 'insufficient') {
      throw new InsufficientHistoryError(result.haveSeconds, result.needSeconds);
    }
    return result.sample;
  }
}
