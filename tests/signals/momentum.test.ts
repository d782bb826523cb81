import { describe, it, expect } from 'vitest';

import { InsufficientHistoryError } from '../../src/core/errors.js';
import type { PriceTick } from '../../src/feed/types.js';
import { MOMENTUM_WEIGHTS_BPS, MomentumEngine } from '../../src/signals/momentum.js';
import { PriceSeries, relativeStdDevPct } from '../../src/signals/series.js';

const T0 = 1_790_000_000_000;

function at(seconds: number, price: number) {
  return { timestamp: T0 + seconds * 1000, price };
}

/** One tick per second from `from` to `to` inclusive. */
function flat(from: number, to: number, price: number) {
  const ticks: PriceTick[] = [];
  for (let s = from; s <= to; s += 1) ticks.push(at(s, price));
  return ticks;
}

describe('MomentumEngine', () => {
  it('uses weights that sum to 10000 bps', () => {
    expect(Object.values(MOMENTUM_WEIGHTS_BPS).reduce((a, b) => a + b, 0)).toBe(10_000);
  });

  it('needs thirty minutes of history', () => {
    const engine = new MomentumEngine();
    engine.warmUp(flat(0, 1799, 100));
    expect(engine.current()).toEqual({ kind: 'insufficient', haveSeconds: 1799, needSeconds: 1800 });
    expect(() => engine.requireMomentum()).toThrow(InsufficientHistoryError);
  });

  it('is zero for a flat price', () => {
    const engine = new MomentumEngine();
    engine.warmUp(flat(0, 1800, 100));
    expect(engine.requireMomentum().momentum).toBe(0);
  });

  it('equals the common delta when every interval moved the same', () => {
    const engine = new MomentumEngine();
    engine.warmUp([...flat(0, 1799, 100), at(1800, 101)]);
    const sample = engine.requireMomentum();
    expect(sample.momentum).toBeCloseTo(1, 10);
    expect(sample.timestamp).toBe(T0 + 1_800_000);
    expect(sample.deltas['30m']).toBeCloseTo(1, 10);
  });

  it('weights the short intervals most', () => {
    const engine = new MomentumEngine();
    engine.warmUp([...flat(0, 899, 100), ...flat(900, 1739, 101), ...flat(1740, 1799, 102), at(1800, 103)]);
    const sample = engine.requireMomentum();
    expect(sample.deltas['1m']).toBeCloseTo(0.980392, 6);
    expect(sample.deltas['4m']).toBeCloseTo(1.980198, 6);
    expect(sample.deltas['30m']).toBeCloseTo(3, 10);
    expect(sample.momentum).toBeCloseTo(1.731246, 6);
  });

  it('forward-fills short gaps and keeps only the last thirty minutes', () => {
    const engine = new MomentumEngine();
    const sparse: PriceTick[] = [];
    for (let s = 0; s <= 4980; s += 30) sparse.push(at(s, 100));
    engine.warmUp([...sparse, at(5000, 110)]);
    expect(engine.historySeconds()).toBe(1800);
    expect(engine.requireMomentum().momentum).toBeCloseTo(10, 10);
  });

  it('fills a gap of exactly the configured maximum', () => {
    const engine = new MomentumEngine({ maxGapSeconds: 60 });
    engine.warmUp([...flat(0, 1740, 100), at(1800, 101)]);
    expect(engine.requireMomentum().momentum).toBeCloseTo(1, 10);
  });

  it('restarts history after a feed outage instead of inventing prices', () => {
    const engine = new MomentumEngine({ maxGapSeconds: 60 });
    engine.warmUp([at(0, 100), at(7200, 150)]);
    expect(engine.current()).toEqual({ kind: 'insufficient', haveSeconds: 0, needSeconds: 1800 });

    const resumed = new MomentumEngine({ maxGapSeconds: 60 });
    resumed.warmUp([...flat(0, 1800, 100), at(1861, 101)]);
    expect(resumed.current()).toEqual({ kind: 'insufficient', haveSeconds: 0, needSeconds: 1800 });
    expect(resumed.latestPrice()).toBe(101);
  });

  it('flags a choppy window as volatile', () => {
    const calm = new MomentumEngine({ volatilityWindowSeconds: 30, volatilityThresholdPct: 0.03 });
    const choppy = new MomentumEngine({ volatilityWindowSeconds: 30, volatilityThresholdPct: 0.03 });
    for (let s = 0; s <= 40; s += 1) {
      calm.addTick(at(s, 100));
      choppy.addTick(at(s, s % 2 === 0 ? 100 : 101));
    }
    expect(calm.isVolatile()).toBe(false);
    expect(choppy.isVolatile()).toBe(true);
  });
});

describe('PriceSeries', () => {
  it('keeps the last price seen in each second', () => {
    const series = new PriceSeries(10);
    series.record({ timestamp: 1000, price: 1 });
    series.record({ timestamp: 1500, price: 2 });
    series.record({ timestamp: 3000, price: 4 });
    expect(series.recent(3)).toEqual([2, 2, 4]);
  });

  it('accepts a late tick inside the window', () => {
    const series = new PriceSeries(10);
    series.record({ timestamp: 1000, price: 1 });
    series.record({ timestamp: 3000, price: 3 });
    series.record({ timestamp: 2000, price: 2 });
    expect(series.recent(3)).toEqual([1, 2, 3]);
  });

  it('computes relative standard deviation as a percent of the mean', () => {
    expect(relativeStdDevPct([100, 100])).toBe(0);
    expect(relativeStdDevPct([99, 101])).toBeCloseTo(1, 10);
  });
});
