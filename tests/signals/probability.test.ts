import { describe, it, expect } from 'vitest';

import { ConfigError } from '../../src/core/errors.js';
import {
  adjustProbability,
  baseProbabilityBps,
  interpolateBase,
  loadBaseTable,
  meetsEntryThreshold,
  parseBaseTable,
  ProbabilityModel,
  venueImpliedBps,
} from '../../src/signals/probability.js';

const table = loadBaseTable();

describe('base probability table', () => {
  it('returns grid values exactly', () => {
    expect(interpolateBase(table, 5, 0.2)).toBe(9320);
    expect(interpolateBase(table, 10, 0)).toBe(5000);
  });

  it('interpolates between rows', () => {
    expect(interpolateBase(table, 7.5, 0.2)).toBe(8931);
  });

  it('clamps outside the grid', () => {
    expect(interpolateBase(table, 0.5, 0.2)).toBe(interpolateBase(table, 1, 0.2));
    expect(interpolateBase(table, 120, 10)).toBe(9999);
  });

  it('complements the value for the out-of-the-money side', () => {
    const input = { spot: 100_000, strike: 99_800, ttcMinutes: 5 };
    expect(baseProbabilityBps(table, { ...input, side: 'yes' })).toBe(9320);
    expect(baseProbabilityBps(table, { ...input, side: 'no' })).toBe(680);
  });

  it('rejects a malformed table', () => {
    expect(() => parseBaseTable({ ttcMinutes: [1, 2], bufferPct: [0, 1], probabilityBps: [[5000, 6000]] })).toThrow(
      ConfigError
    );
  });

  it('reports an unreadable table path as a config error', () => {
    expect(() => loadBaseTable('/nonexistent/base_probability.json')).toThrow(ConfigError);
  });
});

describe('momentum adjustment', () => {
  it('adds gain × momentum in the last five minutes', () => {
    expect(
      adjustProbability({ baseBps: 9400, momentum: 0.02, side: 'yes', ttcMinutes: 5, volatile: false })
    ).toEqual({ adjustedBps: 9700, shiftBps: 300 });
  });

  it('works against the no side', () => {
    expect(
      adjustProbability({ baseBps: 9400, momentum: 0.02, side: 'no', ttcMinutes: 5, volatile: false }).shiftBps
    ).toBe(-300);
  });

  it('ramps in as expiry approaches', () => {
    expect(
      adjustProbability({ baseBps: 9400, momentum: 0.02, side: 'yes', ttcMinutes: 2.5, volatile: false }).shiftBps
    ).toBe(150);
  });

  it('dampens but never vetoes in volatile markets', () => {
    expect(
      adjustProbability({ baseBps: 9400, momentum: 0.02, side: 'yes', ttcMinutes: 5, volatile: true })
    ).toEqual({ adjustedBps: 9550, shiftBps: 150 });
  });

  it('clamps to the bps range', () => {
    expect(
      adjustProbability({ baseBps: 9900, momentum: 0.1, side: 'yes', ttcMinutes: 5, volatile: false }).adjustedBps
    ).toBe(10_000);
    expect(
      adjustProbability({ baseBps: 100, momentum: 0.1, side: 'no', ttcMinutes: 5, volatile: false }).adjustedBps
    ).toBe(0);
  });
});

describe('entry threshold', () => {
  it('is inclusive at 9600 bps', () => {
    expect(meetsEntryThreshold(9600)).toBe(true);
    expect(meetsEntryThreshold(9599)).toBe(false);
  });

  it('reads the venue-implied probability from the ask', () => {
    expect(venueImpliedBps(90)).toBe(9000);
  });
});

describe('ProbabilityModel', () => {
  it('combines the base lookup and momentum shift', () => {
    const model = new ProbabilityModel(table);
    expect(
      model.estimate({ spot: 100_000, strike: 99_800, side: 'yes', ttcSeconds: 300, momentum: 0.01, volatile: false })
    ).toEqual({ baseBps: 9320, shiftBps: 150, adjustedBps: 9470, bufferPct: 0.2 });
  });
});
