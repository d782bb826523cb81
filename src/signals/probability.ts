import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { ConfigError } from '../core/errors.js';
import type { TradeSide } from '../trade-management/types.js';

export const ENTRY_PROBABILITY_THRESHOLD_BPS = 9600;

export const MAX_BPS = 10_000;

const BaseTableSchema = z
  .object({
    ttcMinutes: z.array(z.number()).min(2),
    bufferPct: z.array(z.number()).min(2),
    probabilityBps: z.array(z.array(z.number().int().min(0).max(MAX_BPS))),
  })
  .refine((t) => t.probabilityBps.length === t.ttcMinutes.length, {
    message: 'probabilityBps needs one row per ttcMinutes entry',
  })
  .refine((t) => t.probabilityBps.every((row) => row.length === t.bufferPct.length), {
    message: 'every probabilityBps row needs one value per bufferPct entry',
  });

/**
 * Historical probability (bps) that the in-the-money side is still in the
 * money at settlement, indexed by minutes to close and distance from strike.
 */
export type BaseProbabilityTable = z.infer<typeof BaseTableSchema>;

export function defaultBaseTablePath(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return join(here, '..', '..', 'data', 'base_probability.json');
}

export function parseBaseTable(raw: unknown): BaseProbabilityTable {
  const result = BaseTableSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid base probability table: ${result.error.issues.map((i) => i.message).join('; ')}`);
  }
  return result.data;
}

export function loadBaseTable(path?: string): BaseProbabilityTable {
  const resolved = path ?? defaultBaseTablePath();
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to read base probability table ${resolved}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseBaseTable(parsed);
}

function bracket(axis: number[], value: number): { lo: number; hi: number; frac: number } {
  const last = axis.length - 1;
  const first = axis[0] ?? 0;
  const end = axis[last] ?? 0;
  if (value <= first) return { lo: 0, hi: 0, frac: 0 };
  if (value >= end) return { lo: last, hi: last, frac: 0 };
  for (let i = 0; i < last; i += 1) {
    const a = axis[i] ?? 0;
    const b = axis[i + 1] ?? 0;
    if (value >= a && value <= b) {
      return { lo: i, hi: i + 1, frac: b === a ? 0 : (value - a) / (b - a) };
    }
  }
  return { lo: last, hi: last, frac: 0 };
}

/** Bilinear lookup, clamped to the grid edges. */
export function interpolateBase(table: BaseProbabilityTable, ttcMinutes: number, bufferPct: number): number {
  const t = bracket(table.ttcMinutes, ttcMinutes);
  const b = bracket(table.bufferPct, bufferPct);
  const cell = (row: number, col: number): number => table.probabilityBps[row]?.[col] ?? 0;

  const top = cell(t.lo, b.lo) + (cell(t.lo, b.hi) - cell(t.lo, b.lo)) * b.frac;
  const bottom = cell(t.hi, b.lo) + (cell(t.hi, b.hi) - cell(t.hi, b.lo)) * b.frac;
  return Math.round(top + (bottom - top) * t.frac);
}

export function bufferPct(spot: number, strike: number): number {
  return spot > 0 ? (Math.abs(spot - strike) / spot) * 100 : 0;
}

export function isInTheMoney(side: TradeSide, spot: number, strike: number): boolean {
  return side === 'yes' ? spot > strike : spot < strike;
}

export function baseProbabilityBps(
  table: BaseProbabilityTable,
  input: { spot: number; strike: number; side: TradeSide; ttcMinutes: number }
): number {
  const value = interpolateBase(table, input.ttcMinutes, bufferPct(input.spot, input.strike));
  if (input.spot === input.strike || isInTheMoney(input.side, input.spot, input.strike)) {
    return value;
  }
  return MAX_BPS - value;
}

export interface AdjustmentParams {
  momentumGainBps: number;
  momentumFullEffectMinutes: number;
  volatilityDampening: number;
}

export const DEFAULT_ADJUSTMENT: AdjustmentParams = {
  momentumGainBps: 15_000,
  momentumFullEffectMinutes: 5,
  volatilityDampening: 0.5,
};

export function clampBps(value: number): number {
  return Math.min(MAX_BPS, Math.max(0, Math.round(value)));
}

/**
 * Shifts the base probability by momentum. Positive momentum favours `yes`,
 * the effect ramps in over the last minutes and is dampened (never vetoed)
 * when the volatility flag is set.
 */
export function adjustProbability(
  input: { baseBps: number; momentum: number; side: TradeSide; ttcMinutes: number; volatile: boolean },
  params: AdjustmentParams = DEFAULT_ADJUSTMENT
): { adjustedBps: number; shiftBps: number } {
  const signed = input.side === 'yes' ? input.momentum : -input.momentum;
  const ttcFactor =
    params.momentumFullEffectMinutes > 0
      ? Math.min(1, Math.max(0, input.ttcMinutes) / params.momentumFullEffectMinutes)
      : 1;
  const dampening = input.volatile ? params.volatilityDampening : 1;
  const shiftBps = Math.round(signed * params.momentumGainBps * ttcFactor * dampening);
  return { adjustedBps: clampBps(input.baseBps + shiftBps), shiftBps };
}

export function venueImpliedBps(askCents: number): number {
  return clampBps(askCents * 100);
}

export function meetsEntryThreshold(adjustedBps: number): boolean {
  return adjustedBps >= ENTRY_PROBABILITY_THRESHOLD_BPS;
}

export interface ProbabilityEstimate {
  baseBps: number;
  shiftBps: number;
  adjustedBps: number;
  bufferPct: number;
}

export class ProbabilityModel {
  constructor(
    private table: BaseProbabilityTable,
    private params: AdjustmentParams = DEFAULT_ADJUSTMENT
  ) {}

  estimate(input: {
    spot: number;
    strike: number;
    side: TradeSide;
    ttcSeconds: number;
    momentum: number;
    volatile: boolean;
  }): ProbabilityEstimate {
    const ttcMinutes = input.ttcSeconds / 60;
    const baseBps = baseProbabilityBps(this.table, {
      spot: input.spot,
      strike: input.strike,
      side: input.side,
      ttcMinutes,
    });
    const { adjustedBps, shiftBps } = adjustProbability(
      { baseBps, momentum: input.momentum, side: input.side, ttcMinutes, volatile: input.volatile },
      this.params
    );
    return { baseBps, shiftBps, adjustedBps, bufferPct: bufferPct(input.spot, input.strike) };
  }
}
