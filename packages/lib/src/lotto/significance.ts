// packages/lib/src/lotto/significance.ts
import { numberRange } from '../gameRegistry.js';
import type { FrequencyTable, SignificanceEntry, SignificanceTable } from './types.js';

/** |residual| above this flags a number (two-tailed, ~95%). */
export const SIGNIFICANCE_THRESHOLD = 2.0;

/**
 * Standardized residual of every number in 1..rangeSize against a uniform
 * null model where each of `drawsPerRecord` slots is equally likely to hold
 * any number:
 *
 *   expected = totalDraws * drawsPerRecord / rangeSize
 *   sd       = sqrt(expected * (1 - 1/rangeSize))
 *
 * A zero sd (no draws) yields residual 0 and not significant.
 */
export function significance(
  table: FrequencyTable,
  totalDraws: number,
  drawsPerRecord: number,
  rangeSize: number,
): SignificanceTable {
  const expected = rangeSize > 0 ? (totalDraws * drawsPerRecord) / rangeSize : 0;
  const sd = rangeSize > 0 ? Math.sqrt(expected * (1 - 1 / rangeSize)) : 0;

  const out = new Map<number, SignificanceEntry>();
  for (const n of numberRange(rangeSize)) {
    const observed = table.get(n) ?? 0;
    const residual = sd > 0 ? (observed - expected) / sd : 0;
    out.set(n, {
      observed,
      expected,
      residual,
      significant: Math.abs(residual) > SIGNIFICANCE_THRESHOLD,
    });
  }
  return out;
}

/** Numbers flagged significant, strongest residual first. */
export function significantNumbers(table: SignificanceTable): number[] {
  return [...table.entries()]
    .filter(([, e]) => e.significant)
    .sort((a, b) => Math.abs(b[1].residual) - Math.abs(a[1].residual) || a[0] - b[0])
    .map(([n]) => n);
}
