// packages/lib/src/lotto/frequency.ts
import { gameConfig, numberRange } from '../gameRegistry.js';
import { assertValidDraw } from './draws.js';
import {
  ALL_POSITIONS,
  REGULAR_POSITIONS,
  SPECIAL_POSITION,
  type DrawCollection,
  type FrequencyTable,
  type GameType,
  type Position,
  type PositionalFrequencyTable,
} from './types.js';

/* -------------------------------------------------------
   Frequency counting (no fetch, no IO, deterministic)
   ------------------------------------------------------- */

export type FrequencyAnalysis = {
  frequency: FrequencyTable;
  frequencyAtPosition: PositionalFrequencyTable;
  specialBallFrequency: FrequencyTable;
};

/** Count descending, number ascending on ties. */
export function compareFrequencyEntries(a: readonly [number, number], b: readonly [number, number]): number {
  return b[1] - a[1] || a[0] - b[0];
}

/** Materialize counts in canonical table order. */
export function toFrequencyTable(counts: Iterable<readonly [number, number]>): FrequencyTable {
  const entries = Array.from(counts, ([n, c]): [number, number] => [n, c]);
  entries.sort(compareFrequencyEntries);
  return new Map(entries);
}

function zeroCounts(max: number): Map<number, number> {
  return new Map(numberRange(max).map((n) => [n, 0]));
}

function bump(counts: Map<number, number>, n: number): void {
  counts.set(n, (counts.get(n) ?? 0) + 1);
}

export function tableTotal(table: FrequencyTable): number {
  let sum = 0;
  for (const c of table.values()) sum += c;
  return sum;
}

/** Positional table lookup that never yields undefined for a known position. */
export function positionTable(positional: PositionalFrequencyTable, p: Position): FrequencyTable {
  return positional.get(p) ?? new Map<number, number>();
}

/**
 * Aggregate, per-position and special-ball counts. Every number in range is
 * present (zero when never drawn). Draw order does not affect the result.
 * A record outside the game's ranges aborts with InvalidDrawError.
 */
export function analyzeFrequency(game: GameType, draws: DrawCollection): FrequencyAnalysis {
  const cfg = gameConfig(game);

  const aggregate = zeroCounts(cfg.regularMax);
  const special = zeroCounts(cfg.specialMax);
  const atPosition = new Map<Position, Map<number, number>>(
    ALL_POSITIONS.map((p): [Position, Map<number, number>] => [
      p,
      zeroCounts(p === SPECIAL_POSITION ? cfg.specialMax : cfg.regularMax),
    ]),
  );
  const slot = (p: Position): Map<number, number> => {
    const m = atPosition.get(p);
    if (!m) throw new Error(`No counter for position ${p}`);
    return m;
  };

  for (const d of draws) {
    assertValidDraw(d, game);
    for (const p of REGULAR_POSITIONS) {
      const n = d.numbers[p];
      bump(aggregate, n);
      bump(slot(p), n);
    }
    bump(special, d.specialBall);
    bump(slot(SPECIAL_POSITION), d.specialBall);
  }

  return {
    frequency: toFrequencyTable(aggregate),
    frequencyAtPosition: new Map(
      ALL_POSITIONS.map((p): [Position, FrequencyTable] => [p, toFrequencyTable(slot(p))]),
    ),
    specialBallFrequency: toFrequencyTable(special),
  };
}
