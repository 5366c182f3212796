// packages/lib/src/lotto/optimizer.ts
import { combinationKey } from './draws.js';
import { ExhaustedCandidatePoolError } from './errors.js';
import { positionTable } from './frequency.js';
import {
  REGULAR_POSITIONS,
  type CombinationIndex,
  type FrequencyTable,
  type OptimizedCombination,
  type PositionalFrequencyTable,
  type RegularPosition,
} from './types.js';

/* -------------------------------------------------------
   Optimized picks: frequency-favoured, never drawn before.
   Both searches are bounded; running out of candidates is
   an ExhaustedCandidatePoolError, never a colliding pick.
   ------------------------------------------------------- */

export type OptimizerOptions = {
  /** Collision retries before giving up. Defaults to the regular range size. */
  maxAttempts?: number;
};

const PICK = REGULAR_POSITIONS.length;

function toCombination(regular: readonly number[], special: number): OptimizedCombination {
  const [a, b, c, d, e] = regular;
  if (a === undefined || b === undefined || c === undefined || d === undefined || e === undefined) {
    throw new Error(`Expected ${PICK} regular numbers, got ${regular.length}`);
  }
  return [a, b, c, d, e, special];
}

function topSpecial(specialFreq: FrequencyTable, strategy: 'byPosition' | 'byGeneralFrequency'): number {
  for (const n of specialFreq.keys()) return n;
  throw new ExhaustedCandidatePoolError(strategy, 0, []);
}

/**
 * Top number at each regular position. A pick already used by another
 * position goes to whichever position sees it more often (the earlier one on
 * a tie); the other moves to its next candidate, or the keeper moves when the
 * other has none left. A set that was drawn before moves the position with
 * the smallest lead over its next unused candidate (the later one on a tie).
 * Cursors only advance, so the search ends.
 */
export function optimizeByPosition(
  positional: PositionalFrequencyTable,
  specialFreq: FrequencyTable,
  history: CombinationIndex,
  opts: OptimizerOptions = {},
): OptimizedCombination {
  const tables = REGULAR_POSITIONS.map((p) => positionTable(positional, p));
  const ranked = tables.map((t) => [...t.keys()]);
  const cursor = REGULAR_POSITIONS.map(() => 0);
  const maxAttempts = opts.maxAttempts ?? ranked[0]?.length ?? 0;
  const maxSteps = ranked.reduce((sum, r) => sum + r.length, 0);
  const special = topSpecial(specialFreq, 'byPosition');

  let attempts = 0;
  let picks: number[] = [];
  const exhausted = () => new ExhaustedCandidatePoolError('byPosition', attempts, picks);

  const countAt = (p: RegularPosition, n: number | undefined): number =>
    n === undefined ? 0 : tables[p]?.get(n) ?? 0;
  const current = (p: RegularPosition): number | undefined => ranked[p]?.[cursor[p] ?? 0];
  const canAdvance = (p: RegularPosition): boolean => (cursor[p] ?? 0) + 1 < (ranked[p]?.length ?? 0);
  // index of the next candidate at p that no position holds yet, or -1
  const nextFree = (p: RegularPosition): number => {
    const list = ranked[p] ?? [];
    for (let k = (cursor[p] ?? 0) + 1; k < list.length; k++) {
      const n = list[k];
      if (n !== undefined && !picks.includes(n)) return k;
    }
    return -1;
  };

  for (let step = 0; step <= maxSteps; step++) {
    picks = [];
    for (const p of REGULAR_POSITIONS) {
      const n = current(p);
      if (n === undefined) throw exhausted();
      picks.push(n);
    }

    const clash = firstClash(picks);
    if (clash) {
      const [i, j] = clash;
      const shared = picks[i];
      const [loser, keeper]: [RegularPosition, RegularPosition] = countAt(j, shared) <= countAt(i, shared) ? [j, i] : [i, j];
      const mover = canAdvance(loser) ? loser : canAdvance(keeper) ? keeper : null;
      if (mover === null) throw exhausted();
      cursor[mover] = (cursor[mover] ?? 0) + 1;
      continue;
    }

    if (!history.has(combinationKey(picks))) return toCombination(picks, special);

    attempts++;
    if (attempts > maxAttempts) throw exhausted();

    let weakest: RegularPosition | null = null;
    let weakestNext = -1;
    let weakestMargin = Infinity;
    for (const p of REGULAR_POSITIONS) {
      const k = nextFree(p);
      if (k < 0) continue;
      const margin = countAt(p, current(p)) - countAt(p, ranked[p]?.[k]);
      if (margin <= weakestMargin) {
        weakest = p;
        weakestNext = k;
        weakestMargin = margin;
      }
    }
    if (weakest === null) throw exhausted();
    cursor[weakest] = weakestNext;
  }
  throw exhausted();
}

/** First pair of positions holding the same number, lower index first. */
function firstClash(picks: readonly number[]): [RegularPosition, RegularPosition] | null {
  for (const j of REGULAR_POSITIONS) {
    for (const i of REGULAR_POSITIONS) {
      if (i >= j) break;
      if (picks[i] === picks[j]) return [i, j];
    }
  }
  return null;
}

/**
 * The five most frequent numbers overall (ascending number on ties). A set
 * that was drawn before swaps its numerically smallest member for the next
 * ranked number not yet selected. Returned ascending, special ball last.
 */
export function optimizeByGeneralFrequency(
  aggregate: FrequencyTable,
  specialFreq: FrequencyTable,
  history: CombinationIndex,
  opts: OptimizerOptions = {},
): OptimizedCombination {
  const ranked = [...aggregate.keys()];
  const maxAttempts = opts.maxAttempts ?? ranked.length;
  const special = topSpecial(specialFreq, 'byGeneralFrequency');
  const selected = ranked.slice(0, PICK);
  if (selected.length < PICK) {
    throw new ExhaustedCandidatePoolError('byGeneralFrequency', 0, selected);
  }

  let next = PICK;
  for (let attempt = 0; attempt <= maxAttempts; attempt++) {
    if (!history.has(combinationKey(selected))) {
      return toCombination([...selected].sort((a, b) => a - b), special);
    }
    const candidate = ranked[next];
    if (attempt === maxAttempts || candidate === undefined) {
      throw new ExhaustedCandidatePoolError('byGeneralFrequency', attempt + 1, selected);
    }
    next++;
    selected[selected.indexOf(Math.min(...selected))] = candidate;
  }
  throw new ExhaustedCandidatePoolError('byGeneralFrequency', maxAttempts, selected);
}
