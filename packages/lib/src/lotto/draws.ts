// packages/lib/src/lotto/draws.ts
import { gameConfig } from '../gameRegistry.js';
import { InvalidDrawError, type DrawIssue } from './errors.js';
import type { CombinationIndex, Draw, DrawCollection, GameType } from './types.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isIsoDate(s: string): boolean {
  if (!ISO_DATE.test(s)) return false;
  const d = new Date(`${s}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === s;
}

/** Every way `draw` breaks the record invariant for `game`. Empty means valid. */
export function checkDraw(draw: Draw, game: GameType): DrawIssue[] {
  const cfg = gameConfig(game);
  const issues: DrawIssue[] = [];

  if (draw.type !== game) issues.push({ field: 'type', message: `expected ${game}, got ${String(draw.type)}` });
  if (!isIsoDate(draw.date)) issues.push({ field: 'date', message: `not an ISO calendar date: "${draw.date}"` });

  if (draw.numbers.length !== cfg.regularPick) {
    issues.push({ field: 'numbers', message: `expected ${cfg.regularPick} numbers, got ${draw.numbers.length}` });
  }
  for (const n of draw.numbers) {
    if (!Number.isInteger(n) || n < 1 || n > cfg.regularMax) {
      issues.push({ field: 'numbers', message: `${n} is outside 1..${cfg.regularMax}` });
    }
  }
  if (new Set(draw.numbers).size !== draw.numbers.length) {
    issues.push({ field: 'numbers', message: `duplicate regular number in ${draw.numbers.join(',')}` });
  }

  const sb = draw.specialBall;
  if (!Number.isInteger(sb) || sb < 1 || sb > cfg.specialMax) {
    issues.push({ field: 'specialBall', message: `${sb} is outside 1..${cfg.specialMax}` });
  }
  return issues;
}

export function assertValidDraw(draw: Draw, game: GameType): void {
  const issues = checkDraw(draw, game);
  if (issues.length) throw new InvalidDrawError(game, draw.date, issues);
}

/** Canonical key of an unordered regular-number set. */
export function combinationKey(numbers: readonly number[]): string {
  return [...numbers].sort((a, b) => a - b).join('-');
}

export function combinationIndex(draws: DrawCollection): CombinationIndex {
  return new Set(draws.map((d) => combinationKey(d.numbers)));
}

/** Newest first (ISO dates compare lexically). */
export function sortDraws(draws: readonly Draw[]): Draw[] {
  return [...draws].sort((a, b) => b.date.localeCompare(a.date));
}

/**
 * Union of `existing` and `incoming`, deduplicated by date. A later record for
 * the same date replaces the earlier one. Every record is validated.
 */
export function mergeDraws(
  game: GameType,
  existing: readonly Draw[],
  incoming: readonly Draw[] = [],
): DrawCollection {
  const byDate = new Map<string, Draw>();
  for (const d of [...existing, ...incoming]) {
    assertValidDraw(d, game);
    byDate.set(d.date, d);
  }
  return Object.freeze(sortDraws([...byDate.values()]));
}

/** Records strictly after `isoDate` (all of them when null). */
export function drawsAfter(draws: readonly Draw[], isoDate: string | null): Draw[] {
  if (!isoDate) return [...draws];
  return draws.filter((d) => d.date > isoDate);
}

export function latestDrawDate(draws: DrawCollection): string | null {
  let latest: string | null = null;
  for (const d of draws) if (latest === null || d.date > latest) latest = d.date;
  return latest;
}
