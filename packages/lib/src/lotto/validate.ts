// packages/lib/src/lotto/validate.ts
import { gameConfig, numberRange } from '../gameRegistry.js';
import { compareFrequencyEntries, positionTable, tableTotal } from './frequency.js';
import {
  ALL_POSITIONS,
  REGULAR_POSITIONS,
  SPECIAL_POSITION,
  type FrequencyTable,
  type OptimizedCombination,
  type Position,
  type StatsArtifact,
} from './types.js';

export type Violation =
  | { kind: 'frequency-total'; expected: number; actual: number; message: string }
  | { kind: 'special-ball-total'; expected: number; actual: number; message: string }
  | { kind: 'position-total'; position: Position; expected: number; actual: number; message: string }
  | { kind: 'positional-decomposition'; number: number; expected: number; actual: number; message: string }
  | { kind: 'unsorted-table'; table: string; index: number; message: string }
  | { kind: 'table-range'; table: string; missing: number[]; unexpected: number[]; message: string }
  | { kind: 'optimized-pick'; field: 'optimizedByPosition' | 'optimizedByGeneralFrequency'; message: string };

function unsortedAt(table: FrequencyTable): number {
  let prev: [number, number] | null = null;
  let i = 0;
  for (const entry of table) {
    if (prev && compareFrequencyEntries(prev, entry) > 0) return i;
    prev = entry;
    i++;
  }
  return -1;
}

function rangeMismatch(table: FrequencyTable, max: number): { missing: number[]; unexpected: number[] } {
  const expected = numberRange(max);
  const missing = expected.filter((n) => !table.has(n));
  const unexpected = [...table.keys()].filter((n) => !Number.isInteger(n) || n < 1 || n > max);
  return { missing, unexpected };
}

function checkPick(
  field: 'optimizedByPosition' | 'optimizedByGeneralFrequency',
  pick: OptimizedCombination | null,
  regularMax: number,
  specialMax: number,
): Violation[] {
  if (pick === null) return [];
  const regular = pick.slice(0, REGULAR_POSITIONS.length);
  const special = pick[SPECIAL_POSITION];
  const problems: string[] = [];
  if (regular.some((n) => !Number.isInteger(n) || n < 1 || n > regularMax)) problems.push(`regular number outside 1..${regularMax}`);
  if (new Set(regular).size !== regular.length) problems.push('repeated regular number');
  if (!Number.isInteger(special) || special < 1 || special > specialMax) problems.push(`special ball outside 1..${specialMax}`);
  return problems.map((p): Violation => ({ kind: 'optimized-pick', field, message: `${field}: ${p} (${pick.join(',')})` }));
}

/**
 * Every internal-consistency violation of an assembled artifact. Read-only;
 * an empty list means the artifact may be published.
 */
export function validateStats(artifact: StatsArtifact): Violation[] {
  const cfg = gameConfig(artifact.type);
  const total = artifact.totalDraws;
  const out: Violation[] = [];

  const freqSum = tableTotal(artifact.frequency);
  if (freqSum !== total * cfg.regularPick) {
    out.push({
      kind: 'frequency-total',
      expected: total * cfg.regularPick,
      actual: freqSum,
      message: `frequency sums to ${freqSum}, expected ${total * cfg.regularPick}`,
    });
  }

  const specialSum = tableTotal(artifact.specialBallFrequency);
  if (specialSum !== total) {
    out.push({
      kind: 'special-ball-total',
      expected: total,
      actual: specialSum,
      message: `specialBallFrequency sums to ${specialSum}, expected ${total}`,
    });
  }

  for (const p of ALL_POSITIONS) {
    const sum = tableTotal(positionTable(artifact.frequencyAtPosition, p));
    if (sum !== total) {
      out.push({
        kind: 'position-total',
        position: p,
        expected: total,
        actual: sum,
        message: `frequencyAtPosition[${p}] sums to ${sum}, expected ${total}`,
      });
    }
  }

  for (const n of numberRange(cfg.regularMax)) {
    const expected = artifact.frequency.get(n) ?? 0;
    let actual = 0;
    for (const p of REGULAR_POSITIONS) actual += positionTable(artifact.frequencyAtPosition, p).get(n) ?? 0;
    if (actual !== expected) {
      out.push({
        kind: 'positional-decomposition',
        number: n,
        expected,
        actual,
        message: `number ${n}: positions 0-4 sum to ${actual}, frequency is ${expected}`,
      });
    }
  }

  const tables: Array<[string, FrequencyTable, number]> = [
    ['frequency', artifact.frequency, cfg.regularMax],
    ['specialBallFrequency', artifact.specialBallFrequency, cfg.specialMax],
    ...ALL_POSITIONS.map((p): [string, FrequencyTable, number] => [
      `frequencyAtPosition[${p}]`,
      positionTable(artifact.frequencyAtPosition, p),
      p === SPECIAL_POSITION ? cfg.specialMax : cfg.regularMax,
    ]),
  ];
  for (const [name, table, max] of tables) {
    const index = unsortedAt(table);
    if (index >= 0) {
      out.push({ kind: 'unsorted-table', table: name, index, message: `${name} is out of order at entry ${index}` });
    }
    const { missing, unexpected } = rangeMismatch(table, max);
    if (missing.length || unexpected.length) {
      out.push({
        kind: 'table-range',
        table: name,
        missing,
        unexpected,
        message: `${name} does not cover 1..${max} exactly (missing ${missing.length}, unexpected ${unexpected.length})`,
      });
    }
  }

  out.push(
    ...checkPick('optimizedByPosition', artifact.optimizedByPosition, cfg.regularMax, cfg.specialMax),
    ...checkPick('optimizedByGeneralFrequency', artifact.optimizedByGeneralFrequency, cfg.regularMax, cfg.specialMax),
  );
  return out;
}

export const validate = validateStats;
