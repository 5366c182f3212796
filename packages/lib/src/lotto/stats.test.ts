import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { setLogSink } from '../logger.js';
import { encodeStats } from '../validation/schemas.js';
import { combinationKey } from './draws.js';
import { tableTotal } from './frequency.js';
import { computeStats, computeStatsReport } from './stats.js';
import type { Draw } from './types.js';
import { validateStats } from './validate.js';

const repeated: Draw[] = [
  { date: '2025-01-04', numbers: [1, 2, 3, 4, 5], specialBall: 6, type: 'powerball' },
  { date: '2025-01-01', numbers: [1, 2, 3, 4, 5], specialBall: 6, type: 'powerball' },
];

const mixed: Draw[] = [
  { date: '2025-02-05', numbers: [70, 12, 3, 44, 25], specialBall: 25, type: 'megamillions' },
  { date: '2025-02-01', numbers: [8, 12, 31, 44, 60], specialBall: 1, type: 'megamillions' },
  { date: '2025-01-28', numbers: [12, 19, 3, 7, 51], specialBall: 25, type: 'megamillions' },
];

function skewed(): Draw[] {
  const day = 86_400_000;
  return Array.from({ length: 1000 }, (_, i): Draw => {
    const r = i % 10;
    const first = i < 800 ? 1 : 2 + (i % 8);
    return {
      date: new Date(Date.UTC(2000, 0, 1) + i * day).toISOString().slice(0, 10),
      numbers: [first, 10 + r, 20 + r, 30 + r, 40 + r],
      specialBall: (i % 26) + 1,
      type: 'powerball',
    };
  });
}

describe('computeStats', () => {
  it('produces both optimized picks', () => {
    const artifact = computeStats('powerball', repeated);
    expect(artifact.totalDraws).toBe(2);
    expect(artifact.optimizedByPosition).toEqual([1, 2, 3, 4, 6, 6]);
    expect(artifact.optimizedByGeneralFrequency).toEqual([2, 3, 4, 5, 6, 6]);
  });

  it('scores significance with k = 5 overall and k = 1 per position', () => {
    const artifact = computeStats('powerball', repeated);
    expect(artifact.regularNumbers.get(1)?.expected).toBeCloseTo(10 / 69, 12);
    expect(artifact.byPosition.get(0)?.get(1)?.expected).toBeCloseTo(2 / 69, 12);
    expect(artifact.specialBallNumbers.get(6)?.expected).toBeCloseTo(2 / 26, 12);
    expect(artifact.specialBallNumbers.size).toBe(26);
  });

  it('is deterministic and order independent', () => {
    const a = computeStats('megamillions', mixed);
    const b = computeStats('megamillions', [...mixed].reverse());
    expect([...b.frequency]).toEqual([...a.frequency]);
    expect(b.optimizedByPosition).toEqual(a.optimizedByPosition);
    expect(b.optimizedByGeneralFrequency).toEqual(a.optimizedByGeneralFrequency);
  });

  it('flags a number drawn first in 800 of 1000 draws', () => {
    const artifact = computeStats('powerball', skewed());
    const atFirst = artifact.byPosition.get(0)?.get(1);
    expect(atFirst?.observed).toBe(800);
    expect(atFirst?.significant).toBe(true);
    expect(atFirst?.residual).toBeGreaterThan(2);
    expect(artifact.regularNumbers.get(1)?.significant).toBe(true);
  });

  it('never picks a historical combination', () => {
    const draws = skewed();
    const history = new Set(draws.map((d) => combinationKey(d.numbers)));
    const artifact = computeStats('powerball', draws);
    for (const pick of [artifact.optimizedByPosition, artifact.optimizedByGeneralFrequency]) {
      expect(pick).not.toBeNull();
      expect(history.has(combinationKey(pick?.slice(0, 5) ?? []))).toBe(false);
    }
    expect(validateStats(artifact)).toEqual([]);
  });

  it('serializes identically on repeated runs', () => {
    const draws = skewed();
    expect(JSON.stringify(encodeStats(computeStats('powerball', draws)))).toBe(
      JSON.stringify(encodeStats(computeStats('powerball', draws))),
    );
  });

  it('conserves counts and passes validation', () => {
    const artifact = computeStats('megamillions', mixed);
    expect(tableTotal(artifact.frequency)).toBe(15);
    expect(tableTotal(artifact.specialBallFrequency)).toBe(3);
    expect([...artifact.frequency].slice(0, 3)).toEqual([[12, 3], [3, 2], [44, 2]]);
    expect(validateStats(artifact)).toEqual([]);
  });

  it('returns zero tables and lowest-number picks for an empty history', () => {
    const artifact = computeStats('powerball', []);
    expect(artifact.totalDraws).toBe(0);
    expect(artifact.regularNumbers.get(1)).toEqual({ observed: 0, expected: 0, residual: 0, significant: false });
    expect(artifact.optimizedByPosition).toEqual([1, 2, 3, 4, 5, 1]);
    expect(artifact.optimizedByGeneralFrequency).toEqual([1, 2, 3, 4, 5, 1]);
  });
});

describe('computeStatsReport', () => {
  const lines: string[] = [];
  let restore: ((line: string) => void) | null = null;

  beforeEach(() => {
    lines.length = 0;
    restore = setLogSink((line) => lines.push(line));
  });

  afterEach(() => {
    if (restore) setLogSink(restore);
  });

  it('isolates optimizer exhaustion to the optimized fields', () => {
    const { artifact, issues } = computeStatsReport('powerball', repeated, { maxAttempts: 0 });
    expect(artifact.optimizedByPosition).toBeNull();
    expect(artifact.optimizedByGeneralFrequency).toBeNull();
    expect(issues.map((e) => [e.strategy, e.game])).toEqual([
      ['byPosition', 'powerball'],
      ['byGeneralFrequency', 'powerball'],
    ]);
    expect(tableTotal(artifact.frequency)).toBe(10);
    expect(validateStats(artifact)).toEqual([]);

    const logged = lines.map((l) => JSON.parse(l));
    expect(logged.map((l) => [l.severity, l.strategy])).toEqual([
      ['ERROR', 'byPosition'],
      ['ERROR', 'byGeneralFrequency'],
    ]);
  });

  it('reports no issues when both optimizers succeed', () => {
    expect(computeStatsReport('powerball', repeated).issues).toEqual([]);
    expect(lines).toEqual([]);
  });
});
