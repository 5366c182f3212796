import { describe, expect, it } from 'vitest';
import { toFrequencyTable } from './frequency.js';
import { significance, significantNumbers } from './significance.js';

describe('significance', () => {
  it('flags a heavily over-represented number', () => {
    // number 1 at one position in 800 of 1000 draws, a few near expectation
    const counts: Array<[number, number]> = [[1, 800]];
    for (let n = 2; n <= 69; n++) counts.push([n, n <= 4 ? 14 : 0]);
    const table = significance(toFrequencyTable(counts), 1000, 1, 69);

    const one = table.get(1);
    const expected = 1000 / 69;
    const sd = Math.sqrt(expected * (1 - 1 / 69));
    expect(one?.observed).toBe(800);
    expect(one?.expected).toBeCloseTo(expected, 10);
    expect(one?.residual).toBeCloseTo((800 - expected) / sd, 10);
    expect(one?.significant).toBe(true);
    expect(table.get(2)?.significant).toBe(false);
    expect(table.get(69)?.residual).toBeCloseTo(-expected / sd, 10);
    expect([...table.keys()].slice(0, 3)).toEqual([1, 2, 3]);
  });

  it('uses expected = total * k / R', () => {
    const table = significance(toFrequencyTable([[1, 10], [2, 0]]), 10, 5, 50);
    expect(table.size).toBe(50);
    expect(table.get(2)?.expected).toBe(1);
    expect(table.get(2)?.residual).toBeCloseTo(-1 / Math.sqrt(1 - 1 / 50), 10);
  });

  it('gives residual 0 when there are no draws', () => {
    const table = significance(new Map(), 0, 5, 69);
    expect(table.get(7)).toEqual({ observed: 0, expected: 0, residual: 0, significant: false });
  });

  it('lists significant numbers strongest first', () => {
    const table = new Map([
      [3, { observed: 9, expected: 2, residual: 2.5, significant: true }],
      [8, { observed: 0, expected: 2, residual: -3.1, significant: true }],
      [9, { observed: 3, expected: 2, residual: 0.7, significant: false }],
    ]);
    expect(significantNumbers(table)).toEqual([8, 3]);
  });
});
