import { describe, expect, it } from 'vitest';
import { GAMES, gameConfig, isGameType, normalizeGameType, numberRange } from './gameRegistry.js';
import { objectPathFor, resultsPageUrl } from './lotto/paths.js';

describe('game registry', () => {
  it('holds the matrix of each game', () => {
    expect(gameConfig('powerball')).toMatchObject({ regularMax: 69, specialMax: 26, regularPick: 5 });
    expect(gameConfig('megamillions')).toMatchObject({ regularMax: 70, specialMax: 25, regularPick: 5 });
    expect(Object.isFrozen(GAMES)).toBe(true);
  });

  it('normalises legacy spellings', () => {
    expect(normalizeGameType('mega-millions')).toBe('megamillions');
    expect(normalizeGameType(' Mega_Millions ')).toBe('megamillions');
    expect(normalizeGameType('powerball')).toBe('powerball');
    expect(normalizeGameType('lotto')).toBeNull();
    expect(normalizeGameType(7)).toBeNull();
    expect(isGameType('mega-millions')).toBe(false);
  });

  it('builds inclusive ranges', () => {
    expect(numberRange(3)).toEqual([1, 2, 3]);
    expect(numberRange(0)).toEqual([]);
  });
});

describe('paths', () => {
  it('names artifact objects', () => {
    expect(objectPathFor('powerball', 'draws')).toBe('pb.json');
    expect(objectPathFor('megamillions', 'stats', '/data/')).toBe('data/mm-stats.json');
  });

  it('builds yearly results URLs', () => {
    expect(resultsPageUrl('megamillions', 2025, 'https://example.test/')).toBe(
      'https://example.test/mega-millions/numbers/2025',
    );
  });
});
