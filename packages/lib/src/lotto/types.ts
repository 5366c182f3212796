// packages/lib/src/lotto/types.ts

/* ===========================================================
   Game keys (source of truth)
   =========================================================== */

export const GAME_TYPES = ['powerball', 'megamillions'] as const;
export type GameType = (typeof GAME_TYPES)[number];

// Regular positions 0..4, special ball is position 5.
export const REGULAR_POSITIONS = [0, 1, 2, 3, 4] as const;
export const ALL_POSITIONS = [0, 1, 2, 3, 4, 5] as const;
export type RegularPosition = (typeof REGULAR_POSITIONS)[number];
export type Position = (typeof ALL_POSITIONS)[number];
export const SPECIAL_POSITION: Position = 5;

/* ===========================================================
   Game constants
   =========================================================== */

export type GameConfig = {
  type: GameType;
  regularMax: number;  // regular numbers drawn from 1..regularMax
  specialMax: number;  // special ball drawn from 1..specialMax
  regularPick: number; // regular numbers per draw
  label: string;       // e.g. "Powerball"
  specialLabel: string;
  drawsFile: string;   // object path of the draw history
  statsFile: string;   // object path of the stats artifact
  sourceSlug: string;  // lottery.net path segment
  specialBallClass: string; // css class of the special ball on results pages
};

/* ===========================================================
   Draw records
   =========================================================== */

export type RegularNumbers = readonly [number, number, number, number, number];

export type Draw = {
  date: string; // ISO YYYY-MM-DD, unique within a game
  numbers: RegularNumbers; // draw order is meaningful (position stats)
  specialBall: number;
  type: GameType;
};

/** Newest first, unique dates, one game. */
export type DrawCollection = readonly Draw[];

/** Canonical keys of every regular-number set that has been drawn. */
export type CombinationIndex = ReadonlySet<string>;

/* ===========================================================
   Frequency + significance
   =========================================================== */

/**
 * number → count over the full range, iterated by count descending and
 * number ascending on ties. Map insertion order carries that ordering.
 */
export type FrequencyTable = ReadonlyMap<number, number>;

export type PositionalFrequencyTable = ReadonlyMap<Position, FrequencyTable>;

export type SignificanceEntry = {
  observed: number;
  expected: number;
  residual: number;
  significant: boolean;
};

/** number → entry, ascending by number. */
export type SignificanceTable = ReadonlyMap<number, SignificanceEntry>;

/* ===========================================================
   Published artifact
   =========================================================== */

/** 5 regular numbers followed by the special ball. */
export type OptimizedCombination = readonly [number, number, number, number, number, number];

export type StatsArtifact = {
  type: GameType;
  totalDraws: number;
  frequency: FrequencyTable;
  frequencyAtPosition: PositionalFrequencyTable;
  specialBallFrequency: FrequencyTable;
  regularNumbers: SignificanceTable;
  specialBallNumbers: SignificanceTable;
  byPosition: ReadonlyMap<RegularPosition, SignificanceTable>;
  // null only when the optimizer exhausted its candidate pool for this game
  optimizedByPosition: OptimizedCombination | null;
  optimizedByGeneralFrequency: OptimizedCombination | null;
};
