// packages/lib/src/gameRegistry.ts
import { GAME_TYPES, type GameConfig, type GameType } from './lotto/types.js';

/* ---------------- Game matrices ----------------
   - Powerball:     5/69 + 1/26
   - Mega Millions: 5/70 + 1/25
-------------------------------------------------*/
export const GAMES: Readonly<Record<GameType, GameConfig>> = Object.freeze({
  powerball: {
    type: 'powerball',
    regularMax: 69,
    specialMax: 26,
    regularPick: 5,
    label: 'Powerball',
    specialLabel: 'Powerball',
    drawsFile: 'pb.json',
    statsFile: 'pb-stats.json',
    sourceSlug: 'powerball',
    specialBallClass: 'powerball',
  },
  megamillions: {
    type: 'megamillions',
    regularMax: 70,
    specialMax: 25,
    regularPick: 5,
    label: 'Mega Millions',
    specialLabel: 'Mega Ball',
    drawsFile: 'mm.json',
    statsFile: 'mm-stats.json',
    sourceSlug: 'mega-millions',
    specialBallClass: 'mega-ball',
  },
});

// Older records spell Mega Millions with a hyphen.
const LEGACY_ALIASES: Readonly<Record<string, GameType>> = {
  'mega-millions': 'megamillions',
  mega_millions: 'megamillions',
};

export function isGameType(value: unknown): value is GameType {
  return GAME_TYPES.some((g) => g === value);
}

/** Accepts canonical keys and legacy spellings; null for anything else. */
export function normalizeGameType(value: unknown): GameType | null {
  if (isGameType(value)) return value;
  if (typeof value !== 'string') return null;
  return LEGACY_ALIASES[value.trim().toLowerCase()] ?? null;
}

/** Strict lookup (throws on unknown). */
export function gameConfig(type: GameType): GameConfig {
  const cfg = GAMES[type];
  if (!cfg) throw new Error(`Unknown game type: ${String(type)}`);
  return cfg;
}

/** Inclusive 1..max, ascending. */
export function numberRange(max: number): number[] {
  return Array.from({ length: Math.max(0, max) }, (_, i) => i + 1);
}
