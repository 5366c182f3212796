// packages/lib/src/lotto/paths.ts
import { gameConfig } from '../gameRegistry.js';
import type { GameType } from './types.js';

export type ArtifactKind = 'draws' | 'stats';

/** Object path of a game's artifact, optionally under a prefix ("data/pb.json"). */
export function objectPathFor(game: GameType, kind: ArtifactKind, prefix = ''): string {
  const cfg = gameConfig(game);
  const file = kind === 'draws' ? cfg.drawsFile : cfg.statsFile;
  const base = prefix.replace(/^\/+|\/+$/g, '');
  return base ? `${base}/${file}` : file;
}

/** Yearly results page, e.g. https://www.lottery.net/powerball/numbers/2025 */
export function resultsPageUrl(game: GameType, year: number, baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${gameConfig(game).sourceSlug}/numbers/${year}`;
}
