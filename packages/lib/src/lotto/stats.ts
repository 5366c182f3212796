// packages/lib/src/lotto/stats.ts
import { gameConfig } from '../gameRegistry.js';
import { logger, serializeError } from '../logger.js';
import { combinationIndex } from './draws.js';
import { ExhaustedCandidatePoolError } from './errors.js';
import { analyzeFrequency, positionTable } from './frequency.js';
import { optimizeByGeneralFrequency, optimizeByPosition, type OptimizerOptions } from './optimizer.js';
import { significance } from './significance.js';
import {
  REGULAR_POSITIONS,
  type DrawCollection,
  type GameType,
  type OptimizedCombination,
  type RegularPosition,
  type SignificanceTable,
  type StatsArtifact,
} from './types.js';

/* -------------------------------------------------------
   Per-game stats core (pure, synchronous, no IO)
   ------------------------------------------------------- */

export type StatsReport = {
  artifact: StatsArtifact;
  /** Optimizer failures; the rest of the artifact is still valid. */
  issues: ExhaustedCandidatePoolError[];
};

function attempt(
  game: GameType,
  issues: ExhaustedCandidatePoolError[],
  run: () => OptimizedCombination,
): OptimizedCombination | null {
  try {
    return run();
  } catch (e) {
    if (!(e instanceof ExhaustedCandidatePoolError)) throw e;
    const err = e.forGame(game);
    logger.error('Optimizer exhausted its candidate pool', { game, strategy: err.strategy, error: serializeError(err) });
    issues.push(err);
    return null;
  }
}

/**
 * Frequencies, significance and both optimized picks for one game.
 * Throws InvalidDrawError when a record breaks the game's ranges.
 */
export function computeStatsReport(
  game: GameType,
  draws: DrawCollection,
  opts: OptimizerOptions = {},
): StatsReport {
  const cfg = gameConfig(game);
  const totalDraws = draws.length;
  const { frequency, frequencyAtPosition, specialBallFrequency } = analyzeFrequency(game, draws);

  const byPosition = new Map<RegularPosition, SignificanceTable>(
    REGULAR_POSITIONS.map((p): [RegularPosition, SignificanceTable] => [
      p,
      // exactly one number occupies each position per draw
      significance(positionTable(frequencyAtPosition, p), totalDraws, 1, cfg.regularMax),
    ]),
  );

  const history = combinationIndex(draws);
  const issues: ExhaustedCandidatePoolError[] = [];

  const artifact: StatsArtifact = {
    type: game,
    totalDraws,
    frequency,
    frequencyAtPosition,
    specialBallFrequency,
    regularNumbers: significance(frequency, totalDraws, cfg.regularPick, cfg.regularMax),
    specialBallNumbers: significance(specialBallFrequency, totalDraws, 1, cfg.specialMax),
    byPosition,
    optimizedByPosition: attempt(game, issues, () =>
      optimizeByPosition(frequencyAtPosition, specialBallFrequency, history, opts),
    ),
    optimizedByGeneralFrequency: attempt(game, issues, () =>
      optimizeByGeneralFrequency(frequency, specialBallFrequency, history, opts),
    ),
  };
  return { artifact, issues };
}

export function computeStats(game: GameType, draws: DrawCollection): StatsArtifact {
  return computeStatsReport(game, draws).artifact;
}
