// packages/lib/src/lotto/errors.ts
import type { GameType } from './types.js';
import type { Violation } from './validate.js';

export type EngineErrorKind =
  | 'InvalidDraw'
  | 'ExhaustedCandidatePool'
  | 'ValidationFailure'
  | 'Decode';

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type DrawIssue = {
  field: 'date' | 'numbers' | 'specialBall' | 'type';
  message: string;
};

export class InvalidDrawError extends EngineError {
  readonly kind = 'InvalidDraw';

  constructor(
    readonly game: GameType,
    readonly date: string,
    readonly issues: readonly DrawIssue[],
  ) {
    super(`Invalid ${game} draw ${date || '(no date)'}: ${issues.map((i) => `${i.field}: ${i.message}`).join('; ')}`);
  }
}

export type OptimizerStrategy = 'byPosition' | 'byGeneralFrequency';

export class ExhaustedCandidatePoolError extends EngineError {
  readonly kind = 'ExhaustedCandidatePool';

  constructor(
    readonly strategy: OptimizerStrategy,
    readonly attempts: number,
    readonly lastCandidate: readonly number[],
    readonly game?: GameType,
  ) {
    super(
      `No unseen combination found by ${strategy} after ${attempts} attempt(s); last candidate ${lastCandidate.join('-')}`,
    );
  }

  forGame(game: GameType): ExhaustedCandidatePoolError {
    return new ExhaustedCandidatePoolError(this.strategy, this.attempts, this.lastCandidate, game);
  }
}

export class ValidationFailureError extends EngineError {
  readonly kind = 'ValidationFailure';

  constructor(
    readonly game: GameType,
    readonly violations: readonly Violation[],
  ) {
    super(`${game} stats failed ${violations.length} check(s): ${violations.map((v) => v.message).join('; ')}`);
  }
}

export class DecodeError extends EngineError {
  readonly kind = 'Decode';

  constructor(
    readonly what: string,
    readonly issues: readonly string[],
  ) {
    super(`Cannot decode ${what}: ${issues.join('; ')}`);
  }
}
