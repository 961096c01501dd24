/** One of the two moves. 'C' = cooperate, 'D' = defect. */
export type Move = 'C' | 'D';

/** Points awarded to each player for one round. */
export interface PayoffPair {
  payoff1: number;
  payoff2: number;
}

/** Uniform draw in [0, 1). Threaded explicitly into everything that needs randomness. */
export type RandomSource = () => number;

/** Engine validation errors. */
export enum EngineError {
  INVALID_MOVE = 'INVALID_MOVE',
  INVALID_ROUNDS = 'INVALID_ROUNDS',
  INVALID_NOISE = 'INVALID_NOISE',
  INVALID_SEED = 'INVALID_SEED',
  EMPTY_ROSTER = 'EMPTY_ROSTER',
  MATCH_ALREADY_PLAYED = 'MATCH_ALREADY_PLAYED',
  SHARED_STRATEGY_INSTANCE = 'SHARED_STRATEGY_INSTANCE',
}

/** Result of a failed validation. */
export interface ValidationFailure {
  error: EngineError;
  detail?: string;
}

/** Thrown when a match or tournament has to abort. Carries the validation code. */
export class SimulationError extends Error {
  readonly code: EngineError;
  readonly detail?: string;

  constructor(code: EngineError, detail?: string) {
    super(detail ? `${code}: ${detail}` : code);
    this.name = 'SimulationError';
    this.code = code;
    this.detail = detail;
  }

  static from(failure: ValidationFailure): SimulationError {
    return new SimulationError(failure.error, failure.detail);
  }
}
