import { EngineError } from './types.js';
import type { Move, ValidationFailure } from './types.js';

export function isMove(value: unknown): value is Move {
  return value === 'C' || value === 'D';
}

export function validateRounds(rounds: number): ValidationFailure | null {
  if (!Number.isInteger(rounds) || rounds < 1) {
    return { error: EngineError.INVALID_ROUNDS, detail: `rounds=${rounds}` };
  }
  return null;
}

/** Noise is a per-move flip probability in [0, 1). */
export function validateNoise(noise: number): ValidationFailure | null {
  if (!Number.isFinite(noise) || noise < 0 || noise >= 1) {
    return { error: EngineError.INVALID_NOISE, detail: `noise=${noise}` };
  }
  return null;
}

export function validateSeed(seed: number): ValidationFailure | null {
  if (!Number.isSafeInteger(seed)) {
    return { error: EngineError.INVALID_SEED, detail: `seed=${seed}` };
  }
  return null;
}

export interface MatchConfigInput {
  rounds: number;
  noise: number;
}

/** Validate match configuration. Returns first error found, or null. */
export function validateMatchConfig(config: MatchConfigInput): ValidationFailure | null {
  return validateRounds(config.rounds) ?? validateNoise(config.noise);
}

export interface TournamentConfigInput extends MatchConfigInput {
  seed: number;
  roster_size: number;
}

/** Validate tournament configuration. Returns first error found, or null. */
export function validateTournamentConfig(config: TournamentConfigInput): ValidationFailure | null {
  if (config.roster_size === 0) {
    return { error: EngineError.EMPTY_ROSTER, detail: 'no opponents' };
  }
  return validateMatchConfig(config) ?? validateSeed(config.seed);
}
