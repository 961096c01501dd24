// Types
export type { Move, PayoffPair, RandomSource, ValidationFailure } from './types.js';
export { EngineError, SimulationError } from './types.js';

// Decision types
export type {
  Decision,
  DecisionRule,
  DecisionThresholds,
  EngineState,
  FeatureSnapshot,
  RetaliationState,
} from './decision/types.js';

// Strategy contract
export type { Strategy, ResettableStrategy } from './strategy/types.js';

// Payoff model
export { PAYOFF_MATRIX, computePayoff, swapPayoff, flipMove } from './payoff.js';

// Decision engine
export { DEFAULT_THRESHOLDS, makeDecision, shouldForgive } from './decision/maker.js';
export { computeFeatures } from './decision/features.js';
export { DecisionEngine, createEngineState } from './decision/engine.js';

// Randomness
export { createRandom, deriveSeed } from './random.js';

// Validation
export type { MatchConfigInput, TournamentConfigInput } from './validation.js';
export {
  isMove,
  validateRounds,
  validateNoise,
  validateSeed,
  validateMatchConfig,
  validateTournamentConfig,
} from './validation.js';

// Defaults + utils
export { DEFAULT_ROUNDS, DEFAULT_NOISE, DEFAULT_SEED } from './constants.js';
export { rate } from './utils.js';
