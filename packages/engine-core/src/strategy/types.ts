import type { Move, RandomSource } from '../types.js';

/** Capability shared by the engine under test and every opponent. */
export interface Strategy {
  readonly name: string;
  decideMove(): Move;
  /** Called once per round with the moves actually played. */
  updateHistory(ownMove: Move, opponentMove: Move): void;
}

/** A strategy that can be cleared between matches and re-bound to a random source. */
export interface ResettableStrategy extends Strategy {
  reset(random?: RandomSource): void;
}
