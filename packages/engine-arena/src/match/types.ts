import type { Move, RandomSource } from '@ipd/engine-core';

/** Anything that can sit at the table. Moves are validated, so decideMove may return any string. */
export interface MatchPlayer {
  decideMove(): string;
  updateHistory(ownMove: Move, opponentMove: Move): void;
}

export interface MatchConfig {
  rounds: number;
  /** Per-move flip probability in [0, 1). */
  noise?: number;
  random?: RandomSource;
}

/** One recorded round. move1/move2 are the moves actually played (post-noise). */
export interface RoundRecord {
  round: number;
  move1: Move;
  move2: Move;
  intended1: Move;
  intended2: Move;
  payoff1: number;
  payoff2: number;
}

export interface MatchStats {
  rounds: number;
  score1: number;
  score2: number;
  avg_score1: number;
  avg_score2: number;
  cooperation_rate1: number;
  cooperation_rate2: number;
  flips1: number;
  flips2: number;
}

export interface MatchResult {
  score1: number;
  score2: number;
  history: readonly RoundRecord[];
  stats: MatchStats;
}
