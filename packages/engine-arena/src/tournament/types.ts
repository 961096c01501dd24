import type { RandomSource } from '@ipd/engine-core';
import type { MatchPlayer } from '../match/types.js';

/** An opponent in the roster: a named player that can be cleared between matches. */
export interface TournamentOpponent extends MatchPlayer {
  readonly name: string;
  reset(random?: RandomSource): void;
}

/**
 * 'shared'    : one random source for the whole run; roster order matters.
 * 'per_match' : each match gets its own sub-stream seeded from (seed, index).
 */
export type RandomMode = 'shared' | 'per_match';

/** Structured logger accepted by the engine. Fastify's and pino's loggers both fit. */
export interface TournamentLogger {
  info(obj: object, msg?: string): void;
  debug(obj: object, msg?: string): void;
}

export interface TournamentConfig {
  /** Must return a fresh instance on every call. */
  strategyFactory: () => MatchPlayer;
  opponents: readonly TournamentOpponent[];
  rounds?: number;
  noise?: number;
  seed?: number;
  randomMode?: RandomMode;
  logger?: TournamentLogger;
}

/** One entry of the summary. Field names are the external contract. */
export interface TournamentMatchResult {
  opponent: string;
  our_score: number;
  opponent_score: number;
  our_avg: number;
  our_coop: number;
  opp_coop: number;
  won: boolean;
  score_difference: number;
}

/** The only interface handed to analysis and reporting collaborators. */
export interface TournamentSummary {
  total_matches: number;
  total_score: number;
  average_score: number;
  wins: number;
  losses: number;
  win_rate: number;
  results: readonly TournamentMatchResult[];
}
