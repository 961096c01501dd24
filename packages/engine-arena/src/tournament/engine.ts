import {
  DEFAULT_NOISE,
  DEFAULT_ROUNDS,
  DEFAULT_SEED,
  EngineError,
  SimulationError,
  createRandom,
  deriveSeed,
  rate,
  validateTournamentConfig,
} from '@ipd/engine-core';
import type { RandomSource } from '@ipd/engine-core';
import { Match } from '../match/engine.js';
import type { MatchPlayer } from '../match/types.js';
import type {
  RandomMode,
  TournamentConfig,
  TournamentLogger,
  TournamentMatchResult,
  TournamentOpponent,
  TournamentSummary,
} from './types.js';

/**
 * One match per opponent, in roster order, each against a fresh engine from
 * the factory. Configuration is validated up front; any failure aborts the
 * whole run.
 */
export class Tournament {
  readonly rounds: number;
  readonly noise: number;
  readonly seed: number;
  readonly randomMode: RandomMode;
  private readonly strategyFactory: () => MatchPlayer;
  private readonly opponents: readonly TournamentOpponent[];
  private readonly logger?: TournamentLogger;

  constructor(config: TournamentConfig) {
    this.rounds = config.rounds ?? DEFAULT_ROUNDS;
    this.noise = config.noise ?? DEFAULT_NOISE;
    this.seed = config.seed ?? DEFAULT_SEED;
    this.randomMode = config.randomMode ?? 'shared';

    const failure = validateTournamentConfig({
      rounds: this.rounds,
      noise: this.noise,
      seed: this.seed,
      roster_size: config.opponents.length,
    });
    if (failure) {
      throw SimulationError.from(failure);
    }

    this.strategyFactory = config.strategyFactory;
    this.opponents = [...config.opponents];
    this.logger = config.logger;
  }

  /** Run every match. Repeatable: each call starts again from the seed. */
  run(): TournamentSummary {
    const shared = createRandom(this.seed);
    const results: TournamentMatchResult[] = [];
    const issued = new WeakSet<MatchPlayer>();

    this.logger?.info(
      { opponents: this.opponents.length, rounds: this.rounds, noise: this.noise, seed: this.seed, random_mode: this.randomMode },
      'tournament started',
    );

    this.opponents.forEach((opponent, index) => {
      const random = this.randomFor(index, shared);
      opponent.reset(random);

      const player = this.strategyFactory();
      if (issued.has(player)) {
        throw new SimulationError(
          EngineError.SHARED_STRATEGY_INSTANCE,
          `strategyFactory returned an instance already used before the match against ${opponent.name}`,
        );
      }
      issued.add(player);

      const match = new Match(player, opponent, { rounds: this.rounds, noise: this.noise, random });
      const [ourScore, opponentScore] = match.play();
      const stats = match.getStats();

      const entry: TournamentMatchResult = {
        opponent: opponent.name,
        our_score: ourScore,
        opponent_score: opponentScore,
        our_avg: stats.avg_score1,
        our_coop: stats.cooperation_rate1,
        opp_coop: stats.cooperation_rate2,
        won: ourScore > opponentScore,
        score_difference: ourScore - opponentScore,
      };
      results.push(entry);

      this.logger?.debug({ ...entry, flips: stats.flips1 + stats.flips2 }, 'match complete');
    });

    const summary = summarizeResults(results);
    this.logger?.info(
      { total_score: summary.total_score, wins: summary.wins, win_rate: summary.win_rate },
      'tournament complete',
    );
    return summary;
  }

  private randomFor(index: number, shared: RandomSource): RandomSource {
    return this.randomMode === 'per_match' ? createRandom(deriveSeed(this.seed, index)) : shared;
  }
}

/** Fold per-match entries into a frozen summary. Ties count as losses. */
export function summarizeResults(results: readonly TournamentMatchResult[]): TournamentSummary {
  const totalMatches = results.length;
  const totalScore = results.reduce((sum, r) => sum + r.our_score, 0);
  const wins = results.filter((r) => r.won).length;

  return Object.freeze({
    total_matches: totalMatches,
    total_score: totalScore,
    average_score: rate(totalScore, totalMatches),
    wins,
    losses: totalMatches - wins,
    win_rate: rate(wins, totalMatches),
    results: Object.freeze(results.map((r) => Object.freeze({ ...r }))),
  });
}
