import {
  DEFAULT_NOISE,
  DEFAULT_SEED,
  EngineError,
  SimulationError,
  computePayoff,
  createRandom,
  flipMove,
  isMove,
  rate,
  validateMatchConfig,
} from '@ipd/engine-core';
import type { Move, RandomSource } from '@ipd/engine-core';
import type { MatchConfig, MatchPlayer, MatchResult, MatchStats, RoundRecord } from './types.js';

/**
 * A fixed-length game between two players.
 *
 * Per round:
 * 1. Ask both players for a move
 * 2. Validate both (an illegal move aborts the match)
 * 3. Flip each move independently with probability `noise`
 * 4. Score the played pair
 * 5. Record the played pair
 * 6. Report the played pair to both players
 */
export class Match {
  readonly rounds: number;
  readonly noise: number;
  private readonly random: RandomSource;
  private readonly records: RoundRecord[] = [];
  private score1 = 0;
  private score2 = 0;
  private played = false;

  constructor(
    private readonly player1: MatchPlayer,
    private readonly player2: MatchPlayer,
    config: MatchConfig,
  ) {
    const noise = config.noise ?? DEFAULT_NOISE;
    const failure = validateMatchConfig({ rounds: config.rounds, noise });
    if (failure) {
      throw SimulationError.from(failure);
    }
    this.rounds = config.rounds;
    this.noise = noise;
    this.random = config.random ?? createRandom(DEFAULT_SEED);
  }

  /** Play every round. Returns the final [score1, score2]. */
  play(): [number, number] {
    if (this.played) {
      throw new SimulationError(EngineError.MATCH_ALREADY_PLAYED);
    }
    this.played = true;

    for (let round = 1; round <= this.rounds; round++) {
      const intended1 = this.ask(this.player1, 'player1', round);
      const intended2 = this.ask(this.player2, 'player2', round);

      const move1 = this.perturb(intended1);
      const move2 = this.perturb(intended2);

      const { payoff1, payoff2 } = computePayoff(move1, move2);
      this.score1 += payoff1;
      this.score2 += payoff2;

      this.records.push({ round, move1, move2, intended1, intended2, payoff1, payoff2 });

      // Players only ever learn what was played, never what was intended.
      this.player1.updateHistory(move1, move2);
      this.player2.updateHistory(move2, move1);
    }

    return [this.score1, this.score2];
  }

  getStats(): MatchStats {
    const n = this.records.length;
    let coop1 = 0;
    let coop2 = 0;
    let flips1 = 0;
    let flips2 = 0;
    for (const r of this.records) {
      if (r.move1 === 'C') coop1++;
      if (r.move2 === 'C') coop2++;
      if (r.move1 !== r.intended1) flips1++;
      if (r.move2 !== r.intended2) flips2++;
    }

    return {
      rounds: n,
      score1: this.score1,
      score2: this.score2,
      avg_score1: rate(this.score1, n),
      avg_score2: rate(this.score2, n),
      cooperation_rate1: rate(coop1, n),
      cooperation_rate2: rate(coop2, n),
      flips1,
      flips2,
    };
  }

  /** Frozen record of the finished match. */
  result(): MatchResult {
    return Object.freeze({
      score1: this.score1,
      score2: this.score2,
      history: Object.freeze(this.records.map((r) => Object.freeze({ ...r }))),
      stats: Object.freeze(this.getStats()),
    });
  }

  get history(): readonly RoundRecord[] {
    return this.records;
  }

  private ask(player: MatchPlayer, label: string, round: number): Move {
    const move = player.decideMove();
    if (!isMove(move)) {
      throw new SimulationError(EngineError.INVALID_MOVE, `round ${round}: ${label} played ${JSON.stringify(move)}`);
    }
    return move;
  }

  private perturb(move: Move): Move {
    if (this.noise > 0 && this.random() < this.noise) {
      return flipMove(move);
    }
    return move;
  }
}

/** Convenience: construct, play, and return the frozen result. */
export function playMatch(player1: MatchPlayer, player2: MatchPlayer, config: MatchConfig): MatchResult {
  const match = new Match(player1, player2, config);
  match.play();
  return match.result();
}
