import { DEFAULT_SEED, createRandom } from '@ipd/engine-core';
import type { Move, RandomSource, ResettableStrategy } from '@ipd/engine-core';
import { OPPONENT_KINDS } from './types.js';
import type { OpponentDecider, OpponentKind, OpponentOptions, OpponentView } from './types.js';

function lastMove(history: readonly Move[]): Move | undefined {
  return history[history.length - 1];
}

/** One decider per kind. Each is a pure function of the opponent's view. */
const DECIDERS: Record<OpponentKind, OpponentDecider> = {
  AlwaysCooperate: () => 'C',
  AlwaysDefect: () => 'D',
  TitForTat: ({ opponent_history }) => lastMove(opponent_history) ?? 'C',
  TitForTwoTats: ({ opponent_history }) =>
    opponent_history.length >= 2 && opponent_history.slice(-2).every((m) => m === 'D') ? 'D' : 'C',
  // Irreversible: one defection anywhere in the history means defect forever.
  Grudger: ({ opponent_history }) => (opponent_history.includes('D') ? 'D' : 'C'),
  Random: ({ random }) => (random() < 0.5 ? 'C' : 'D'),
  Suspicious: ({ opponent_history }) => lastMove(opponent_history) ?? 'D',
};

export function isOpponentKind(value: unknown): value is OpponentKind {
  return typeof value === 'string' && OPPONENT_KINDS.some((kind) => kind === value);
}

/**
 * Reference opponent. Stateless beyond its move history.
 * Must be reset between matches.
 */
export class OpponentStrategy implements ResettableStrategy {
  readonly kind: OpponentKind;
  readonly name: string;
  private own_history: Move[] = [];
  private opponent_history: Move[] = [];
  private random: RandomSource;

  constructor(kind: OpponentKind, options: OpponentOptions = {}) {
    this.kind = kind;
    this.name = options.name ?? kind;
    this.random = options.random ?? createRandom(DEFAULT_SEED);
  }

  decideMove(): Move {
    const view: OpponentView = {
      own_history: this.own_history,
      opponent_history: this.opponent_history,
      random: this.random,
    };
    return DECIDERS[this.kind](view);
  }

  updateHistory(ownMove: Move, opponentMove: Move): void {
    this.own_history.push(ownMove);
    this.opponent_history.push(opponentMove);
  }

  /** Clear both histories; optionally bind the random source for the next match. */
  reset(random?: RandomSource): void {
    this.own_history = [];
    this.opponent_history = [];
    if (random) {
      this.random = random;
    }
  }

  get rounds(): number {
    return this.own_history.length;
  }
}

export function createOpponent(kind: OpponentKind, options?: OpponentOptions): OpponentStrategy {
  return new OpponentStrategy(kind, options);
}

/** All seven reference opponents in canonical order. */
export function createDefaultRoster(options: { random?: RandomSource } = {}): OpponentStrategy[] {
  return OPPONENT_KINDS.map((kind) => createOpponent(kind, { random: options.random }));
}
