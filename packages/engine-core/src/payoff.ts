import type { Move, PayoffPair } from './types.js';

/**
 * Canonical payoff table.
 * (C,C) → 3,3   (C,D) → 0,5   (D,C) → 5,0   (D,D) → 1,1
 */
export const PAYOFF_MATRIX: Readonly<Record<Move, Readonly<Record<Move, PayoffPair>>>> = {
  C: {
    C: { payoff1: 3, payoff2: 3 },
    D: { payoff1: 0, payoff2: 5 },
  },
  D: {
    C: { payoff1: 5, payoff2: 0 },
    D: { payoff1: 1, payoff2: 1 },
  },
};

export function computePayoff(move1: Move, move2: Move): PayoffPair {
  const { payoff1, payoff2 } = PAYOFF_MATRIX[move1][move2];
  return { payoff1, payoff2 };
}

export function swapPayoff(pair: PayoffPair): PayoffPair {
  return { payoff1: pair.payoff2, payoff2: pair.payoff1 };
}

export function flipMove(move: Move): Move {
  return move === 'C' ? 'D' : 'C';
}
