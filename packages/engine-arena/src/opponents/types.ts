import type { Move, RandomSource } from '@ipd/engine-core';

/** The fixed reference roster, in canonical order. */
export const OPPONENT_KINDS = [
  'AlwaysCooperate',
  'AlwaysDefect',
  'TitForTat',
  'TitForTwoTats',
  'Grudger',
  'Random',
  'Suspicious',
] as const;

export type OpponentKind = (typeof OPPONENT_KINDS)[number];

/** What an opponent may look at when deciding. */
export interface OpponentView {
  own_history: readonly Move[];
  opponent_history: readonly Move[];
  random: RandomSource;
}

export type OpponentDecider = (view: OpponentView) => Move;

export interface OpponentOptions {
  name?: string;
  random?: RandomSource;
}
