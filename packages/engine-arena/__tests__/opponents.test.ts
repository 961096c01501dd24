import { describe, expect, it } from 'vitest';
import { createRandom } from '@ipd/engine-core';
import type { Move } from '@ipd/engine-core';
import {
  OpponentStrategy,
  createDefaultRoster,
  createOpponent,
  isOpponentKind,
} from '../src/opponents/strategies.js';
import { OPPONENT_KINDS } from '../src/opponents/types.js';

/** Feed the opponent a sequence of moves made against it; its own moves are whatever it decides. */
function feed(opponent: OpponentStrategy, against: Move[]): Move[] {
  return against.map((theirs) => {
    const mine = opponent.decideMove();
    opponent.updateHistory(mine, theirs);
    return mine;
  });
}

describe('opening moves', () => {
  it.each([
    ['AlwaysCooperate', 'C'],
    ['AlwaysDefect', 'D'],
    ['TitForTat', 'C'],
    ['TitForTwoTats', 'C'],
    ['Grudger', 'C'],
    ['Suspicious', 'D'],
  ] as const)('%s opens with %s', (kind, expected) => {
    expect(createOpponent(kind).decideMove()).toBe(expected);
  });
});

describe('TitForTat', () => {
  it('mirrors the previous move', () => {
    const tft = createOpponent('TitForTat');
    feed(tft, ['D']);
    expect(tft.decideMove()).toBe('D');
    feed(tft, ['C']);
    expect(tft.decideMove()).toBe('C');
  });
});

describe('TitForTwoTats', () => {
  it('forgives a single defection', () => {
    const tf2t = createOpponent('TitForTwoTats');
    feed(tf2t, ['D']);
    expect(tf2t.decideMove()).toBe('C');
  });

  it('defects after two consecutive defections', () => {
    const tf2t = createOpponent('TitForTwoTats');
    feed(tf2t, ['D', 'D']);
    expect(tf2t.decideMove()).toBe('D');
  });

  it('cooperates again once the pair is broken', () => {
    const tf2t = createOpponent('TitForTwoTats');
    feed(tf2t, ['D', 'D', 'C']);
    expect(tf2t.decideMove()).toBe('C');
  });
});

describe('Grudger', () => {
  it('defects for the rest of the match after a single defection', () => {
    const grudger = createOpponent('Grudger');
    const played = feed(grudger, ['C', 'C', 'D', ...Array<Move>(20).fill('C')]);
    expect(played.slice(0, 3)).toEqual(['C', 'C', 'C']);
    expect(played.slice(3).every((m) => m === 'D')).toBe(true);
    expect(grudger.decideMove()).toBe('D');
  });
});

describe('Suspicious', () => {
  it('opens with defection then mirrors', () => {
    const suspicious = createOpponent('Suspicious');
    expect(feed(suspicious, ['C', 'D', 'C'])).toEqual(['D', 'C', 'D']);
  });
});

describe('Random', () => {
  it('draws from the supplied source', () => {
    expect(createOpponent('Random', { random: () => 0.2 }).decideMove()).toBe('C');
    expect(createOpponent('Random', { random: () => 0.7 }).decideMove()).toBe('D');
  });

  it('is reproducible for a fixed seed', () => {
    const a = createOpponent('Random', { random: createRandom(9) });
    const b = createOpponent('Random', { random: createRandom(9) });
    const against = Array<Move>(50).fill('C');
    expect(feed(a, against)).toEqual(feed(b, against));
  });
});

describe('reset', () => {
  it('clears history between matches', () => {
    const tft = createOpponent('TitForTat');
    feed(tft, ['D']);
    tft.reset();
    expect(tft.rounds).toBe(0);
    expect(tft.decideMove()).toBe('C');
  });

  it('rebinds the random source when one is given', () => {
    const random = createOpponent('Random', { random: () => 0.9 });
    random.reset(() => 0.1);
    expect(random.decideMove()).toBe('C');
  });
});

describe('roster', () => {
  it('builds the seven reference opponents in canonical order', () => {
    expect(createDefaultRoster().map((o) => o.name)).toEqual([
      'AlwaysCooperate',
      'AlwaysDefect',
      'TitForTat',
      'TitForTwoTats',
      'Grudger',
      'Random',
      'Suspicious',
    ]);
  });

  it('accepts a custom display name', () => {
    expect(new OpponentStrategy('Grudger', { name: 'Grim' }).name).toBe('Grim');
  });

  it('recognises opponent kinds', () => {
    for (const kind of OPPONENT_KINDS) {
      expect(isOpponentKind(kind)).toBe(true);
    }
    expect(isOpponentKind('Pavlov')).toBe(false);
    expect(isOpponentKind(3)).toBe(false);
  });
});
