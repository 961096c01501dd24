import { describe, expect, it } from 'vitest';
import { computeFeatures } from '../src/decision/features.js';
import { createEngineState } from '../src/decision/engine.js';
import { DEFAULT_THRESHOLDS } from '../src/decision/maker.js';
import type { EngineState } from '../src/decision/types.js';
import type { Move } from '../src/types.js';

function moves(pattern: string): Move[] {
  return pattern.split('').map((m) => (m === 'C' ? 'C' : 'D'));
}

function makeState(overrides?: Partial<EngineState>): EngineState {
  return { ...createEngineState(), ...overrides };
}

describe('computeFeatures', () => {
  it('reports zeros for an empty history', () => {
    expect(computeFeatures(makeState(), DEFAULT_THRESHOLDS)).toEqual({
      overall_coop: 0,
      recent_coop: 0,
      betrayal_rate: 0,
      aggressive_streak: false,
      total_rounds: 0,
    });
  });

  it('computes overall cooperation over the whole history', () => {
    const f = computeFeatures(makeState({ opponent_history: moves('CCCD'), own_history: moves('CCCC') }), DEFAULT_THRESHOLDS);
    expect(f.overall_coop).toBe(0.75);
    expect(f.total_rounds).toBe(4);
  });

  it('limits recent cooperation to the trailing window', () => {
    const opp = moves('CCCCC' + 'D'.repeat(15));
    const f = computeFeatures(makeState({ opponent_history: opp, own_history: moves('C'.repeat(20)) }), DEFAULT_THRESHOLDS);
    expect(f.overall_coop).toBe(0.25);
    expect(f.recent_coop).toBe(0);
  });

  it('uses the whole history while it is shorter than the window', () => {
    const f = computeFeatures(makeState({ opponent_history: moves('CD'), own_history: moves('CC') }), DEFAULT_THRESHOLDS);
    expect(f.recent_coop).toBe(0.5);
  });

  it('reports no betrayal rate before own cooperation reaches the judgment gate', () => {
    const state = makeState({
      own_history: moves('C'.repeat(9)),
      opponent_history: moves('DDDCCCCCC'),
      betrayals: 3,
    });
    expect(computeFeatures(state, DEFAULT_THRESHOLDS).betrayal_rate).toBe(0);
  });

  it('normalises betrayals by own cooperation once the gate is met', () => {
    const state = makeState({
      own_history: moves('C'.repeat(10) + 'DD'),
      opponent_history: moves('DDDCCCCCCCCC'),
      betrayals: 3,
    });
    expect(computeFeatures(state, DEFAULT_THRESHOLDS).betrayal_rate).toBeCloseTo(0.3);
  });

  it('flags an aggressive streak from two consecutive defections', () => {
    expect(computeFeatures(makeState({ opponent_history: moves('DD'), own_history: moves('CD'), consecutive_defections: 2 }), DEFAULT_THRESHOLDS).aggressive_streak).toBe(true);
    expect(computeFeatures(makeState({ opponent_history: moves('CD'), own_history: moves('CC'), consecutive_defections: 1 }), DEFAULT_THRESHOLDS).aggressive_streak).toBe(false);
  });
});
