import type { Move } from '../types.js';
import type { Strategy } from '../strategy/types.js';
import { computeFeatures } from './features.js';
import { DEFAULT_THRESHOLDS, makeDecision } from './maker.js';
import type { Decision, EngineState, FeatureSnapshot } from './types.js';

export function createEngineState(): EngineState {
  return {
    own_history: [],
    opponent_history: [],
    consecutive_defections: 0,
    betrayals: 0,
    rounds_since_betrayal: 0,
    retaliation: { active: false, rounds_remaining: 0 },
  };
}

/**
 * The strategy under test.
 *
 * decideMove() only reads state. updateHistory() re-derives the decision for
 * the round that just finished, applies its retaliation/forgiveness effects,
 * then records the moves actually played.
 */
export class DecisionEngine implements Strategy {
  readonly name: string;
  private state: EngineState = createEngineState();

  constructor(options: { name?: string } = {}) {
    this.name = options.name ?? 'DecisionEngine';
  }

  decide(): Decision {
    return makeDecision(this.state, DEFAULT_THRESHOLDS);
  }

  decideMove(): Move {
    return this.decide().move;
  }

  updateHistory(ownMove: Move, opponentMove: Move): void {
    const decision = this.decide();
    const s = this.state;

    s.retaliation = { ...decision.retaliation };
    if (decision.reset_streak) {
      s.consecutive_defections = 0;
    }

    s.own_history.push(ownMove);
    s.opponent_history.push(opponentMove);

    if (opponentMove === 'D') {
      s.consecutive_defections++;
      if (ownMove === 'C') {
        s.betrayals++;
        s.rounds_since_betrayal = 0;
      }
    } else {
      s.consecutive_defections = 0;
      s.rounds_since_betrayal++;
    }
  }

  features(): FeatureSnapshot {
    return computeFeatures(this.state, DEFAULT_THRESHOLDS);
  }

  /** Frozen copy of the current state. */
  snapshot(): Readonly<EngineState> {
    return Object.freeze({
      ...this.state,
      own_history: [...this.state.own_history],
      opponent_history: [...this.state.opponent_history],
      retaliation: { ...this.state.retaliation },
    });
  }
}
