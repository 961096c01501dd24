import { countMoves, rate } from '../utils.js';
import type { DecisionThresholds, EngineState, FeatureSnapshot } from './types.js';

/**
 * Compute opponent behaviour features from the engine's own history.
 *
 * betrayal_rate = betrayals / own cooperations, reported as 0 until own
 * cooperations reach min_rounds_for_judgment.
 */
export function computeFeatures(state: EngineState, thresholds: DecisionThresholds): FeatureSnapshot {
  const total = state.opponent_history.length;
  const recent = state.opponent_history.slice(-Math.min(thresholds.recent_window, total));
  const ownCoop = countMoves(state.own_history, 'C');

  return {
    overall_coop: rate(countMoves(state.opponent_history, 'C'), total),
    recent_coop: total > 0 ? rate(countMoves(recent, 'C'), recent.length) : 0,
    betrayal_rate: ownCoop >= thresholds.min_rounds_for_judgment ? rate(state.betrayals, ownCoop) : 0,
    aggressive_streak: state.consecutive_defections >= thresholds.aggressive_streak,
    total_rounds: total,
  };
}
