import type { Move } from '../types.js';
import { computeFeatures } from './features.js';
import type {
  Decision,
  DecisionRule,
  DecisionThresholds,
  EngineState,
  FeatureSnapshot,
  RetaliationState,
} from './types.js';

export const DEFAULT_THRESHOLDS: Readonly<DecisionThresholds> = Object.freeze({
  cooperation_threshold: 0.7,
  betrayal_threshold: 0.3,
  recent_window: 15,
  noise_tolerance: 2,
  forgiveness_window: 5,
  min_rounds_for_judgment: 10,
  forgiveness_recent_coop: 0.8,
  improvement_recent_coop: 0.6,
  aggressive_streak: 2,
  retaliation_cap: 3,
  defensive_retaliation: 2,
  probe_period: 3,
});

const INACTIVE: RetaliationState = { active: false, rounds_remaining: 0 };

/**
 * Decision maker: a pure function of the engine state.
 *
 * Priority order:
 * 1. no history                      → C (opening)
 * 2. retaliation pending             → D, count down
 * 3. opponent reformed               → C, clear retaliation + streak
 * 4. opponent's last move was D      → defection response
 * 5. opponent's last move was C      → cooperation response
 *
 * State effects are described by the returned Decision, never applied here.
 */
export function makeDecision(
  state: EngineState,
  thresholds: DecisionThresholds = DEFAULT_THRESHOLDS,
): Decision {
  const features = computeFeatures(state, thresholds);
  const current = state.retaliation;
  const decide = (move: Move, rule: DecisionRule, retaliation: RetaliationState = current, reset_streak = false): Decision => ({
    move,
    rule,
    features,
    retaliation,
    reset_streak,
  });

  if (state.opponent_history.length === 0) {
    return decide('C', 'opening');
  }

  if (current.rounds_remaining > 0) {
    const remaining = current.rounds_remaining - 1;
    return decide('D', 'retaliation', { active: remaining > 0, rounds_remaining: remaining });
  }

  if (shouldForgive(state, features, thresholds)) {
    return decide('C', 'forgiveness', INACTIVE, true);
  }

  const last = state.opponent_history[state.opponent_history.length - 1];
  if (last === 'D') {
    return handleDefection(state, features, thresholds, decide);
  }
  return handleCooperation(features, thresholds, decide);
}

type DecideFn = (move: Move, rule: DecisionRule, retaliation?: RetaliationState) => Decision;

function handleDefection(
  state: EngineState,
  features: FeatureSnapshot,
  thresholds: DecisionThresholds,
  decide: DecideFn,
): Decision {
  const streak = state.consecutive_defections;
  // Commitments are never restacked or extended once begun.
  const start = (rounds: number): RetaliationState =>
    state.retaliation.active ? state.retaliation : { active: true, rounds_remaining: rounds };

  if (features.overall_coop > thresholds.cooperation_threshold && streak <= thresholds.noise_tolerance) {
    return decide('C', 'noise_tolerance');
  }
  if (streak === 1) {
    return decide('D', 'proportional_retaliation', start(1));
  }
  if (features.aggressive_streak) {
    return decide('D', 'escalated_retaliation', start(Math.min(thresholds.retaliation_cap, streak)));
  }
  if (features.betrayal_rate > thresholds.betrayal_threshold) {
    return decide('D', 'defensive_retaliation', start(thresholds.defensive_retaliation));
  }
  return decide('D', 'defection');
}

function handleCooperation(
  features: FeatureSnapshot,
  thresholds: DecisionThresholds,
  decide: DecideFn,
): Decision {
  if (features.overall_coop > thresholds.cooperation_threshold) {
    return decide('C', 'reward_cooperation');
  }
  if (features.recent_coop > thresholds.improvement_recent_coop) {
    return decide('C', 'reward_improvement');
  }
  if (features.betrayal_rate > thresholds.betrayal_threshold) {
    return decide(features.total_rounds % thresholds.probe_period === 0 ? 'C' : 'D', 'probe');
  }
  return decide('C', 'default_cooperation');
}

/** Sustained reform: enough rounds, a clean trailing window, and no recent betrayal. */
export function shouldForgive(
  state: EngineState,
  features: FeatureSnapshot,
  thresholds: DecisionThresholds,
): boolean {
  if (features.total_rounds < thresholds.min_rounds_for_judgment) {
    return false;
  }
  const window = state.opponent_history.slice(-thresholds.forgiveness_window);
  return (
    window.length === thresholds.forgiveness_window &&
    window.every((move) => move === 'C') &&
    state.rounds_since_betrayal >= thresholds.forgiveness_window &&
    features.recent_coop > thresholds.forgiveness_recent_coop
  );
}
