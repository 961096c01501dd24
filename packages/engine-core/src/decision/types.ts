import type { Move } from '../types.js';

/** Fixed tuning constants of the rule cascade. */
export interface DecisionThresholds {
  cooperation_threshold: number;
  betrayal_threshold: number;
  recent_window: number;
  noise_tolerance: number;
  forgiveness_window: number;
  min_rounds_for_judgment: number;
  forgiveness_recent_coop: number;
  improvement_recent_coop: number;
  aggressive_streak: number;
  retaliation_cap: number;
  defensive_retaliation: number;
  probe_period: number;
}

/** Commitment to defect for a fixed number of upcoming rounds. */
export interface RetaliationState {
  active: boolean;
  rounds_remaining: number;
}

/** Everything the engine knows. Owned by one DecisionEngine instance. */
export interface EngineState {
  own_history: Move[];
  opponent_history: Move[];
  consecutive_defections: number;
  betrayals: number;
  rounds_since_betrayal: number;
  retaliation: RetaliationState;
}

/** Read-only view derived from EngineState every round. */
export interface FeatureSnapshot {
  overall_coop: number;
  recent_coop: number;
  betrayal_rate: number;
  aggressive_streak: boolean;
  total_rounds: number;
}

export type DecisionRule =
  | 'opening'
  | 'retaliation'
  | 'forgiveness'
  | 'noise_tolerance'
  | 'proportional_retaliation'
  | 'escalated_retaliation'
  | 'defensive_retaliation'
  | 'defection'
  | 'reward_cooperation'
  | 'reward_improvement'
  | 'probe'
  | 'default_cooperation';

export interface Decision {
  move: Move;
  rule: DecisionRule;
  features: FeatureSnapshot;
  /** Retaliation state once this decision is carried out. */
  retaliation: RetaliationState;
  /** Forgiveness clears the consecutive-defection counter. */
  reset_streak: boolean;
}
