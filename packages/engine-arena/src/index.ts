// Opponents
export type { OpponentKind, OpponentView, OpponentDecider, OpponentOptions } from './opponents/types.js';
export { OPPONENT_KINDS } from './opponents/types.js';
export {
  OpponentStrategy,
  createOpponent,
  createDefaultRoster,
  isOpponentKind,
} from './opponents/strategies.js';

// Match engine
export type { MatchPlayer, MatchConfig, RoundRecord, MatchStats, MatchResult } from './match/types.js';
export { Match, playMatch } from './match/engine.js';

// Tournament engine
export type {
  RandomMode,
  TournamentConfig,
  TournamentLogger,
  TournamentMatchResult,
  TournamentOpponent,
  TournamentSummary,
} from './tournament/types.js';
export { Tournament, summarizeResults } from './tournament/engine.js';
export { formatComparisonTable } from './tournament/report.js';
