import { z } from "zod";
import { DecisionEngine, createRandom } from "@ipd/engine-core";
import {
  Match,
  OPPONENT_KINDS,
  Tournament,
  createOpponent,
  formatComparisonTable,
  type MatchStats,
  type OpponentKind,
  type TournamentLogger,
  type TournamentSummary,
} from "@ipd/engine-arena";

/** Defaults applied to any field a request leaves out. */
export interface SimulationDefaults {
  rounds: number;
  noise: number;
  seed: number;
}

const rounds = z.number().int().positive().max(100_000);
const noise = z.number().min(0).lt(1);
const seed = z.number().int();

export const TournamentRequestShape = {
  rounds: rounds.optional(),
  noise: noise.optional(),
  seed: seed.optional(),
  opponents: z.array(z.enum(OPPONENT_KINDS)).min(1).optional(),
  random_mode: z.enum(["shared", "per_match"]).optional(),
};
export const TournamentRequestSchema = z.object(TournamentRequestShape);
export type TournamentRequest = z.infer<typeof TournamentRequestSchema>;

export const MatchRequestShape = {
  opponent: z.enum(OPPONENT_KINDS),
  rounds: rounds.optional(),
  noise: noise.optional(),
  seed: seed.optional(),
};
export const MatchRequestSchema = z.object(MatchRequestShape);
export type MatchRequest = z.infer<typeof MatchRequestSchema>;

export interface TournamentRunResult {
  summary: TournamentSummary;
  table: string;
}

export interface MatchRunResult {
  opponent: OpponentKind;
  scores: { ours: number; theirs: number };
  stats: MatchStats;
  /** One entry per round: our move then theirs, e.g. "CD". */
  moves: string[];
}

/** Run the decision engine against the requested roster (all seven by default). */
export function runTournament(
  request: TournamentRequest,
  defaults: SimulationDefaults,
  logger?: TournamentLogger,
): TournamentRunResult {
  const kinds = request.opponents ?? OPPONENT_KINDS;
  const tournament = new Tournament({
    strategyFactory: () => new DecisionEngine(),
    opponents: kinds.map((kind) => createOpponent(kind)),
    rounds: request.rounds ?? defaults.rounds,
    noise: request.noise ?? defaults.noise,
    seed: request.seed ?? defaults.seed,
    randomMode: request.random_mode,
    logger,
  });

  const summary = tournament.run();
  return { summary, table: formatComparisonTable(summary) };
}

/** Play a single match of the decision engine against one opponent. */
export function playSingleMatch(request: MatchRequest, defaults: SimulationDefaults): MatchRunResult {
  const random = createRandom(request.seed ?? defaults.seed);
  const match = new Match(new DecisionEngine(), createOpponent(request.opponent, { random }), {
    rounds: request.rounds ?? defaults.rounds,
    noise: request.noise ?? defaults.noise,
    random,
  });

  const [ours, theirs] = match.play();
  return {
    opponent: request.opponent,
    scores: { ours, theirs },
    stats: match.getStats(),
    moves: match.history.map((r) => `${r.move1}${r.move2}`),
  };
}
