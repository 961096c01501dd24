import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SimulationError } from "@ipd/engine-core";
import { OPPONENT_KINDS } from "@ipd/engine-arena";
import {
  MatchRequestShape,
  TournamentRequestShape,
  playSingleMatch,
  runTournament,
  type SimulationDefaults,
} from "../../services/tournament.service.js";

export const MCP_SERVER_VERSION = "0.1.0";

function text(payload: unknown) {
  return { type: "text" as const, text: JSON.stringify(payload) };
}

/** Engine errors become tool errors; anything else propagates to the SDK. */
function toolError(err: unknown) {
  if (err instanceof SimulationError) {
    return { isError: true, content: [text({ error: err.code, detail: err.detail })] };
  }
  throw err;
}

/**
 * Register all MCP tools with the server.
 * Every tool answers with a single JSON text block.
 */
export function registerTools(server: McpServer, defaults: SimulationDefaults) {
  // ─── ipd_ping ────────────────────────────────────────────
  server.tool(
    "ipd_ping",
    "Health check tool. Returns server status and timestamp.",
    {},
    async () => ({
      content: [
        text({
          status: "ok",
          timestamp: new Date().toISOString(),
          version: MCP_SERVER_VERSION,
        }),
      ],
    }),
  );

  // ─── ipd_list_opponents ──────────────────────────────────
  server.tool(
    "ipd_list_opponents",
    "List the reference opponent strategies available for matches and tournaments.",
    {},
    async () => ({ content: [text({ opponents: OPPONENT_KINDS })] }),
  );

  // ─── ipd_run_tournament ──────────────────────────────────
  server.tool(
    "ipd_run_tournament",
    "Run the decision engine against a roster of opponents (all seven by default) and return the tournament summary and comparison table.",
    TournamentRequestShape,
    async (args) => {
      try {
        return { content: [text(runTournament(args, defaults))] };
      } catch (err) {
        return toolError(err);
      }
    },
  );

  // ─── ipd_play_match ──────────────────────────────────────
  server.tool(
    "ipd_play_match",
    "Play one match of the decision engine against a single opponent and return scores, stats and the move sequence.",
    MatchRequestShape,
    async (args) => {
      try {
        return { content: [text(playSingleMatch(args, defaults))] };
      } catch (err) {
        return toolError(err);
      }
    },
  );
}
