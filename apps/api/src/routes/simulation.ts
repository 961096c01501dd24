import type { FastifyError, FastifyInstance } from "fastify";
import { ZodError } from "zod";
import { SimulationError } from "@ipd/engine-core";
import { OPPONENT_KINDS } from "@ipd/engine-arena";
import { createApiError, createApiResponse } from "@ipd/shared";
import {
  MatchRequestSchema,
  TournamentRequestSchema,
  playSingleMatch,
  runTournament,
  type SimulationDefaults,
} from "../services/tournament.service.js";

/**
 * Register the REST simulation routes.
 * Request bodies are validated with zod; engine configuration errors come
 * back as SimulationError. Both map to 400.
 */
export function registerSimulationRoutes(app: FastifyInstance, defaults: SimulationDefaults) {
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send(createApiError("VALIDATION_ERROR", "Invalid request body", error.issues));
    }
    if (error instanceof SimulationError) {
      return reply.status(400).send(createApiError(error.code, error.message));
    }
    const status = error.statusCode ?? 500;
    if (status >= 500) {
      request.log.error({ err: error }, "request failed");
      return reply.status(status).send(createApiError("INTERNAL_ERROR", "Internal server error"));
    }
    return reply.status(status).send(createApiError("BAD_REQUEST", error.message));
  });

  // ─── GET /opponents ──────────────────────────────────────
  app.get("/opponents", async () => createApiResponse({ opponents: OPPONENT_KINDS }));

  // ─── POST /tournaments ───────────────────────────────────
  app.post("/tournaments", async (request) => {
    const body = TournamentRequestSchema.parse(request.body ?? {});
    return createApiResponse(runTournament(body, defaults, request.log));
  });

  // ─── POST /matches ───────────────────────────────────────
  app.post("/matches", async (request) => {
    const body = MatchRequestSchema.parse(request.body ?? {});
    return createApiResponse(playSingleMatch(body, defaults));
  });
}
