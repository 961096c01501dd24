import Fastify from "fastify";
import cors from "@fastify/cors";
import { loadConfig, type AppConfig } from "./config.js";
import { registerSimulationRoutes } from "./routes/simulation.js";
import { registerMcpRoutes } from "./mcp/router.js";

export async function createServer(config: AppConfig = loadConfig()) {
  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // ─── CORS ────────────────────────────────────────────────
  await app.register(cors, {
    origin: config.corsOrigins,
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "mcp-session-id"],
    exposedHeaders: ["mcp-session-id"],
  });

  // ─── Health Check ────────────────────────────────────────
  app.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  // ─── Simulation Routes ───────────────────────────────────
  registerSimulationRoutes(app, config.simulation);

  // ─── MCP Routes ──────────────────────────────────────────
  registerMcpRoutes(app, config.simulation);

  return app;
}
