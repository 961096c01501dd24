import { z } from "zod";
import { DEFAULT_NOISE, DEFAULT_ROUNDS, DEFAULT_SEED } from "@ipd/engine-core";
import type { SimulationDefaults } from "./services/tournament.service.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  IPD_ROUNDS: z.coerce.number().int().positive().default(DEFAULT_ROUNDS),
  IPD_NOISE: z.coerce.number().min(0).lt(1).default(DEFAULT_NOISE),
  IPD_SEED: z.coerce.number().int().default(DEFAULT_SEED),
  CORS_ORIGINS: z.string().optional(),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  corsOrigins: (string | RegExp)[];
  simulation: SimulationDefaults;
}

/** Any localhost port, for local MCP inspectors and dev tools. */
const DEFAULT_CORS_ORIGINS: (string | RegExp)[] = [/^http:\/\/localhost:\d+$/];

/** Read and validate configuration from the environment. Throws on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    corsOrigins: e.CORS_ORIGINS
      ? e.CORS_ORIGINS.split(",").map((o) => o.trim()).filter((o) => o.length > 0)
      : DEFAULT_CORS_ORIGINS,
    simulation: {
      rounds: e.IPD_ROUNDS,
      noise: e.IPD_NOISE,
      seed: e.IPD_SEED,
    },
  };
}
