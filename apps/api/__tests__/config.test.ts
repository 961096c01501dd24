import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config.port).toBe(3001);
    expect(config.host).toBe("0.0.0.0");
    expect(config.logLevel).toBe("info");
    expect(config.simulation).toEqual({ rounds: 200, noise: 0, seed: 42 });
    expect(config.corsOrigins).toHaveLength(1);
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ PORT: "8080", IPD_ROUNDS: "50", IPD_NOISE: "0.05", IPD_SEED: "7" });
    expect(config.port).toBe(8080);
    expect(config.simulation).toEqual({ rounds: 50, noise: 0.05, seed: 7 });
  });

  it("splits and trims CORS_ORIGINS", () => {
    const config = loadConfig({ CORS_ORIGINS: "http://a.test, http://b.test ,," });
    expect(config.corsOrigins).toEqual(["http://a.test", "http://b.test"]);
  });

  it("rejects noise outside [0, 1)", () => {
    expect(() => loadConfig({ IPD_NOISE: "1" })).toThrow(/Invalid environment configuration: IPD_NOISE/);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(/LOG_LEVEL/);
  });

  it("rejects a non-positive round count", () => {
    expect(() => loadConfig({ IPD_ROUNDS: "0" })).toThrow(/IPD_ROUNDS/);
  });
});
