import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { createMcpServer } from "../src/mcp/router.js";

let client: Client;

beforeEach(async () => {
  const server = createMcpServer({ rounds: 10, noise: 0, seed: 42 });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: "ipd-test", version: "0.0.0" });
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
});

afterEach(async () => {
  await client.close();
});

async function callJson(name: string, args: Record<string, unknown> = {}) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const block = result.content[0];
  if (block?.type !== "text") {
    throw new Error(`expected text content from ${name}`);
  }
  const payload: unknown = JSON.parse(block.text);
  return { isError: result.isError === true, payload };
}

describe("MCP tools", () => {
  it("registers every tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "ipd_list_opponents",
      "ipd_ping",
      "ipd_play_match",
      "ipd_run_tournament",
    ]);
  });

  it("answers ipd_ping", async () => {
    const { payload } = await callJson("ipd_ping");
    expect(payload).toMatchObject({ status: "ok", version: "0.1.0" });
  });

  it("lists opponents", async () => {
    const { payload } = await callJson("ipd_list_opponents");
    expect(payload).toMatchObject({ opponents: expect.arrayContaining(["TitForTat", "Grudger"]) });
  });

  it("runs a tournament", async () => {
    const { isError, payload } = await callJson("ipd_run_tournament", {
      opponents: ["AlwaysCooperate", "AlwaysDefect"],
    });
    expect(isError).toBe(false);
    expect(payload).toMatchObject({ summary: { total_matches: 2, total_score: 39 } });
  });

  it("plays a match", async () => {
    const { payload } = await callJson("ipd_play_match", { opponent: "AlwaysCooperate", rounds: 3 });
    expect(payload).toMatchObject({ scores: { ours: 9, theirs: 9 }, moves: ["CC", "CC", "CC"] });
  });

  it("reports engine errors as tool errors", async () => {
    const { isError, payload } = await callJson("ipd_run_tournament", { seed: 2 ** 60 });
    expect(isError).toBe(true);
    expect(payload).toMatchObject({ error: "INVALID_SEED" });
  });
});
