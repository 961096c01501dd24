import "dotenv/config";
import { loadConfig } from "./config.js";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const server = await createServer(config);

  await server.listen({ port: config.port, host: config.host });
  server.log.info(`IPD arena API running on ${config.host}:${config.port}`);
  server.log.info(`MCP endpoint: http://${config.host}:${config.port}/mcp`);
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
