import "dotenv/config";
import { pino } from "pino";
import { loadConfig } from "../config.js";
import { runTournament } from "../services/tournament.service.js";

/**
 * Run the default tournament with the configured rounds/noise/seed,
 * log the summary and print the comparison table.
 */
const config = loadConfig();
const logger = pino({ level: config.logLevel });

try {
  const { summary, table } = runTournament({}, config.simulation, logger);
  process.stdout.write(`${table}\n`);
  logger.info(
    {
      total_matches: summary.total_matches,
      total_score: summary.total_score,
      average_score: summary.average_score,
      win_rate: summary.win_rate,
    },
    "tournament finished",
  );
} catch (err) {
  logger.error({ err }, "tournament failed");
  process.exitCode = 1;
}
