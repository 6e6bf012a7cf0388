import * as dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { getConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { runBenchmarks } from "./scenarios.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

function main(): number {
  const config = getConfig();
  const logger = createLogger(config.LOG_LEVEL);
  const results = runBenchmarks(config, logger);

  const inconsistent = results.filter((result) => !result.consistent).map((result) => result.scenario);
  if (inconsistent.length > 0) {
    logger.error({ scenarios: inconsistent }, "[bench] algorithms disagreed");
    return 1;
  }

  logger.info({ scenarios: results.length }, "[bench] complete");
  return 0;
}

try {
  process.exitCode = main();
} catch (error) {
  createLogger().error({ err: error }, "[bench] fatal error");
  process.exitCode = 1;
}
