/**
 * Entrypoint — searches Companies House and writes registered office addresses
 *
 * Usage:
 *   npm start
 *
 * Environment variables (or .env):
 *   - API_KEY: Companies House REST API key (raw, not encoded)
 *   - LOCATION: Location filter; also the first part of the output file name
 *   - SIC_CODES: Comma-separated SIC codes; the first one completes the file name
 *   - COMPANIES_HOUSE_BASE_URL, HTTP_TIMEOUT_MS, OUTPUT_DIR: optional
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 */

import "dotenv/config";
import { runCli } from "./pipeline";
import * as logger from "./logger";

async function main() {
  logger.info("Starting company-address-extractor");
  process.exitCode = await runCli(process.env);
}

main().catch((error) => {
  logger.error("Fatal error", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
});
