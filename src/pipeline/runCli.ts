/**
 * CLI runner — configuration + pipeline, mapped to a process exit code
 */

import type { ConfigSource, PipelineDeps } from "@/types";
import { loadConfig } from "@/config";
import { ExtractorError } from "@/errors";
import { runExtraction } from "./runExtraction";
import * as defaultLogger from "@/logger";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/**
 * Run the extractor once
 *
 * @returns 0 on success (including zero matches), 1 on any error
 */
export async function runCli(
  source: ConfigSource,
  deps: PipelineDeps = {},
): Promise<number> {
  const logger = deps.logger ?? defaultLogger;

  try {
    const config = loadConfig(source);
    await runExtraction(config, deps);
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof ExtractorError) {
      logger.error(error.message, { error: error.name });
    } else {
      logger.error("Unexpected error", {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    }
    return EXIT_FAILURE;
  }
}
