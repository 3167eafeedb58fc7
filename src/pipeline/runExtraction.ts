/**
 * Extraction pipeline — encode credential, search, format, write
 *
 * Strictly sequential; any failure propagates and nothing is written unless
 * the whole response was fetched and formatted.
 */

import type { AppConfig, ExtractionSummary, PipelineDeps } from "@/types";
import { CompaniesHouseClient } from "@/clients/companiesHouse";
import { encodeBasicAuth } from "@/utils";
import { formatCompanyBlocks, writeOutputDocument } from "@/output";
import * as defaultLogger from "@/logger";

export async function runExtraction(
  config: AppConfig,
  deps: PipelineDeps = {},
): Promise<ExtractionSummary> {
  const [firstCode] = config.classificationCodes;
  const log = defaultLogger.withContext(
    { location: config.location, sicCode: firstCode },
    deps.logger ?? defaultLogger,
  );

  const client = new CompaniesHouseClient({
    authorizationHeader: encodeBasicAuth(config.apiKey),
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    httpRequest: deps.httpRequest,
    logger: log,
  });

  const response = await client.searchCompanies(config);

  const { blocks, skipped } = formatCompanyBlocks(response);
  if (skipped > 0) {
    log.debug("Skipped companies without a registered office address", {
      skipped,
    });
  }

  const outputPath = writeOutputDocument({
    outputDir: config.outputDir,
    location: config.location,
    classificationCode: firstCode,
    blocks,
  });

  const summary: ExtractionSummary = {
    outputPath,
    totalResults: response.totalResults,
    itemsReturned: response.items.length,
    written: blocks.length,
    skipped,
    truncated: response.items.length < response.totalResults,
  };

  log.info("Addresses written", { ...summary });
  return summary;
}
