/**
 * Pipeline types
 */

import type { HttpRequestFn } from "./clients/http";
import type { Logger } from "./logger";

export interface PipelineDeps {
  /** Defaults to the production fetch-based httpRequest */
  httpRequest?: HttpRequestFn;
  /** Defaults to the project logger */
  logger?: Logger;
}

export interface ExtractionSummary {
  outputPath: string;
  totalResults: number;
  itemsReturned: number;
  written: number;
  skipped: number;
  /** True when the API reported more results than it returned */
  truncated: boolean;
}
