/**
 * CompaniesHouseClient — client for the Companies House advanced company search
 *
 * Implements the CompanySearchClient interface. One GET per search, no retries
 * and no pagination: when the API reports more hits than it returned, a
 * truncation notice is logged and the returned page is used as-is.
 */

import type { CompanySearchClient } from "@/interfaces";
import type {
  HttpRequestFn,
  Logger,
  SearchQuery,
  SearchResponse,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  COMPANIES_HOUSE_ADVANCED_SEARCH_PATH,
  COMPANIES_HOUSE_BASE_URL,
  COMPANIES_HOUSE_COMPANY_STATUS,
  COMPANIES_HOUSE_SEARCH_SIZE,
  DEFAULT_HTTP_TIMEOUT_MS,
} from "@/constants";
import { parseSearchResponse } from "./mappers";
import * as defaultLogger from "@/logger";

export interface CompaniesHouseClientConfig {
  /**
   * Precomputed Authorization header value (see encodeBasicAuth)
   */
  authorizationHeader: string;

  /**
   * API base URL. Defaults to the public Companies House API
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds
   */
  timeoutMs?: number;

  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;

  logger?: Logger;
}

export class CompaniesHouseClient implements CompanySearchClient {
  private readonly authorizationHeader: string;
  private readonly searchUrl: string;
  private readonly timeoutMs: number;
  private readonly httpRequest: HttpRequestFn;
  private readonly logger: Logger;

  constructor(config: CompaniesHouseClientConfig) {
    this.authorizationHeader = config.authorizationHeader;
    this.searchUrl = new URL(
      COMPANIES_HOUSE_ADVANCED_SEARCH_PATH,
      config.baseUrl ?? COMPANIES_HOUSE_BASE_URL,
    ).toString();
    this.timeoutMs = config.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.logger = config.logger ?? defaultLogger;
  }

  /**
   * Search active companies by location and SIC codes
   *
   * @throws {TransportError} On network failures and timeouts
   * @throws {ApiError} On non-2xx responses
   * @throws {ParseError} On an invalid body
   */
  async searchCompanies(query: SearchQuery): Promise<SearchResponse> {
    this.logger.info("Searching companies", {
      location: query.location,
      sicCodes: query.classificationCodes,
    });

    const raw = await this.httpRequest<unknown>({
      method: "GET",
      url: this.searchUrl,
      headers: { Authorization: this.authorizationHeader },
      query: {
        location: query.location,
        sic_codes: query.classificationCodes,
        company_status: COMPANIES_HOUSE_COMPANY_STATUS,
        size: COMPANIES_HOUSE_SEARCH_SIZE,
      },
      timeoutMs: this.timeoutMs,
    });

    const response = parseSearchResponse(raw);

    this.logger.info("Search response received", {
      totalResults: response.totalResults,
      itemsReturned: response.items.length,
    });

    if (response.items.length < response.totalResults) {
      this.logger.info(
        "Results truncated: API reports more companies than returned, pagination is not implemented",
        {
          totalResults: response.totalResults,
          itemsReturned: response.items.length,
        },
      );
    }

    return response;
  }
}
