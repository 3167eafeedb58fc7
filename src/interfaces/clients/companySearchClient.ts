/**
 * CompanySearchClient interface — contract for the company search data source
 *
 * SIC code filtering is passed through as-is; how several codes combine is
 * decided server-side.
 */

import type { SearchQuery, SearchResponse } from "@/types";

export interface CompanySearchClient {
  /**
   * Run one search request (no pagination)
   *
   * @returns Items of the first (and only) page plus the reported total
   */
  searchCompanies(query: SearchQuery): Promise<SearchResponse>;
}
