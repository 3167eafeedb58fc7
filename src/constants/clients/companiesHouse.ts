/**
 * Companies House client constants — base URL, endpoint path, fixed filters
 */

/**
 * Companies House public data API base URL
 */
export const COMPANIES_HOUSE_BASE_URL =
  "https://api.company-information.service.gov.uk";

/**
 * Advanced company search endpoint path
 */
export const COMPANIES_HOUSE_ADVANCED_SEARCH_PATH =
  "/advanced-search/companies";

/**
 * Only currently trading companies are requested
 */
export const COMPANIES_HOUSE_COMPANY_STATUS = "active";

/**
 * Results requested in the single (unpaginated) call
 */
export const COMPANIES_HOUSE_SEARCH_SIZE = 500;

/**
 * Name used when a search item carries no company_name
 */
export const COMPANY_NAME_FALLBACK = "N/A";
