/**
 * Companies House raw API response types — minimal shapes for mapping
 *
 * Only the fields read from the advanced company search endpoint.
 * Everything is optional/unknown because the body is validated at runtime
 * before being mapped to SearchResponse.
 */

export type CompaniesHouseAddressRaw = {
  address_line_1?: unknown;
  address_line_2?: unknown;
  locality?: unknown;
  postal_code?: unknown;
};

export type CompaniesHouseCompanyRaw = {
  company_name?: unknown;
  registered_office_address?: unknown;
};

/**
 * Advanced search body. The live endpoint reports the total as `hits`;
 * `total_results` is accepted as well.
 */
export type CompaniesHouseSearchResponseRaw = {
  total_results?: unknown;
  hits?: unknown;
  items?: unknown;
};
