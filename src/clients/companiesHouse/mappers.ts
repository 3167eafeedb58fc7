/**
 * Companies House payload mappers — validate the raw search body and map it
 * to SearchResponse
 *
 * The body is untrusted JSON: anything that does not have the expected shape
 * raises ParseError. A missing or null registered_office_address is data
 * sparsity, not a shape error, and maps to null.
 */

import type {
  CompanyRecord,
  RegisteredOfficeAddress,
  SearchResponse,
} from "@/types";
import type {
  CompaniesHouseAddressRaw,
  CompaniesHouseCompanyRaw,
  CompaniesHouseSearchResponseRaw,
} from "@/types/clients/companiesHouse";
import { COMPANY_NAME_FALLBACK } from "@/constants";
import { ParseError } from "@/errors";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Optional string field: undefined/null/"" are absent, other non-strings are invalid
 */
function readOptionalString(
  value: unknown,
  fieldPath: string,
): string | undefined {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ParseError(`${fieldPath} must be a string, got ${typeof value}`);
  }
  return value;
}

/**
 * Resolve the total hit count; the live endpoint reports it as `hits`
 */
function readTotalResults(raw: CompaniesHouseSearchResponseRaw): number {
  const total = raw.total_results ?? raw.hits;
  if (typeof total !== "number" || !Number.isInteger(total) || total < 0) {
    throw new ParseError("total_results/hits must be a non-negative integer");
  }
  return total;
}

function mapAddress(
  raw: CompaniesHouseAddressRaw,
  fieldPath: string,
): RegisteredOfficeAddress {
  const address: RegisteredOfficeAddress = {};

  const addressLine1 = readOptionalString(raw.address_line_1, `${fieldPath}.address_line_1`);
  const addressLine2 = readOptionalString(raw.address_line_2, `${fieldPath}.address_line_2`);
  const locality = readOptionalString(raw.locality, `${fieldPath}.locality`);
  const postalCode = readOptionalString(raw.postal_code, `${fieldPath}.postal_code`);

  if (addressLine1 !== undefined) address.addressLine1 = addressLine1;
  if (addressLine2 !== undefined) address.addressLine2 = addressLine2;
  if (locality !== undefined) address.locality = locality;
  if (postalCode !== undefined) address.postalCode = postalCode;

  return address;
}

/**
 * Map one search item to a CompanyRecord
 */
export function mapCompanyItem(
  raw: CompaniesHouseCompanyRaw,
  index: number,
): CompanyRecord {
  const fieldPath = `items[${index}]`;
  const companyName =
    readOptionalString(raw.company_name, `${fieldPath}.company_name`) ??
    COMPANY_NAME_FALLBACK;

  const rawAddress = raw.registered_office_address;
  if (rawAddress === undefined || rawAddress === null) {
    return { companyName, registeredOfficeAddress: null };
  }
  if (!isRecord(rawAddress)) {
    throw new ParseError(
      `${fieldPath}.registered_office_address must be an object`,
    );
  }

  return {
    companyName,
    registeredOfficeAddress: mapAddress(
      rawAddress,
      `${fieldPath}.registered_office_address`,
    ),
  };
}

/**
 * Validate and map a parsed search body
 *
 * A body without `items` is treated as zero results (the API omits the field
 * when nothing matches).
 *
 * @throws {ParseError} If the body does not have the expected shape
 */
export function parseSearchResponse(raw: unknown): SearchResponse {
  if (!isRecord(raw)) {
    throw new ParseError("body must be a JSON object");
  }
  const body: CompaniesHouseSearchResponseRaw = raw;

  const rawItems = body.items ?? [];
  if (!Array.isArray(rawItems)) {
    throw new ParseError("items must be an array");
  }

  const items = rawItems.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new ParseError(`items[${index}] must be an object`);
    }
    return mapCompanyItem(item, index);
  });

  return { totalResults: readTotalResults(body), items };
}
