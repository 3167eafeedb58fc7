/**
 * Address formatter — renders search results as plain-text address blocks
 *
 * Block layout (fixed order, absent fields omitted, no blank lines inside):
 *   company name
 *   address line 1
 *   address line 2
 *   locality
 *   postal code
 *
 * Records without a registered office address are skipped and counted.
 */

import type {
  CompanyRecord,
  FormatResult,
  FormattedBlock,
  SearchResponse,
} from "@/types";

/**
 * Render one company as a block; every line, including the last, ends in "\n"
 */
export function formatCompanyBlock(record: CompanyRecord): FormattedBlock {
  const address = record.registeredOfficeAddress;
  const lines = [
    record.companyName,
    address?.addressLine1,
    address?.addressLine2,
    address?.locality,
    address?.postalCode,
  ].filter((line): line is string => line !== undefined && line !== "");

  return lines.map((line) => `${line}\n`).join("");
}

/**
 * Format every record that has a registered office address, in response order
 */
export function formatCompanyBlocks(response: SearchResponse): FormatResult {
  const blocks: FormattedBlock[] = [];
  let skipped = 0;

  for (const record of response.items) {
    if (record.registeredOfficeAddress === null) {
      skipped++;
      continue;
    }
    blocks.push(formatCompanyBlock(record));
  }

  return { blocks, skipped };
}

/**
 * Join blocks with a blank separator line. No blocks renders as ""
 */
export function renderDocument(blocks: readonly FormattedBlock[]): string {
  return blocks.join("\n");
}
