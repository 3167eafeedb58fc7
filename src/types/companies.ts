/**
 * Normalized company search types
 */

export interface RegisteredOfficeAddress {
  addressLine1?: string;
  addressLine2?: string;
  locality?: string;
  postalCode?: string;
}

export interface CompanyRecord {
  companyName: string;
  /** null when the API returned no registered office address */
  registeredOfficeAddress: RegisteredOfficeAddress | null;
}

export interface SearchResponse {
  totalResults: number;
  items: CompanyRecord[];
}
