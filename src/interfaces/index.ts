export type { CompanySearchClient } from "./clients/companySearchClient";
