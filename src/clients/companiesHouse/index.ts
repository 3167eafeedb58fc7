export { CompaniesHouseClient } from "./companiesHouseClient";
export type { CompaniesHouseClientConfig } from "./companiesHouseClient";
export { parseSearchResponse } from "./mappers";
