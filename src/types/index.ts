export * from "./logger";
export * from "./config";
export * from "./companies";
export * from "./output";
export * from "./pipeline";
export * from "./clients/http";
// Companies House raw types are intentionally NOT exported from the global barrel.
// Import directly from "@/types/clients/companiesHouse" within src/clients/companiesHouse/ only.
