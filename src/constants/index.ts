export * from "./logger";
export * from "./config";
export * from "./output";
export * from "./clients/http";
export * from "./clients/companiesHouse";
