/**
 * Utils barrel exports
 */

export * from "./auth/basicAuth";
