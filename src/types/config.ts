/**
 * Configuration types
 */

/**
 * External key-value source the configuration is read from (process.env)
 */
export type ConfigSource = Readonly<Record<string, string | undefined>>;

/**
 * At least one SIC code; the first one names the output file
 */
export type ClassificationCodes = readonly [string, ...string[]];

/**
 * Filters sent to the company search endpoint
 */
export interface SearchQuery {
  readonly location: string;
  /** In the order given */
  readonly classificationCodes: ClassificationCodes;
}

/**
 * Immutable application configuration, built once at startup
 */
export interface AppConfig extends SearchQuery {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly outputDir: string;
}
