/**
 * Configuration loader
 *
 * Builds the immutable AppConfig from a key-value source. Library code never
 * reads process.env directly; the entry point passes it in after dotenv has
 * populated it.
 */

import type { AppConfig, ClassificationCodes, ConfigSource } from "@/types";
import {
  CONFIG_KEYS,
  SIC_CODES_SEPARATOR,
  COMPANIES_HOUSE_BASE_URL,
  DEFAULT_HTTP_TIMEOUT_MS,
} from "@/constants";
import { ConfigurationError } from "@/errors";

/**
 * Read a value, treating empty/whitespace-only as absent
 */
function readTrimmed(source: ConfigSource, key: string): string | undefined {
  const value = source[key]?.trim();
  return value ? value : undefined;
}

/**
 * Split the raw SIC_CODES value on commas, trimming each code.
 * Empty elements (e.g. "62012,,62020" or a trailing comma) are dropped.
 *
 * @throws {ConfigurationError} If no code remains
 */
export function parseClassificationCodes(raw: string): ClassificationCodes {
  const [first, ...rest] = raw
    .split(SIC_CODES_SEPARATOR)
    .map((code) => code.trim())
    .filter((code) => code.length > 0);

  if (first === undefined) {
    throw new ConfigurationError(
      `${CONFIG_KEYS.sicCodes} must contain at least one code`,
    );
  }
  return [first, ...rest];
}

function parseTimeoutMs(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_HTTP_TIMEOUT_MS;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(
      `${CONFIG_KEYS.timeoutMs} must be a positive integer (milliseconds), got "${raw}"`,
    );
  }
  return value;
}

/**
 * Load configuration from a key-value source.
 *
 * Required: API_KEY, LOCATION, SIC_CODES. All missing keys are reported together.
 *
 * @throws {ConfigurationError} On missing/empty required keys or an invalid optional value
 */
export function loadConfig(source: ConfigSource): AppConfig {
  const apiKey = readTrimmed(source, CONFIG_KEYS.apiKey);
  const location = readTrimmed(source, CONFIG_KEYS.location);
  const rawCodes = readTrimmed(source, CONFIG_KEYS.sicCodes);

  if (!apiKey || !location || !rawCodes) {
    const missing: string[] = [];
    if (!apiKey) missing.push(CONFIG_KEYS.apiKey);
    if (!location) missing.push(CONFIG_KEYS.location);
    if (!rawCodes) missing.push(CONFIG_KEYS.sicCodes);
    throw new ConfigurationError(
      `missing required setting(s): ${missing.join(", ")}. ` +
        `Set them in the environment or in a .env file.`,
    );
  }

  const classificationCodes = Object.freeze(parseClassificationCodes(rawCodes));

  return Object.freeze({
    apiKey,
    location,
    classificationCodes,
    baseUrl: readTrimmed(source, CONFIG_KEYS.baseUrl) ?? COMPANIES_HOUSE_BASE_URL,
    timeoutMs: parseTimeoutMs(readTrimmed(source, CONFIG_KEYS.timeoutMs)),
    outputDir: readTrimmed(source, CONFIG_KEYS.outputDir) ?? process.cwd(),
  });
}
