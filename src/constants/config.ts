/**
 * Configuration keys read from the environment
 */

export const CONFIG_KEYS = {
  apiKey: "API_KEY",
  location: "LOCATION",
  sicCodes: "SIC_CODES",
  baseUrl: "COMPANIES_HOUSE_BASE_URL",
  timeoutMs: "HTTP_TIMEOUT_MS",
  outputDir: "OUTPUT_DIR",
} as const;

export const SIC_CODES_SEPARATOR = ",";
