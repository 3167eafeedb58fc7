/**
 * HTTP client constants — defaults and configuration
 */

/**
 * Default request timeout in milliseconds (10 seconds)
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

/**
 * Default headers: the search endpoint only speaks JSON
 */
export const DEFAULT_ACCEPT_HEADERS: Record<string, string> = {
  Accept: "application/json",
};

/**
 * Maximum length of error body snippet to include in error messages
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;
