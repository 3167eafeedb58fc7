/**
 * Error taxonomy — every failure of the extraction pipeline is terminal
 *
 * Kept apart from types (which should be shapes only). Missing per-record
 * address data is not an error and has no class here.
 */

import type { ApiErrorDetails } from "@/types";

/**
 * Base class for all pipeline failures
 */
export class ExtractorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ExtractorError";

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A required setting is missing, empty or malformed
 */
export class ConfigurationError extends ExtractorError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = "ConfigurationError";
  }
}

/**
 * The API credential cannot be turned into a Basic auth token
 */
export class EncodingError extends ExtractorError {
  constructor(message: string) {
    super(`Credential encoding failed: ${message}`);
    this.name = "EncodingError";
  }
}

/**
 * No HTTP response: connection refused, DNS failure, timeout
 */
export class TransportError extends ExtractorError {
  public readonly url: string;
  public readonly timedOut: boolean;

  constructor(url: string, timedOut: boolean, cause?: unknown) {
    const reason = timedOut
      ? "request timed out"
      : cause instanceof Error
        ? cause.message
        : "network failure";
    super(`Request to ${url} failed: ${reason}`, { cause });
    this.name = "TransportError";
    this.url = url;
    this.timedOut = timedOut;
  }
}

/**
 * Non-2xx HTTP status
 */
export class ApiError extends ExtractorError {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;

  constructor(details: ApiErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "ApiError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
  }
}

/**
 * Response body is not valid JSON or lacks the expected shape
 */
export class ParseError extends ExtractorError {
  constructor(message: string, cause?: unknown) {
    super(`Invalid search response: ${message}`, { cause });
    this.name = "ParseError";
  }
}

/**
 * Output file cannot be created or written
 */
export class FileWriteError extends ExtractorError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(
      `Failed to write ${path}${cause instanceof Error ? `: ${cause.message}` : ""}`,
      { cause },
    );
    this.name = "FileWriteError";
    this.path = path;
  }
}
