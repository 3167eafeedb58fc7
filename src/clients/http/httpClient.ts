/**
 * HTTP client wrapper — JSON GET client using native fetch
 * Supports timeouts, repeated query params, and typed failures
 *
 * One attempt per call: failures are surfaced to the caller, never retried.
 */

import type { HttpRequest, HttpQueryValue } from "@/types";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_ACCEPT_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants";
import { ApiError, ParseError, TransportError } from "@/errors";
import * as logger from "@/logger";

/**
 * Build URL with query parameters (supports arrays for repeated params)
 */
export function buildUrl(
  baseUrl: string,
  query?: Record<string, HttpQueryValue | readonly HttpQueryValue[]>,
): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    if (Array.isArray(value)) {
      // Append each array element as a repeated query param
      value.forEach((item) => url.searchParams.append(key, String(item)));
    } else {
      url.searchParams.append(key, String(value));
    }
  });

  return url.toString();
}

/**
 * Shorten a response body for error messages
 */
function toSnippet(text: string): string | undefined {
  if (!text) {
    return undefined;
  }
  return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
    ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
    : text;
}

/**
 * Extract a snippet of the error response body for debugging
 * A failed read leaves the snippet out; the status still decides the error
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    return toSnippet(await response.text());
  } catch {
    return undefined;
  }
}

/**
 * Read the body, mapping a connection dropped mid-body to TransportError
 */
async function readBody(
  response: Response,
  url: string,
  signal: AbortSignal,
): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new TransportError(url, signal.aborted, error);
  }
}

/**
 * Perform a GET request and parse the JSON body
 *
 * @template T - Expected response type (unchecked; validate the result)
 * @throws {TransportError} On network failures and timeouts
 * @throws {ApiError} On non-2xx status codes
 * @throws {ParseError} When the body is not valid JSON
 */
export async function httpRequest<T = unknown>(req: HttpRequest): Promise<T> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  // Setup timeout using AbortController
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Defaults first, caller headers override
    const headers: Record<string, string> = {
      ...DEFAULT_ACCEPT_HEADERS,
      ...req.headers,
    };

    logger.debug("HTTP request", { method: req.method, url, timeoutMs });

    let response: Response;
    try {
      response = await fetch(url, {
        method: req.method,
        headers,
        signal: controller.signal,
      });
    } catch (error) {
      // AbortError (timeout) or TypeError (DNS, connection refused, reset)
      throw new TransportError(url, controller.signal.aborted, error);
    }

    // Check for HTTP errors (non-2xx)
    if (!response.ok) {
      throw new ApiError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet: await extractBodySnippet(response),
      });
    }

    const body = await readBody(response, url, controller.signal);

    const contentType = response.headers.get("content-type");
    if (
      contentType &&
      !contentType.includes("application/json") &&
      !contentType.includes("+json")
    ) {
      logger.warn("Non-JSON content type, parsing body as JSON anyway", {
        method: req.method,
        url,
        status: response.status,
        contentType,
      });
    }

    try {
      return JSON.parse(body);
    } catch (parseError) {
      throw new ParseError(
        `body is not valid JSON (${toSnippet(body) ?? "empty body"})`,
        parseError,
      );
    }
  } finally {
    clearTimeout(timeoutId);
  }
}
