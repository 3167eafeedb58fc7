/**
 * Mock HTTP Harness for Offline Tests
 *
 * Provides a controllable stand-in for the injected httpRequest that:
 * - Returns fixture JSON for registered routes
 * - Throws ApiError / TransportError the way the real client does
 * - Throws loudly on unmocked requests (prevents accidental real calls)
 *
 * Usage:
 *   const mock = createMockHttp();
 *   mock.on("GET", COMPANIES_HOUSE_SEARCH_URL, loadFixtureJson("companiesHouse/search_empty.json"));
 *   const client = new CompaniesHouseClient({ authorizationHeader, httpRequest: mock.request });
 */

import type { HttpRequest, HttpRequestFn } from "@/types";
import { ApiError, TransportError } from "@/errors";
import { readFileSync } from "fs";
import { join } from "path";

type RouteKey = string; // "METHOD URL"
type RouteHandler = (req: HttpRequest) => Promise<unknown>;

export const COMPANIES_HOUSE_SEARCH_URL =
  "https://api.company-information.service.gov.uk/advanced-search/companies";

/**
 * Mock HTTP client for testing
 */
export interface MockHttp {
  /**
   * Register a 200 response for a given method+url
   */
  on(method: string, url: string, body: unknown): void;

  /**
   * Register a non-2xx response (rejects with ApiError)
   */
  onStatus(method: string, url: string, status: number, body?: unknown): void;

  /**
   * Register a network failure (rejects with TransportError)
   */
  onNetworkError(method: string, url: string, timedOut?: boolean): void;

  /**
   * Mock httpRequest function (inject into clients)
   */
  request: HttpRequestFn;

  /**
   * Get recorded requests (for assertions)
   */
  getRecordedRequests(): HttpRequest[];

  /**
   * Clear all mocks and recorded requests
   */
  reset(): void;
}

/**
 * Load fixture content from tests/fixtures as UTF-8 text
 *
 * @param relativePath - Path relative to tests/fixtures (e.g. "companiesHouse/search_empty.json")
 */
export function loadFixtureText(relativePath: string): string {
  const fullPath = join(process.cwd(), "tests", "fixtures", relativePath);
  return readFileSync(fullPath, "utf-8");
}

export function loadFixtureJson(relativePath: string): unknown {
  return JSON.parse(loadFixtureText(relativePath));
}

/**
 * Build route key from method and URL (ignores query params)
 */
function buildRouteKey(method: string, url: string): RouteKey {
  const urlWithoutQuery = url.split("?")[0];
  return `${method.toUpperCase()} ${urlWithoutQuery}`;
}

/**
 * Create a mock HTTP client
 */
export function createMockHttp(): MockHttp {
  const routes = new Map<RouteKey, RouteHandler>();
  const recordedRequests: HttpRequest[] = [];

  const on = (method: string, url: string, body: unknown): void => {
    routes.set(buildRouteKey(method, url), async () => body);
  };

  const onStatus = (
    method: string,
    url: string,
    status: number,
    body?: unknown,
  ): void => {
    routes.set(buildRouteKey(method, url), async (req) => {
      throw new ApiError({
        status,
        statusText: "Mock Response",
        url: req.url,
        bodySnippet:
          body === undefined
            ? undefined
            : typeof body === "string"
              ? body
              : JSON.stringify(body),
      });
    });
  };

  const onNetworkError = (
    method: string,
    url: string,
    timedOut = false,
  ): void => {
    routes.set(buildRouteKey(method, url), async (req) => {
      throw new TransportError(
        req.url,
        timedOut,
        new TypeError("fetch failed"),
      );
    });
  };

  const request = async <T = unknown>(req: HttpRequest): Promise<T> => {
    recordedRequests.push({ ...req });

    const key = buildRouteKey(req.method, req.url);
    const handler = routes.get(key);

    if (!handler) {
      throw new Error(
        `[MockHttp] Unmocked request: ${key}\n` +
          `All HTTP requests must be explicitly mocked to prevent accidental network calls.\n` +
          `Available routes: ${Array.from(routes.keys()).join(", ") || "(none)"}`,
      );
    }

    // Fixtures are untyped JSON; callers validate what they receive
    return (await handler(req)) as T;
  };

  const getRecordedRequests = (): HttpRequest[] => {
    return [...recordedRequests];
  };

  const reset = (): void => {
    routes.clear();
    recordedRequests.length = 0;
  };

  return {
    on,
    onStatus,
    onNetworkError,
    request,
    getRecordedRequests,
    reset,
  };
}
