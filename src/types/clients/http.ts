/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET";

export type HttpQueryValue = string | number | boolean;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** Array values are sent as repeated query params */
  query?: Record<string, HttpQueryValue | readonly HttpQueryValue[]>;
  timeoutMs?: number;
}

/**
 * Injectable request function (production: httpRequest, tests: mock)
 */
export type HttpRequestFn = <T = unknown>(req: HttpRequest) => Promise<T>;

export interface ApiErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
}
