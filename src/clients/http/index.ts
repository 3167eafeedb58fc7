/**
 * HTTP client public API
 */

export { httpRequest, buildUrl } from "./httpClient";
export type {
  HttpRequest,
  HttpRequestFn,
  HttpMethod,
  HttpQueryValue,
} from "@/types";
