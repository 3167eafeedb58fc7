/**
 * HTTP Basic auth header for API-key authentication
 *
 * Companies House takes the key as the user-id with an empty password,
 * so the token is base64("<key>:").
 */

import { EncodingError } from "@/errors";

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
const LONE_SURROGATE =
  /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Build the Authorization header value for a raw API key
 *
 * @param credential - Raw API key (not pre-encoded)
 * @returns `Basic <base64(credential + ":")>`
 * @throws {EncodingError} If the key cannot be carried as a Basic user-id
 */
export function encodeBasicAuth(credential: string): string {
  if (credential.length === 0) {
    throw new EncodingError("credential is empty");
  }
  if (credential.includes(":")) {
    throw new EncodingError("credential must not contain ':'");
  }
  if (CONTROL_CHARS.test(credential)) {
    throw new EncodingError("credential contains control characters");
  }
  if (LONE_SURROGATE.test(credential)) {
    throw new EncodingError("credential is not valid UTF-16 text");
  }

  const encoded = Buffer.from(`${credential}:`, "utf-8").toString("base64");
  return `Basic ${encoded}`;
}
