/**
 * Unit tests for the Basic auth header encoder
 */

import { describe, it, expect } from "vitest";
import { encodeBasicAuth } from "@/utils";
import { EncodingError } from "@/errors";

function decodeToken(header: string): string {
  expect(header.startsWith("Basic ")).toBe(true);
  return Buffer.from(header.slice("Basic ".length), "base64").toString("utf-8");
}

describe("encodeBasicAuth", () => {
  it("encodes the key with an empty password", () => {
    expect(encodeBasicAuth("abc123")).toBe("Basic YWJjMTIzOg==");
  });

  it.each([
    "abc123",
    "test-api-key-0000",
    "clé-ünïcode",
    "key with spaces",
  ])("decodes back to '<key>:' for %s", (key) => {
    expect(decodeToken(encodeBasicAuth(key))).toBe(`${key}:`);
  });

  describe("invalid credentials", () => {
    it.each([
      ["empty", ""],
      ["colon", "abc:123"],
      ["newline", "abc123\n"],
      ["lone surrogate", "abc\uD800"],
    ])("rejects a credential with %s", (_label, key) => {
      expect(() => encodeBasicAuth(key)).toThrow(EncodingError);
    });

    it("names the problem in the message", () => {
      expect(() => encodeBasicAuth("abc:123")).toThrow(
        "Credential encoding failed: credential must not contain ':'",
      );
    });
  });
});
