/**
 * Unit tests for logger helpers
 */

import { describe, it, expect } from "vitest";
import { resolveLogLevel, withContext } from "@/logger";
import { createRecordingLogger } from "../helpers/recordingLogger";

describe("resolveLogLevel", () => {
  it.each([
    ["debug", "debug"],
    ["WARN", "warn"],
    [" error ", "error"],
  ])("reads %s as %s", (raw, expected) => {
    expect(resolveLogLevel(raw)).toBe(expected);
  });

  it.each([undefined, "", "verbose"])("falls back to info for %s", (raw) => {
    expect(resolveLogLevel(raw)).toBe("info");
  });
});

describe("withContext", () => {
  it("merges bound context into every call", () => {
    const base = createRecordingLogger();
    const log = withContext({ location: "London" }, base);

    log.info("Addresses written", { written: 2 });
    log.error("Failed");

    expect(base.info).toHaveBeenCalledWith("Addresses written", {
      location: "London",
      written: 2,
    });
    expect(base.error).toHaveBeenCalledWith("Failed", { location: "London" });
  });
});
