/**
 * Logger stand-in that records calls instead of printing
 */

import { vi } from "vitest";
import type { Logger } from "@/types";

export function createRecordingLogger() {
  return {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  } satisfies Logger;
}
