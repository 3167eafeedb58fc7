/**
 * Temporary output directory harness
 *
 * Usage:
 *   const tmp = createTempDir();
 *   // ... write files under tmp.dir ...
 *   tmp.cleanup();
 */

import { mkdtempSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

export interface TempDirHarness {
  dir: string;
  cleanup: () => void;
}

export function createTempDir(): TempDirHarness {
  const dir = mkdtempSync(join(tmpdir(), "company-address-extractor-"));
  return {
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
