/**
 * File writer — writes the rendered address document to `{location}_{code}.txt`
 *
 * Location and code are used verbatim in the file name; callers that need a
 * filesystem-safe name must clean them first.
 */

import * as fs from "fs";
import * as path from "path";
import type { WriteOutputInput } from "@/types";
import {
  OUTPUT_FILE_ENCODING,
  OUTPUT_FILE_EXTENSION,
  OUTPUT_FILENAME_SEPARATOR,
} from "@/constants";
import { FileWriteError } from "@/errors";
import { renderDocument } from "./addressFormatter";

export function buildOutputFilename(
  location: string,
  classificationCode: string,
): string {
  return `${location}${OUTPUT_FILENAME_SEPARATOR}${classificationCode}${OUTPUT_FILE_EXTENSION}`;
}

/**
 * Create (or truncate) the output file and write all blocks in order
 *
 * @returns Path of the written file
 * @throws {FileWriteError} On any I/O failure
 */
export function writeOutputDocument(input: WriteOutputInput): string {
  const outputPath = path.join(
    input.outputDir,
    buildOutputFilename(input.location, input.classificationCode),
  );

  try {
    fs.writeFileSync(outputPath, renderDocument(input.blocks), {
      encoding: OUTPUT_FILE_ENCODING,
      flag: "w",
    });
  } catch (error) {
    throw new FileWriteError(outputPath, error);
  }

  return outputPath;
}
