/**
 * Output (formatting + file writing) types
 */

/**
 * One company rendered as text: one line per field, each ending in "\n"
 */
export type FormattedBlock = string;

export interface FormatResult {
  blocks: FormattedBlock[];
  /** Records without a registered office address */
  skipped: number;
}

export interface WriteOutputInput {
  outputDir: string;
  location: string;
  classificationCode: string;
  blocks: readonly FormattedBlock[];
}
