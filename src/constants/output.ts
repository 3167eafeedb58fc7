/**
 * Output file constants
 */

export const OUTPUT_FILE_EXTENSION = ".txt";

export const OUTPUT_FILE_ENCODING = "utf-8";

/**
 * Separator between the location and the SIC code in the file name
 */
export const OUTPUT_FILENAME_SEPARATOR = "_";
