/**
 * CSV encoder: sheet rows to CSV bytes
 *
 * Fully blank rows are dropped. Quoting follows papaparse: fields holding a
 * comma, quote, CR or LF (or a leading/trailing space) are quoted and inner
 * quotes doubled. Every record ends with the chosen line terminator.
 */

import Papa from "papaparse";
import type { Cell } from "@/types";
import { EncodingError, errorMessage } from "@/errors";

export function isBlankRow(row: string[]): boolean {
  return row.every((value) => value === "");
}

export function cellValues(rows: Cell[][]): string[][] {
  return rows.map((row) => row.map((cell) => cell.value));
}

/**
 * Encode rows as CSV
 *
 * Identical input always yields identical bytes; the skip check depends on it.
 *
 * @param rows - Grid of cell values
 * @param useCrlf - Terminate records with \r\n instead of \n
 * @returns UTF-8 CSV, empty when every row is blank
 * @throws EncodingError if serialization fails
 */
export function encodeCsv(rows: string[][], useCrlf: boolean): Buffer {
  const newline = useCrlf ? "\r\n" : "\n";
  const records = rows.filter((row) => !isBlankRow(row));
  if (records.length === 0) {
    return Buffer.alloc(0);
  }

  let text: string;
  try {
    text = Papa.unparse(records, { newline, quotes: false, header: false });
  } catch (error) {
    throw new EncodingError(`could not encode CSV: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return Buffer.from(text + newline, "utf-8");
}
