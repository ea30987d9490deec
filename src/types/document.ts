/**
 * Spreadsheet document model
 *
 * The shape handed to the upload pipeline after a document is fetched.
 * Field names follow the Sheets API resource so that path and file name
 * templates read naturally ({{properties.title}}, {{properties.index}}).
 */

export type Cell = {
  value: string;
};

export type SheetProperties = {
  sheetId: number;
  index: number;
  title: string;
};

/**
 * One tab of a document
 *
 * rows is rectangular: every row has as many cells as the widest row.
 */
export type Sheet = {
  properties: SheetProperties;
  rows: Cell[][];
};

export type DocumentProperties = {
  title: string;
  locale?: string;
  timeZone?: string;
};

export type SpreadsheetDocument = {
  spreadsheetId: string;
  properties: DocumentProperties;
  sheets: Sheet[];
};

/**
 * Source of spreadsheet documents (Google Sheets in production)
 */
export interface SpreadsheetSource {
  fetchDocument(
    spreadsheetId: string,
    signal?: AbortSignal,
  ): Promise<SpreadsheetDocument>;
}
