/**
 * Google Sheets payload mappers: convert the Spreadsheet resource to the
 * document model consumed by the upload pipeline
 */

import type { Cell, Sheet, SpreadsheetDocument } from "@/types";
import type {
  SheetResource,
  SpreadsheetResource,
} from "@/types/clients/googleSheets";

/**
 * Map one sheet resource to a Sheet with a rectangular grid
 *
 * The API omits trailing empty cells and may return rows without values;
 * every row is padded with empty cells up to the widest row so the grid
 * matches what the spreadsheet UI shows.
 *
 * @param resource - Sheet resource with grid data
 * @param position - Position in the document, used when index is absent
 */
export function mapSheetResource(
  resource: SheetResource,
  position: number,
): Sheet {
  const rowData = resource.data?.flatMap((grid) => grid.rowData ?? []) ?? [];

  const rawRows: string[][] = rowData.map((row) =>
    (row.values ?? []).map((cell) => cell.formattedValue ?? ""),
  );
  const width = rawRows.reduce((max, row) => Math.max(max, row.length), 0);

  const rows: Cell[][] = rawRows.map((row) => {
    const cells: Cell[] = row.map((value) => ({ value }));
    while (cells.length < width) {
      cells.push({ value: "" });
    }
    return cells;
  });

  return {
    properties: {
      sheetId: resource.properties?.sheetId ?? 0,
      index: resource.properties?.index ?? position,
      title: resource.properties?.title ?? "",
    },
    rows,
  };
}

/**
 * Map the Spreadsheet resource to a SpreadsheetDocument
 *
 * Sheets keep the order the API returns them in.
 *
 * @param resource - Spreadsheet resource fetched with includeGridData=true
 * @param spreadsheetId - Requested ID, used when the payload omits it
 */
export function mapSpreadsheetResource(
  resource: SpreadsheetResource,
  spreadsheetId: string,
): SpreadsheetDocument {
  return {
    spreadsheetId: resource.spreadsheetId ?? spreadsheetId,
    properties: {
      title: resource.properties?.title ?? "",
      locale: resource.properties?.locale,
      timeZone: resource.properties?.timeZone,
    },
    sheets: (resource.sheets ?? []).map((sheet, position) =>
      mapSheetResource(sheet, position),
    ),
  };
}
