/**
 * Unit tests for Spreadsheet resource mapping
 */

import { describe, it, expect } from "vitest";
import { mapSheetResource, mapSpreadsheetResource } from "@/clients/googleSheets";

describe("mapSheetResource", () => {
  it("pads rows to the widest row with empty cells", () => {
    const sheet = mapSheetResource(
      {
        properties: { sheetId: 7, index: 0, title: "Summary" },
        data: [
          {
            rowData: [
              { values: [{ formattedValue: "Region" }, { formattedValue: "Total" }] },
              { values: [{ formattedValue: "North" }] },
              {},
            ],
          },
        ],
      },
      0,
    );

    expect(sheet.properties).toEqual({ sheetId: 7, index: 0, title: "Summary" });
    expect(sheet.rows).toEqual([
      [{ value: "Region" }, { value: "Total" }],
      [{ value: "North" }, { value: "" }],
      [{ value: "" }, { value: "" }],
    ]);
  });

  it("maps cells without a formatted value to empty strings", () => {
    const sheet = mapSheetResource(
      { properties: { title: "Notes" }, data: [{ rowData: [{ values: [{}, { formattedValue: "x" }] }] }] },
      2,
    );

    expect(sheet.rows).toEqual([[{ value: "" }, { value: "x" }]]);
    expect(sheet.properties.index).toBe(2);
  });

  it("returns no rows for a sheet without grid data", () => {
    expect(mapSheetResource({ properties: { title: "Empty" } }, 0).rows).toEqual([]);
  });
});

describe("mapSpreadsheetResource", () => {
  it("keeps the sheet order of the payload", () => {
    const document = mapSpreadsheetResource(
      {
        properties: { title: "Quarterly Report", locale: "en_US" },
        sheets: [
          { properties: { index: 1, title: "B" } },
          { properties: { index: 0, title: "A" } },
        ],
      },
      "test-sheet-id",
    );

    expect(document.spreadsheetId).toBe("test-sheet-id");
    expect(document.properties.title).toBe("Quarterly Report");
    expect(document.sheets.map((sheet) => sheet.properties.title)).toEqual([
      "B",
      "A",
    ]);
  });
});
