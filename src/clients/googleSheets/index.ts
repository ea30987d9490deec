/**
 * Google Sheets client public API
 */

export { GoogleSheetsClient, loadCredentialsFromEnv } from "./googleSheetsClient";
export { mapSpreadsheetResource, mapSheetResource } from "./mappers";
export type {
  GoogleSheetsConfig,
  GoogleSheetsCredentials,
} from "@/types/clients/googleSheets";
