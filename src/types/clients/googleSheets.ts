/**
 * Google Sheets API type definitions
 *
 * Data shapes used by the Google Sheets client and its credential helpers.
 * Not exported from the global types barrel (@/types).
 */

import type { Logger } from "@/types";

/**
 * Service account credentials for Google Sheets API authentication
 */
export type GoogleSheetsCredentials = {
  clientEmail: string;
  privateKey: string;
  projectId?: string;
};

/**
 * Google Sheets client configuration
 */
export type GoogleSheetsConfig = {
  /**
   * Service account credentials for authentication
   * If not provided, will attempt to load from environment variables
   */
  credentials?: GoogleSheetsCredentials;

  /**
   * Retry configuration for API requests
   */
  retry?: {
    /** Maximum number of attempts (default from constants) */
    maxAttempts?: number;
    /** Base delay in ms for exponential backoff (default from constants) */
    baseDelayMs?: number;
    /** Maximum delay in ms between retries (default from constants) */
    maxDelayMs?: number;
  };

  /** Request timeout in ms (default from constants) */
  timeoutMs?: number;

  /** fetch implementation, global fetch by default */
  fetchImpl?: typeof fetch;

  /** Run logger; silent when omitted */
  logger?: Logger;
};

/**
 * Service account JSON key file, as downloaded from the Cloud Console
 */
export type ServiceAccountKeyFile = {
  type?: string;
  client_email?: string;
  private_key?: string;
  project_id?: string;
};

/**
 * OAuth2 token response from Google
 * Used internally for service account authentication
 */
export type GoogleOAuth2TokenResponse = {
  access_token: string;
  expires_in: number;
  token_type: string;
};

/**
 * Subset of the Spreadsheet resource returned with includeGridData=true
 */
export type SpreadsheetResource = {
  spreadsheetId?: string;
  properties?: {
    title?: string;
    locale?: string;
    timeZone?: string;
  };
  sheets?: SheetResource[];
};

export type SheetResource = {
  properties?: {
    sheetId?: number;
    index?: number;
    title?: string;
  };
  data?: GridDataResource[];
};

export type GridDataResource = {
  rowData?: RowDataResource[];
};

export type RowDataResource = {
  values?: CellDataResource[];
};

export type CellDataResource = {
  formattedValue?: string;
};
