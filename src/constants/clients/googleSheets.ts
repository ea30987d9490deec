/**
 * Google Sheets API client constants
 *
 * Base URLs, endpoints, and default retry/timeout tunables
 */

/**
 * Google Sheets API base URL
 */
export const GOOGLE_SHEETS_BASE_URL = "https://sheets.googleapis.com";

/**
 * Google Sheets API version path
 */
export const GOOGLE_SHEETS_API_VERSION = "/v4";

/**
 * Google OAuth2 token URL for service account authentication
 */
export const GOOGLE_OAUTH2_TOKEN_URL = "https://oauth2.googleapis.com/token";

/**
 * Google Sheets API scopes (read-only: documents are never modified)
 */
export const GOOGLE_SHEETS_SCOPES = [
  "https://www.googleapis.com/auth/spreadsheets.readonly",
];

/**
 * Field mask for the document fetch
 * Only titles, indexes and formatted cell values are needed.
 */
export const GOOGLE_SHEETS_DOCUMENT_FIELDS =
  "spreadsheetId,properties(title,locale,timeZone)," +
  "sheets(properties(sheetId,index,title),data(rowData(values(formattedValue))))";

/**
 * Default maximum number of attempts for the document fetch
 * Includes the initial request
 */
export const GOOGLE_SHEETS_DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Default base delay in milliseconds for exponential backoff
 */
export const GOOGLE_SHEETS_DEFAULT_BASE_DELAY_MS = 1000;

/**
 * Default maximum delay in milliseconds between retry attempts
 * Prevents exponential backoff from growing unbounded
 */
export const GOOGLE_SHEETS_DEFAULT_MAX_DELAY_MS = 10000;

/**
 * Default timeout in milliseconds for API requests
 */
export const GOOGLE_SHEETS_DEFAULT_TIMEOUT_MS = 30000;

/**
 * JWT expiration time in seconds (1 hour)
 * Google's OAuth2 JWT tokens are valid for 1 hour
 */
export const GOOGLE_SHEETS_JWT_EXPIRATION_SECONDS = 3600;

/**
 * Token expiry buffer in seconds
 * Refresh token this many seconds before actual expiry to avoid edge cases
 */
export const GOOGLE_SHEETS_TOKEN_EXPIRY_BUFFER_SECONDS = 60;

/**
 * Milliseconds per second
 */
export const GOOGLE_SHEETS_MS_PER_SECOND = 1000;

/**
 * HTTP status code for rate limiting
 */
export const GOOGLE_SHEETS_HTTP_STATUS_RATE_LIMIT = 429;

/**
 * HTTP status code for request timeout
 */
export const GOOGLE_SHEETS_HTTP_STATUS_REQUEST_TIMEOUT = 408;

/**
 * HTTP status code threshold for server errors (5xx)
 */
export const GOOGLE_SHEETS_HTTP_STATUS_SERVER_ERROR_MIN = 500;

/**
 * Environment variable naming a service account JSON file
 */
export const GOOGLE_APPLICATION_CREDENTIALS_ENV =
  "GOOGLE_APPLICATION_CREDENTIALS";

/**
 * Environment variables for inline service account credentials
 */
export const GOOGLE_SERVICE_ACCOUNT_EMAIL_ENV = "GOOGLE_SERVICE_ACCOUNT_EMAIL";
export const GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY_ENV =
  "GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY";
export const GOOGLE_PROJECT_ID_ENV = "GOOGLE_PROJECT_ID";
