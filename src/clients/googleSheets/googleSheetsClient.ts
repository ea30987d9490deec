/**
 * GoogleSheetsClient: read-only API client for Google Sheets
 *
 * Fetches a whole spreadsheet (all sheets with grid data) in one request.
 * Handles authentication via service account JWT.
 */

import { readFileSync } from "fs";
import { createSign } from "crypto";
import { setTimeout as delay } from "timers/promises";
import type {
  GoogleSheetsConfig,
  GoogleSheetsCredentials,
  GoogleOAuth2TokenResponse,
  SpreadsheetResource,
} from "@/types/clients/googleSheets";
import type { Logger, SpreadsheetDocument, SpreadsheetSource } from "@/types";
import {
  GOOGLE_SHEETS_BASE_URL,
  GOOGLE_SHEETS_API_VERSION,
  GOOGLE_SHEETS_DEFAULT_MAX_ATTEMPTS,
  GOOGLE_SHEETS_DEFAULT_BASE_DELAY_MS,
  GOOGLE_SHEETS_DEFAULT_MAX_DELAY_MS,
  GOOGLE_SHEETS_DEFAULT_TIMEOUT_MS,
  GOOGLE_SHEETS_DOCUMENT_FIELDS,
  GOOGLE_SHEETS_JWT_EXPIRATION_SECONDS,
  GOOGLE_OAUTH2_TOKEN_URL,
  GOOGLE_SHEETS_SCOPES,
  GOOGLE_SHEETS_TOKEN_EXPIRY_BUFFER_SECONDS,
  GOOGLE_SHEETS_MS_PER_SECOND,
  GOOGLE_SHEETS_HTTP_STATUS_RATE_LIMIT,
  GOOGLE_SHEETS_HTTP_STATUS_REQUEST_TIMEOUT,
  GOOGLE_SHEETS_HTTP_STATUS_SERVER_ERROR_MIN,
  GOOGLE_APPLICATION_CREDENTIALS_ENV,
  GOOGLE_SERVICE_ACCOUNT_EMAIL_ENV,
  GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY_ENV,
  GOOGLE_PROJECT_ID_ENV,
} from "@/constants/clients/googleSheets";
import { ConfigError, FetchError, errorMessage } from "@/errors";
import { silentLogger } from "@/logger";
import {
  normalizePrivateKey,
  parseServiceAccountJson,
} from "@/utils/sheets/sheetsHelpers";
import { mapSpreadsheetResource } from "./mappers";

/**
 * Resolve service account credentials from the environment
 *
 * Order: JSON key file named by GOOGLE_APPLICATION_CREDENTIALS, then
 * GOOGLE_SERVICE_ACCOUNT_EMAIL + GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY.
 *
 * @throws ConfigError if neither source is usable
 */
export function loadCredentialsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): GoogleSheetsCredentials {
  const keyFile = env[GOOGLE_APPLICATION_CREDENTIALS_ENV];
  if (keyFile) {
    let json: string;
    try {
      json = readFileSync(keyFile, "utf-8");
    } catch (error) {
      throw new ConfigError(
        `could not read ${GOOGLE_APPLICATION_CREDENTIALS_ENV} file ${keyFile}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    try {
      return parseServiceAccountJson(json, GOOGLE_APPLICATION_CREDENTIALS_ENV);
    } catch (error) {
      throw new ConfigError(errorMessage(error), { cause: error });
    }
  }

  const clientEmail = env[GOOGLE_SERVICE_ACCOUNT_EMAIL_ENV] || "";
  if (!clientEmail) {
    throw new ConfigError(
      "Google Sheets authentication configuration missing: " +
        `set ${GOOGLE_APPLICATION_CREDENTIALS_ENV}, or ` +
        `${GOOGLE_SERVICE_ACCOUNT_EMAIL_ENV} and ${GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY_ENV}, ` +
        "or pass service account JSON explicitly",
    );
  }

  try {
    return {
      clientEmail,
      privateKey: normalizePrivateKey(
        env[GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY_ENV],
        GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY_ENV,
      ),
      projectId: env[GOOGLE_PROJECT_ID_ENV],
    };
  } catch (error) {
    throw new ConfigError(errorMessage(error), { cause: error });
  }
}

/**
 * Whether a failed HTTP status is worth another attempt
 */
function isRetryableStatus(status: number): boolean {
  return (
    status >= GOOGLE_SHEETS_HTTP_STATUS_SERVER_ERROR_MIN ||
    status === GOOGLE_SHEETS_HTTP_STATUS_RATE_LIMIT ||
    status === GOOGLE_SHEETS_HTTP_STATUS_REQUEST_TIMEOUT
  );
}

/**
 * Google Sheets client implementation
 */
export class GoogleSheetsClient implements SpreadsheetSource {
  private readonly credentials: GoogleSheetsCredentials;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  private accessToken: string | null = null;
  private tokenExpiry: number = 0;

  constructor(config: GoogleSheetsConfig = {}) {
    this.logger = config.logger ?? silentLogger;

    if (config.credentials) {
      const { clientEmail, privateKey } = config.credentials;

      if (!clientEmail || !privateKey) {
        throw new ConfigError(
          "Google Sheets authentication configuration missing: " +
            "credentials.clientEmail and credentials.privateKey are required " +
            "when credentials are provided in config",
        );
      }

      this.credentials = config.credentials;
    } else {
      this.credentials = loadCredentialsFromEnv();
    }

    // Set retry configuration
    this.maxAttempts =
      config.retry?.maxAttempts ?? GOOGLE_SHEETS_DEFAULT_MAX_ATTEMPTS;
    this.baseDelayMs =
      config.retry?.baseDelayMs ?? GOOGLE_SHEETS_DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs =
      config.retry?.maxDelayMs ?? GOOGLE_SHEETS_DEFAULT_MAX_DELAY_MS;
    this.timeoutMs = config.timeoutMs ?? GOOGLE_SHEETS_DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetchImpl ?? fetch;

    this.logger.debug("GoogleSheetsClient initialized", {
      clientEmail: this.credentials.clientEmail,
    });
  }

  /**
   * Generate JWT for service account authentication
   */
  private createJWT(): string {
    const now = Math.floor(Date.now() / GOOGLE_SHEETS_MS_PER_SECOND);
    const expiry = now + GOOGLE_SHEETS_JWT_EXPIRATION_SECONDS;

    const header = {
      alg: "RS256",
      typ: "JWT",
    };

    const payload = {
      iss: this.credentials.clientEmail,
      scope: GOOGLE_SHEETS_SCOPES.join(" "),
      aud: GOOGLE_OAUTH2_TOKEN_URL,
      exp: expiry,
      iat: now,
    };

    const encodedHeader = Buffer.from(JSON.stringify(header)).toString(
      "base64url",
    );
    const encodedPayload = Buffer.from(JSON.stringify(payload)).toString(
      "base64url",
    );

    const signatureInput = `${encodedHeader}.${encodedPayload}`;
    const sign = createSign("RSA-SHA256");
    sign.update(signatureInput);
    sign.end();

    const signature = sign.sign(this.credentials.privateKey, "base64url");

    return `${signatureInput}.${signature}`;
  }

  /**
   * Get access token, refreshing if necessary
   */
  private async getAccessToken(signal?: AbortSignal): Promise<string> {
    const now = Math.floor(Date.now() / GOOGLE_SHEETS_MS_PER_SECOND);

    // Return cached token if still valid (with buffer)
    if (
      this.accessToken &&
      this.tokenExpiry > now + GOOGLE_SHEETS_TOKEN_EXPIRY_BUFFER_SECONDS
    ) {
      return this.accessToken;
    }

    this.logger.debug("Requesting new Google OAuth2 access token");

    try {
      const jwt = this.createJWT();
      const response = await this.fetchImpl(GOOGLE_OAUTH2_TOKEN_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({
          grant_type: "urn:ietf:params:oauth:grant-type:jwt-bearer",
          assertion: jwt,
        }),
        signal: this.requestSignal(signal),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new FetchError(
          `OAuth2 token request failed: ${response.status} ${response.statusText} - ${errorText}`,
          { status: response.status },
        );
      }

      const data = (await response.json()) as GoogleOAuth2TokenResponse;

      this.accessToken = data.access_token;
      this.tokenExpiry = now + data.expires_in;

      this.logger.debug("Google OAuth2 access token obtained");

      return this.accessToken;
    } catch (error) {
      this.logger.error("Failed to obtain Google OAuth2 access token", {
        error: errorMessage(error),
      });
      throw new FetchError(
        `Failed to authenticate with Google Sheets API: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Combine the caller's signal with the per-request timeout
   */
  private requestSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }

  private backoffDelay(attempt: number): number {
    return Math.min(
      this.baseDelayMs * Math.pow(2, attempt - 1),
      this.maxDelayMs,
    );
  }

  /**
   * Make a GET request with retry logic
   */
  private async apiGet<T>(
    endpoint: string,
    spreadsheetId: string,
    signal?: AbortSignal,
  ): Promise<T> {
    const token = await this.getAccessToken(signal);
    const url = `${GOOGLE_SHEETS_BASE_URL}${GOOGLE_SHEETS_API_VERSION}${endpoint}`;

    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const response = await this.fetchImpl(url, {
          method: "GET",
          headers: {
            Authorization: `Bearer ${token}`,
            Accept: "application/json",
          },
          signal: this.requestSignal(signal),
        });

        if (!response.ok) {
          const errorBody = await response.text();
          const failure = new FetchError(
            `Google Sheets API error for ${spreadsheetId}: ${response.status} ${response.statusText} - ${errorBody}`,
            { status: response.status },
          );

          if (!isRetryableStatus(response.status)) {
            throw failure;
          }

          lastError = failure;
          if (attempt < this.maxAttempts) {
            const delayMs = this.backoffDelay(attempt);
            this.logger.warn(
              `Google Sheets API request failed, retrying (${attempt}/${this.maxAttempts})`,
              { status: response.status, delayMs, url },
            );
            await delay(delayMs, undefined, { signal });
          }
          continue;
        }

        return (await response.json()) as T;
      } catch (error) {
        if (error instanceof FetchError && !isRetryableStatus(error.status ?? 0)) {
          throw error;
        }
        // Caller cancelled: no further attempts
        if (signal?.aborted) {
          throw new FetchError(`Google Sheets request cancelled: ${url}`, {
            cause: error,
          });
        }

        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt < this.maxAttempts) {
          const delayMs = this.backoffDelay(attempt);
          this.logger.warn(
            `Google Sheets API request failed, retrying (${attempt}/${this.maxAttempts})`,
            { error: lastError.message, delayMs, url },
          );
          await delay(delayMs, undefined, { signal });
        }
      }
    }

    // All retries exhausted
    this.logger.error("Google Sheets API request failed after all retries", {
      url,
      error: lastError?.message,
    });
    throw lastError instanceof FetchError
      ? lastError
      : new FetchError(
          `Google Sheets API request failed: ${lastError?.message ?? url}`,
          { cause: lastError },
        );
  }

  /**
   * Fetch a spreadsheet with the grid data of every sheet
   *
   * @param spreadsheetId - Google Sheets document ID
   * @param signal - Run cancellation signal
   * @returns Document with sheets in document order
   * @throws FetchError on authentication, HTTP or network failure
   */
  async fetchDocument(
    spreadsheetId: string,
    signal?: AbortSignal,
  ): Promise<SpreadsheetDocument> {
    this.logger.debug("Fetching Google Sheets document", { spreadsheetId });

    const query = new URLSearchParams({
      includeGridData: "true",
      fields: GOOGLE_SHEETS_DOCUMENT_FIELDS,
    });
    const endpoint = `/spreadsheets/${encodeURIComponent(spreadsheetId)}?${query.toString()}`;
    const resource = await this.apiGet<SpreadsheetResource>(
      endpoint,
      spreadsheetId,
      signal,
    );

    return mapSpreadsheetResource(resource, spreadsheetId);
  }
}
