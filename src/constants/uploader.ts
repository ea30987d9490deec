/**
 * Uploader constants: CLI defaults and pipeline tunables
 */

export const APP_NAME = "sheets-uploader";

/**
 * Prefix for environment variables backing each CLI flag
 * --bucket-url falls back to SHEETS_UPLOADER_BUCKET_URL, and so on.
 */
export const ENV_PREFIX = "SHEETS_UPLOADER_";

export const DEFAULT_WORKERS = 10;

/**
 * Upper bound on --workers; each worker is one concurrent store request
 */
export const MAX_WORKERS = 1000;

export const DEFAULT_PATH_TEMPLATE = "{{properties.title}}";

export const DEFAULT_FILE_TEMPLATE =
  "{{properties.index}} {{properties.title}}.csv";

export const DEFAULT_BUCKET_URL = "file://.";

export const DEFAULT_CACHE_CONTROL = "max-age=900,public";

/**
 * Content-Type stored with every uploaded sheet
 */
export const CSV_CONTENT_TYPE = "text/csv";

/**
 * Maximum time to wait for workers to exit after the pool aborts
 * Workers blocked on an in-flight write may outlive this; the run returns anyway.
 */
export const POOL_DRAIN_TIMEOUT_MS = 5000;

/**
 * Process signals that cancel a run
 */
export const TERMINATION_SIGNALS = ["SIGINT", "SIGTERM"] as const;
