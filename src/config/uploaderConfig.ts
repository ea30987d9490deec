/**
 * Uploader configuration: command line flags with environment fallback
 *
 * Every flag can also be set through SHEETS_UPLOADER_<FLAG> (upper case,
 * dashes as underscores). Flags win over the environment; the log level also
 * honours LOG_LEVEL.
 */

import { parseArgs } from "util";
import type { ConfigLoadResult, LogLevel, UploaderConfig } from "@/types";
import {
  APP_NAME,
  DEFAULT_BUCKET_URL,
  DEFAULT_CACHE_CONTROL,
  DEFAULT_FILE_TEMPLATE,
  DEFAULT_LOG_LEVEL,
  DEFAULT_PATH_TEMPLATE,
  DEFAULT_WORKERS,
  ENV_PREFIX,
  MAX_WORKERS,
} from "@/constants";
import { ConfigError, errorMessage } from "@/errors";
import { isLogLevel } from "@/logger";
import { validateWorkerCount } from "@/orchestration";

const FLAG_OPTIONS = {
  sheet: { type: "string" },
  workers: { type: "string" },
  "google-client-secret": { type: "string" },
  path: { type: "string" },
  filename: { type: "string" },
  "bucket-url": { type: "string" },
  dist: { type: "string" },
  "cache-control": { type: "string" },
  crlf: { type: "boolean" },
  quiet: { type: "boolean" },
  "log-level": { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

type FlagName = keyof typeof FLAG_OPTIONS;

export const USAGE = `${APP_NAME} saves all sheets in a Google Sheets document to cloud storage as CSV.

--path and --filename are templates with {{placeholders}} that read the
document or sheet respectively, e.g. {{properties.title}} or
{{properties.index}}.

If --google-client-secret is not specified, credentials are read from:

1. The service account JSON file named by GOOGLE_APPLICATION_CREDENTIALS.
2. GOOGLE_SERVICE_ACCOUNT_EMAIL and GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY.

If --google-client-secret is specified, it must be the base64 encoded service
account JSON, because the '\\n' in the JSON is often mangled by the environment.

S3 and CloudFront use the default AWS credentials (environment, shared
credentials file, instance role).

Usage of ${APP_NAME}:

  --sheet ID                    Google Sheet ID (required)
  --workers N                   number of upload workers (default ${DEFAULT_WORKERS}, at most ${MAX_WORKERS})
  --google-client-secret B64    base64 encoded JSON of Google service account
  --path TEMPLATE               path to save files in (default "${DEFAULT_PATH_TEMPLATE}")
  --filename TEMPLATE           file name for files (default "${DEFAULT_FILE_TEMPLATE}")
  --bucket-url URL              destination: file://dir, mem://, s3://bucket (default "${DEFAULT_BUCKET_URL}")
  --dist ID                     CloudFront distribution ID to invalidate
  --cache-control VALUE         Cache-Control header value (default "${DEFAULT_CACHE_CONTROL}")
  --crlf                        use Windows-style line endings
  --quiet                       don't log activity
  --log-level LEVEL             debug, info, warn or error (default ${DEFAULT_LOG_LEVEL})

Each flag can also be set as ${ENV_PREFIX}<FLAG>, e.g. ${ENV_PREFIX}BUCKET_URL.
`;

/**
 * Environment variable backing a flag
 */
export function envNameForFlag(flag: string): string {
  return ENV_PREFIX + flag.toUpperCase().replace(/-/g, "_");
}

function parseBoolean(value: string, source: string): boolean {
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "":
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      throw new ConfigError(`${source}: invalid boolean ${JSON.stringify(value)}`);
  }
}

function parseWorkers(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(`invalid number of workers: ${JSON.stringify(value)}`);
  }
  const workers = Number.parseInt(value, 10);
  validateWorkerCount(workers);
  return workers;
}

/**
 * Decode the base64 service account JSON passed on the command line
 */
function decodeClientSecret(value: string): string {
  const compact = value.replace(/\s+/g, "");
  if (!/^[A-Za-z0-9+/_-]+={0,2}$/.test(compact)) {
    throw new ConfigError("google-client-secret is not valid base64");
  }
  return Buffer.from(compact, "base64").toString("utf-8");
}

/**
 * Parse command line arguments and environment into a config
 *
 * @param argv - Arguments after the script name
 * @param env - Environment (process.env in production)
 * @throws ConfigError for unknown flags, invalid values or a missing --sheet
 */
export function loadUploaderConfig(
  argv: string[],
  env: NodeJS.ProcessEnv,
): ConfigLoadResult {
  let values: ReturnType<typeof parseFlags>;
  try {
    values = parseFlags(argv);
  } catch (error) {
    throw new ConfigError(errorMessage(error), { cause: error });
  }

  if (values.help) {
    return { kind: "help", usage: USAGE };
  }

  const stringValue = (flag: FlagName): string | undefined => {
    const fromFlag = values[flag];
    if (typeof fromFlag === "string") {
      return fromFlag;
    }
    const fromEnv = env[envNameForFlag(flag)];
    return fromEnv === undefined || fromEnv === "" ? undefined : fromEnv;
  };

  const booleanValue = (flag: FlagName): boolean => {
    const fromFlag = values[flag];
    if (typeof fromFlag === "boolean") {
      return fromFlag;
    }
    const name = envNameForFlag(flag);
    const fromEnv = env[name];
    return fromEnv === undefined ? false : parseBoolean(fromEnv, name);
  };

  const sheetId = stringValue("sheet");
  if (!sheetId) {
    throw new ConfigError(
      `missing required flag --sheet (or ${envNameForFlag("sheet")})`,
    );
  }

  const workersValue = stringValue("workers");
  const secret = stringValue("google-client-secret");

  const logLevelValue = stringValue("log-level") ?? env.LOG_LEVEL;
  let logLevel: LogLevel = DEFAULT_LOG_LEVEL;
  if (logLevelValue) {
    const normalized = logLevelValue.toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new ConfigError(`invalid log level: ${JSON.stringify(logLevelValue)}`);
    }
    logLevel = normalized;
  }

  const config: UploaderConfig = {
    workers: workersValue === undefined ? DEFAULT_WORKERS : parseWorkers(workersValue),
    sheetId,
    googleClientSecret: secret === undefined ? null : decodeClientSecret(secret),
    pathTemplate: stringValue("path") ?? DEFAULT_PATH_TEMPLATE,
    fileTemplate: stringValue("filename") ?? DEFAULT_FILE_TEMPLATE,
    bucketUrl: stringValue("bucket-url") ?? DEFAULT_BUCKET_URL,
    cacheControl: stringValue("cache-control") ?? DEFAULT_CACHE_CONTROL,
    useCrlf: booleanValue("crlf"),
    cloudFrontDistribution: stringValue("dist") ?? null,
    logLevel,
    quiet: booleanValue("quiet"),
  };

  return { kind: "run", config };
}

function parseFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: FLAG_OPTIONS,
    strict: true,
    allowPositionals: false,
  }).values;
}
