/**
 * CLI entrypoint: upload every sheet of a Google Sheets document as CSV
 *
 * Usage:
 *   npm start -- --sheet <id> --bucket-url s3://my-bucket --dist E123
 *   npm start -- --help
 *
 * Exit code 0 on success (or --help), 1 on any failure. A second SIGINT or
 * SIGTERM during a run terminates the process immediately.
 */

import "dotenv/config";
import type { GoogleSheetsCredentials } from "@/clients/googleSheets";
import { GoogleSheetsClient } from "@/clients/googleSheets";
import { loadUploaderConfig } from "@/config";
import { ConfigError, errorMessage } from "@/errors";
import { createLogger } from "@/logger";
import { runUpload } from "@/orchestration";
import { parseServiceAccountJson } from "@/utils";

function credentialsFromSecret(secret: string): GoogleSheetsCredentials {
  try {
    return parseServiceAccountJson(secret, "google-client-secret");
  } catch (error) {
    throw new ConfigError(errorMessage(error), { cause: error });
  }
}

async function main(): Promise<void> {
  const loaded = loadUploaderConfig(process.argv.slice(2), process.env);
  if (loaded.kind === "help") {
    process.stdout.write(loaded.usage);
    return;
  }

  const { config } = loaded;
  const logger = createLogger({
    level: config.logLevel,
    quiet: config.quiet,
  });

  const source = new GoogleSheetsClient({
    credentials:
      config.googleClientSecret === null
        ? undefined
        : credentialsFromSecret(config.googleClientSecret),
    logger,
  });

  const summary = await runUpload(config, { source, logger });

  logger.info("Upload finished", {
    document: summary.documentTitle,
    directory: summary.directory,
    sheets: summary.sheetCount,
    written: summary.writtenCount,
    skipped: summary.skippedCount,
    invalidationId: summary.invalidationId,
  });
}

main().then(
  () => process.exit(0),
  (error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  },
);
