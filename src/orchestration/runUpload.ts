/**
 * Run orchestrator: one document, end to end
 *
 * validate config -> open store -> fetch document -> render directory
 *   -> upload pool -> CDN invalidation
 *
 * The store is always closed. A close failure is reported only when the run
 * itself succeeded; an earlier error is never replaced.
 */

import type {
  BlobStore,
  CdnInvalidator,
  Logger,
  RunCancellation,
  RunSummary,
  SpreadsheetDocument,
  SpreadsheetSource,
  UploaderConfig,
} from "@/types";
import { CSV_CONTENT_TYPE } from "@/constants";
import { FetchError, WriteError, errorMessage, toUploaderError } from "@/errors";
import { CloudFrontInvalidator } from "@/clients/cloudFront";
import { createSheetUploader } from "@/sheets";
import { openBlobStore } from "@/storage";
import { compileTemplate, withResource } from "@/utils";
import { cancellationError, createRunCancellation } from "./cancellation";
import { notifyChangedPaths } from "./invalidation";
import { runUploadPool, validateWorkerCount } from "./uploadPool";

export type RunUploadDeps = {
  source: SpreadsheetSource;
  logger: Logger;
  /** Opens the destination store (openBlobStore by default) */
  openStore?: (url: string, logger: Logger) => BlobStore;
  /** CloudFront by default */
  invalidator?: CdnInvalidator;
  /** Created from process signals by default */
  cancellation?: RunCancellation;
  /** Upper bound on waiting for workers after an abort */
  drainTimeoutMs?: number;
  now?: () => Date;
};

async function fetchDocument(
  source: SpreadsheetSource,
  sheetId: string,
  signal: AbortSignal,
): Promise<SpreadsheetDocument> {
  try {
    return await source.fetchDocument(sheetId, signal);
  } catch (error) {
    if (signal.aborted) {
      throw cancellationError(signal);
    }
    throw toUploaderError(
      error,
      (message, cause) =>
        new FetchError(`failure getting Google Sheet: ${message}`, { cause }),
    );
  }
}

/**
 * Upload every sheet of the configured document
 *
 * @returns Summary of what was written, skipped and invalidated
 * @throws ConfigError, TemplateError, FetchError, EncodingError, WriteError,
 *   InvalidationError or CancelledError
 */
export async function runUpload(
  config: UploaderConfig,
  deps: RunUploadDeps,
): Promise<RunSummary> {
  const { logger } = deps;

  validateWorkerCount(config.workers);
  const pathTemplate = compileTemplate("path", config.pathTemplate);
  const fileTemplate = compileTemplate("filename", config.fileTemplate);

  const cancellation = deps.cancellation ?? createRunCancellation({ logger });
  const openStore = deps.openStore ?? openBlobStore;
  const invalidator = deps.invalidator ?? new CloudFrontInvalidator({}, logger);

  try {
    logger.info("Opening cloud storage", { url: config.bucketUrl });
    const store = openStore(config.bucketUrl, logger);

    return await withResource(
      store,
      (opened) => opened.close(),
      async (opened) => {
        logger.info("Connecting to Google Sheets", { sheetId: config.sheetId });
        const document = await fetchDocument(
          deps.source,
          config.sheetId,
          cancellation.signal,
        );
        logger.info("Fetched document", {
          title: document.properties.title,
          sheets: document.sheets.length,
        });

        const directory = pathTemplate.render(document);

        const pool = await runUploadPool({
          sheets: document.sheets,
          directory,
          workers: config.workers,
          upload: createSheetUploader({
            fileTemplate,
            store: opened,
            writeOptions: {
              cacheControl: config.cacheControl,
              contentType: CSV_CONTENT_TYPE,
            },
            useCrlf: config.useCrlf,
            logger,
          }),
          cancellation,
          logger,
          drainTimeoutMs: deps.drainTimeoutMs,
        });

        const invalidationId = await notifyChangedPaths(
          pool.changedPaths,
          config.cloudFrontDistribution,
          invalidator,
          { logger, now: deps.now },
        );

        return {
          documentTitle: document.properties.title,
          directory,
          sheetCount: document.sheets.length,
          writtenCount: pool.changedPaths.length,
          skippedCount: pool.results.length - pool.changedPaths.length,
          changedPaths: pool.changedPaths,
          invalidationId,
        };
      },
      (error) =>
        new WriteError(
          "",
          `problem closing store ${config.bucketUrl}: ${errorMessage(error)}`,
          { cause: error },
        ),
      (error) =>
        logger.warn("Problem closing store after failure", {
          url: config.bucketUrl,
          error: errorMessage(error),
        }),
    );
  } finally {
    cancellation.dispose();
  }
}
