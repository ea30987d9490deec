/**
 * Sheet upload unit: one sheet to one CSV object
 *
 * Steps: render file name, encode CSV, join path, skip check, write.
 */

import type {
  BlobStore,
  BlobWriteOptions,
  Logger,
  SheetUpload,
  SheetUploader,
  UploadTask,
} from "@/types";
import type { CompiledTemplate } from "@/utils/template/template";
import { CancelledError, WriteError, errorMessage } from "@/errors";
import { joinStoragePath } from "@/utils/paths";
import { cellValues, encodeCsv } from "./csvEncoder";
import { shouldSkip } from "./skipCheck";

export type SheetUploadDeps = {
  /** Compiled file name template, rendered against each sheet */
  fileTemplate: CompiledTemplate;
  store: BlobStore;
  /** Cache-Control and Content-Type stored with each file */
  writeOptions: BlobWriteOptions;
  useCrlf: boolean;
  logger: Logger;
};

/**
 * Upload one sheet
 *
 * @param task - Sheet and target directory
 * @param deps - Template, store and write settings
 * @param signal - Run cancellation; checked before writing
 * @returns Path and outcome; changedPath is set only for written files
 * @throws TemplateError, EncodingError, WriteError or CancelledError
 */
export async function uploadSheet(
  task: UploadTask,
  deps: SheetUploadDeps,
  signal?: AbortSignal,
): Promise<SheetUpload> {
  const { sheet, directory } = task;
  const { store, logger } = deps;

  const file = deps.fileTemplate.render(sheet);
  const payload = encodeCsv(cellValues(sheet.rows), deps.useCrlf);
  const path = joinStoragePath(directory, file);

  logger.debug("Checking existing object", { path, store: store.url });
  if (await shouldSkip(store, path, payload, { signal, logger })) {
    logger.info("Skipping sheet; already uploaded", { path });
    return { path, outcome: "skipped", changedPath: null };
  }

  // Writes in flight are never interrupted, but none start after cancellation
  if (signal?.aborted) {
    throw new CancelledError(`run cancelled before writing ${path}`);
  }

  logger.info("Writing sheet", {
    path,
    store: store.url,
    bytes: payload.length,
  });
  try {
    await store.writeAll(path, payload, deps.writeOptions);
  } catch (error) {
    throw new WriteError(
      path,
      `could not write ${path} to ${store.url}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  return { path, outcome: "written", changedPath: path };
}

/**
 * Bind upload dependencies into the per-task function the pool runs
 */
export function createSheetUploader(deps: SheetUploadDeps): SheetUploader {
  return (task, signal) => uploadSheet(task, deps, signal);
}
