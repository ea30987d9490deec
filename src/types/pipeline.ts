/**
 * Upload pipeline type definitions
 */

import type { Sheet } from "./document";
import type { Logger } from "./logger";
import type { UploaderError } from "@/errors";

/**
 * Work item handed from the dispatch loop to exactly one worker
 */
export type UploadTask = {
  sheet: Sheet;
  directory: string;
};

export type UploadOutcome = "skipped" | "written";

/**
 * Outcome of one sheet upload, as returned by uploadSheet
 */
export type SheetUpload = {
  path: string;
  outcome: UploadOutcome;
  /** Full path when the upload changed the store, null when skipped */
  changedPath: string | null;
};

export type SheetUploadSuccess = SheetUpload & {
  ok: true;
  sheetTitle: string;
};

export type SheetUploadFailure = {
  ok: false;
  /** Resolved path when the failure happened after path rendering, else "" */
  path: string;
  sheetTitle: string;
  error: UploaderError;
};

/**
 * Result sent back from a worker to the dispatch loop
 */
export type SheetUploadResult = SheetUploadSuccess | SheetUploadFailure;

/**
 * Per-sheet upload operation run by each worker
 */
export type SheetUploader = (
  task: UploadTask,
  signal: AbortSignal,
) => Promise<SheetUpload>;

export type PoolState = "dispatching" | "draining" | "completed" | "aborted";

export type UploadPoolOptions = {
  sheets: Sheet[];
  directory: string;
  workers: number;
  upload: SheetUploader;
  /** Shared run cancellation; the pool aborts it on first error */
  cancellation: RunCancellation;
  logger: Logger;
  /** Upper bound on waiting for workers after an abort (default from constants) */
  drainTimeoutMs?: number;
  /** Observer for pool state transitions */
  onStateChange?: (state: PoolState) => void;
};

export type PoolSummary = {
  state: "completed";
  /** Results in completion order */
  results: SheetUploadSuccess[];
  /** Paths written during the run, in completion order */
  changedPaths: string[];
};

/**
 * Shared cancellation for one run
 */
export interface RunCancellation {
  readonly signal: AbortSignal;
  /** Abort the run; the first reason wins */
  abort(reason?: unknown): void;
  /** Remove process signal listeners */
  dispose(): void;
}

export type RunSummary = {
  documentTitle: string;
  directory: string;
  sheetCount: number;
  writtenCount: number;
  skippedCount: number;
  changedPaths: string[];
  invalidationId: string | null;
};
