/**
 * Upload pool: fixed set of workers fed by a dispatch loop
 *
 * The dispatch loop owns all pipeline state (remaining sheets, outstanding
 * counter, collected results). Workers only see the two channels:
 *   tasks   dispatch loop -> any free worker
 *   results worker        -> dispatch loop
 * Each dispatch step selects between offering the next sheet and receiving a
 * result, so a busy pool can always hand back results.
 *
 * States: dispatching -> draining -> completed | aborted.
 * The first failed result aborts the run; later failures are discarded.
 */

import type {
  Logger,
  PoolState,
  PoolSummary,
  SheetUploadResult,
  SheetUploadSuccess,
  SheetUploader,
  Sheet,
  UploadPoolOptions,
  UploadTask,
} from "@/types";
import { MAX_WORKERS, POOL_DRAIN_TIMEOUT_MS } from "@/constants";
import {
  ConfigError,
  UploaderError,
  WriteError,
  errorMessage,
  toUploaderError,
} from "@/errors";
import { withContext } from "@/logger";
import { Channel, SelectClaim } from "./channel";
import { cancellationError } from "./cancellation";

type DispatchStep =
  | { kind: "dispatched" }
  | { kind: "result"; result: SheetUploadResult };

/**
 * Reject worker counts outside 1..MAX_WORKERS (or non-integers) before
 * anything starts
 */
export function validateWorkerCount(workers: number): void {
  if (!Number.isInteger(workers) || workers < 1) {
    throw new ConfigError(`invalid number of workers: ${workers}`);
  }
  if (workers > MAX_WORKERS) {
    throw new ConfigError(
      `too many workers: ${workers} (maximum ${MAX_WORKERS})`,
    );
  }
}

/**
 * Run one task, turning any failure into a result
 */
async function runTask(
  task: UploadTask,
  upload: SheetUploader,
  signal: AbortSignal,
): Promise<SheetUploadResult> {
  const sheetTitle = task.sheet.properties.title;
  try {
    const outcome = await upload(task, signal);
    return { ok: true, sheetTitle, ...outcome };
  } catch (error) {
    const failure = toUploaderError(
      error,
      (message, cause) =>
        new WriteError("", `upload of sheet ${sheetTitle} failed: ${message}`, {
          cause,
        }),
    );
    return {
      ok: false,
      path: failure instanceof WriteError ? failure.path : "",
      sheetTitle,
      error: failure,
    };
  }
}

/**
 * Worker loop: take a task, upload, report, repeat until cancelled
 *
 * Never rejects; cancellation while waiting ends the loop.
 */
async function runWorker(
  id: number,
  tasks: Channel<UploadTask>,
  results: Channel<SheetUploadResult>,
  upload: SheetUploader,
  signal: AbortSignal,
  logger: Logger,
): Promise<void> {
  for (;;) {
    let task: UploadTask;
    try {
      task = await tasks.receive({ signal });
    } catch (error) {
      logger.debug("Worker stopping", { worker: id, reason: errorMessage(error) });
      return;
    }

    const result = await runTask(task, upload, signal);

    try {
      await results.send(result, { signal });
    } catch (error) {
      logger.debug("Worker stopping; result dropped", {
        worker: id,
        sheet: result.sheetTitle,
        reason: errorMessage(error),
      });
      return;
    }
  }
}

/**
 * Wait for workers to exit, giving up after timeoutMs
 */
async function drainWorkers(
  workers: Promise<void>[],
  timeoutMs: number,
  logger: Logger,
): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), timeoutMs);
  });

  const outcome = await Promise.race([
    Promise.allSettled(workers).then(() => "drained" as const),
    expired,
  ]);
  clearTimeout(timer);

  if (outcome === "timeout") {
    logger.warn("Workers still busy after abort; not waiting any longer", {
      timeoutMs,
    });
  }
}

/**
 * Upload every sheet with a fixed number of concurrent workers
 *
 * @returns Summary with results and changed paths in completion order
 * @throws ConfigError for an invalid worker count (before any work starts)
 * @throws the first failed result's error, or CancelledError when the run
 *   signal fires before completion
 */
export async function runUploadPool(
  options: UploadPoolOptions,
): Promise<PoolSummary> {
  validateWorkerCount(options.workers);

  const { cancellation, directory, upload } = options;
  const logger = withContext(options.logger, { directory });
  const drainTimeoutMs = options.drainTimeoutMs ?? POOL_DRAIN_TIMEOUT_MS;

  let state: PoolState = "dispatching";
  const transition = (next: PoolState): void => {
    state = next;
    logger.debug("Upload pool state", { state });
    options.onStateChange?.(state);
  };

  if (cancellation.signal.aborted) {
    transition("aborted");
    throw cancellationError(cancellation.signal);
  }

  // Stops the workers once the pool is done, without cancelling the run
  const poolController = new AbortController();
  const signal = AbortSignal.any([cancellation.signal, poolController.signal]);

  const tasks = new Channel<UploadTask>();
  const results = new Channel<SheetUploadResult>();

  const remaining = [...options.sheets];
  let outstanding = 0;
  const completed: SheetUploadSuccess[] = [];
  const changedPaths: string[] = [];
  let failure: UploaderError | null = null;

  logger.info("Starting upload workers", {
    workers: options.workers,
    sheets: remaining.length,
  });
  const workers = Array.from({ length: options.workers }, (_, id) =>
    runWorker(id, tasks, results, upload, signal, logger),
  );

  transition("dispatching");

  while (remaining.length > 0 || outstanding > 0) {
    if (remaining.length === 0 && state === "dispatching") {
      transition("draining");
    }

    let step: DispatchStep;
    try {
      step = await nextStep(remaining[0], directory, tasks, results, signal);
    } catch {
      failure = cancellationError(cancellation.signal);
      break;
    }

    if (step.kind === "dispatched") {
      remaining.shift();
      outstanding++;
      continue;
    }

    outstanding--;
    const { result } = step;
    if (!result.ok) {
      logger.error("Sheet upload failed", {
        sheet: result.sheetTitle,
        path: result.path,
        error: result.error.message,
      });
      failure = result.error;
      break;
    }

    completed.push(result);
    if (result.changedPath) {
      changedPaths.push(result.changedPath);
    }
  }

  if (failure) {
    transition("aborted");
    cancellation.abort(failure);
    poolController.abort();
    await drainWorkers(workers, drainTimeoutMs, logger);
    throw failure;
  }

  transition("completed");
  poolController.abort();
  await Promise.allSettled(workers);

  logger.info("All sheets resolved", {
    sheets: completed.length,
    written: changedPaths.length,
    skipped: completed.length - changedPaths.length,
  });

  return { state: "completed", results: completed, changedPaths };
}

/**
 * One dispatch step: offer the next sheet (if any) while receiving results
 *
 * @throws the signal's reason when the run is cancelled while waiting
 */
async function nextStep(
  next: Sheet | undefined,
  directory: string,
  tasks: Channel<UploadTask>,
  results: Channel<SheetUploadResult>,
  signal: AbortSignal,
): Promise<DispatchStep> {
  if (!next) {
    const result = await results.receive({ signal });
    return { kind: "result", result };
  }

  const claim = new SelectClaim();
  return Promise.race([
    tasks
      .send({ sheet: next, directory }, { signal, claim })
      .then((): DispatchStep => ({ kind: "dispatched" })),
    results
      .receive({ signal, claim })
      .then((result): DispatchStep => ({ kind: "result", result })),
  ]);
}
