/**
 * Run cancellation: one AbortController per run
 *
 * Aborted by the first termination signal (SIGINT/SIGTERM), by an optional
 * parent signal, or by the upload pool when a sheet fails. After the first
 * process signal the listeners are removed, so a second signal falls back to
 * Node's default handling and terminates the process.
 */

import type { Logger, RunCancellation } from "@/types";
import { TERMINATION_SIGNALS } from "@/constants";
import { CancelledError } from "@/errors";
import { silentLogger } from "@/logger";

/**
 * Event source delivering process signals (process in production)
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  removeListener(event: NodeJS.Signals, listener: () => void): unknown;
}

export type RunCancellationOptions = {
  parent?: AbortSignal;
  source?: SignalSource;
  signals?: readonly NodeJS.Signals[];
  logger?: Logger;
};

/**
 * Error to report when the run stopped because signal fired
 */
export function cancellationError(signal: AbortSignal): CancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof CancelledError) {
    return reason;
  }
  return new CancelledError("run cancelled", { cause: reason });
}

export function createRunCancellation(
  options: RunCancellationOptions = {},
): RunCancellation {
  const controller = new AbortController();
  const source = options.source ?? process;
  const signals = options.signals ?? TERMINATION_SIGNALS;
  const logger = options.logger ?? silentLogger;

  const listeners = new Map<NodeJS.Signals, () => void>();
  let disposed = false;

  const abort = (reason?: unknown): void => {
    if (!controller.signal.aborted) {
      controller.abort(reason ?? new CancelledError());
    }
  };

  const dispose = (): void => {
    if (disposed) {
      return;
    }
    disposed = true;
    for (const [name, listener] of listeners) {
      source.removeListener(name, listener);
    }
    listeners.clear();
    options.parent?.removeEventListener("abort", onParentAbort);
  };

  function onParentAbort(): void {
    abort(options.parent?.reason);
  }

  for (const name of signals) {
    const listener = (): void => {
      logger.warn("Termination signal received, cancelling run", {
        signal: name,
      });
      dispose();
      abort(new CancelledError(`run cancelled by ${name}`));
    };
    listeners.set(name, listener);
    source.on(name, listener);
  }

  if (options.parent) {
    if (options.parent.aborted) {
      abort(options.parent.reason);
    } else {
      options.parent.addEventListener("abort", onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    abort,
    dispose,
  };
}
