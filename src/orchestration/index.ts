/**
 * Orchestration public API
 */

export { runUpload } from "./runUpload";
export type { RunUploadDeps } from "./runUpload";
export { runUploadPool, validateWorkerCount } from "./uploadPool";
export {
  createRunCancellation,
  cancellationError,
} from "./cancellation";
export type { SignalSource, RunCancellationOptions } from "./cancellation";
export {
  notifyChangedPaths,
  normalizeInvalidationPath,
  escapePathSegment,
  formatCallerReference,
} from "./invalidation";
export { Channel, SelectClaim } from "./channel";
