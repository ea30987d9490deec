/**
 * Error classes public API
 */

export {
  UploaderError,
  ConfigError,
  TemplateError,
  EncodingError,
  WriteError,
  FetchError,
  InvalidationError,
  CancelledError,
  toUploaderError,
  errorMessage,
} from "./uploaderError";
export type { UploaderErrorCode } from "./uploaderError";
