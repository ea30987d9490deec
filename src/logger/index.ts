/**
 * Logger public API
 */

export {
  createLogger,
  withContext,
  silentLogger,
  formatLogLine,
  isLogLevel,
} from "./logger";
