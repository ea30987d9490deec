/**
 * Sheets module public API
 */

export { encodeCsv, isBlankRow, cellValues } from "./csvEncoder";
export { shouldSkip } from "./skipCheck";
export { uploadSheet, createSheetUploader } from "./uploadSheet";
export type { SheetUploadDeps } from "./uploadSheet";
