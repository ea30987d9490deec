/**
 * Uploader configuration type definitions
 */

import type { LogLevel } from "./logger";

export type UploaderConfig = {
  /** Number of concurrent upload workers (>= 1) */
  workers: number;

  /** Google Sheets document ID */
  sheetId: string;

  /** Service account JSON (already base64-decoded), if given */
  googleClientSecret: string | null;

  /** Template for the destination directory, rendered against the document */
  pathTemplate: string;

  /** Template for each file name, rendered against the sheet */
  fileTemplate: string;

  /** Destination store URL (file://, mem://, s3://) */
  bucketUrl: string;

  /** Cache-Control value stored with each file */
  cacheControl: string;

  /** Use \r\n line endings in CSV output */
  useCrlf: boolean;

  /** CloudFront distribution to invalidate, if any */
  cloudFrontDistribution: string | null;

  logLevel: LogLevel;
  quiet: boolean;
};

/**
 * Result of parsing the command line
 */
export type ConfigLoadResult =
  | { kind: "run"; config: UploaderConfig }
  | { kind: "help"; usage: string };
