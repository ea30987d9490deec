/**
 * Post-pipeline CDN invalidation for changed paths
 */

import type { CdnInvalidator, Logger } from "@/types";
import { InvalidationError, toUploaderError } from "@/errors";
import { silentLogger } from "@/logger";

/**
 * Bytes left as-is in a path segment: RFC 3986 unreserved plus $&+:=@
 */
const PATH_SEGMENT_SAFE = /^[A-Za-z0-9\-_.~$&+:=@]$/;

/**
 * Percent-encode one path segment byte by byte (UTF-8, upper-case hex)
 */
export function escapePathSegment(segment: string): string {
  let escaped = "";
  for (const byte of Buffer.from(segment, "utf-8")) {
    const char = String.fromCharCode(byte);
    escaped +=
      byte < 0x80 && PATH_SEGMENT_SAFE.test(char)
        ? char
        : "%" + byte.toString(16).toUpperCase().padStart(2, "0");
  }
  return escaped;
}

/**
 * Turn a store key into a CDN invalidation path
 *
 * "reports/Q1 (draft).csv" -> "/reports/Q1%20%28draft%29.csv": exactly one
 * leading slash, each segment escaped, separators kept.
 */
export function normalizeInvalidationPath(path: string): string {
  const rooted = "/" + path.replace(/^\/+/, "");
  return rooted.split("/").map(escapePathSegment).join("/");
}

/**
 * Caller reference for an invalidation batch: UTC time as YYYYMMDDhhmmss
 */
export function formatCallerReference(now: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  return (
    String(now.getUTCFullYear()) +
    pad(now.getUTCMonth() + 1) +
    pad(now.getUTCDate()) +
    pad(now.getUTCHours()) +
    pad(now.getUTCMinutes()) +
    pad(now.getUTCSeconds())
  );
}

/**
 * Invalidate changed paths on the CDN in one batch
 *
 * @param changedPaths - Store keys written during the run
 * @param distributionId - CDN distribution, null when not configured
 * @returns Invalidation ID, or null when nothing was sent
 * @throws InvalidationError when the CDN call fails
 */
export async function notifyChangedPaths(
  changedPaths: readonly string[],
  distributionId: string | null,
  invalidator: CdnInvalidator,
  options: { logger?: Logger; now?: () => Date } = {},
): Promise<string | null> {
  const logger = options.logger ?? silentLogger;

  if (changedPaths.length === 0 || !distributionId) {
    logger.debug("No CDN invalidation needed", {
      changed: changedPaths.length,
      distributionId,
    });
    return null;
  }

  const paths = changedPaths.map(normalizeInvalidationPath);
  const callerReference = formatCallerReference(
    options.now ? options.now() : new Date(),
  );

  logger.info("Invalidating CDN paths", { distributionId, paths });

  let id: string;
  try {
    id = await invalidator.invalidate(distributionId, paths, callerReference);
  } catch (error) {
    throw toUploaderError(
      error,
      (message, cause) =>
        new InvalidationError(
          distributionId,
          `could not invalidate ${distributionId}: ${message}`,
          { cause },
        ),
    );
  }

  logger.info("CDN invalidation created", { distributionId, invalidationId: id });
  return id;
}
