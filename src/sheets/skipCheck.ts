/**
 * Content-addressed skip check
 *
 * Compares the MD5 of a freshly encoded payload with the digest the store
 * reports for the same key.
 */

import type { BlobStore, Logger } from "@/types";
import { errorMessage } from "@/errors";
import { silentLogger } from "@/logger";
import { md5 } from "@/storage/checksum";

/**
 * Decide whether writing payload to path can be skipped
 *
 * A failed lookup or a missing digest counts as "not stored yet": the
 * result is false and the lookup error is not propagated.
 *
 * @returns true when the store already holds byte-identical content
 */
export async function shouldSkip(
  store: BlobStore,
  path: string,
  payload: Buffer,
  options: { signal?: AbortSignal; logger?: Logger } = {},
): Promise<boolean> {
  const logger = options.logger ?? silentLogger;

  let stored: Buffer | undefined;
  try {
    const attributes = await store.getAttributes(path, {
      signal: options.signal,
    });
    stored = attributes.md5;
  } catch (error) {
    logger.debug("No existing object", { path, reason: errorMessage(error) });
    return false;
  }

  if (!stored) {
    logger.debug("Existing object has no checksum", { path });
    return false;
  }

  return md5(payload).equals(stored);
}
