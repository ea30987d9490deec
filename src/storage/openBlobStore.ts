/**
 * Open a blob store from a URL
 *
 * Supported forms:
 *   file://./out, file:///srv/www   files under a directory
 *   mem://                          in-process store
 *   s3://bucket?region=eu-west-1&prefix=data&endpoint=https://...
 */

import type { BlobStore, Logger } from "@/types";
import {
  FILE_STORE_SCHEME,
  MEMORY_STORE_SCHEME,
  S3_STORE_SCHEME,
} from "@/constants/storage";
import { ConfigError } from "@/errors";
import { silentLogger } from "@/logger";
import { FileBlobStore } from "./fileBlobStore";
import { MemoryBlobStore } from "./memoryBlobStore";
import { S3BlobStore } from "./s3BlobStore";

/**
 * Directory named by a file:// URL
 *
 * Parsed by hand because URL treats "file://." as host ".".
 */
export function fileUrlToDirectory(url: string): string {
  const rest = url.slice(`${FILE_STORE_SCHEME}//`.length).split("?")[0];
  const directory = decodeURIComponent(rest);
  return directory === "" ? "." : directory;
}

/**
 * Open the store named by url
 *
 * @throws ConfigError for malformed URLs and unsupported schemes
 */
export function openBlobStore(
  url: string,
  logger: Logger = silentLogger,
): BlobStore {
  const schemeEnd = url.indexOf("//");
  const scheme = schemeEnd > 0 ? url.slice(0, schemeEnd) : "";

  switch (scheme) {
    case FILE_STORE_SCHEME: {
      const directory = fileUrlToDirectory(url);
      logger.debug("Opening file store", { directory });
      return new FileBlobStore(directory, url);
    }
    case MEMORY_STORE_SCHEME:
      logger.debug("Opening memory store");
      return new MemoryBlobStore(url);
    case S3_STORE_SCHEME: {
      let parsed: URL;
      try {
        parsed = new URL(url);
      } catch (error) {
        throw new ConfigError(`invalid bucket URL: ${url}`, { cause: error });
      }
      if (!parsed.hostname) {
        throw new ConfigError(`bucket URL has no bucket name: ${url}`);
      }
      const endpoint = parsed.searchParams.get("endpoint") ?? undefined;
      logger.debug("Opening S3 store", { bucket: parsed.hostname, endpoint });
      return new S3BlobStore(
        {
          bucket: parsed.hostname,
          region: parsed.searchParams.get("region") ?? undefined,
          prefix: parsed.searchParams.get("prefix") ?? undefined,
          endpoint,
          forcePathStyle: endpoint !== undefined,
        },
        url,
      );
    }
    default:
      throw new ConfigError(
        `unsupported bucket URL ${JSON.stringify(url)}: expected file://, mem:// or s3://`,
      );
  }
}
