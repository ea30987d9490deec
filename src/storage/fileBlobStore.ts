/**
 * Filesystem blob store (file://)
 *
 * Each key maps to a file under the root directory. Writes go to a temporary
 * file first and are renamed into place. Attributes that a plain file cannot
 * carry (Cache-Control, Content-Type, MD5) are kept in a JSON sidecar named
 * "<file>.attrs".
 */

import { randomUUID } from "crypto";
import { mkdir, readFile, rename, rm, stat, writeFile } from "fs/promises";
import path from "path";
import type { BlobAttributes, BlobStore, BlobWriteOptions } from "@/types";
import {
  FILE_STORE_ATTRS_SUFFIX,
  FILE_STORE_TEMP_PREFIX,
} from "@/constants/storage";
import { md5 } from "./checksum";

/**
 * Sidecar file contents
 */
type FileAttrs = {
  cacheControl?: string;
  contentType?: string;
  /** base64 MD5 of the file contents at write time */
  md5?: string;
};

function isFileAttrs(value: unknown): value is FileAttrs {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export class FileBlobStore implements BlobStore {
  readonly url: string;
  private readonly root: string;

  /**
   * @param root - Directory holding the blobs (created on first write)
   * @param url - URL the store was opened from
   */
  constructor(root: string, url = `file://${root}`) {
    this.root = path.resolve(root);
    this.url = url;
  }

  /**
   * Map a key to a file path under the root
   *
   * @throws Error for empty keys, keys escaping the root and sidecar names
   */
  resolveKey(key: string): string {
    const normalized = path.posix.normalize(key.replace(/\\/g, "/"));
    if (
      key === "" ||
      normalized === "." ||
      normalized.startsWith("../") ||
      normalized === ".." ||
      path.posix.isAbsolute(normalized)
    ) {
      throw new Error(`invalid blob key: ${JSON.stringify(key)}`);
    }
    if (normalized.endsWith(FILE_STORE_ATTRS_SUFFIX)) {
      throw new Error(
        `blob key may not end in ${FILE_STORE_ATTRS_SUFFIX}: ${JSON.stringify(key)}`,
      );
    }
    return path.join(this.root, ...normalized.split("/"));
  }

  async getAttributes(
    key: string,
    options: { signal?: AbortSignal } = {},
  ): Promise<BlobAttributes> {
    const filePath = this.resolveKey(key);
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new Error(`not a file: ${key}`);
    }

    const attrs = await this.readAttrs(filePath, options.signal);
    const digest = attrs.md5
      ? Buffer.from(attrs.md5, "base64")
      : md5(await readFile(filePath, { signal: options.signal }));

    return {
      md5: digest,
      size: info.size,
      cacheControl: attrs.cacheControl,
      contentType: attrs.contentType,
      modifiedAt: info.mtime,
    };
  }

  async writeAll(
    key: string,
    data: Buffer,
    options: BlobWriteOptions = {},
  ): Promise<void> {
    const filePath = this.resolveKey(key);
    await mkdir(path.dirname(filePath), { recursive: true });

    const attrs: FileAttrs = {
      cacheControl: options.cacheControl,
      contentType: options.contentType,
      md5: md5(data).toString("base64"),
    };

    // A file without a sidecar is hashed from its contents, so the old
    // sidecar goes before the new data lands
    const attrsPath = filePath + FILE_STORE_ATTRS_SUFFIX;
    await rm(attrsPath, { force: true });
    await this.writeAtomic(filePath, data);
    await this.writeAttrs(attrsPath, attrs);
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }

  protected async writeAttrs(attrsPath: string, attrs: FileAttrs): Promise<void> {
    await this.writeAtomic(attrsPath, Buffer.from(JSON.stringify(attrs)));
  }

  private async writeAtomic(filePath: string, data: Buffer): Promise<void> {
    const tempPath = path.join(
      path.dirname(filePath),
      `${FILE_STORE_TEMP_PREFIX}${randomUUID()}`,
    );
    try {
      await writeFile(tempPath, data);
      await rename(tempPath, filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  /**
   * Read the sidecar; a missing or malformed sidecar means no recorded attributes
   */
  private async readAttrs(
    filePath: string,
    signal?: AbortSignal,
  ): Promise<FileAttrs> {
    let raw: string;
    try {
      raw = await readFile(filePath + FILE_STORE_ATTRS_SUFFIX, {
        encoding: "utf-8",
        signal,
      });
    } catch (error) {
      if (isNotFound(error)) {
        return {};
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return isFileAttrs(parsed) ? parsed : {};
    } catch {
      return {};
    }
  }
}
