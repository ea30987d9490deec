/**
 * In-process blob store (mem://)
 *
 * Used for dry runs and tests. Contents are lost when the process exits.
 */

import type { BlobAttributes, BlobStore, BlobWriteOptions } from "@/types";
import { md5 } from "./checksum";

type MemoryBlob = {
  data: Buffer;
  attributes: BlobAttributes;
};

export class MemoryBlobStore implements BlobStore {
  readonly url: string;
  private readonly blobs = new Map<string, MemoryBlob>();
  private closed = false;

  constructor(url = "mem://") {
    this.url = url;
  }

  async getAttributes(key: string): Promise<BlobAttributes> {
    this.assertOpen();
    const blob = this.blobs.get(key);
    if (!blob) {
      throw new Error(`blob not found: ${key}`);
    }
    return { ...blob.attributes };
  }

  async writeAll(
    key: string,
    data: Buffer,
    options: BlobWriteOptions = {},
  ): Promise<void> {
    this.assertOpen();
    const copy = Buffer.from(data);
    this.blobs.set(key, {
      data: copy,
      attributes: {
        md5: md5(copy),
        size: copy.length,
        cacheControl: options.cacheControl,
        contentType: options.contentType,
        modifiedAt: new Date(),
      },
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * Read back a stored blob (undefined when missing)
   */
  read(key: string): Buffer | undefined {
    return this.blobs.get(key)?.data;
  }

  keys(): string[] {
    return [...this.blobs.keys()];
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`store ${this.url} is closed`);
    }
  }
}
