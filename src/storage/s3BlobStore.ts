/**
 * S3 blob store (s3://bucket)
 *
 * Works with any S3-compatible endpoint. Credentials come from the default
 * AWS credential chain.
 */

import {
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import type { BlobAttributes, BlobStore, BlobWriteOptions } from "@/types";
import { MD5_HEX_LENGTH } from "@/constants/storage";
import { md5 } from "./checksum";

export type S3BlobStoreConfig = {
  bucket: string;
  /** Key prefix prepended to every key, without trailing slash */
  prefix?: string;
  region?: string;
  /** Custom endpoint for S3-compatible services */
  endpoint?: string;
  /** Use path-style addressing (most S3-compatible services need it) */
  forcePathStyle?: boolean;
};

/**
 * Decode an ETag into an MD5 digest
 *
 * Only single-part uploads have an ETag equal to the content MD5; multipart
 * ETags ("<hex>-<parts>") yield undefined.
 */
export function md5FromETag(etag: string | undefined): Buffer | undefined {
  if (!etag) {
    return undefined;
  }
  const hex = etag.replace(/^W\//, "").replace(/"/g, "");
  if (hex.length !== MD5_HEX_LENGTH || !/^[0-9a-f]+$/i.test(hex)) {
    return undefined;
  }
  return Buffer.from(hex, "hex");
}

export class S3BlobStore implements BlobStore {
  readonly url: string;
  private readonly bucket: string;
  private readonly prefix: string;
  private readonly client: S3Client;

  constructor(config: S3BlobStoreConfig, url: string, client?: S3Client) {
    this.url = url;
    this.bucket = config.bucket;
    this.prefix = (config.prefix ?? "").replace(/^\/+|\/+$/g, "");
    this.client =
      client ??
      new S3Client({
        region: config.region,
        endpoint: config.endpoint,
        forcePathStyle: config.forcePathStyle,
      });
  }

  objectKey(key: string): string {
    return this.prefix ? `${this.prefix}/${key}` : key;
  }

  async getAttributes(
    key: string,
    options: { signal?: AbortSignal } = {},
  ): Promise<BlobAttributes> {
    const head = await this.client.send(
      new HeadObjectCommand({ Bucket: this.bucket, Key: this.objectKey(key) }),
      { abortSignal: options.signal },
    );

    return {
      md5: md5FromETag(head.ETag),
      size: head.ContentLength ?? 0,
      cacheControl: head.CacheControl,
      contentType: head.ContentType,
      modifiedAt: head.LastModified,
    };
  }

  async writeAll(
    key: string,
    data: Buffer,
    options: BlobWriteOptions = {},
  ): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.objectKey(key),
        Body: data,
        CacheControl: options.cacheControl,
        ContentType: options.contentType,
        ContentMD5: md5(data).toString("base64"),
      }),
    );
  }

  async close(): Promise<void> {
    this.client.destroy();
  }
}
