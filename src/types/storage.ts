/**
 * Blob store type definitions
 *
 * Keys are slash-separated relative paths ("Budget/0 Summary.csv").
 */

export type BlobAttributes = {
  /** MD5 digest of the stored content, when the store reports one */
  md5?: Buffer;
  size: number;
  cacheControl?: string;
  contentType?: string;
  modifiedAt?: Date;
};

export type BlobWriteOptions = {
  cacheControl?: string;
  contentType?: string;
};

export interface BlobStore {
  /** URL the store was opened from (for logging) */
  readonly url: string;

  /**
   * Look up attributes of an existing object
   *
   * @throws when the object does not exist or the lookup fails
   */
  getAttributes(
    key: string,
    options?: { signal?: AbortSignal },
  ): Promise<BlobAttributes>;

  /**
   * Write the whole object in one call, replacing any existing content
   */
  writeAll(key: string, data: Buffer, options?: BlobWriteOptions): Promise<void>;

  /**
   * Release the store's resources; further calls are invalid
   */
  close(): Promise<void>;
}
