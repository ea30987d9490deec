/**
 * Blob store public API
 */

export { openBlobStore, fileUrlToDirectory } from "./openBlobStore";
export { FileBlobStore } from "./fileBlobStore";
export { MemoryBlobStore } from "./memoryBlobStore";
export { S3BlobStore, md5FromETag } from "./s3BlobStore";
export type { S3BlobStoreConfig } from "./s3BlobStore";
export { md5 } from "./checksum";
