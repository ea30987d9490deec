/**
 * Blob store constants
 */

export const FILE_STORE_SCHEME = "file:";
export const MEMORY_STORE_SCHEME = "mem:";
export const S3_STORE_SCHEME = "s3:";

/**
 * Suffix of the sidecar file holding attributes next to each stored file
 */
export const FILE_STORE_ATTRS_SUFFIX = ".attrs";

/**
 * Prefix of temporary files written before an atomic rename
 */
export const FILE_STORE_TEMP_PREFIX = ".tmp-";

/**
 * Length of a hex-encoded MD5 digest (single-part S3 ETag)
 */
export const MD5_HEX_LENGTH = 32;
