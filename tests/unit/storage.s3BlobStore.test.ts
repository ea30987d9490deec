/**
 * Unit tests for S3 key and ETag handling
 *
 * No requests are sent; the client is only constructed.
 */

import { describe, it, expect, vi } from "vitest";
import { S3Client } from "@aws-sdk/client-s3";
import { S3BlobStore, md5, md5FromETag } from "@/storage";

describe("md5FromETag", () => {
  const digest = md5(Buffer.from("a,b\n"));

  it("decodes a quoted single-part ETag", () => {
    expect(md5FromETag(`"${digest.toString("hex")}"`)?.equals(digest)).toBe(true);
  });

  it("ignores multipart and missing ETags", () => {
    expect(md5FromETag(`"${digest.toString("hex")}-2"`)).toBeUndefined();
    expect(md5FromETag(undefined)).toBeUndefined();
    expect(md5FromETag("")).toBeUndefined();
  });
});

describe("S3BlobStore", () => {
  it("prepends the prefix to object keys", () => {
    const client = new S3Client({ region: "us-east-1" });
    const store = new S3BlobStore(
      { bucket: "test-bucket", prefix: "/data/" },
      "s3://test-bucket",
      client,
    );

    expect(store.objectKey("Reports/0 Q1.csv")).toBe("data/Reports/0 Q1.csv");
  });

  it("uses keys as is without a prefix", () => {
    const client = new S3Client({ region: "us-east-1" });
    const store = new S3BlobStore({ bucket: "test-bucket" }, "s3://test-bucket", client);

    expect(store.objectKey("a.csv")).toBe("a.csv");
  });

  it("destroys the client on close", async () => {
    const client = new S3Client({ region: "us-east-1" });
    const destroy = vi.spyOn(client, "destroy");
    const store = new S3BlobStore({ bucket: "test-bucket" }, "s3://test-bucket", client);

    await store.close();

    expect(destroy).toHaveBeenCalledTimes(1);
  });
});
