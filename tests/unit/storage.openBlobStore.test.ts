import { describe, it, expect } from "vitest";
import {
  FileBlobStore,
  MemoryBlobStore,
  S3BlobStore,
  fileUrlToDirectory,
  openBlobStore,
} from "@/storage";
import { ConfigError } from "@/errors";

describe("fileUrlToDirectory", () => {
  it("maps file URLs to directories", () => {
    expect(fileUrlToDirectory("file://.")).toBe(".");
    expect(fileUrlToDirectory("file://")).toBe(".");
    expect(fileUrlToDirectory("file://./out")).toBe("./out");
    expect(fileUrlToDirectory("file:///srv/www")).toBe("/srv/www");
    expect(fileUrlToDirectory("file://my%20dir")).toBe("my dir");
  });
});

describe("openBlobStore", () => {
  it("opens a file store", () => {
    const store = openBlobStore("file://./out");
    expect(store).toBeInstanceOf(FileBlobStore);
    expect(store.url).toBe("file://./out");
  });

  it("opens a memory store", () => {
    expect(openBlobStore("mem://")).toBeInstanceOf(MemoryBlobStore);
  });

  it("opens an S3 store with the prefix from the query", async () => {
    const store = openBlobStore("s3://test-bucket?region=eu-west-1&prefix=data");

    expect(store).toBeInstanceOf(S3BlobStore);
    if (store instanceof S3BlobStore) {
      expect(store.objectKey("a.csv")).toBe("data/a.csv");
    }
    await store.close();
  });

  it("rejects unsupported schemes", () => {
    expect(() => openBlobStore("ftp://example.com/x")).toThrow(ConfigError);
    expect(() => openBlobStore("not a url")).toThrow(ConfigError);
  });
});
