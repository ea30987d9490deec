/**
 * Unit tests for the filesystem blob store
 *
 * Each test works in its own temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile, mkdir } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { FileBlobStore, md5 } from "@/storage";
import { shouldSkip } from "@/sheets";

class FailingAttrsStore extends FileBlobStore {
  protected override async writeAttrs(): Promise<void> {
    throw new Error("sidecar write failed");
  }
}

describe("FileBlobStore", () => {
  let root: string;
  let store: FileBlobStore;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "blob-store-"));
    store = new FileBlobStore(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes the file and its attributes", async () => {
    const data = Buffer.from("a,b\n");

    await store.writeAll("Reports/0 Q1.csv", data, {
      cacheControl: "max-age=900,public",
      contentType: "text/csv",
    });

    expect(await readFile(path.join(root, "Reports", "0 Q1.csv"), "utf-8")).toBe(
      "a,b\n",
    );
    const attributes = await store.getAttributes("Reports/0 Q1.csv");
    expect(attributes.md5?.equals(md5(data))).toBe(true);
    expect(attributes.size).toBe(4);
    expect(attributes.cacheControl).toBe("max-age=900,public");
    expect(attributes.contentType).toBe("text/csv");
  });

  it("leaves no temporary files behind", async () => {
    await store.writeAll("Reports/0 Q1.csv", Buffer.from("x\n"));
    await store.writeAll("Reports/0 Q1.csv", Buffer.from("y\n"));

    expect((await readdir(path.join(root, "Reports"))).sort()).toEqual([
      "0 Q1.csv",
      "0 Q1.csv.attrs",
    ]);
  });

  it("computes the checksum of a file written outside the store", async () => {
    await mkdir(path.join(root, "manual"));
    await writeFile(path.join(root, "manual", "a.csv"), "hand made\n");

    const attributes = await store.getAttributes("manual/a.csv");

    expect(attributes.md5?.equals(md5(Buffer.from("hand made\n")))).toBe(true);
    expect(attributes.cacheControl).toBeUndefined();
  });

  it("falls back to hashing the contents when the sidecar write fails", async () => {
    const before = Buffer.from("before\n");
    const after = Buffer.from("after\n");
    await store.writeAll("a.csv", before);

    await expect(
      new FailingAttrsStore(root).writeAll("a.csv", after),
    ).rejects.toThrow("sidecar write failed");

    const attributes = await store.getAttributes("a.csv");
    expect(attributes.md5?.equals(md5(after))).toBe(true);
    expect(await readdir(root)).toEqual(["a.csv"]);
    await expect(shouldSkip(store, "a.csv", before)).resolves.toBe(false);
  });

  it("fails to describe a missing key", async () => {
    await expect(store.getAttributes("missing.csv")).rejects.toThrow();
  });

  it("rejects keys outside the root or naming a sidecar", () => {
    expect(() => store.resolveKey("")).toThrow("invalid blob key");
    expect(() => store.resolveKey("../escape.csv")).toThrow("invalid blob key");
    expect(() => store.resolveKey("/etc/passwd")).toThrow("invalid blob key");
    expect(() => store.resolveKey("a.csv.attrs")).toThrow(
      "blob key may not end in .attrs",
    );
  });

  it("resolves nested keys under the root", () => {
    expect(store.resolveKey("a/b/c.csv")).toBe(path.join(root, "a", "b", "c.csv"));
  });
});
