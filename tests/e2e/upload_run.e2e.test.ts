/**
 * E2E Test: whole document upload (offline)
 *
 * Fake document source → runUpload → file store in a temp directory → fake CDN
 *
 * Proves the full run without Google, S3 or CloudFront: first run writes
 * and invalidates everything, an unchanged rerun skips everything, and a
 * single edited sheet is the only path rewritten and invalidated.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import type { BlobStore, UploaderConfig } from "@/types";
import { createRunCancellation, runUpload } from "@/orchestration";
import type { RunUploadDeps } from "@/orchestration";
import { MemoryBlobStore } from "@/storage";
import {
  CancelledError,
  ConfigError,
  FetchError,
  TemplateError,
  WriteError,
} from "@/errors";
import {
  FakeInvalidator,
  FakeSignalSource,
  FakeSpreadsheetSource,
  captureLogger,
  makeDocument,
  makeSheet,
} from "../helpers/uploadFixtures";

const fixedNow = () => new Date(Date.UTC(2024, 5, 30, 23, 59, 58));

function quarterlyReport(notes: string) {
  return makeDocument("Quarterly Report", [
    makeSheet(0, "Summary", [
      ["Region", "Total"],
      ["North", "10"],
      ["", ""],
    ]),
    makeSheet(1, "Notes", [[notes]]),
  ]);
}

describe("E2E: document upload run (offline)", () => {
  let root: string;
  let config: UploaderConfig;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "sheets-upload-"));
    config = {
      workers: 2,
      sheetId: "test-sheet-id",
      googleClientSecret: null,
      pathTemplate: "{{properties.title}}",
      fileTemplate: "{{properties.index}} {{properties.title}}.csv",
      bucketUrl: `file://${root}`,
      cacheControl: "max-age=900,public",
      useCrlf: false,
      cloudFrontDistribution: "E2E-DIST",
      logLevel: "debug",
      quiet: false,
    };
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function depsFor(
    source: FakeSpreadsheetSource,
    invalidator: FakeInvalidator,
  ): RunUploadDeps {
    return {
      source,
      invalidator,
      logger: captureLogger().logger,
      cancellation: createRunCancellation({ source: new FakeSignalSource() }),
      now: fixedNow,
    };
  }

  it("writes, skips and rewrites only what changed", async () => {
    const invalidator = new FakeInvalidator();

    // ========================================================================
    // First run: everything is new
    // ========================================================================
    const first = await runUpload(
      config,
      depsFor(new FakeSpreadsheetSource(quarterlyReport("hello, world")), invalidator),
    );

    expect(first).toMatchObject({
      documentTitle: "Quarterly Report",
      directory: "Quarterly Report",
      sheetCount: 2,
      writtenCount: 2,
      skippedCount: 0,
      invalidationId: "INV-1",
    });
    expect(
      await readFile(path.join(root, "Quarterly Report", "0 Summary.csv"), "utf-8"),
    ).toBe("Region,Total\nNorth,10\n");
    expect(
      await readFile(path.join(root, "Quarterly Report", "1 Notes.csv"), "utf-8"),
    ).toBe('"hello, world"\n');

    expect(invalidator.calls).toHaveLength(1);
    expect(invalidator.calls[0].distributionId).toBe("E2E-DIST");
    expect(invalidator.calls[0].callerReference).toBe("20240630235958");
    expect([...invalidator.calls[0].paths].sort()).toEqual([
      "/Quarterly%20Report/0%20Summary.csv",
      "/Quarterly%20Report/1%20Notes.csv",
    ]);

    // ========================================================================
    // Second run: nothing changed
    // ========================================================================
    const second = await runUpload(
      config,
      depsFor(new FakeSpreadsheetSource(quarterlyReport("hello, world")), invalidator),
    );

    expect(second).toMatchObject({
      writtenCount: 0,
      skippedCount: 2,
      changedPaths: [],
      invalidationId: null,
    });
    expect(invalidator.calls).toHaveLength(1);

    // ========================================================================
    // Third run: one sheet edited
    // ========================================================================
    const third = await runUpload(
      config,
      depsFor(new FakeSpreadsheetSource(quarterlyReport("goodbye")), invalidator),
    );

    expect(third).toMatchObject({
      writtenCount: 1,
      skippedCount: 1,
      changedPaths: ["Quarterly Report/1 Notes.csv"],
      invalidationId: "INV-2",
    });
    expect(invalidator.calls[1].paths).toEqual(["/Quarterly%20Report/1%20Notes.csv"]);
    expect(
      await readFile(path.join(root, "Quarterly Report", "1 Notes.csv"), "utf-8"),
    ).toBe("goodbye\n");
  });

  it("skips invalidation when no distribution is configured", async () => {
    const invalidator = new FakeInvalidator();

    const summary = await runUpload(
      { ...config, cloudFrontDistribution: null },
      depsFor(new FakeSpreadsheetSource(quarterlyReport("x")), invalidator),
    );

    expect(summary.writtenCount).toBe(2);
    expect(summary.invalidationId).toBeNull();
    expect(invalidator.calls).toEqual([]);
  });

  it("reports a document fetch failure as a FetchError", async () => {
    const source = new FakeSpreadsheetSource(new Error("quota exceeded"));

    const error = await runUpload(config, depsFor(source, new FakeInvalidator())).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toHaveProperty(
      "message",
      "failure getting Google Sheet: quota exceeded",
    );
  });

  it("rejects a bad template before fetching the document", async () => {
    const source = new FakeSpreadsheetSource(quarterlyReport("x"));

    await expect(
      runUpload({ ...config, fileTemplate: "{{" }, depsFor(source, new FakeInvalidator())),
    ).rejects.toBeInstanceOf(TemplateError);
    expect(source.requests).toEqual([]);
  });

  it("rejects a worker count below one before fetching the document", async () => {
    const source = new FakeSpreadsheetSource(quarterlyReport("x"));

    await expect(
      runUpload({ ...config, workers: 0 }, depsFor(source, new FakeInvalidator())),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(source.requests).toEqual([]);
  });

  it("fails without invalidating when a sheet cannot be written", async () => {
    const store = new MemoryBlobStore();
    const writeAll = store.writeAll.bind(store);
    store.writeAll = async (key, data, options) => {
      if (key.endsWith("1 Notes.csv")) {
        throw new Error("permission denied");
      }
      await writeAll(key, data, options);
    };
    const invalidator = new FakeInvalidator();

    const error = await runUpload(config, {
      ...depsFor(new FakeSpreadsheetSource(quarterlyReport("x")), invalidator),
      openStore: (): BlobStore => store,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(WriteError);
    expect(error).toHaveProperty("path", "Quarterly Report/1 Notes.csv");
    expect(invalidator.calls).toEqual([]);
  });

  it("reports a cancelled run as CancelledError", async () => {
    const cancellation = createRunCancellation({ source: new FakeSignalSource() });
    cancellation.abort();

    const error = await runUpload(config, {
      ...depsFor(new FakeSpreadsheetSource(quarterlyReport("x")), new FakeInvalidator()),
      cancellation,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CancelledError);
  });

  it("reports a store close failure after a successful run", async () => {
    const store = new MemoryBlobStore("mem://closing");
    store.close = async () => {
      throw new Error("flush failed");
    };

    const error = await runUpload(
      { ...config, cloudFrontDistribution: null },
      {
        ...depsFor(new FakeSpreadsheetSource(quarterlyReport("x")), new FakeInvalidator()),
        openStore: (): BlobStore => store,
      },
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(WriteError);
    expect(error).toHaveProperty(
      "message",
      `problem closing store ${config.bucketUrl}: flush failed`,
    );
  });
});
