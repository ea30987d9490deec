/**
 * Unit tests for the per-sheet upload unit
 *
 * Uses the in-process memory store; no filesystem or network.
 */

import { describe, it, expect, vi } from "vitest";
import type { BlobStore, UploadTask } from "@/types";
import { uploadSheet, type SheetUploadDeps } from "@/sheets/uploadSheet";
import { MemoryBlobStore } from "@/storage";
import { compileTemplate } from "@/utils";
import { CancelledError, TemplateError, WriteError } from "@/errors";
import { silentLogger } from "@/logger";
import { makeSheet } from "../helpers/uploadFixtures";

function depsFor(store: BlobStore, useCrlf = false): SheetUploadDeps {
  return {
    fileTemplate: compileTemplate(
      "filename",
      "{{properties.index}} {{properties.title}}.csv",
    ),
    store,
    writeOptions: { cacheControl: "max-age=900,public", contentType: "text/csv" },
    useCrlf,
    logger: silentLogger,
  };
}

const task: UploadTask = {
  sheet: makeSheet(0, "Q1", [
    ["Region", "Total"],
    ["North", "10"],
  ]),
  directory: "Reports",
};

describe("uploadSheet", () => {
  it("writes a new sheet and reports its path as changed", async () => {
    const store = new MemoryBlobStore();

    const upload = await uploadSheet(task, depsFor(store));

    expect(upload).toEqual({
      path: "Reports/0 Q1.csv",
      outcome: "written",
      changedPath: "Reports/0 Q1.csv",
    });
    expect(store.read("Reports/0 Q1.csv")?.toString("utf-8")).toBe(
      "Region,Total\nNorth,10\n",
    );
    const attributes = await store.getAttributes("Reports/0 Q1.csv");
    expect(attributes.cacheControl).toBe("max-age=900,public");
    expect(attributes.contentType).toBe("text/csv");
  });

  it("skips a sheet whose content is already stored", async () => {
    const store = new MemoryBlobStore();
    await uploadSheet(task, depsFor(store));
    const writeAll = vi.spyOn(store, "writeAll");

    const upload = await uploadSheet(task, depsFor(store));

    expect(upload).toEqual({
      path: "Reports/0 Q1.csv",
      outcome: "skipped",
      changedPath: null,
    });
    expect(writeAll).not.toHaveBeenCalled();
  });

  it("rewrites when the line terminator changes", async () => {
    const store = new MemoryBlobStore();
    await uploadSheet(task, depsFor(store));

    const upload = await uploadSheet(task, depsFor(store, true));

    expect(upload.outcome).toBe("written");
    expect(store.read("Reports/0 Q1.csv")?.toString("utf-8")).toBe(
      "Region,Total\r\nNorth,10\r\n",
    );
  });

  it("writes an empty object for a sheet with only blank rows", async () => {
    const store = new MemoryBlobStore();
    const blank: UploadTask = {
      sheet: makeSheet(2, "Empty", [["", ""]]),
      directory: "",
    };

    const upload = await uploadSheet(blank, depsFor(store));

    expect(upload.path).toBe("2 Empty.csv");
    expect(store.read("2 Empty.csv")?.length).toBe(0);
  });

  it("does not start a write once the run is cancelled", async () => {
    const store = new MemoryBlobStore();
    const controller = new AbortController();
    controller.abort();

    await expect(
      uploadSheet(task, depsFor(store), controller.signal),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(store.keys()).toEqual([]);
  });

  it("wraps store failures in a WriteError carrying the path", async () => {
    const store = new MemoryBlobStore();
    vi.spyOn(store, "writeAll").mockRejectedValue(new Error("disk full"));

    const failure = await uploadSheet(task, depsFor(store)).catch(
      (error: unknown) => error,
    );

    expect(failure).toBeInstanceOf(WriteError);
    if (failure instanceof WriteError) {
      expect(failure.path).toBe("Reports/0 Q1.csv");
      expect(failure.message).toBe(
        "could not write Reports/0 Q1.csv to mem://: disk full",
      );
    }
  });

  it("fails with a TemplateError when the file name cannot be rendered", async () => {
    const store = new MemoryBlobStore();
    const deps = {
      ...depsFor(store),
      fileTemplate: compileTemplate("filename", "{{properties.missing}}.csv"),
    };

    await expect(uploadSheet(task, deps)).rejects.toBeInstanceOf(TemplateError);
    expect(store.keys()).toEqual([]);
  });
});
