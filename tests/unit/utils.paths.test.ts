import { describe, it, expect } from "vitest";
import { joinStoragePath } from "@/utils";

describe("joinStoragePath", () => {
  it("joins directory and file with a slash", () => {
    expect(joinStoragePath("Reports", "0 Q1.csv")).toBe("Reports/0 Q1.csv");
  });

  it("returns the file alone for an empty or current directory", () => {
    expect(joinStoragePath("", "a.csv")).toBe("a.csv");
    expect(joinStoragePath(".", "a.csv")).toBe("a.csv");
  });

  it("collapses doubled separators and strips leading ones", () => {
    expect(joinStoragePath("/root/", "/x.csv")).toBe("root/x.csv");
    expect(joinStoragePath("a//b", "c.csv")).toBe("a/b/c.csv");
  });
});
