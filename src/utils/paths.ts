/**
 * Storage path helpers
 */

import path from "path";

/**
 * Join a directory and a file name into a store key
 *
 * Uses "/" separators, collapses doubled separators and strips leading ones,
 * so "Reports/" + "0 Q1.csv" and "Reports" + "/0 Q1.csv" give the same key.
 */
export function joinStoragePath(directory: string, file: string): string {
  const joined = path.posix.join(directory, file);
  return joined.replace(/^(\.\/|\/)+/, "");
}
