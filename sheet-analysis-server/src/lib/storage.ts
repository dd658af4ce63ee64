// src/lib/storage.ts
// Names and locations of everything the server writes under its storage root.
import path from "node:path";
import { formatCompactTimestamp } from "./format";

export const DEFAULT_UPLOAD_FILENAME = "uploaded_file.xlsx";
export const RESULTS_FILENAME = "analysis_results.json";
export const HISTORY_DIRNAME = "history";

// Root entries an upload must never replace.
export const RESERVED_NAMES: readonly string[] = [
  RESULTS_FILENAME,
  HISTORY_DIRNAME,
  "index.html",
  "upload.html",
];

const RESERVED_PREFIX = "upload_";

/**
 * Lower-cased names uploads may not take: {@link RESERVED_NAMES} plus the
 * base name of every protected path (analyzer command or script) that sits
 * directly in `root`.
 */
export function reservedNames(root: string, protectedPaths: readonly string[] = []): Set<string> {
  const names = new Set(RESERVED_NAMES.map((n) => n.toLowerCase()));
  const absRoot = path.resolve(root);
  for (const p of protectedPaths) {
    const abs = path.resolve(p);
    if (path.dirname(abs) === absRoot) names.add(path.basename(abs).toLowerCase());
  }
  return names;
}

/**
 * Reduces a client-supplied filename to a single path segment made of
 * letters, digits, `.`, `_` and `-`. Directory parts are dropped, anything
 * else becomes `_`, and leading dots are removed so the result is never
 * hidden, `.` or `..`. A reserved result is prefixed with `upload_`.
 */
export function sanitizeFilename(
  name: string,
  reserved: ReadonlySet<string> = new Set(RESERVED_NAMES)
): string {
  const base = path.posix.basename(name.replace(/\\/g, "/"));
  const cleaned = base.replace(/[^\p{L}\p{N}._-]/gu, "_").replace(/^\.+/, "");
  const safe = cleaned || DEFAULT_UPLOAD_FILENAME;
  return reserved.has(safe.toLowerCase()) ? `${RESERVED_PREFIX}${safe}` : safe;
}

/** Filename without its last extension: `sales.2024.xlsx` → `sales.2024`. */
export function stem(filename: string): string {
  return path.parse(filename).name;
}

export function historyFilename(uploadedFilename: string, at: Date): string {
  return `${stem(uploadedFilename)}_${formatCompactTimestamp(at)}.json`;
}

export function historyUrl(name: string): string {
  return `/${HISTORY_DIRNAME}/${encodeURIComponent(name)}`;
}

export const historyDir = (root: string) => path.join(root, HISTORY_DIRNAME);
export const latestResultsPath = (root: string) => path.join(root, RESULTS_FILENAME);
