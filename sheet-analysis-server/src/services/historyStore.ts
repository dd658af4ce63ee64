// src/services/historyStore.ts
import path from "node:path";
import fs from "fs-extra";
import { formatDisplayTimestamp } from "../lib/format";
import { historyDir, historyUrl } from "../lib/storage";

export type HistoryItem = {
  name: string;
  url: string;
  timestamp: string;
};

/**
 * Lists `history/*.json`, most recently modified first. A missing history
 * directory is an empty history.
 */
export async function listHistory(root: string): Promise<HistoryItem[]> {
  const dir = historyDir(root);
  if (!(await fs.pathExists(dir))) return [];

  const names = (await fs.readdir(dir))
    .filter((n) => n.endsWith(".json") && !n.startsWith("."))
    .sort();

  const entries = await Promise.all(
    names.map(async (name) => ({ name, stat: await fs.stat(path.join(dir, name)) }))
  );

  return entries
    .filter((e) => e.stat.isFile())
    .sort((a, b) => b.stat.mtimeMs - a.stat.mtimeMs)
    .map((e) => ({
      name: e.name,
      url: historyUrl(e.name),
      timestamp: formatDisplayTimestamp(e.stat.mtime),
    }));
}
