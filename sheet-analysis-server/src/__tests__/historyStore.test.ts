import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { listHistory } from "../services/historyStore";

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "history-store-"));
});

afterEach(async () => {
  await fs.remove(root);
});

async function writeEntry(name: string, mtime: Date): Promise<void> {
  const file = path.join(root, "history", name);
  await fs.outputFile(file, "{}");
  await fs.utimes(file, mtime, mtime);
}

describe("listHistory", () => {
  it("treats a missing history directory as empty", async () => {
    expect(await listHistory(root)).toEqual([]);
  });

  it("lists json entries newest first with local timestamps", async () => {
    await writeEntry("march_20240301-081500.json", new Date(2024, 2, 1, 8, 15, 0));
    await writeEntry("may_20240502-093000.json", new Date(2024, 4, 2, 9, 30, 0));
    await writeEntry("april_20240410-120000.json", new Date(2024, 3, 10, 12, 0, 0));

    expect(await listHistory(root)).toEqual([
      {
        name: "may_20240502-093000.json",
        url: "/history/may_20240502-093000.json",
        timestamp: "2024-05-02 09:30:00",
      },
      {
        name: "april_20240410-120000.json",
        url: "/history/april_20240410-120000.json",
        timestamp: "2024-04-10 12:00:00",
      },
      {
        name: "march_20240301-081500.json",
        url: "/history/march_20240301-081500.json",
        timestamp: "2024-03-01 08:15:00",
      },
    ]);
  });

  it("skips non-json files, hidden files and directories", async () => {
    const when = new Date(2024, 0, 1, 0, 0, 0);
    await writeEntry("kept.json", when);
    await writeEntry("notes.txt", when);
    await writeEntry(".draft.json", when);
    await fs.ensureDir(path.join(root, "history", "nested.json"));

    const names = (await listHistory(root)).map((item) => item.name);
    expect(names).toEqual(["kept.json"]);
  });

  it("orders equal modification times by name", async () => {
    const when = new Date(2024, 0, 1, 0, 0, 0);
    await writeEntry("b.json", when);
    await writeEntry("a.json", when);

    const names = (await listHistory(root)).map((item) => item.name);
    expect(names).toEqual(["a.json", "b.json"]);
  });
});
