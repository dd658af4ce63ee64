import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { createProcessAnalyzer } from "../services/analyzer";

// Small Node programs standing in for the external analyzer.
const SCRIPTS = {
  "writes-results.mjs": `
import { writeFileSync } from "node:fs";
writeFileSync("analysis_results.json", JSON.stringify({
  input: process.argv[2],
  target: process.env.ANALYSIS_RESULTS_PATH,
}));
process.stdout.write("done\\n");
`,
  "fails.mjs": `
process.stdout.write("partial\\n");
process.stderr.write("bad sheet\\n");
process.exit(3);
`,
  "hangs.mjs": `
setTimeout(() => {}, 30000);
`,
  "reads-stdin.mjs": `
let bytes = 0;
process.stdin.on("data", (chunk) => { bytes += chunk.length; });
process.stdin.on("end", () => process.stdout.write("read " + bytes + "\\n"));
`,
  "chatty.mjs": `
process.stdout.write("x".repeat(4096));
`,
};

let scriptsDir: string;
let workDir: string;

beforeEach(async () => {
  scriptsDir = await fs.mkdtemp(path.join(os.tmpdir(), "analyzer-scripts-"));
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), "analyzer-work-"));
  for (const [name, source] of Object.entries(SCRIPTS)) {
    await fs.writeFile(path.join(scriptsDir, name), source);
  }
});

afterEach(async () => {
  await fs.remove(scriptsDir);
  await fs.remove(workDir);
});

function analyzerFor(script: string, timeoutMs = 10_000, maxOutputBytes = 1_000_000) {
  return createProcessAnalyzer({
    command: process.execPath,
    script: path.join(scriptsDir, script),
    timeoutMs,
    maxOutputBytes,
  });
}

describe("createProcessAnalyzer", () => {
  it("runs in the work directory and passes the file path last", async () => {
    const outcome = await analyzerFor("writes-results.mjs").analyze("/uploads/sales.xlsx", workDir);

    expect(outcome).toEqual({ ok: true, stdout: "done\n", stderr: "" });
    expect(await fs.readJson(path.join(workDir, "analysis_results.json"))).toEqual({
      input: "/uploads/sales.xlsx",
      target: path.join(workDir, "analysis_results.json"),
    });
  });

  it("reports a non-zero exit with verbatim output", async () => {
    const outcome = await analyzerFor("fails.mjs").analyze("/uploads/sales.xlsx", workDir);

    expect(outcome).toMatchObject({
      ok: false,
      kind: "exit",
      exitCode: 3,
      stdout: "partial\n",
      stderr: "bad sheet\n",
    });
  });

  it("kills the process and reports a timeout", async () => {
    const outcome = await analyzerFor("hangs.mjs", 300).analyze("/uploads/sales.xlsx", workDir);

    expect(outcome).toMatchObject({ ok: false, kind: "timeout", exitCode: null });
  }, 10_000);

  it("gives the analyzer an empty, closed stdin", async () => {
    const outcome = await analyzerFor("reads-stdin.mjs", 5_000).analyze("/uploads/sales.xlsx", workDir);

    expect(outcome).toEqual({ ok: true, stdout: "read 0\n", stderr: "" });
  }, 10_000);

  it("treats output over the buffer limit as a failed run, not a spawn failure", async () => {
    const outcome = await analyzerFor("chatty.mjs", 10_000, 1024).analyze("/uploads/sales.xlsx", workDir);

    expect(outcome).toMatchObject({ ok: false, kind: "exit" });
  });

  it("reports a command that cannot be started", async () => {
    const analyzer = createProcessAnalyzer({
      command: path.join(scriptsDir, "no-such-analyzer"),
      script: null,
      timeoutMs: 10_000,
      maxOutputBytes: 1_000_000,
    });

    const outcome = await analyzer.analyze("/uploads/sales.xlsx", workDir);

    expect(outcome).toMatchObject({ ok: false, kind: "spawn", exitCode: null });
  });
});
