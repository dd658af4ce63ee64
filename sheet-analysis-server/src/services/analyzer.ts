// src/services/analyzer.ts
import path from "node:path";
import { execa } from "execa";
import type { AnalyzerConfig } from "../config";
import { RESULTS_FILENAME } from "../lib/storage";

export type AnalyzerFailureKind = "exit" | "timeout" | "spawn";

export type AnalyzerOutcome =
  | { ok: true; stdout: string; stderr: string }
  | {
      ok: false;
      kind: AnalyzerFailureKind;
      exitCode: number | null;
      reason: string;
      stdout: string;
      stderr: string;
    };

/**
 * Turns a saved spreadsheet into `analysis_results.json` inside `workDir`.
 */
export interface Analyzer {
  analyze(filePath: string, workDir: string): Promise<AnalyzerOutcome>;
}

/**
 * Runs `<command> [script] <filePath>` with `workDir` as its working
 * directory, so each run writes its own `./analysis_results.json`. The same
 * path is exported as ANALYSIS_RESULTS_PATH. Output is captured verbatim;
 * stdin is closed.
 */
export function createProcessAnalyzer(config: AnalyzerConfig): Analyzer {
  return {
    async analyze(filePath, workDir) {
      const args = config.script ? [config.script, filePath] : [filePath];
      const result = await execa(config.command, args, {
        cwd: workDir,
        env: { ANALYSIS_RESULTS_PATH: path.join(workDir, RESULTS_FILENAME) },
        stdin: "ignore",
        timeout: config.timeoutMs,
        maxBuffer: config.maxOutputBytes,
        stripFinalNewline: false,
        reject: false,
      });

      const stdout = result.stdout ?? "";
      const stderr = result.stderr ?? "";

      if (!result.failed) return { ok: true, stdout, stderr };

      const reason =
        "shortMessage" in result && typeof result.shortMessage === "string"
          ? result.shortMessage
          : `${config.command} failed`;

      if (result.timedOut) {
        return { ok: false, kind: "timeout", exitCode: null, reason, stdout, stderr };
      }
      // Node tags errors from starting the child with syscall "spawn <file>".
      const spawnFailed =
        "syscall" in result && typeof result.syscall === "string" && result.syscall.startsWith("spawn");
      if (spawnFailed) {
        return { ok: false, kind: "spawn", exitCode: null, reason, stdout, stderr };
      }
      // Everything else ran: non-zero exit, a signal, or output over maxBuffer.
      const exitCode = typeof result.exitCode === "number" ? result.exitCode : null;
      return { ok: false, kind: "exit", exitCode, reason, stdout, stderr };
    },
  };
}
