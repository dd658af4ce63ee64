// src/config.ts
import path from "node:path";

export interface AnalyzerConfig {
  command: string;        // executable, e.g. "python3"
  script: string | null;  // absolute path passed before the upload, or none
  timeoutMs: number;
  maxOutputBytes: number; // per stream
}

export interface ServerConfig {
  port: number;
  root: string;           // storage root: uploads, analysis_results.json, history/
  maxUploadBytes: number;
  analyzer: AnalyzerConfig;
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_ANALYZER_COMMAND = "python3";
export const DEFAULT_ANALYZER_SCRIPT = "process_data.py";
export const DEFAULT_ANALYZER_TIMEOUT_MS = 5 * 60 * 1000;
export const DEFAULT_ANALYZER_MAX_OUTPUT_BYTES = 100_000_000;
export const DEFAULT_MAX_UPLOAD_BYTES = 100 * 1024 * 1024;

type Env = Record<string, string | undefined>;

export function parsePort(raw: string | undefined): number | null {
  const s = String(raw ?? "").trim();
  if (!/^\d+$/.test(s)) return null;
  const port = Number(s);
  return port >= 1 && port <= 65535 ? port : null;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const s = String(raw ?? "").trim();
  if (!/^\d+$/.test(s)) return fallback;
  const n = Number(s);
  return Number.isSafeInteger(n) && n > 0 ? n : fallback;
}

/**
 * Builds the server config from CLI arguments (without the node/script
 * entries) and the environment.
 *
 * Port precedence: first positional argument, then `PORT`, then 8000.
 */
export function loadConfig(argv: string[], env: Env, cwd: string): ServerConfig {
  const port = parsePort(argv[0]) ?? parsePort(env.PORT) ?? DEFAULT_PORT;
  const root = path.resolve(cwd, env.SHEET_ROOT?.trim() || ".");

  // A command given as a path is pinned to cwd; bare names go through PATH.
  const rawCommand = env.ANALYZER_COMMAND?.trim() || DEFAULT_ANALYZER_COMMAND;
  const command = /[\\/]/.test(rawCommand) ? path.resolve(cwd, rawCommand) : rawCommand;
  // An explicitly empty ANALYZER_SCRIPT means the command is the analyzer itself.
  // Resolved against cwd, not the writable storage root.
  const rawScript = env.ANALYZER_SCRIPT ?? DEFAULT_ANALYZER_SCRIPT;
  const script = rawScript.trim() ? path.resolve(cwd, rawScript.trim()) : null;

  return {
    port,
    root,
    maxUploadBytes: positiveInt(env.UPLOAD_MAX_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
    analyzer: {
      command,
      script,
      timeoutMs: positiveInt(env.ANALYZER_TIMEOUT_MS, DEFAULT_ANALYZER_TIMEOUT_MS),
      maxOutputBytes: positiveInt(env.ANALYZER_MAX_OUTPUT_BYTES, DEFAULT_ANALYZER_MAX_OUTPUT_BYTES),
    },
  };
}
