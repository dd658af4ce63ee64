// src/services/uploadWorkflow.ts
// Save → analyze → publish → archive, for one uploaded spreadsheet.
import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { ErrorCodeDescriptions, ErrorCodes, errorMessage } from "../errors";
import { formatCompactTimestamp } from "../lib/format";
import {
  RESULTS_FILENAME,
  historyDir,
  historyFilename,
  historyUrl,
  latestResultsPath,
  reservedNames,
  sanitizeFilename,
} from "../lib/storage";
import type { Analyzer, AnalyzerFailureKind } from "./analyzer";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type StepOutcome = { ok: true } | { ok: false; reason: string };

export type Diagnostics = {
  results?: string;
  latest?: string;
  history?: string;
};

export type UploadSuccess = {
  success: true;
  message: string;
  filename: string;
  size: number;
  summary: JsonValue;
  history_file: string;
  history_timestamp: string;
  diagnostics?: Diagnostics;
};

export type AnalysisFailure = {
  success: false;
  message: string;
  failure: AnalyzerFailureKind;
  exit_code: number | null;
  stderr: string;
  stdout: string;
};

export type WorkflowResult =
  | { status: 200; body: UploadSuccess }
  | { status: 500; body: AnalysisFailure };

export interface WorkflowDeps {
  root: string;
  analyzer: Analyzer;
  /** Files an upload must not overwrite, such as the analyzer script. */
  protectedPaths?: readonly string[];
  now?: () => Date;
}

export type IncomingUpload = {
  filename: string;
  data: Buffer;
};

const FAILURE_MESSAGES: Record<AnalyzerFailureKind, string> = {
  exit: ErrorCodeDescriptions[ErrorCodes.ANALYZER_EXIT],
  timeout: ErrorCodeDescriptions[ErrorCodes.ANALYZER_TIMEOUT],
  spawn: ErrorCodeDescriptions[ErrorCodes.ANALYZER_SPAWN],
};

type ResultsRead = {
  raw: Buffer | null;
  summary: JsonValue;
  outcome: StepOutcome;
};

function isJsonObject(v: JsonValue): v is { [key: string]: JsonValue } {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

async function readResults(file: string): Promise<ResultsRead> {
  if (!(await fs.pathExists(file))) {
    return { raw: null, summary: {}, outcome: { ok: false, reason: `${RESULTS_FILENAME} was not written` } };
  }
  let raw: Buffer;
  try {
    raw = await fs.readFile(file);
  } catch (err) {
    return { raw: null, summary: {}, outcome: { ok: false, reason: `unreadable: ${errorMessage(err)}` } };
  }
  try {
    const doc: JsonValue = JSON.parse(raw.toString("utf8"));
    const summary = isJsonObject(doc) ? doc.data_summary : undefined;
    return { raw, summary: summary === undefined ? {} : summary, outcome: { ok: true } };
  } catch (err) {
    return { raw, summary: {}, outcome: { ok: false, reason: `invalid JSON: ${errorMessage(err)}` } };
  }
}

async function attempt(step: () => Promise<void>): Promise<StepOutcome> {
  try {
    await step();
    return { ok: true };
  } catch (err) {
    return { ok: false, reason: errorMessage(err) };
  }
}

export async function runUploadWorkflow(
  upload: IncomingUpload,
  deps: WorkflowDeps
): Promise<WorkflowResult> {
  const now = deps.now ?? (() => new Date());
  const filename = sanitizeFilename(upload.filename, reservedNames(deps.root, deps.protectedPaths));
  const savePath = path.join(deps.root, filename);

  await fs.writeFile(savePath, upload.data);

  const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "sheet-analysis-"));
  try {
    const outcome = await deps.analyzer.analyze(savePath, workDir);
    if (!outcome.ok) {
      console.error(`[upload] analyzer ${outcome.kind} for ${filename}: ${outcome.reason}`);
      return {
        status: 500,
        body: {
          success: false,
          message: FAILURE_MESSAGES[outcome.kind],
          failure: outcome.kind,
          exit_code: outcome.exitCode,
          stderr: outcome.stderr,
          stdout: outcome.stdout,
        },
      };
    }

    const results = await readResults(path.join(workDir, RESULTS_FILENAME));
    const at = now();
    const historyName = historyFilename(filename, at);
    const { raw } = results;

    const latest: StepOutcome = raw
      ? await attempt(() => fs.writeFile(latestResultsPath(deps.root), raw))
      : { ok: false, reason: "no results to publish" };

    const history = await attempt(async () => {
      await fs.ensureDir(historyDir(deps.root));
      if (!raw) throw new Error("no results to archive");
      await fs.writeFile(path.join(historyDir(deps.root), historyName), raw);
    });

    const diagnostics: Diagnostics = {};
    if (!results.outcome.ok) diagnostics.results = results.outcome.reason;
    if (!latest.ok) diagnostics.latest = latest.reason;
    if (!history.ok) diagnostics.history = history.reason;
    for (const [step, reason] of Object.entries(diagnostics)) {
      console.warn(`[upload] ${filename}: ${step} step skipped: ${reason}`);
    }

    console.log(`[upload] ${filename} (${upload.data.length} bytes) analyzed → ${historyName}`);

    const body: UploadSuccess = {
      success: true,
      message: "upload and analysis complete",
      filename,
      size: upload.data.length,
      summary: results.summary,
      history_file: historyUrl(historyName),
      history_timestamp: formatCompactTimestamp(at),
    };
    if (Object.keys(diagnostics).length > 0) body.diagnostics = diagnostics;
    return { status: 200, body };
  } finally {
    await fs.remove(workDir).catch((err: unknown) =>
      console.warn(`[upload] could not remove ${workDir}: ${errorMessage(err)}`)
    );
  }
}
