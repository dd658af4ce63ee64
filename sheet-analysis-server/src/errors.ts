// src/errors.ts
// Request-level error codes for the upload and history endpoints.

export const ErrorCodes = {
  INVALID_CONTENT_TYPE: "E400",
  MISSING_FILE_FIELD: "E401",
  FILE_TOO_LARGE: "E413",

  ANALYZER_EXIT: "E501",
  ANALYZER_TIMEOUT: "E502",
  ANALYZER_SPAWN: "E503",

  UPLOAD_FAILED: "E590",
  HISTORY_LIST_FAILED: "E591",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const ErrorCodeDescriptions: Record<ErrorCode, string> = {
  [ErrorCodes.INVALID_CONTENT_TYPE]: "Invalid content type",
  [ErrorCodes.MISSING_FILE_FIELD]: "Missing file field",
  [ErrorCodes.FILE_TOO_LARGE]: "File too large",

  [ErrorCodes.ANALYZER_EXIT]: "analysis failed",
  [ErrorCodes.ANALYZER_TIMEOUT]: "analysis timed out",
  [ErrorCodes.ANALYZER_SPAWN]: "analyzer could not be started",

  [ErrorCodes.UPLOAD_FAILED]: "upload or analysis failed",
  [ErrorCodes.HISTORY_LIST_FAILED]: "history listing failed",
};

/** A client error on POST /upload; the message goes to the client as-is. */
export class UploadRequestError extends Error {
  readonly status: 400 | 413;
  readonly code: ErrorCode;

  constructor(status: 400 | 413, code: ErrorCode) {
    super(ErrorCodeDescriptions[code]);
    this.name = "UploadRequestError";
    this.status = status;
    this.code = code;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
