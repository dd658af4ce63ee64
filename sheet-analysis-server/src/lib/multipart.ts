// src/lib/multipart.ts
import type { IncomingMessage } from "node:http";
import Busboy from "busboy";
import { ErrorCodes, UploadRequestError } from "../errors";

export type FormFile = {
  filename: string;
  mimeType: string;
  data: Buffer;
};

export type MultipartForm = {
  files: Map<string, FormFile>;
  fields: Map<string, string>;
};

export function isMultipart(contentType: string | undefined): boolean {
  return String(contentType ?? "").toLowerCase().startsWith("multipart/form-data");
}

/**
 * Reads a whole multipart/form-data body into memory. The first part wins
 * when a name repeats. A file or field part over `maxFileBytes` rejects with
 * a 413 UploadRequestError.
 */
export function readMultipartForm(
  req: IncomingMessage,
  opts: { maxFileBytes: number }
): Promise<MultipartForm> {
  return new Promise((resolve, reject) => {
    const form: MultipartForm = { files: new Map(), fields: new Map() };
    const bb = Busboy({
      headers: req.headers,
      limits: { fileSize: opts.maxFileBytes, fieldSize: opts.maxFileBytes },
    });

    bb.on("file", (name, stream, info) => {
      const chunks: Buffer[] = [];
      stream.on("data", (chunk: Buffer) => chunks.push(chunk));
      stream.on("limit", () => reject(new UploadRequestError(413, ErrorCodes.FILE_TOO_LARGE)));
      stream.on("end", () => {
        if (form.files.has(name)) return;
        form.files.set(name, {
          filename: info.filename,
          mimeType: info.mimeType || "application/octet-stream",
          data: Buffer.concat(chunks),
        });
      });
    });

    bb.on("field", (name, value, info) => {
      if (info.valueTruncated) {
        reject(new UploadRequestError(413, ErrorCodes.FILE_TOO_LARGE));
        return;
      }
      if (!form.fields.has(name)) form.fields.set(name, value);
    });

    bb.on("error", reject);
    bb.on("close", () => resolve(form));
    req.on("error", reject);

    req.pipe(bb);
  });
}
