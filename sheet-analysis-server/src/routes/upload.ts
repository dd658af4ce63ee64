import { Router } from "express";
import {
  ErrorCodeDescriptions,
  ErrorCodes,
  UploadRequestError,
  errorMessage,
} from "../errors";
import { isMultipart, readMultipartForm } from "../lib/multipart";
import type { Analyzer } from "../services/analyzer";
import { runUploadWorkflow, type IncomingUpload } from "../services/uploadWorkflow";

export type UploadRouteOptions = {
  root: string;
  analyzer: Analyzer;
  protectedPaths?: readonly string[];
  maxUploadBytes: number;
  now?: () => Date;
};

export default function uploadRouter(opts: UploadRouteOptions): Router {
  const router = Router();

  router.post("/upload", async (req, res) => {
    try {
      if (!isMultipart(req.headers["content-type"])) {
        throw new UploadRequestError(400, ErrorCodes.INVALID_CONTENT_TYPE);
      }

      const form = await readMultipartForm(req, { maxFileBytes: opts.maxUploadBytes });

      // A `file` part sent without a filename arrives as a plain field.
      const part = form.files.get("file");
      const text = form.fields.get("file");
      let upload: IncomingUpload;
      if (part) upload = { filename: part.filename, data: part.data };
      else if (text !== undefined) upload = { filename: "", data: Buffer.from(text, "utf8") };
      else throw new UploadRequestError(400, ErrorCodes.MISSING_FILE_FIELD);

      const result = await runUploadWorkflow(upload, {
        root: opts.root,
        analyzer: opts.analyzer,
        protectedPaths: opts.protectedPaths,
        now: opts.now,
      });
      res.status(result.status).json(result.body);
    } catch (err) {
      if (err instanceof UploadRequestError) {
        console.warn(`[upload] rejected (${err.code}): ${err.message}`);
        res.status(err.status).json({ success: false, message: err.message });
        return;
      }

      const msg = errorMessage(err);
      console.error(`[upload] ${ErrorCodes.UPLOAD_FAILED}:`, msg);
      res.status(500).json({
        success: false,
        message: `${ErrorCodeDescriptions[ErrorCodes.UPLOAD_FAILED]}: ${msg}`,
      });
    }
  });

  return router;
}
