// src/app.ts
import cors from "cors";
import express, { type Express } from "express";
import historyRouter from "./routes/history";
import uploadRouter from "./routes/upload";
import type { Analyzer } from "./services/analyzer";

export type AppOptions = {
  root: string;
  analyzer: Analyzer;
  /** Paths uploads must never overwrite (the analyzer command and script). */
  protectedPaths?: readonly string[];
  maxUploadBytes: number;
  now?: () => Date;
};

export function createApp(opts: AppOptions): Express {
  const app = express();
  app.disable("x-powered-by");

  // Every response gets Allow-Origin; any OPTIONS ends here with a 204.
  app.use(
    cors({
      origin: "*",
      methods: "POST, GET, OPTIONS",
      allowedHeaders: "Content-Type",
    })
  );

  app.use("/", uploadRouter(opts));
  app.use("/", historyRouter(opts.root));

  app.post("*", (_req, res) => {
    res.status(404).json({ success: false, message: "Unknown POST endpoint" });
  });

  app.use(express.static(opts.root));

  return app;
}
