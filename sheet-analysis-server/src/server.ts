// sheet-analysis-server/src/server.ts
// Usage: tsx src/server.ts [port]
import path from "node:path";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createProcessAnalyzer } from "./services/analyzer";

const config = loadConfig(process.argv.slice(2), process.env, process.cwd());

const app = createApp({
  root: config.root,
  analyzer: createProcessAnalyzer(config.analyzer),
  protectedPaths: [config.analyzer.command, config.analyzer.script].filter(
    (p): p is string => p !== null && path.isAbsolute(p)
  ),
  maxUploadBytes: config.maxUploadBytes,
});

app.listen(config.port, () =>
  console.log(`Serving at http://localhost:${config.port}/ (root: ${config.root})`)
);
