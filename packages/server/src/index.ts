/**
 * Mailpaste server: entry point.
 *
 * Hono on @hono/node-server. Images are rehosted into an S3-compatible
 * bucket (Cloudflare R2), or a local directory in development.
 */

import { config as loadEnv } from "dotenv";
import { resolve } from "node:path";
// Load .env from the repository root (npm workspaces run from the package dir), then the package dir.
loadEnv({ path: resolve(process.cwd(), "../../.env") });
loadEnv();
import { serve } from "@hono/node-server";
import { assertStorageConfig, loadConfig } from "./lib/config.js";
import { createPipeline } from "./lib/pipeline.js";
import { createApp } from "./app.js";

const config = loadConfig();
assertStorageConfig(config);

const pipeline = createPipeline(config, console);
await pipeline.encoders.probe();

const app = createApp({
  config,
  assets: pipeline.assets,
  transformer: pipeline.transformer,
  fsStore: pipeline.fsStore,
  logger: console,
});

console.log(`📨 Mailpaste server starting on http://localhost:${config.port} (storage: ${config.storage.driver})`);
const server = serve({ fetch: app.fetch, port: config.port });

let shuttingDown = false;
function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`🛑 ${signal} received, shutting down`);
  server.close(() => {
    pipeline
      .close()
      .catch((err: unknown) => console.error("error while closing pipeline:", err))
      .finally(() => process.exit(0));
  });
  setTimeout(() => process.exit(1), 10_000).unref();
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
