/**
 * Hono application: middleware, health and config endpoints, and the
 * asset and HTML routes. Built from injected services so tests can drive
 * it through app.request() without a network.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { secureHeaders } from "hono/secure-headers";
import { logger as requestLogger } from "hono/logger";
import type { Config } from "./lib/config.js";
import type { AssetService } from "./lib/assets.js";
import type { HtmlTransformer } from "./lib/html-transform.js";
import type { FsObjectStore } from "./lib/storage/fs.js";
import { getLocale, t } from "./lib/i18n.js";
import type { Logger } from "./lib/logger.js";
import { rateLimiter } from "./middleware/rate-limit.js";
import { assetRoutes } from "./routes/assets.js";
import { htmlRoutes } from "./routes/html.js";
import { serveAssetsRoutes } from "./routes/serve-assets.js";
import { errorResponse } from "./routes/errors.js";

export const VERSION = "0.1.0";

export interface AppDeps {
  config: Config;
  assets: AssetService;
  transformer: HtmlTransformer;
  /** Present with STORAGE_DRIVER=fs; exposes stored objects at /assets. */
  fsStore?: FsObjectStore;
  logger: Logger;
}

/** Largest request body a route accepts. Payload limits proper are enforced by the pipeline. */
function bodyLimitFor(path: string, config: Config): number {
  // JSON string escaping can double HTML; base64 adds a third to image bytes.
  if (path.startsWith("/api/html")) return config.maxHtmlBytes * 2;
  if (path.startsWith("/api/assets/batch")) return Math.ceil(config.fetch.maxBytes * 1.4) * 2;
  if (path.startsWith("/api/assets")) return Math.ceil(config.fetch.maxBytes * 1.4);
  return 1024 * 1024;
}

export function createApp(deps: AppDeps): Hono {
  const { config, logger } = deps;
  const app = new Hono();

  app.use("*", requestLogger((message, ...rest) => logger.log(`[http] ${message}`, ...rest)));
  app.use("*", secureHeaders());

  app.use("*", async (c, next) => {
    const contentLength = parseInt(c.req.header("content-length") || "0", 10);
    if (contentLength > bodyLimitFor(c.req.path, config)) {
      return c.json({ error: t(getLocale(c), "common.body_too_large"), code: "PayloadTooLarge" }, 413);
    }
    await next();
  });

  const allowedOrigins = config.appBaseUrl.split(",").map((o) => o.trim());
  app.use(
    "/api/*",
    cors({
      origin: (origin) => (allowedOrigins.includes(origin) ? origin : ""),
      allowMethods: ["GET", "POST", "OPTIONS"],
    }),
  );

  // Every asset call may fetch and re-encode; keep a single client from hogging the encoder.
  app.use("/api/assets/*", rateLimiter({ windowMs: 60_000, max: 60, trustedProxy: config.trustedProxy }));
  app.use("/api/html/*", rateLimiter({ windowMs: 60_000, max: 30, trustedProxy: config.trustedProxy }));

  app.get("/healthz", (c) => c.json({ status: "ok", timestamp: new Date().toISOString(), version: VERSION }));
  app.get("/api/config", (c) => c.json({ cdnBaseUrl: config.storage.publicBaseUrl }));

  app.route("/api/assets", assetRoutes(deps.assets, logger));
  app.route("/api/html", htmlRoutes(deps.transformer, logger));
  if (deps.fsStore) {
    app.route("/assets", serveAssetsRoutes(deps.fsStore));
  }

  app.notFound((c) => c.json({ error: t(getLocale(c), "common.not_found") }, 404));
  app.onError((err, c) => errorResponse(c, err, logger));

  return app;
}
