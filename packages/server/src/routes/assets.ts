/**
 * Asset routes.
 *
 * POST /api/assets        — JSON { url } | { dataUri }, or multipart with a `file` field
 * POST /api/assets/batch  — JSON { items: [{ url?, dataUri?, data? (base64), contentType? }] }
 */

import { Hono, type Context } from "hono";
import type { BatchInput } from "@mailpaste/core";
import type { AssetService } from "../lib/assets.js";
import type { Logger } from "../lib/logger.js";
import { errorResponse, invalidRequest } from "./errors.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

export async function readJson(c: Context): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw invalidRequest("request body must be valid JSON");
  }
  if (!isRecord(body)) throw invalidRequest("request body must be a JSON object");
  return body;
}

/** Batch items arrive as JSON, so raw bytes travel base64-encoded. */
export function parseBatchItem(value: unknown, index: number): BatchInput {
  if (!isRecord(value)) throw invalidRequest(`item ${index} must be an object`);
  const data = optionalString(value.data);
  return {
    url: optionalString(value.url),
    dataUri: optionalString(value.dataUri),
    data: data ? new Uint8Array(Buffer.from(data, "base64")) : undefined,
    contentType: optionalString(value.contentType),
  };
}

export function assetRoutes(service: AssetService, logger: Logger): Hono {
  const router = new Hono();

  router.post("/", async (c) => {
    const signal = c.req.raw.signal;
    try {
      if ((c.req.header("content-type") ?? "").includes("multipart/form-data")) {
        const body = await c.req.parseBody();
        const file = body["file"];
        if (!(file instanceof File)) {
          throw invalidRequest("multipart upload needs a `file` field");
        }
        const data = new Uint8Array(await file.arrayBuffer());
        return c.json(await service.processFromBytes(data, file.type || undefined, signal));
      }

      const body = await readJson(c);
      const url = optionalString(body.url);
      const dataUri = optionalString(body.dataUri);
      if (url) return c.json(await service.processFromUrl(url, signal));
      if (dataUri) return c.json(await service.processFromDataUri(dataUri, signal));
      throw invalidRequest("either `url` or `dataUri` must be provided");
    } catch (err) {
      return errorResponse(c, err, logger);
    }
  });

  router.post("/batch", async (c) => {
    try {
      const body = await readJson(c);
      if (!Array.isArray(body.items)) throw invalidRequest("`items` must be an array");
      const items = body.items.map((item, index) => parseBatchItem(item, index));
      const assets = await service.processBatch(items, c.req.raw.signal);
      return c.json({ assets, count: assets.length });
    } catch (err) {
      return errorResponse(c, err, logger);
    }
  });

  return router;
}
