/**
 * Serve objects from the filesystem store, read-only. Only mounted when
 * STORAGE_DRIVER=fs; in production the bucket's own CDN serves assets.
 */

import { Hono } from "hono";
import { readFile } from "node:fs/promises";
import type { FsObjectStore } from "../lib/storage/fs.js";
import { IMMUTABLE_CACHE_CONTROL } from "../lib/content-store.js";

const CONTENT_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".png": "image/png",
};

export function serveAssetsRoutes(store: FsObjectStore): Hono {
  const router = new Hono();

  router.get("/:shard/:name", async (c) => {
    const key = `${c.req.param("shard")}/${c.req.param("name")}`;
    const path = store.pathFor(key);
    if (!path) return c.notFound();

    let data: Buffer;
    try {
      data = await readFile(path);
    } catch {
      return c.notFound();
    }

    const contentType = CONTENT_TYPES[key.slice(key.lastIndexOf("."))] ?? "application/octet-stream";
    return new Response(new Uint8Array(data), {
      headers: {
        "Content-Type": contentType,
        "Content-Length": String(data.length),
        "Cache-Control": IMMUTABLE_CACHE_CONTROL,
        "X-Content-Type-Options": "nosniff",
      },
    });
  });

  return router;
}
