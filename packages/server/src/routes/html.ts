/**
 * POST /api/html/transform — JSON { html } → { html, messages, stats }
 */

import { Hono } from "hono";
import type { HtmlTransformer } from "../lib/html-transform.js";
import type { Logger } from "../lib/logger.js";
import { errorResponse, invalidRequest } from "./errors.js";
import { readJson } from "./assets.js";

export function htmlRoutes(transformer: HtmlTransformer, logger: Logger): Hono {
  const router = new Hono();

  router.post("/transform", async (c) => {
    try {
      const body = await readJson(c);
      if (typeof body.html !== "string" || body.html.trim() === "") {
        throw invalidRequest("`html` must be a non-empty string");
      }
      return c.json(await transformer.transform(body.html, c.req.raw.signal));
    } catch (err) {
      return errorResponse(c, err, logger);
    }
  });

  return router;
}
