/**
 * Error → JSON response mapping shared by every route.
 */

import type { Context } from "hono";
import { BatchItemFailedError, PipelineError, errorMessage } from "../lib/errors.js";
import { getLocale, t } from "../lib/i18n.js";
import type { Logger } from "../lib/logger.js";

export interface ErrorBody {
  error: string;
  code: string;
  index?: number;
}

export function errorBody(c: Context, err: PipelineError): ErrorBody {
  const locale = getLocale(c);
  if (err instanceof BatchItemFailedError) {
    return {
      error: t(locale, "errors.BatchItemFailed", { index: err.index, detail: errorMessage(err.cause) }),
      code: err.code,
      index: err.index,
    };
  }
  return { error: t(locale, `errors.${err.code}`, { detail: err.message }), code: err.code };
}

/** JSON error response; pipeline errors carry their own status, anything else is a 500. */
export function errorResponse(c: Context, err: unknown, logger: Logger): Response {
  if (err instanceof PipelineError) {
    if (err.status >= 500) logger.error(`[http] ${c.req.method} ${c.req.path}: ${err.code}: ${err.message}`);
    return Response.json(errorBody(c, err), { status: err.status });
  }
  logger.error(`[http] ${c.req.method} ${c.req.path}: unhandled error:`, err);
  return Response.json({ error: t(getLocale(c), "common.internal_error"), code: "Internal" }, { status: 500 });
}

export function invalidRequest(detail: string): PipelineError {
  return new PipelineError("InvalidRequest", detail);
}
