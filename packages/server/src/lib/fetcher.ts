/**
 * Fetcher: turns a URL, a data: URI or uploaded bytes into
 * `{ data, contentType }` for the rest of the pipeline.
 *
 * URL fetches are https-only, checked against private address ranges
 * before every connection (redirect hops included), bounded by a connect
 * timeout and an overall deadline, and read under a hard byte cap.
 */

import { Agent, fetch as undiciFetch } from "undici";
import { PipelineError, errorMessage, isPipelineError } from "./errors.js";
import { parseDataUri } from "./data-uri.js";
import { withDeadline } from "./deadline.js";
import { normalizeContentType, resolveContentType, sniffImageType } from "./mime.js";
import { assertPublicDestination, guardedLookup, systemLookup, type LookupFn } from "./security.js";
import type { FetchSettings } from "./config.js";
import { silentLogger, type Logger } from "./logger.js";

const USER_AGENT = "Mailpaste/1.0 (+image rehosting)";

export type FetchFn = typeof undiciFetch;

export type ImageSource =
  | { kind: "url"; url: string }
  | { kind: "dataUri"; uri: string }
  | { kind: "bytes"; data: Uint8Array; contentType?: string };

export interface FetchedImage {
  data: Buffer;
  contentType: string;
}

export interface FetcherOptions extends FetchSettings {
  lookup?: LookupFn;
  fetch?: FetchFn;
  logger?: Logger;
}

/** undici reports connect failures as `TypeError("fetch failed")` with the socket error as cause. */
function pipelineCause(err: unknown): PipelineError | null {
  let current: unknown = err;
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    if (isPipelineError(current)) return current;
    current = current.cause;
  }
  return null;
}

export class Fetcher {
  private readonly settings: FetchSettings;
  private readonly lookup: LookupFn;
  private readonly fetchFn: FetchFn;
  private readonly dispatcher: Agent;
  private readonly logger: Logger;

  constructor(options: FetcherOptions) {
    const { lookup, fetch, logger, ...settings } = options;
    this.settings = settings;
    this.lookup = lookup ?? systemLookup;
    this.fetchFn = fetch ?? undiciFetch;
    this.logger = logger ?? silentLogger;
    this.dispatcher = new Agent({
      connect: { timeout: settings.connectTimeoutMs, lookup: guardedLookup(this.lookup) },
      headersTimeout: settings.timeoutMs,
      bodyTimeout: settings.timeoutMs,
    });
  }

  /** Resolve any supported source to bytes plus a content type. */
  async load(source: ImageSource, signal?: AbortSignal): Promise<FetchedImage> {
    switch (source.kind) {
      case "url":
        return this.fetchUrl(source.url, signal);
      case "dataUri":
        return parseDataUri(source.uri);
      case "bytes": {
        const data = Buffer.from(source.data);
        return { data, contentType: resolveContentType(source.contentType, data) };
      }
    }
  }

  async fetchUrl(rawUrl: string, signal?: AbortSignal): Promise<FetchedImage> {
    let current: URL;
    try {
      current = new URL(rawUrl);
    } catch {
      throw new PipelineError("InvalidSource", `invalid URL: ${rawUrl.slice(0, 100)}`);
    }

    const deadline = withDeadline(signal, this.settings.timeoutMs);
    try {
      for (let hop = 0; ; hop++) {
        if (current.protocol !== "https:") {
          throw new PipelineError("InvalidSource", `only HTTPS URLs are allowed, got ${current.protocol}`);
        }
        await assertPublicDestination(current.hostname, this.lookup);
        deadline.signal.throwIfAborted();

        const res = await this.fetchFn(current, {
          method: "GET",
          redirect: "manual",
          signal: deadline.signal,
          dispatcher: this.dispatcher,
          headers: {
            "User-Agent": USER_AGENT,
            Accept: "image/avif,image/webp,image/png,image/jpeg,image/*;q=0.8,*/*;q=0.5",
          },
        });

        const location = res.headers.get("location");
        if (res.status >= 300 && res.status < 400 && location) {
          await res.body?.cancel();
          if (hop >= this.settings.maxRedirects) {
            throw new PipelineError("InvalidSource", `too many redirects (max ${this.settings.maxRedirects})`);
          }
          current = new URL(location, current);
          this.logger.log(`[fetch] redirect ${hop + 1} → ${current.host}`);
          continue;
        }

        if (!res.ok) {
          await res.body?.cancel();
          throw new PipelineError("InvalidSource", `HTTP ${res.status} from ${current.host}`);
        }

        const data = await this.readCapped(res);
        const declared = normalizeContentType(res.headers.get("content-type"));
        const contentType = declared || sniffImageType(data) || "application/octet-stream";
        this.logger.log(`[fetch] ${current.host}: ${data.length} bytes (${contentType})`);
        return { data, contentType };
      }
    } catch (err) {
      const refused = pipelineCause(err);
      if (refused) throw refused;
      if (signal?.aborted) {
        throw new PipelineError("Cancelled", "image fetch was cancelled", { cause: err });
      }
      if (deadline.timedOut()) {
        throw new PipelineError("InvalidSource", `fetch timed out after ${this.settings.timeoutMs}ms`, {
          cause: err,
        });
      }
      throw new PipelineError("InvalidSource", `failed to fetch image: ${errorMessage(err)}`, { cause: err });
    } finally {
      deadline.dispose();
    }
  }

  /** Read the body chunk by chunk, giving up as soon as it passes the cap. */
  private async readCapped(res: Awaited<ReturnType<FetchFn>>): Promise<Buffer> {
    const { maxBytes } = this.settings;

    const declaredLength = Number(res.headers.get("content-length") ?? NaN);
    if (Number.isFinite(declaredLength) && declaredLength > maxBytes) {
      await res.body?.cancel();
      throw new PipelineError("PayloadTooLarge", `image too large: ${declaredLength} bytes (max ${maxBytes})`);
    }
    if (!res.body) {
      throw new PipelineError("InvalidSource", "empty response body");
    }

    const reader = res.body.getReader();
    const chunks: Uint8Array[] = [];
    let total = 0;
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      total += value.byteLength;
      if (total > maxBytes) {
        await reader.cancel();
        throw new PipelineError("PayloadTooLarge", `image exceeds ${maxBytes} bytes`);
      }
      chunks.push(value);
    }

    if (total === 0) {
      throw new PipelineError("InvalidSource", "empty response body");
    }
    return Buffer.concat(chunks, total);
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}
