/**
 * HTML transformer: takes pasted rich text and returns HTML that survives a
 * webmail compose box. Images on ephemeral hosts are rehosted, scripts and
 * style blocks removed, and structure rewritten into Gmail's own inline-styled
 * vocabulary before a final allow-list pass through sanitize-html.
 */

import * as cheerio from "cheerio";
import sanitize from "sanitize-html";
import {
  GMAIL_CLASS_PREFIX,
  GMAIL_IMAGE_STYLE,
  GMAIL_IMG_SCHEMES,
  GMAIL_LINK_STYLE,
  GMAIL_PARAGRAPH_STYLE,
  GMAIL_QUOTE_STYLE,
  GMAIL_SAFE_ATTRS,
  GMAIL_SAFE_SCHEMES,
  GMAIL_SAFE_TAGS,
  GMAIL_STYLE_MARKER,
  gmailHeadingStyle,
  type Asset,
  type TransformResult,
  type TransformStats,
} from "@mailpaste/core";
import type { AssetService } from "./assets.js";
import { PipelineError, abortedError, errorMessage } from "./errors.js";
import { cleanUrl, isScriptUrl } from "./links.js";
import { mapConcurrent } from "./concurrency.js";
import { silentLogger, type Logger } from "./logger.js";

/** Hosts known to hand out links that expire or need a session. */
export const EPHEMERAL_HOSTS = [
  "amazonaws.com",
  "googleusercontent.com",
  "mail.google.com",
  "notion.so",
  "dropbox.com",
  "onedrive.com",
  "sharepoint.com",
  "slack-edge.com",
  "files.slack.com",
];

/** Query parameters that mark a pre-signed, time-limited URL. */
const SIGNED_PARAMS = new Set(["Expires", "expires", "sig", "Signature", "token"]);
const SIGNED_PARAM_PREFIXES = ["X-Amz-", "X-Goog-"];

export const BLOB_IMAGE_MESSAGE =
  "Browser-local image (blob: URL) detected - please download and re-upload it manually for rehosting";
export const GMAIL_ATTACHMENT_MESSAGE =
  "Gmail attachment image detected - please download and re-upload it manually for rehosting";

const MESSAGE_SRC_LENGTH = 50;

export function relativeImageMessage(src: string): string {
  return `Relative image source ${src.slice(0, MESSAGE_SRC_LENGTH)} cannot be rehosted - use an absolute URL`;
}

export type ImageRoute =
  | { action: "keep" }
  | { action: "notify"; message: string }
  | { action: "rehost"; kind: "url"; url: string }
  | { action: "rehost"; kind: "dataUri"; uri: string };

type RehostOutcome = { ok: true; asset: Asset } | { ok: false; error: unknown };

export type ImageRehoster = Pick<AssetService, "processFromUrl" | "processFromDataUri">;

export interface HtmlTransformerOptions {
  assets: ImageRehoster;
  /** Public base URL of the asset store; images already there are left alone. */
  assetBaseUrl: string;
  maxHtmlBytes: number;
  concurrency: number;
  logger?: Logger;
}

function hostMatches(hostname: string, domain: string): boolean {
  return hostname === domain || hostname.endsWith(`.${domain}`);
}

function hasSignedQuery(url: URL): boolean {
  const keys = [...url.searchParams.keys()];
  if (keys.some((key) => SIGNED_PARAMS.has(key))) return true;
  if (keys.some((key) => SIGNED_PARAM_PREFIXES.some((prefix) => key.startsWith(prefix)))) return true;
  // Azure SAS tokens
  return url.searchParams.has("se") && url.searchParams.has("sp");
}

function safeHost(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

function sanitizeOutput(html: string): string {
  return sanitize(html, {
    allowedTags: [...GMAIL_SAFE_TAGS],
    allowedAttributes: { ...GMAIL_SAFE_ATTRS },
    allowedSchemes: [...GMAIL_SAFE_SCHEMES],
    allowedSchemesByTag: { img: [...GMAIL_IMG_SCHEMES] },
    // Keep inline styles verbatim; Gmail's own markup is what we emit.
    parseStyleAttributes: false,
  });
}

export class HtmlTransformer {
  private readonly assets: ImageRehoster;
  private readonly assetHost: string | null;
  private readonly maxHtmlBytes: number;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(options: HtmlTransformerOptions) {
    this.assets = options.assets;
    this.assetHost = safeHost(options.assetBaseUrl);
    this.maxHtmlBytes = options.maxHtmlBytes;
    this.concurrency = options.concurrency;
    this.logger = options.logger ?? silentLogger;
  }

  /** Decide what to do with one <img src>. */
  classify(src: string): ImageRoute {
    const trimmed = src.trim();
    const lower = trimmed.toLowerCase();

    if (lower.startsWith("blob:")) return { action: "notify", message: BLOB_IMAGE_MESSAGE };
    if (lower.startsWith("data:")) return { action: "rehost", kind: "dataUri", uri: trimmed };

    if (trimmed === "") return { action: "keep" };

    let url: URL;
    try {
      url = new URL(trimmed);
    } catch {
      return { action: "notify", message: relativeImageMessage(trimmed) };
    }

    const host = url.hostname.toLowerCase();
    if (this.assetHost && host === this.assetHost) return { action: "keep" };
    if (host === "mail.google.com" && trimmed.includes("attid=")) {
      return { action: "notify", message: GMAIL_ATTACHMENT_MESSAGE };
    }

    if (url.protocol === "http:") {
      url.protocol = "https:";
      return { action: "rehost", kind: "url", url: url.toString() };
    }
    // Other schemes go to the pipeline, which reports why they cannot be fetched.
    if (url.protocol !== "https:") return { action: "rehost", kind: "url", url: trimmed };

    if (EPHEMERAL_HOSTS.some((domain) => hostMatches(host, domain)) || hasSignedQuery(url)) {
      return { action: "rehost", kind: "url", url: trimmed };
    }
    return { action: "keep" };
  }

  async transform(html: string, signal?: AbortSignal): Promise<TransformResult> {
    const size = Buffer.byteLength(html, "utf8");
    if (size > this.maxHtmlBytes) {
      throw new PipelineError("PayloadTooLarge", `HTML too large: ${size} bytes (max ${this.maxHtmlBytes})`);
    }
    if (signal?.aborted) throw abortedError(signal, "HTML transform");

    const started = Date.now();
    const stats: TransformStats = { imagesProcessed: 0, imagesRehosted: 0, stylesRemoved: 0, scriptsRemoved: 0 };
    const $ = cheerio.load(html, null, false);

    const scripts = $("script");
    stats.scriptsRemoved = scripts.length;
    scripts.remove();
    const styles = $("style");
    stats.stylesRemoved = styles.length;
    styles.remove();

    const messages = await this.rehostImages($, stats, signal);

    this.stripUnsafeAttributes($);
    this.convertToGmailFormat($);
    this.normalizeLinks($);

    const output = sanitizeOutput($.html());
    this.logger.log(
      `[html] ${size} bytes in, ${stats.imagesRehosted}/${stats.imagesProcessed} images rehosted, ` +
        `${stats.scriptsRemoved} scripts and ${stats.stylesRemoved} style blocks removed in ${Date.now() - started}ms`,
    );
    return { html: output, messages, stats };
  }

  private async rehostImages($: cheerio.CheerioAPI, stats: TransformStats, signal?: AbortSignal): Promise<string[]> {
    const images = $("img[src]")
      .toArray()
      .map((el) => {
        const src = $(el).attr("src") ?? "";
        return { el, src, route: this.classify(src) };
      });
    stats.imagesProcessed = images.length;

    // Identical sources in one document are rehosted once; repeats report as deduplicated.
    const inflight = new Map<string, Promise<RehostOutcome>>();
    const outcomes = await mapConcurrent(images, this.concurrency, async ({ route }): Promise<RehostOutcome | null> => {
      if (route.action !== "rehost") return null;
      const key = route.kind === "dataUri" ? route.uri : route.url;
      const pending = inflight.get(key);
      if (pending) {
        const outcome = await pending;
        return outcome.ok ? { ok: true, asset: { ...outcome.asset, deduped: true } } : outcome;
      }
      const attempt = this.rehostOne(route, signal);
      inflight.set(key, attempt);
      return attempt;
    });

    // A cancelled request rejects as a whole instead of returning a partial rewrite.
    if (signal?.aborted) throw abortedError(signal, "HTML transform");

    const messages: string[] = [];
    images.forEach(({ el, src, route }, i) => {
      const label = src.slice(0, MESSAGE_SRC_LENGTH);
      if (route.action === "notify") {
        messages.push(route.message);
        return;
      }
      const outcome = outcomes[i];
      if (!outcome) return;
      if (!outcome.ok) {
        messages.push(`Failed to rehost image ${label}: ${errorMessage(outcome.error)}`);
        return;
      }

      const { asset } = outcome;
      const $img = $(el);
      $img.attr("src", asset.url);
      if ($img.attr("alt") === undefined) $img.attr("alt", "");
      $img.attr("style", GMAIL_IMAGE_STYLE);
      stats.imagesRehosted++;
      messages.push(`${asset.deduped ? "Image deduplicated" : "Image rehosted"}: ${label} -> ${asset.url}`);
    });
    return messages;
  }

  private async rehostOne(
    route: Extract<ImageRoute, { action: "rehost" }>,
    signal?: AbortSignal,
  ): Promise<RehostOutcome> {
    if (signal?.aborted) return { ok: false, error: abortedError(signal, "image rehost") };
    try {
      const asset =
        route.kind === "dataUri"
          ? await this.assets.processFromDataUri(route.uri, signal)
          : await this.assets.processFromUrl(route.url, signal);
      return { ok: true, asset };
    } catch (err) {
      return { ok: false, error: err };
    }
  }

  private stripUnsafeAttributes($: cheerio.CheerioAPI): void {
    $<never, cheerio.SelectorType>("*").each((_i, el) => {
      const $el = $(el);
      for (const name of Object.keys(el.attribs)) {
        if (name.toLowerCase().startsWith("on") || name.toLowerCase() === "id") {
          $el.removeAttr(name);
        }
      }

      const href = $el.attr("href");
      if (href !== undefined && isScriptUrl(href)) $el.attr("href", "#");

      const classes = $el.attr("class");
      if (classes !== undefined) {
        const kept = classes.split(/\s+/).filter((token) => token.startsWith(GMAIL_CLASS_PREFIX));
        if (kept.length > 0) $el.attr("class", kept.join(" "));
        else $el.removeAttr("class");
      }
    });
  }

  private convertToGmailFormat($: cheerio.CheerioAPI): void {
    $("p").each((_i, el) => {
      const $p = $(el);
      const children = $p.children();
      const blankLine = children.length === 1 && children.is("br") && $p.text().trim() === "";
      const $div = $("<div></div>").attr("style", GMAIL_PARAGRAPH_STYLE);
      $div.append(blankLine ? "<br>" : $p.contents());
      $p.replaceWith($div);
    });

    $("div").each((_i, el) => {
      const $div = $(el);
      const style = $div.attr("style") ?? "";
      const hasGmailClass = ($div.attr("class") ?? "").split(/\s+/).some((c) => c.startsWith(GMAIL_CLASS_PREFIX));
      if (style.includes(GMAIL_STYLE_MARKER) || hasGmailClass) return;
      // Lists and quotes carry their own layout.
      if ($div.find("ol, ul, blockquote").length > 0) return;
      $div.attr("style", GMAIL_PARAGRAPH_STYLE);
    });

    $("h1, h2, h3, h4, h5, h6").each((_i, el) => {
      const $heading = $(el);
      const $div = $("<div></div>").attr("style", gmailHeadingStyle(el.tagName.toLowerCase()));
      $div.append($heading.contents());
      $heading.replaceWith($div);
    });

    $("blockquote").each((_i, el) => {
      $(el).attr("class", "gmail_quote").attr("style", GMAIL_QUOTE_STYLE);
    });

    $("a").each((_i, el) => {
      const $a = $(el);
      if ($a.attr("style") === undefined) $a.attr("style", GMAIL_LINK_STYLE);
    });
  }

  private normalizeLinks($: cheerio.CheerioAPI): void {
    $("a[href]").each((_i, el) => {
      const $a = $(el);
      const href = $a.attr("href") ?? "";
      const cleaned = cleanUrl(href);
      if (cleaned !== href) $a.attr("href", cleaned);
    });
  }
}
