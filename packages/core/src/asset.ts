/**
 * Core asset model for Mailpaste.
 *
 * An Asset is the result of running one image through the rehosting
 * pipeline. Field names match the JSON returned by the HTTP API.
 */

/** Content types an Asset can carry. */
export type AssetMime = "image/jpeg" | "image/png";

/** Container formats the encoder chain can produce. */
export type OutputFormat = "jpeg" | "png";

/** Source formats the decider accepts. */
export type SourceFormat = "jpeg" | "png" | "webp" | "gif" | "tiff" | "heif" | "avif";

/** A permanently stored, content-addressed image. */
export interface Asset {
  /** Stable public URL (base URL + key). */
  url: string;

  mime: AssetMime;

  /** Final pixel dimensions. */
  width: number;
  height: number;

  /** Final compressed size in bytes. */
  bytes: number;

  /** "sha256:" followed by the hex digest of the final bytes. */
  hash: string;

  /** Sharded storage key, e.g. "ab/cdefghijklmnopqrstuvwxyz.jpg". */
  key: string;

  /** True when the store already held an object at `key`. */
  deduped: boolean;
}

/**
 * What the format decider concluded about one input.
 * Computed per call and never persisted.
 */
export interface ProcessingDecision {
  /** Small JPEG/PNG input that is stored byte-for-byte. */
  passThrough: boolean;
  needsResize: boolean;
  targetWidth: number;
  targetHeight: number;
  hasMeaningfulTransparency: boolean;
  outputFormat: OutputFormat;

  sourceFormat: SourceFormat;
  /** Orientation-corrected source dimensions. */
  sourceWidth: number;
  sourceHeight: number;
  sourceBytes: number;
}

export interface TransformStats {
  imagesProcessed: number;
  imagesRehosted: number;
  stylesRemoved: number;
  scriptsRemoved: number;
}

/** Output of one HTML transform call. */
export interface TransformResult {
  html: string;
  /** Human-readable notes collected while classifying and rehosting images. */
  messages: string[];
  stats: TransformStats;
}

/**
 * One item of a batch request. The first present source wins, in the
 * order url, dataUri, data.
 */
export interface BatchInput {
  url?: string;
  dataUri?: string;
  data?: Uint8Array;
  contentType?: string;
}
