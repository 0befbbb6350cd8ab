/**
 * Format decider: looks at an image's metadata (and, when it claims an
 * alpha channel, at a grid of its pixels) and decides whether to resize,
 * which container to produce, and whether the bytes can be kept as-is.
 */

import sharp, { type Metadata } from "sharp";
import type { OutputFormat, ProcessingDecision, SourceFormat } from "@mailpaste/core";
import { PipelineError } from "./errors.js";
import { formatFromMime, sniffImageType } from "./mime.js";
import type { ImagePolicy } from "./config.js";

/** Map sharp's format name onto ours. AVIF shows up as heif with av1 compression. */
function sourceFormatFromMetadata(metadata: Metadata): SourceFormat | null {
  switch (metadata.format) {
    case "jpeg":
    case "png":
    case "webp":
    case "gif":
    case "tiff":
      return metadata.format;
    case "heif":
      return metadata.compression === "av1" ? "avif" : "heif";
    default:
      return null;
  }
}

/** Width/height as displayed, i.e. after EXIF orientation is applied. */
export function orientedSize(metadata: Metadata): { width: number; height: number } {
  const width = metadata.width ?? 0;
  const height = metadata.height ?? 0;
  const orientation = metadata.orientation ?? 1;
  return orientation >= 5 && orientation <= 8 ? { width: height, height: width } : { width, height };
}

/**
 * Scale both edges by the same factor so neither exceeds `maxEdge`.
 * The factor never goes above 1: images are never enlarged.
 */
export function fitWithin(width: number, height: number, maxEdge: number): { width: number; height: number } {
  const scale = Math.min(1, maxEdge / Math.max(width, height));
  return {
    width: Math.min(width, Math.max(1, Math.round(width * scale))),
    height: Math.min(height, Math.max(1, Math.round(height * scale))),
  };
}

/**
 * Decode the image and probe roughly `samplePoints` pixels on an even grid.
 * Any alpha below 255 counts as real transparency. When decoding fails we
 * answer true: keeping PNG is the non-destructive choice.
 */
export async function sampleTransparency(data: Buffer, samplePoints: number): Promise<boolean> {
  try {
    const { data: raw, info } = await sharp(data).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
    const { width, height, channels } = info;
    const alphaOffset = channels - 1;
    const grid = Math.max(1, Math.ceil(Math.sqrt(samplePoints)));
    const cols = Math.min(grid, width);
    const rows = Math.min(grid, height);

    for (let gy = 0; gy < rows; gy++) {
      const y = Math.min(height - 1, Math.floor(((gy + 0.5) * height) / rows));
      for (let gx = 0; gx < cols; gx++) {
        const x = Math.min(width - 1, Math.floor(((gx + 0.5) * width) / cols));
        if (raw[(y * width + x) * channels + alphaOffset] < 255) {
          return true;
        }
      }
    }
    return false;
  } catch {
    return true;
  }
}

async function readMetadata(data: Buffer): Promise<Metadata> {
  try {
    return await sharp(data).metadata();
  } catch (err) {
    throw new PipelineError("UnsupportedFormat", "failed to read image metadata", { cause: err });
  }
}

export async function decide(data: Buffer, contentType: string, policy: ImagePolicy): Promise<ProcessingDecision> {
  // The declared type is only a hint; unknown types get a second look at the bytes.
  if (!formatFromMime(contentType)) {
    const sniffed = sniffImageType(data);
    if (!sniffed || !formatFromMime(sniffed)) {
      throw new PipelineError("UnsupportedFormat", `input is not a supported image format (${contentType || "unknown"})`);
    }
  }

  const metadata = await readMetadata(data);
  const sourceFormat = sourceFormatFromMetadata(metadata);
  if (!sourceFormat) {
    throw new PipelineError("UnsupportedFormat", `unsupported image format: ${metadata.format ?? "unknown"}`);
  }

  const { width, height } = orientedSize(metadata);
  if (width < 1 || height < 1) {
    throw new PipelineError("UnsupportedFormat", "image has no dimensions");
  }

  const sourceBytes = data.length;
  const needsResize =
    width > policy.maxEdge || height > policy.maxEdge || sourceBytes > policy.resizeThresholdBytes;
  const target = needsResize ? fitWithin(width, height, policy.maxEdge) : { width, height };

  const passThrough =
    !needsResize &&
    sourceBytes < policy.passThroughBytes &&
    (sourceFormat === "jpeg" || sourceFormat === "png");

  // The flag alone has false positives (RGBA exports of opaque images).
  const hasMeaningfulTransparency =
    metadata.hasAlpha === true && (await sampleTransparency(data, policy.alphaSamplePoints));
  const outputFormat: OutputFormat = hasMeaningfulTransparency ? "png" : "jpeg";

  return {
    passThrough,
    needsResize,
    targetWidth: target.width,
    targetHeight: target.height,
    hasMeaningfulTransparency,
    outputFormat,
    sourceFormat,
    sourceWidth: width,
    sourceHeight: height,
    sourceBytes,
  };
}
