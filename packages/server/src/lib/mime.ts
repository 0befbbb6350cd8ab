/**
 * Content-type helpers: normalisation, magic-byte sniffing and the
 * mapping between MIME types and the formats the pipeline knows.
 */

import type { AssetMime, SourceFormat } from "@mailpaste/core";

const FORMAT_BY_MIME: Record<string, SourceFormat> = {
  "image/jpeg": "jpeg",
  "image/jpg": "jpeg",
  "image/pjpeg": "jpeg",
  "image/png": "png",
  "image/webp": "webp",
  "image/gif": "gif",
  "image/tiff": "tiff",
  "image/heif": "heif",
  "image/heic": "heif",
  "image/avif": "avif",
};

/** Strip parameters and case from a Content-Type value. */
export function normalizeContentType(value: string | null | undefined): string {
  return (value ?? "").split(";")[0].trim().toLowerCase();
}

/** The pipeline's name for a supported image MIME type, or null. */
export function formatFromMime(contentType: string): SourceFormat | null {
  return FORMAT_BY_MIME[normalizeContentType(contentType)] ?? null;
}

export function mimeForFormat(format: "jpeg" | "png"): AssetMime {
  return format === "png" ? "image/png" : "image/jpeg";
}

export function extensionForMime(mime: AssetMime): ".jpg" | ".png" {
  return mime === "image/png" ? ".png" : ".jpg";
}

function startsWith(buf: Uint8Array, bytes: number[], offset = 0): boolean {
  if (buf.length < offset + bytes.length) return false;
  return bytes.every((b, i) => buf[offset + i] === b);
}

function asciiAt(buf: Uint8Array, offset: number, text: string): boolean {
  return startsWith(buf, [...text].map((ch) => ch.charCodeAt(0)), offset);
}

/**
 * Detect the image type from magic bytes.
 * Returns a MIME type, or null when the prefix matches no image we accept.
 */
export function sniffImageType(buf: Uint8Array): string | null {
  if (buf.length < 4) return null;

  // JPEG: FF D8 FF
  if (startsWith(buf, [0xff, 0xd8, 0xff])) return "image/jpeg";

  // PNG: 89 50 4E 47 0D 0A 1A 0A
  if (startsWith(buf, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return "image/png";

  // GIF: "GIF87a" / "GIF89a"
  if (asciiAt(buf, 0, "GIF8")) return "image/gif";

  // WebP: "RIFF" .... "WEBP"
  if (asciiAt(buf, 0, "RIFF") && asciiAt(buf, 8, "WEBP")) return "image/webp";

  // TIFF: little- and big-endian byte order marks
  if (startsWith(buf, [0x49, 0x49, 0x2a, 0x00]) || startsWith(buf, [0x4d, 0x4d, 0x00, 0x2a])) {
    return "image/tiff";
  }

  // ISO-BMFF: "ftyp" box at offset 4, brand decides AVIF vs HEIF
  if (asciiAt(buf, 4, "ftyp")) {
    if (asciiAt(buf, 8, "avif") || asciiAt(buf, 8, "avis")) return "image/avif";
    if (["heic", "heix", "hevc", "heim", "heis", "mif1", "msf1"].some((brand) => asciiAt(buf, 8, brand))) {
      return "image/heif";
    }
  }

  return null;
}

/** Declared type when it is non-empty, otherwise whatever the bytes look like. */
export function resolveContentType(declared: string | null | undefined, data: Uint8Array): string {
  const normalized = normalizeContentType(declared);
  if (normalized) return normalized;
  return sniffImageType(data) ?? "application/octet-stream";
}
