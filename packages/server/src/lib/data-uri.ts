/**
 * data: URI decoding (RFC 2397).
 *
 *   data:[<mediatype>][;base64],<data>
 */

import { PipelineError } from "./errors.js";
import { normalizeContentType } from "./mime.js";

export interface DecodedDataUri {
  data: Buffer;
  contentType: string;
}

const BASE64_RE = /^[A-Za-z0-9+/_-]*={0,2}$/;

function decodeBase64(payload: string): Buffer {
  // Line breaks and spaces survive copy/paste; they carry no data.
  const compact = payload.replace(/\s+/g, "");
  if (!BASE64_RE.test(compact) || compact.length % 4 === 1) {
    throw new PipelineError("MalformedInput", "invalid base64 payload in data URI");
  }
  return Buffer.from(compact, compact.includes("-") || compact.includes("_") ? "base64url" : "base64");
}

/** Percent-decode to raw bytes; non-escaped characters are taken as UTF-8. */
function decodePercent(payload: string): Buffer {
  const out: number[] = [];
  for (let i = 0; i < payload.length; i++) {
    const ch = payload[i];
    if (ch === "%") {
      const hex = payload.slice(i + 1, i + 3);
      if (!/^[0-9a-fA-F]{2}$/.test(hex)) {
        throw new PipelineError("MalformedInput", `invalid percent escape at offset ${i} in data URI`);
      }
      out.push(parseInt(hex, 16));
      i += 2;
    } else {
      out.push(...Buffer.from(ch, "utf8"));
    }
  }
  return Buffer.from(out);
}

export function parseDataUri(uri: string): DecodedDataUri {
  if (!/^data:/i.test(uri)) {
    throw new PipelineError("MalformedInput", "invalid data URI: missing data: prefix");
  }

  const content = uri.slice(5);
  const comma = content.indexOf(",");
  if (comma === -1) {
    throw new PipelineError("MalformedInput", "invalid data URI: missing comma separator");
  }

  const header = content.slice(0, comma);
  const payload = content.slice(comma + 1);
  const [mediaType, ...params] = header.split(";");
  const isBase64 = params.some((p) => p.trim().toLowerCase() === "base64");

  const data = isBase64 ? decodeBase64(payload) : decodePercent(payload);
  if (data.length === 0) {
    throw new PipelineError("MalformedInput", "data URI carries no data");
  }

  return {
    data,
    contentType: normalizeContentType(mediaType) || "text/plain",
  };
}
