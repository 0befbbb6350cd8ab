import { createHash } from "node:crypto";
import type { AssetMime } from "@mailpaste/core";
import { extensionForMime } from "./mime.js";

const BASE32_ALPHABET = "abcdefghijklmnopqrstuvwxyz234567";
const KEY_LENGTH = 26;

/** Lower-case RFC 4648 base32, no padding. */
export function base32(bytes: Uint8Array): string {
  let out = "";
  let buffer = 0;
  let bits = 0;
  for (const byte of bytes) {
    buffer = (buffer << 8) | byte;
    bits += 8;
    while (bits >= 5) {
      out += BASE32_ALPHABET[(buffer >>> (bits - 5)) & 31];
      bits -= 5;
    }
    buffer &= (1 << bits) - 1;
  }
  if (bits > 0) {
    out += BASE32_ALPHABET[(buffer << (5 - bits)) & 31];
  }
  return out;
}

export interface ContentAddress {
  /** "sha256:" followed by the lower-case hex digest. */
  hash: string;
  /** Storage key: two-character shard, slash, rest of the digest, extension. */
  key: string;
}

/**
 * Address bytes by their SHA-256. The key is derived only from the digest
 * and the output type, so identical bytes always land on the same object.
 */
export function contentAddress(data: Uint8Array, mime: AssetMime): ContentAddress {
  const digest = createHash("sha256").update(data).digest();
  const encoded = base32(digest).slice(0, KEY_LENGTH);
  return {
    hash: `sha256:${digest.toString("hex")}`,
    key: `${encoded.slice(0, 2)}/${encoded.slice(2)}${extensionForMime(mime)}`,
  };
}
