/**
 * Content-addressed store: hash the final bytes, skip the upload when the
 * key is already present, and hand back the Asset record.
 */

import type { Asset, AssetMime } from "@mailpaste/core";
import { contentAddress } from "./hash.js";
import type { ObjectStore } from "./storage/types.js";
import { silentLogger, type Logger } from "./logger.js";

export const IMMUTABLE_CACHE_CONTROL = "public, max-age=31536000, immutable";

export interface StoredImage {
  data: Buffer;
  mime: AssetMime;
  width: number;
  height: number;
}

export class ContentStore {
  constructor(
    private readonly store: ObjectStore,
    private readonly logger: Logger = silentLogger,
  ) {}

  async put(image: StoredImage, signal?: AbortSignal): Promise<Asset> {
    const { hash, key } = contentAddress(image.data, image.mime);

    // Two concurrent puts of the same bytes may both upload; the key makes that harmless.
    const deduped = await this.store.exists(key, signal);
    if (deduped) {
      this.logger.log(`[assets] ♻️  ${key} already stored`);
    } else {
      await this.store.put(key, image.data, image.mime, IMMUTABLE_CACHE_CONTROL, signal);
      this.logger.log(`[assets] ⬆️  stored ${key} (${image.data.length} bytes)`);
    }

    return Object.freeze({
      url: this.store.publicUrlFor(key),
      mime: image.mime,
      width: image.width,
      height: image.height,
      bytes: image.data.length,
      hash,
      key,
      deduped,
    });
  }
}
