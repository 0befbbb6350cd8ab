/**
 * Asset service, the one entry point for turning an image reference into
 * a permanent Asset: fetch → decide → encode → store.
 */

import type { Asset, BatchInput } from "@mailpaste/core";
import { BatchItemFailedError, PipelineError, abortedError, toPipelineError } from "./errors.js";
import { decide } from "./decider.js";
import type { EncoderChain } from "./encoders.js";
import type { Fetcher, ImageSource } from "./fetcher.js";
import type { ContentStore } from "./content-store.js";
import type { ImagePolicy } from "./config.js";
import { silentLogger, type Logger } from "./logger.js";

export interface AssetServiceOptions {
  fetcher: Fetcher;
  encoders: EncoderChain;
  store: ContentStore;
  policy: ImagePolicy;
  maxBatchSize: number;
  logger?: Logger;
}

function describeSource(source: ImageSource): string {
  switch (source.kind) {
    case "url":
      return source.url.slice(0, 80);
    case "dataUri":
      return `data URI (${source.uri.length} chars)`;
    case "bytes":
      return `upload (${source.data.byteLength} bytes)`;
  }
}

/** Pick the source a batch item names: url, then dataUri, then data. */
export function batchInputSource(input: BatchInput): ImageSource | null {
  if (input.url) return { kind: "url", url: input.url };
  if (input.dataUri) return { kind: "dataUri", uri: input.dataUri };
  if (input.data && input.data.byteLength > 0) {
    return { kind: "bytes", data: input.data, contentType: input.contentType };
  }
  return null;
}

export class AssetService {
  private readonly fetcher: Fetcher;
  private readonly encoders: EncoderChain;
  private readonly store: ContentStore;
  private readonly policy: ImagePolicy;
  private readonly logger: Logger;
  readonly maxBatchSize: number;

  constructor(options: AssetServiceOptions) {
    this.fetcher = options.fetcher;
    this.encoders = options.encoders;
    this.store = options.store;
    this.policy = options.policy;
    this.maxBatchSize = options.maxBatchSize;
    this.logger = options.logger ?? silentLogger;
  }

  processFromUrl(url: string, signal?: AbortSignal): Promise<Asset> {
    return this.process({ kind: "url", url }, signal);
  }

  processFromDataUri(dataUri: string, signal?: AbortSignal): Promise<Asset> {
    return this.process({ kind: "dataUri", uri: dataUri }, signal);
  }

  processFromBytes(data: Uint8Array, contentType?: string, signal?: AbortSignal): Promise<Asset> {
    return this.process({ kind: "bytes", data, contentType }, signal);
  }

  /**
   * Process items in order and stop at the first failure, which is reported
   * with its index. Assets stored before the failure stay stored.
   */
  async processBatch(inputs: BatchInput[], signal?: AbortSignal): Promise<Asset[]> {
    if (inputs.length === 0) {
      throw new PipelineError("InvalidRequest", "batch must contain at least one item");
    }
    if (inputs.length > this.maxBatchSize) {
      throw new PipelineError("InvalidRequest", `batch too large: ${inputs.length} items (max ${this.maxBatchSize})`);
    }

    const assets: Asset[] = [];
    for (const [index, input] of inputs.entries()) {
      const source = batchInputSource(input);
      if (!source) {
        throw new BatchItemFailedError(
          index,
          new PipelineError("InvalidRequest", "item has no url, dataUri or data"),
        );
      }
      try {
        assets.push(await this.process(source, signal));
      } catch (err) {
        if (err instanceof PipelineError && err.code === "Cancelled") throw err;
        throw new BatchItemFailedError(index, err);
      }
    }
    return assets;
  }

  async process(source: ImageSource, signal?: AbortSignal): Promise<Asset> {
    const label = describeSource(source);
    const started = Date.now();
    try {
      const { data, contentType } = await this.fetcher.load(source, signal);
      if (signal?.aborted) throw abortedError(signal, "processing");

      const decision = await decide(data, contentType, this.policy);
      const encoded = await this.encoders.encode(data, decision);
      if (signal?.aborted) throw abortedError(signal, "processing");

      const asset = await this.store.put(encoded, signal);
      this.logger.log(
        `[assets] ✅ ${label} → ${asset.key} (${asset.width}x${asset.height}, ${asset.bytes} bytes` +
          `${decision.passThrough ? ", pass-through" : ""}) in ${Date.now() - started}ms`,
      );
      return asset;
    } catch (err) {
      const failure = toPipelineError(err, "EncodingFailed", "image processing failed");
      this.logger.warn(`[assets] ❌ ${label}: ${failure.code}: ${failure.message}`);
      throw failure;
    }
  }
}
