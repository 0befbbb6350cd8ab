/**
 * Build the asset pipeline and HTML transformer from configuration.
 * Shared by the HTTP server and the CLI.
 */

import type { Config } from "./config.js";
import { AssetService } from "./assets.js";
import { ContentStore } from "./content-store.js";
import { EncoderChain } from "./encoders.js";
import { Fetcher } from "./fetcher.js";
import { HtmlTransformer } from "./html-transform.js";
import type { Logger } from "./logger.js";
import { FsObjectStore } from "./storage/fs.js";
import { S3ObjectStore } from "./storage/s3.js";
import type { ObjectStore } from "./storage/types.js";

export interface Pipeline {
  assets: AssetService;
  transformer: HtmlTransformer;
  encoders: EncoderChain;
  fetcher: Fetcher;
  objectStore: ObjectStore;
  /** Set when objects live on local disk. */
  fsStore?: FsObjectStore;
  close(): Promise<void>;
}

export function createObjectStore(config: Config): { objectStore: ObjectStore; fsStore?: FsObjectStore } {
  const { storage } = config;
  if (storage.driver === "fs") {
    const fsStore = new FsObjectStore(storage.dir, storage.publicBaseUrl);
    return { objectStore: fsStore, fsStore };
  }
  return {
    objectStore: new S3ObjectStore({
      endpoint: storage.r2Endpoint,
      bucket: storage.r2Bucket,
      accessKeyId: storage.r2AccessKeyId,
      secretAccessKey: storage.r2SecretAccessKey,
      publicBaseUrl: storage.publicBaseUrl,
      connectTimeoutMs: storage.connectTimeoutMs,
      timeoutMs: storage.timeoutMs,
    }),
  };
}

export interface PipelineOverrides {
  objectStore?: ObjectStore;
  fetcher?: Fetcher;
  encoders?: EncoderChain;
}

export function createPipeline(config: Config, logger: Logger, overrides: PipelineOverrides = {}): Pipeline {
  const stores = overrides.objectStore ? { objectStore: overrides.objectStore } : createObjectStore(config);
  const fetcher = overrides.fetcher ?? new Fetcher({ ...config.fetch, logger });
  const encoders = overrides.encoders ?? EncoderChain.fromSettings(config.encoders, logger);

  const assets = new AssetService({
    fetcher,
    encoders,
    store: new ContentStore(stores.objectStore, logger),
    policy: config.policy,
    maxBatchSize: config.maxBatchSize,
    logger,
  });
  const transformer = new HtmlTransformer({
    assets,
    assetBaseUrl: config.storage.publicBaseUrl,
    maxHtmlBytes: config.maxHtmlBytes,
    concurrency: config.imageConcurrency,
    logger,
  });

  return {
    assets,
    transformer,
    encoders,
    fetcher,
    ...stores,
    close: () => fetcher.close(),
  };
}
