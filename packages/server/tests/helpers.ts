/**
 * Shared fixtures: in-memory object store, fake DNS and HTTP, and images
 * generated with sharp so no binary files are checked in.
 */

import sharp from "sharp";
import { Response } from "undici";
import { loadConfig, type Config, type FetchSettings, type ImagePolicy } from "../src/lib/config.js";
import { BaselineJpegEncoder, EncoderChain, SharpPngOptimizer } from "../src/lib/encoders.js";
import { Fetcher, type FetchFn } from "../src/lib/fetcher.js";
import { silentLogger } from "../src/lib/logger.js";
import { createPipeline, type Pipeline } from "../src/lib/pipeline.js";
import type { LookupFn } from "../src/lib/security.js";
import { joinPublicUrl, type ObjectStore } from "../src/lib/storage/types.js";

export const CDN_BASE = "https://cdn.test";

export interface StoredObject {
  data: Uint8Array;
  contentType: string;
  cacheControl: string;
}

export class MemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, StoredObject>();
  puts = 0;

  constructor(private readonly baseUrl = CDN_BASE) {}

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async put(key: string, data: Uint8Array, contentType: string, cacheControl: string): Promise<void> {
    this.puts++;
    this.objects.set(key, { data, contentType, cacheControl });
  }

  publicUrlFor(key: string): string {
    return joinPublicUrl(this.baseUrl, key);
  }
}

export const testPolicy: ImagePolicy = {
  maxEdge: 3840,
  passThroughBytes: 1024 * 1024,
  resizeThresholdBytes: 5 * 1024 * 1024,
  alphaSamplePoints: 400,
};

export const testFetchSettings: FetchSettings = {
  maxBytes: 1024 * 1024,
  connectTimeoutMs: 1_000,
  timeoutMs: 5_000,
  maxRedirects: 5,
};

/** Every name resolves to one public documentation address. */
export const publicLookup: LookupFn = async () => [{ address: "93.184.216.34", family: 4 }];

/** Resolve names from a fixed table; anything else fails like NXDOMAIN. */
export function tableLookup(table: Record<string, string>): LookupFn {
  return async (hostname) => {
    const address = table[hostname];
    if (!address) throw new Error(`ENOTFOUND ${hostname}`);
    return [{ address, family: address.includes(":") ? 6 : 4 }];
  };
}

export type Route = (init?: Parameters<FetchFn>[1]) => Response | Promise<Response>;

/** A fetch that answers from `routes` by exact URL and records what was asked for. */
export function fakeFetch(routes: Record<string, Route>): { fetch: FetchFn; calls: string[] } {
  const calls: string[] = [];
  const fetch: FetchFn = async (input, init) => {
    const url = input instanceof URL ? input.href : typeof input === "string" ? input : input.url;
    calls.push(url);
    const route = routes[url];
    return route ? route(init) : new Response("not found", { status: 404 });
  };
  return { fetch, calls };
}

export interface StalledRoute {
  route: Route;
  /** Resolves once the request has reached the route. */
  started: Promise<void>;
  /** True once the request's signal fired. */
  aborted: () => boolean;
}

/** A route that never answers and rejects only when its request is aborted. */
export function stalledRoute(): StalledRoute {
  let markStarted = () => {};
  const started = new Promise<void>((resolve) => {
    markStarted = () => resolve();
  });
  let aborted = false;
  const route: Route = (init) =>
    new Promise<Response>((_resolve, reject) => {
      markStarted();
      const signal = init?.signal;
      if (!signal) {
        reject(new Error("request has no signal"));
        return;
      }
      signal.addEventListener(
        "abort",
        () => {
          aborted = true;
          reject(signal.reason);
        },
        { once: true },
      );
    });
  return { route, started, aborted: () => aborted };
}

export function imageResponse(data: Uint8Array, contentType: string): Response {
  return new Response(data, { status: 200, headers: { "content-type": contentType } });
}

export function solidJpeg(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 200, g: 60, b: 30 } } })
    .jpeg({ quality: 80 })
    .toBuffer();
}

/** RGBA PNG; alpha 1 is opaque despite the alpha channel. */
export function solidPng(width: number, height: number, alpha = 1): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 4, background: { r: 20, g: 120, b: 220, alpha } } })
    .png()
    .toBuffer();
}

export function solidWebp(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 10, g: 200, b: 90 } } })
    .webp({ quality: 80 })
    .toBuffer();
}

export function dataUri(data: Uint8Array, contentType: string): string {
  return `data:${contentType};base64,${Buffer.from(data).toString("base64")}`;
}

export function testConfig(env: Record<string, string> = {}): Config {
  return loadConfig({ STORAGE_DRIVER: "fs", R2_PUBLIC_BASE_URL: CDN_BASE, APP_BASE_URL: "https://app.test", ...env });
}

export interface TestPipeline {
  pipeline: Pipeline;
  store: MemoryObjectStore;
  calls: string[];
}

/**
 * A full pipeline over an in-memory store, a scripted fetch and the
 * sharp-only encoders, so results do not depend on what is installed.
 */
export function testPipeline(
  routes: Record<string, Route> = {},
  options: { config?: Config; lookup?: LookupFn } = {},
): TestPipeline {
  const config = options.config ?? testConfig();
  const store = new MemoryObjectStore();
  const { fetch, calls } = fakeFetch(routes);
  const fetcher = new Fetcher({ ...config.fetch, lookup: options.lookup ?? publicLookup, fetch });
  const encoders = new EncoderChain({ encoders: [new BaselineJpegEncoder(85), new SharpPngOptimizer()] });
  const pipeline = createPipeline(config, silentLogger, { objectStore: store, fetcher, encoders });
  return { pipeline, store, calls };
}
