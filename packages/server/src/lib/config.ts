/**
 * Runtime configuration, read from environment variables.
 *
 * The entry point loads .env files through dotenv before calling
 * loadConfig(); everything here only looks at the env object it is given.
 */

export type StorageDriver = "s3" | "fs";

export interface ImagePolicy {
  /** Longest allowed edge in pixels. */
  maxEdge: number;
  /** Inputs below this size that need no resize are stored untouched. */
  passThroughBytes: number;
  /** Inputs above this size are always re-encoded through the resize path. */
  resizeThresholdBytes: number;
  /** Target number of pixels probed when checking for real transparency. */
  alphaSamplePoints: number;
}

export interface EncoderSettings {
  jpegQuality: number;
  jpegFallbackQuality: number;
  jpegProgressive: boolean;
  /** Path or name of the oxipng binary; empty disables it. */
  oxipngPath: string;
}

export interface FetchSettings {
  maxBytes: number;
  connectTimeoutMs: number;
  timeoutMs: number;
  maxRedirects: number;
}

export interface Config {
  port: number;
  appBaseUrl: string;
  trustedProxy: boolean;
  storage: {
    driver: StorageDriver;
    dir: string;
    publicBaseUrl: string;
    r2AccountId: string;
    r2AccessKeyId: string;
    r2SecretAccessKey: string;
    r2Bucket: string;
    r2Endpoint: string;
    connectTimeoutMs: number;
    timeoutMs: number;
  };
  policy: ImagePolicy;
  encoders: EncoderSettings;
  fetch: FetchSettings;
  maxHtmlBytes: number;
  maxBatchSize: number;
  imageConcurrency: number;
}

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function getEnvInt(env: Env, key: string, fallback: number): number {
  const value = env[key]?.trim();
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function getEnvBool(env: Env, key: string, fallback: boolean): boolean {
  const value = env[key]?.trim().toLowerCase();
  if (!value) return fallback;
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  return fallback;
}

function clampQuality(value: number): number {
  return Math.min(100, Math.max(1, value));
}

function isStorageDriver(value: string): value is StorageDriver {
  return value === "s3" || value === "fs";
}

export function loadConfig(env: Env = process.env): Config {
  const driver = getEnv(env, "STORAGE_DRIVER", "s3").toLowerCase();
  if (!isStorageDriver(driver)) {
    throw new Error(`STORAGE_DRIVER must be "s3" or "fs", got "${driver}"`);
  }

  const port = getEnvInt(env, "PORT", 8080);
  const accountId = getEnv(env, "R2_ACCOUNT_ID", "");

  const config: Config = {
    port,
    appBaseUrl: getEnv(env, "APP_BASE_URL", "http://localhost:3000").replace(/\/+$/, ""),
    trustedProxy: getEnvBool(env, "TRUSTED_PROXY", false),
    storage: {
      driver,
      dir: getEnv(env, "STORAGE_DIR", "assets"),
      publicBaseUrl: getEnv(
        env,
        "R2_PUBLIC_BASE_URL",
        driver === "fs" ? `http://localhost:${port}/assets` : "",
      ).replace(/\/+$/, ""),
      r2AccountId: accountId,
      r2AccessKeyId: getEnv(env, "R2_ACCESS_KEY_ID", ""),
      r2SecretAccessKey: getEnv(env, "R2_SECRET_ACCESS_KEY", ""),
      r2Bucket: getEnv(env, "R2_BUCKET", "mailpaste-assets"),
      r2Endpoint: getEnv(
        env,
        "R2_S3_ENDPOINT",
        accountId ? `https://${accountId}.r2.cloudflarestorage.com` : "",
      ),
      connectTimeoutMs: getEnvInt(env, "STORAGE_CONNECT_TIMEOUT_MS", 10_000),
      timeoutMs: getEnvInt(env, "STORAGE_TIMEOUT_MS", 30_000),
    },
    policy: {
      maxEdge: getEnvInt(env, "MAX_EDGE", 3840),
      passThroughBytes: getEnvInt(env, "PASS_THROUGH_BYTES", 1024 * 1024),
      resizeThresholdBytes: getEnvInt(env, "RESIZE_THRESHOLD_BYTES", 5 * 1024 * 1024),
      alphaSamplePoints: getEnvInt(env, "ALPHA_SAMPLE_POINTS", 400),
    },
    encoders: {
      jpegQuality: clampQuality(getEnvInt(env, "JPEG_QUALITY", 92)),
      jpegFallbackQuality: clampQuality(getEnvInt(env, "JPEG_FALLBACK_QUALITY", 85)),
      jpegProgressive: getEnvBool(env, "JPEG_PROGRESSIVE", true),
      oxipngPath: env.OXIPNG_PATH?.trim() ?? "oxipng",
    },
    fetch: {
      maxBytes: getEnvInt(env, "MAX_FETCH_BYTES", 30 * 1024 * 1024),
      connectTimeoutMs: getEnvInt(env, "FETCH_CONNECT_TIMEOUT_MS", 10_000),
      timeoutMs: getEnvInt(env, "FETCH_TIMEOUT_MS", 30_000),
      maxRedirects: getEnvInt(env, "FETCH_MAX_REDIRECTS", 5),
    },
    maxHtmlBytes: getEnvInt(env, "MAX_HTML_BYTES", 1_500_000),
    maxBatchSize: getEnvInt(env, "MAX_BATCH_SIZE", 20),
    imageConcurrency: getEnvInt(env, "IMAGE_CONCURRENCY", 4),
  };

  return config;
}

/** Fail fast on settings the chosen storage driver cannot run without. */
export function assertStorageConfig(config: Config): void {
  const { storage } = config;
  if (!storage.publicBaseUrl) {
    throw new Error("R2_PUBLIC_BASE_URL is required");
  }
  if (storage.driver === "s3") {
    if (!storage.r2AccessKeyId || !storage.r2SecretAccessKey) {
      throw new Error("R2 credentials are required (R2_ACCESS_KEY_ID, R2_SECRET_ACCESS_KEY)");
    }
    if (!storage.r2Endpoint) {
      throw new Error("R2_S3_ENDPOINT or R2_ACCOUNT_ID is required");
    }
  }
}
