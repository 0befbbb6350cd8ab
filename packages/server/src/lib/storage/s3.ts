/**
 * S3-compatible object store (Cloudflare R2 in production).
 */

import { HeadObjectCommand, PutObjectCommand, S3Client, S3ServiceException } from "@aws-sdk/client-s3";
import { withDeadline } from "../deadline.js";
import { PipelineError, abortedError, errorMessage } from "../errors.js";
import { joinPublicUrl, type ObjectStore } from "./types.js";

export interface S3ObjectStoreOptions {
  endpoint: string;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  publicBaseUrl: string;
  region?: string;
  /** TCP/TLS connect limit per attempt. */
  connectTimeoutMs: number;
  /** Overall limit for one store call. */
  timeoutMs: number;
  /** Inject a preconfigured client (tests). */
  client?: S3Client;
}

function isNotFound(err: unknown): boolean {
  if (err instanceof S3ServiceException) {
    return err.name === "NotFound" || err.name === "NoSuchKey" || err.$metadata.httpStatusCode === 404;
  }
  return false;
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly publicBaseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: S3ObjectStoreOptions) {
    this.bucket = options.bucket;
    this.publicBaseUrl = options.publicBaseUrl;
    this.timeoutMs = options.timeoutMs;
    this.client =
      options.client ??
      new S3Client({
        region: options.region ?? "auto",
        endpoint: options.endpoint,
        credentials: { accessKeyId: options.accessKeyId, secretAccessKey: options.secretAccessKey },
        forcePathStyle: true,
        maxAttempts: 1,
        requestHandler: {
          connectionTimeout: options.connectTimeoutMs,
          requestTimeout: options.timeoutMs,
        },
      });
  }

  publicUrlFor(key: string): string {
    return joinPublicUrl(this.publicBaseUrl, key);
  }

  async exists(key: string, signal?: AbortSignal): Promise<boolean> {
    const deadline = withDeadline(signal, this.timeoutMs);
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }), {
        abortSignal: deadline.signal,
      });
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      if (signal?.aborted) throw abortedError(signal, "storage lookup");
      if (deadline.timedOut()) {
        throw new PipelineError("StorageUnavailable", `storage lookup timed out after ${this.timeoutMs}ms`, {
          cause: err,
        });
      }
      throw new PipelineError("StorageUnavailable", `failed to check object existence: ${errorMessage(err)}`, {
        cause: err,
      });
    } finally {
      deadline.dispose();
    }
  }

  async put(
    key: string,
    data: Uint8Array,
    contentType: string,
    cacheControl: string,
    signal?: AbortSignal,
  ): Promise<void> {
    const deadline = withDeadline(signal, this.timeoutMs);
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: data,
          ContentType: contentType,
          ContentLength: data.byteLength,
          CacheControl: cacheControl,
          Metadata: { source: "mailpaste" },
        }),
        { abortSignal: deadline.signal },
      );
    } catch (err) {
      if (signal?.aborted) throw abortedError(signal, "storage upload");
      if (deadline.timedOut()) {
        throw new PipelineError("StorageWriteFailed", `storage upload timed out after ${this.timeoutMs}ms`, {
          cause: err,
        });
      }
      throw new PipelineError("StorageWriteFailed", `failed to upload to storage: ${errorMessage(err)}`, {
        cause: err,
      });
    } finally {
      deadline.dispose();
    }
  }

  destroy(): void {
    this.client.destroy();
  }
}
