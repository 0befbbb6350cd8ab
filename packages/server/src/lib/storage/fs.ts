/**
 * Local-directory object store for development. Objects land under `dir`
 * at their key; the server exposes the directory read-only at /assets.
 */

import { randomUUID } from "node:crypto";
import { mkdir, stat, writeFile, rename } from "node:fs/promises";
import { dirname, join, resolve, sep } from "node:path";
import { PipelineError, errorMessage } from "../errors.js";
import { joinPublicUrl, type ObjectStore } from "./types.js";

const KEY_RE = /^[a-z2-7]{2}\/[a-z2-7]+\.(jpg|png)$/;

export class FsObjectStore implements ObjectStore {
  readonly root: string;

  constructor(
    dir: string,
    private readonly publicBaseUrl: string,
  ) {
    this.root = resolve(dir);
  }

  publicUrlFor(key: string): string {
    return joinPublicUrl(this.publicBaseUrl, key);
  }

  /** Absolute path for a key, or null when the key could escape the root. */
  pathFor(key: string): string | null {
    if (!KEY_RE.test(key)) return null;
    const path = resolve(join(this.root, key));
    return path.startsWith(this.root + sep) ? path : null;
  }

  async exists(key: string): Promise<boolean> {
    const path = this.pathFor(key);
    if (!path) return false;
    try {
      return (await stat(path)).isFile();
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
      throw new PipelineError("StorageUnavailable", `failed to check object existence: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async put(key: string, data: Uint8Array): Promise<void> {
    const path = this.pathFor(key);
    if (!path) {
      throw new PipelineError("StorageWriteFailed", `invalid storage key: ${key}`);
    }
    try {
      await mkdir(dirname(path), { recursive: true });
      // Write then rename so a reader never sees a half-written object.
      // Each put gets its own temp file; the last rename wins with identical bytes.
      const tmp = `${path}.${randomUUID()}.tmp`;
      await writeFile(tmp, data);
      await rename(tmp, path);
    } catch (err) {
      throw new PipelineError("StorageWriteFailed", `failed to write to storage: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
