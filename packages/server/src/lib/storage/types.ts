/** The narrow object-store surface the content store needs. */
export interface ObjectStore {
  /** True when an object already sits at `key`. Not-found is false, never an error. */
  exists(key: string, signal?: AbortSignal): Promise<boolean>;
  put(key: string, data: Uint8Array, contentType: string, cacheControl: string, signal?: AbortSignal): Promise<void>;
  publicUrlFor(key: string): string;
}

export function joinPublicUrl(baseUrl: string, key: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${key}`;
}
