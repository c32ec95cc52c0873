import type { StorageBackendConfig } from "../config/config.js";

export interface RemoteObject {
  key: string;
  sizeBytes: number;
}

export interface PutContentOptions {
  contentType: string;
  cacheControl?: string;
}

/**
 * Uniform capability over one bucket. Implementations throw on failure;
 * whether a failure is worth retrying is decided by `isTransientNetworkError`.
 */
export interface ObjectStore {
  readonly backend: StorageBackendConfig;
  /** Short label such as `s3://bucket`, used in logs and errors. */
  describe(): string;
  exists(key: string): Promise<boolean>;
  upload(localPath: string, key: string): Promise<void>;
  /**
   * Resets the object's modification or retention clock without changing its
   * content, so bucket lifecycle rules do not expire a bundle that is still
   * current.
   */
  refreshExpiration(key: string): Promise<void>;
  putContent(key: string, body: string, opts: PutContentOptions): Promise<void>;
  list(prefix: string): Promise<RemoteObject[]>;
}
