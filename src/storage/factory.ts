import type { StorageBackendConfig } from "../config/config.js";
import { GcsObjectStore } from "./gcsObjectStore.js";
import type { ObjectStore } from "./objectStore.js";
import { S3ObjectStore } from "./s3ObjectStore.js";

export function createObjectStore(backend: StorageBackendConfig): ObjectStore {
  switch (backend.provider) {
    case "s3":
      return new S3ObjectStore(backend);
    case "gcs":
      return new GcsObjectStore(backend);
  }
}

export function createObjectStores(backends: readonly StorageBackendConfig[]): ObjectStore[] {
  return backends.map(createObjectStore);
}
