import { Storage, type Bucket } from "@google-cloud/storage";
import type { GcsBackendConfig } from "../config/config.js";
import type { ObjectStore, PutContentOptions, RemoteObject } from "./objectStore.js";

export class GcsObjectStore implements ObjectStore {
  private readonly bucket: Bucket;

  constructor(
    readonly backend: GcsBackendConfig,
    storage?: Storage
  ) {
    this.bucket = (storage ?? new Storage()).bucket(backend.bucket);
  }

  describe(): string {
    return `gs://${this.backend.bucket}`;
  }

  async exists(key: string): Promise<boolean> {
    const [exists] = await this.bucket.file(key).exists();
    return exists;
  }

  async upload(localPath: string, key: string): Promise<void> {
    await this.bucket.upload(localPath, { destination: key });
  }

  async refreshExpiration(key: string): Promise<void> {
    // Placing and releasing an event-based hold restarts the object's
    // retention period.
    const file = this.bucket.file(key);
    await file.setMetadata({ eventBasedHold: true });
    await file.setMetadata({ eventBasedHold: false });
  }

  async putContent(key: string, body: string, opts: PutContentOptions): Promise<void> {
    await this.bucket.file(key).save(body, {
      resumable: false,
      metadata: { contentType: opts.contentType, cacheControl: opts.cacheControl }
    });
  }

  async list(prefix: string): Promise<RemoteObject[]> {
    const [files] = await this.bucket.getFiles({ prefix });
    return files.map((f) => ({ key: f.name, sizeBytes: Number(f.metadata.size ?? 0) }));
  }
}
