import { createReadStream, type ReadStream } from "fs";
import {
  CopyObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  NotFound,
  PutObjectCommand,
  S3Client,
  S3ServiceException
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import type { S3BackendConfig } from "../config/config.js";
import type { ObjectStore, PutContentOptions, RemoteObject } from "./objectStore.js";

function isNotFound(err: unknown): boolean {
  if (err instanceof NotFound) return true;
  return err instanceof S3ServiceException && err.$metadata.httpStatusCode === 404;
}

function copySource(bucket: string, key: string): string {
  return `${bucket}/${key.split("/").map(encodeURIComponent).join("/")}`;
}

/** The stream is closed whether or not `fn` succeeds. */
export async function withFileStream<T>(localPath: string, fn: (body: ReadStream) => Promise<T>): Promise<T> {
  const body = createReadStream(localPath);
  try {
    return await fn(body);
  } finally {
    body.destroy();
  }
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;

  constructor(
    readonly backend: S3BackendConfig,
    client?: S3Client
  ) {
    this.client = client ?? new S3Client({ region: backend.region });
  }

  describe(): string {
    return `s3://${this.backend.bucket}`;
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.backend.bucket, Key: key }));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async upload(localPath: string, key: string): Promise<void> {
    await withFileStream(localPath, async (body) => {
      const upload = new Upload({
        client: this.client,
        params: { Bucket: this.backend.bucket, Key: key, Body: body }
      });
      await upload.done();
    });
  }

  async refreshExpiration(key: string): Promise<void> {
    // S3 rejects a copy onto itself unless something about the object
    // changes; replacing the metadata satisfies that.
    await this.client.send(
      new CopyObjectCommand({
        Bucket: this.backend.bucket,
        Key: key,
        CopySource: copySource(this.backend.bucket, key),
        MetadataDirective: "REPLACE"
      })
    );
  }

  async putContent(key: string, body: string, opts: PutContentOptions): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.backend.bucket,
        Key: key,
        Body: body,
        ContentType: opts.contentType,
        CacheControl: opts.cacheControl
      })
    );
  }

  async list(prefix: string): Promise<RemoteObject[]> {
    const out: RemoteObject[] = [];
    let token: string | undefined;
    do {
      const page = await this.client.send(
        new ListObjectsV2Command({ Bucket: this.backend.bucket, Prefix: prefix, ContinuationToken: token })
      );
      for (const obj of page.Contents ?? []) {
        if (obj.Key === undefined) continue;
        out.push({ key: obj.Key, sizeBytes: obj.Size ?? 0 });
      }
      token = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (token);
    return out;
  }
}
