import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  NotFound,
  PutObjectCommand,
  S3Client
} from "@aws-sdk/client-s3";

import {
  MediaObjectNotFoundError,
  type PutMediaObjectInput,
  type RetrievedMediaObject,
  type StorageAdapter,
  type StoredMediaObject
} from "./adapter.ts";
import { inferMimeType } from "./mime.ts";

export interface S3StorageOptions {
  bucket: string;
  region: string;
  endpoint?: string;
}

/**
 * S3-compatible object storage adapter.
 */
export class S3StorageAdapter implements StorageAdapter {
  private readonly bucket: string;
  private readonly client: S3Client;

  constructor(options: S3StorageOptions, client?: S3Client) {
    this.bucket = options.bucket;
    this.client =
      client ??
      new S3Client({
        region: options.region,
        endpoint: options.endpoint,
        forcePathStyle: Boolean(options.endpoint)
      });
  }

  async putMediaObject(input: PutMediaObjectInput, signal?: AbortSignal): Promise<StoredMediaObject> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: input.storageKey,
        Body: input.bytes,
        ContentType: input.mimeType,
        CacheControl: "public, max-age=31536000, immutable"
      }),
      { abortSignal: signal }
    );

    return {
      storageKey: input.storageKey,
      mimeType: input.mimeType,
      byteSize: input.bytes.length
    };
  }

  async getMediaObject(storageKey: string, signal?: AbortSignal): Promise<RetrievedMediaObject> {
    try {
      const output = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: storageKey }), {
        abortSignal: signal
      });
      if (!output.Body) {
        throw new MediaObjectNotFoundError(storageKey);
      }

      return {
        bytes: Buffer.from(await output.Body.transformToByteArray()),
        mimeType: output.ContentType ?? inferMimeType(storageKey)
      };
    } catch (error) {
      if (error instanceof NoSuchKey) {
        throw new MediaObjectNotFoundError(storageKey);
      }
      throw error;
    }
  }

  async hasMediaObject(storageKey: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: storageKey }));
      return true;
    } catch (error) {
      if (error instanceof NotFound) {
        return false;
      }
      throw error;
    }
  }

  async listMediaObjects(prefix: string): Promise<string[]> {
    const directoryPrefix = `${prefix.replace(/\/+$/, "")}/`;
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: directoryPrefix,
          Delimiter: "/",
          ContinuationToken: continuationToken
        })
      );

      for (const item of page.Contents ?? []) {
        if (item.Key && item.Key !== directoryPrefix) {
          keys.push(item.Key);
        }
      }

      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys.sort();
  }
}
