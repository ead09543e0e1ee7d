/**
 * Input payload for storing a media object under a caller-chosen key.
 */
export interface PutMediaObjectInput {
  storageKey: string;
  mimeType: string;
  bytes: Buffer;
}

/**
 * Metadata returned after storing a media object.
 */
export interface StoredMediaObject {
  storageKey: string;
  mimeType: string;
  byteSize: number;
}

/**
 * Binary object retrieved from storage.
 */
export interface RetrievedMediaObject {
  bytes: Buffer;
  mimeType: string;
}

/**
 * Raised when a storage key does not resolve to an object.
 */
export class MediaObjectNotFoundError extends Error {
  readonly code = "media_not_found";
  readonly storageKey: string;

  constructor(storageKey: string) {
    super(`media object not found: ${storageKey}`);
    this.name = "MediaObjectNotFoundError";
    this.storageKey = storageKey;
  }
}

/**
 * Storage adapter abstraction over local disk and S3.
 */
export interface StorageAdapter {
  putMediaObject(input: PutMediaObjectInput, signal?: AbortSignal): Promise<StoredMediaObject>;
  getMediaObject(storageKey: string, signal?: AbortSignal): Promise<RetrievedMediaObject>;
  hasMediaObject(storageKey: string): Promise<boolean>;
  /**
   * List keys directly under a directory-like prefix, sorted.
   */
  listMediaObjects(prefix: string): Promise<string[]>;
}
