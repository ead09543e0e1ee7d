import fs from "node:fs/promises";
import path from "node:path";

import {
  MediaObjectNotFoundError,
  type PutMediaObjectInput,
  type RetrievedMediaObject,
  type StorageAdapter,
  type StoredMediaObject
} from "./adapter.ts";
import { inferMimeType } from "./mime.ts";

/**
 * Local filesystem storage adapter.
 */
export class LocalStorageAdapter implements StorageAdapter {
  private readonly mediaRootDirectory: string;

  constructor(mediaRootDirectory: string) {
    this.mediaRootDirectory = mediaRootDirectory;
  }

  async putMediaObject(input: PutMediaObjectInput, signal?: AbortSignal): Promise<StoredMediaObject> {
    const fullPath = this.resolvePath(input.storageKey);

    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, input.bytes, { signal });

    return {
      storageKey: input.storageKey,
      mimeType: input.mimeType,
      byteSize: input.bytes.length
    };
  }

  async getMediaObject(storageKey: string, signal?: AbortSignal): Promise<RetrievedMediaObject> {
    const fullPath = this.resolvePath(storageKey);

    try {
      const bytes = await fs.readFile(fullPath, { signal });
      return {
        bytes,
        mimeType: inferMimeType(fullPath)
      };
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new MediaObjectNotFoundError(storageKey);
      }
      throw error;
    }
  }

  async hasMediaObject(storageKey: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.resolvePath(storageKey));
      return stats.isFile();
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }

  async listMediaObjects(prefix: string): Promise<string[]> {
    const directoryKey = prefix.replace(/\/+$/, "");
    const directory = this.resolvePath(directoryKey);

    try {
      const entries = await fs.readdir(directory, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => `${directoryKey}/${entry.name}`)
        .sort();
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }
  }

  private resolvePath(storageKey: string): string {
    const normalized = path.posix.normalize(storageKey).replace(/^\/+/, "");
    const fullPath = path.resolve(this.mediaRootDirectory, normalized);
    const rootPath = path.resolve(this.mediaRootDirectory);

    if (fullPath !== rootPath && !fullPath.startsWith(`${rootPath}${path.sep}`)) {
      throw new Error("invalid storage key path");
    }

    return fullPath;
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}
