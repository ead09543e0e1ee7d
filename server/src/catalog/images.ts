import path from "node:path";

import type { ObjectRef } from "../../../packages/shared/src/index.ts";
import type { StorageAdapter } from "../storage/adapter.ts";
import { isImageFile } from "../storage/mime.ts";

export const ORIGINALS_PREFIX = "originals";

const SOURCE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;

export interface CatalogImage {
  objectRef: ObjectRef;
  name: string;
}

export function isValidSourceId(sourceId: string): boolean {
  return SOURCE_ID_PATTERN.test(sourceId);
}

/**
 * Read-only view of the original images stored per source.
 */
export class ImageCatalog {
  private readonly storage: StorageAdapter;

  constructor(storage: StorageAdapter) {
    this.storage = storage;
  }

  async listSourceImages(sourceId: string): Promise<CatalogImage[]> {
    if (!isValidSourceId(sourceId)) {
      throw new Error(`invalid source id: ${sourceId}`);
    }

    const keys = await this.storage.listMediaObjects(`${ORIGINALS_PREFIX}/${sourceId}`);
    return keys
      .filter((key) => isImageFile(key))
      .map((key) => ({ objectRef: key, name: path.posix.basename(key) }));
  }
}
