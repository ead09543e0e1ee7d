/**
 * Wire contract between the page renderer, the status endpoint and the browser poller.
 */

import type { BatchId, MediaKey, StatusEntry } from "./models.ts";

export const STATUS_PATH = "/status";
export const BATCH_ID_PARAM = "batch_id";
export const KEYS_PARAM = "keys";
export const KEYS_SEPARATOR = ",";

export const BATCH_ID_ATTRIBUTE = "data-batch-id";
export const MEDIA_KEY_ATTRIBUTE = "data-media-key";
export const MEDIA_STATE_ATTRIBUTE = "data-media-state";
export const MANIFEST_ELEMENT_ID = "async-media-manifest";

/**
 * Embedded in the rendered page so the poller knows what to ask for.
 */
export interface BatchManifest {
  batchId: BatchId;
  mediaKeys: MediaKey[];
  unavailableSrc: string;
}

export interface StatusResponse {
  batchId: BatchId;
  entries: Record<MediaKey, StatusEntry>;
}

export interface StatusQuery {
  batchId: BatchId;
  mediaKeys: MediaKey[];
}

/**
 * Build the relative polling URL for a set of keys.
 */
export function buildStatusPath(batchId: BatchId, mediaKeys: readonly MediaKey[]): string {
  const params = new URLSearchParams();
  params.set(BATCH_ID_PARAM, batchId);
  params.set(KEYS_PARAM, mediaKeys.join(KEYS_SEPARATOR));
  return `${STATUS_PATH}?${params.toString()}`;
}
