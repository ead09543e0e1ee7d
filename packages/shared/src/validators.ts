/**
 * Runtime validators for external input.
 * These helpers enforce wire-level safety at API boundaries.
 */

import type { StatusEntry, StatusState } from "./models.ts";
import {
  BATCH_ID_PARAM,
  KEYS_PARAM,
  KEYS_SEPARATOR,
  type BatchManifest,
  type StatusQuery,
  type StatusResponse
} from "./protocol.ts";

export const MAX_KEYS_PER_STATUS_REQUEST = 200;

const STATUS_STATES: readonly StatusState[] = ["pending", "ready", "failed", "expired"];

function assertObject(value: unknown, context: string): asserts value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error(`${context} must be an object`);
  }
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new Error(`${field} must be a non-empty string`);
  }

  return value;
}

function optionalString(value: unknown, field: string): string | null {
  if (value == null) {
    return null;
  }

  if (typeof value !== "string") {
    throw new Error(`${field} must be a string or null`);
  }

  return value;
}

function requireStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${field} must be an array of non-empty strings`);
  }

  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== "string" || item.length === 0) {
      throw new Error(`${field} must be an array of non-empty strings`);
    }
    items.push(item);
  }

  return items;
}

function isStatusState(value: unknown): value is StatusState {
  return typeof value === "string" && STATUS_STATES.some((state) => state === value);
}

/**
 * Parse and validate the query string of a status poll.
 * Keys are de-duplicated in request order.
 */
export function parseStatusQuery(params: URLSearchParams): StatusQuery {
  const batchId = requireString(params.get(BATCH_ID_PARAM), BATCH_ID_PARAM).trim();
  const rawKeys = params.get(KEYS_PARAM) ?? "";

  const mediaKeys = [
    ...new Set(
      rawKeys
        .split(KEYS_SEPARATOR)
        .map((key) => key.trim())
        .filter((key) => key.length > 0)
    )
  ];

  if (mediaKeys.length > MAX_KEYS_PER_STATUS_REQUEST) {
    throw new Error(`${KEYS_PARAM} must list at most ${MAX_KEYS_PER_STATUS_REQUEST} keys`);
  }

  return { batchId, mediaKeys };
}

/**
 * Parse a single status entry from a poll response.
 */
export function parseStatusEntry(input: unknown, context: string): StatusEntry {
  assertObject(input, context);

  if (!isStatusState(input.state)) {
    throw new Error(`${context}.state must be one of ${STATUS_STATES.join(", ")}`);
  }

  return {
    state: input.state,
    resolvedSrc: optionalString(input.resolvedSrc, `${context}.resolvedSrc`),
    error: optionalString(input.error, `${context}.error`)
  };
}

/**
 * Parse and validate a status poll response body.
 */
export function parseStatusResponse(input: unknown): StatusResponse {
  assertObject(input, "status response");
  const batchId = requireString(input.batchId, "batchId");
  assertObject(input.entries, "entries");

  const entries: StatusResponse["entries"] = {};
  for (const [mediaKey, entry] of Object.entries(input.entries)) {
    entries[mediaKey] = parseStatusEntry(entry, `entries.${mediaKey}`);
  }

  return { batchId, entries };
}

/**
 * Parse and validate the manifest a rendered page embeds for the poller.
 */
export function parseBatchManifest(input: unknown): BatchManifest {
  assertObject(input, "batch manifest");

  return {
    batchId: requireString(input.batchId, "batchId"),
    mediaKeys: requireStringArray(input.mediaKeys, "mediaKeys"),
    unavailableSrc: requireString(input.unavailableSrc, "unavailableSrc")
  };
}

/**
 * Parse a 1-based page number, defaulting to the first page.
 */
export function parsePageNumber(raw: string | null): number {
  if (raw == null || raw.trim().length === 0) {
    return 1;
  }

  const page = Number(raw);
  if (!Number.isInteger(page) || page < 1) {
    throw new Error("page must be a positive integer");
  }

  return page;
}
