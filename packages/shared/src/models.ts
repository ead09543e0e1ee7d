/**
 * Shared domain model types for lazythumb.
 */

export type MediaKey = string;
export type BatchId = string;
export type IsoDateTime = string;

/**
 * Reference to an underlying stored object, e.g. `originals/reef-2024/IMG_0001.jpg`.
 */
export type ObjectRef = string;

export type TransformFit = "cover" | "contain" | "inside";

export interface TransformSpec {
  width: number;
  height: number;
  fit?: TransformFit;
}

export type ResolutionState = "pending" | "ready" | "failed";

/**
 * Resolution states as seen by a poller. `expired` is reported for keys whose batch is gone.
 */
export type StatusState = ResolutionState | "expired";

export interface PlaceholderDescriptor {
  mediaKey: MediaKey;
  batchId: BatchId;
  placeholderSrc: string;
}

export type ResolutionRecord =
  | { mediaKey: MediaKey; state: "pending" }
  | { mediaKey: MediaKey; state: "ready"; resolvedSrc: string }
  | { mediaKey: MediaKey; state: "failed"; error: string };

export interface StatusEntry {
  state: StatusState;
  resolvedSrc: string | null;
  error: string | null;
}

export function isTerminalState(state: StatusState): boolean {
  return state !== "pending";
}
