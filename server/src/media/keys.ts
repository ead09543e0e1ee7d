import { createHash } from "node:crypto";

import type { MediaKey, ObjectRef, TransformFit, TransformSpec } from "../../../packages/shared/src/index.ts";
import { InvalidSpecError } from "./errors.ts";

const TRANSFORM_FITS: readonly TransformFit[] = ["cover", "contain", "inside"];
const MAX_DIMENSION = 10_000;

// 128 bits of SHA-256.
const MEDIA_KEY_HEX_LENGTH = 32;

/**
 * Transform spec with defaults applied.
 */
export interface NormalizedTransformSpec {
  width: number;
  height: number;
  fit: TransformFit;
}

/**
 * Validate a transform spec and apply defaults.
 */
export function normalizeTransformSpec(spec: TransformSpec): NormalizedTransformSpec {
  const fit = spec.fit ?? "cover";
  if (!TRANSFORM_FITS.includes(fit)) {
    throw new InvalidSpecError(`fit must be one of ${TRANSFORM_FITS.join(", ")}`);
  }

  return {
    width: requireDimension(spec.width, "width"),
    height: requireDimension(spec.height, "height"),
    fit
  };
}

/**
 * Derive the media key for a derived asset of `objectRef`.
 * Pure: never touches storage, so the referenced object may not exist yet.
 */
export function deriveMediaKey(objectRef: ObjectRef, spec: TransformSpec): MediaKey {
  if (objectRef.trim().length === 0) {
    throw new InvalidSpecError("object reference must be a non-empty string");
  }

  const normalized = normalizeTransformSpec(spec);
  // Fixed field order keeps the digest independent of how the spec object was built.
  const canonical = JSON.stringify([objectRef, normalized.width, normalized.height, normalized.fit]);

  return createHash("sha256").update(canonical, "utf8").digest("hex").slice(0, MEDIA_KEY_HEX_LENGTH);
}

function requireDimension(value: number, field: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidSpecError(`${field} must be a positive integer`);
  }

  if (value > MAX_DIMENSION) {
    throw new InvalidSpecError(`${field} must be at most ${MAX_DIMENSION}`);
  }

  return value;
}
