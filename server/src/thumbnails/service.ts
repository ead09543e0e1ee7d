import type { MediaKey, ObjectRef, TransformSpec } from "../../../packages/shared/src/index.ts";
import { deriveMediaKey, normalizeTransformSpec, type NormalizedTransformSpec } from "../media/keys.ts";
import type { GenerationFn } from "../media/resolver.ts";
import type { RetrievedMediaObject, StorageAdapter } from "../storage/adapter.ts";
import { inferExtension } from "../storage/mime.ts";

export const THUMBNAIL_PREFIX = "thumbnails";

/**
 * Produces derived image bytes. Output must keep the source's image format.
 */
export type MediaTransform = (
  source: RetrievedMediaObject,
  spec: NormalizedTransformSpec,
  signal: AbortSignal
) => Promise<RetrievedMediaObject>;

/**
 * Hands the original through unchanged; deployments plug a real resizer in instead.
 */
export const passthroughTransform: MediaTransform = async (source) => source;

/**
 * Public URL under which a stored object is served.
 */
export function mediaUrl(storageKey: string): string {
  return `/media/${storageKey.split("/").map(encodeURIComponent).join("/")}`;
}

/**
 * Builds media keys and generation jobs for one thumbnail size.
 */
export class ThumbnailService {
  private readonly storage: StorageAdapter;
  private readonly transform: MediaTransform;
  private readonly spec: NormalizedTransformSpec;

  constructor(storage: StorageAdapter, spec: TransformSpec, transform: MediaTransform = passthroughTransform) {
    this.storage = storage;
    this.spec = normalizeTransformSpec(spec);
    this.transform = transform;
  }

  mediaKeyFor(objectRef: ObjectRef): MediaKey {
    return deriveMediaKey(objectRef, this.spec);
  }

  storageKeyFor(objectRef: ObjectRef): string {
    return `${THUMBNAIL_PREFIX}/${this.mediaKeyFor(objectRef)}${inferExtension(objectRef, "image/jpeg")}`;
  }

  /**
   * Generation job for the thumbnail of `objectRef`. Reuses a thumbnail already in storage.
   */
  generator(objectRef: ObjectRef): GenerationFn {
    const storageKey = this.storageKeyFor(objectRef);

    return async (signal) => {
      if (await this.storage.hasMediaObject(storageKey)) {
        return mediaUrl(storageKey);
      }

      signal.throwIfAborted();
      const source = await this.storage.getMediaObject(objectRef, signal);
      const derived = await this.transform(source, this.spec, signal);
      signal.throwIfAborted();

      await this.storage.putMediaObject(
        {
          storageKey,
          mimeType: derived.mimeType,
          bytes: derived.bytes
        },
        signal
      );

      return mediaUrl(storageKey);
    };
  }
}
