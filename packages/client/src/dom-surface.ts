import {
  BATCH_ID_ATTRIBUTE,
  MANIFEST_ELEMENT_ID,
  MEDIA_KEY_ATTRIBUTE,
  MEDIA_STATE_ATTRIBUTE,
  parseBatchManifest,
  type BatchId,
  type BatchManifest,
  type MediaKey
} from "../../shared/src/index.ts";
import type { PlaceholderSurface, UnavailableReason } from "./poller.ts";

/**
 * Read the batch manifest a rendered page embeds. Returns null when the page has none.
 */
export function readBatchManifest(doc: Document): BatchManifest | null {
  const element = doc.getElementById(MANIFEST_ELEMENT_ID);
  const text = element?.textContent?.trim();
  if (!text) {
    return null;
  }

  return parseBatchManifest(JSON.parse(text));
}

/**
 * Swaps `<img data-batch-id data-media-key>` placeholders in place.
 * The same key may appear in several cells; all of them are updated.
 */
export class DomPlaceholderSurface implements PlaceholderSurface {
  private readonly elements = new Map<MediaKey, Element[]>();
  private readonly unavailableSrc: string;

  constructor(root: ParentNode, batchId: BatchId, unavailableSrc: string) {
    this.unavailableSrc = unavailableSrc;

    for (const element of root.querySelectorAll(`img[${MEDIA_KEY_ATTRIBUTE}]`)) {
      if (element.getAttribute(BATCH_ID_ATTRIBUTE) !== batchId) {
        continue;
      }

      const mediaKey = element.getAttribute(MEDIA_KEY_ATTRIBUTE);
      if (!mediaKey) {
        continue;
      }

      const group = this.elements.get(mediaKey) ?? [];
      group.push(element);
      this.elements.set(mediaKey, group);
    }
  }

  showResolved(mediaKey: MediaKey, src: string): void {
    for (const element of this.elements.get(mediaKey) ?? []) {
      element.setAttribute("src", src);
      element.setAttribute(MEDIA_STATE_ATTRIBUTE, "ready");
    }
  }

  showUnavailable(mediaKey: MediaKey, reason: UnavailableReason, error: string | null): void {
    for (const element of this.elements.get(mediaKey) ?? []) {
      element.setAttribute("src", this.unavailableSrc);
      element.setAttribute(MEDIA_STATE_ATTRIBUTE, reason);
      element.setAttribute("title", error ? `Thumbnail unavailable: ${error}` : "Thumbnail unavailable");
    }
  }
}
