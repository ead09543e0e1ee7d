import { readBatchManifest, DomPlaceholderSurface } from "./dom-surface.ts";
import { MediaPoller, type MediaPollerOptions } from "./poller.ts";
import { createFetchStatusFetcher } from "./status-client.ts";

export * from "./dom-surface.ts";
export * from "./poller.ts";
export * from "./status-client.ts";

export type AsyncMediaOptions = Omit<MediaPollerOptions, "fetchStatus" | "surface"> &
  Partial<Pick<MediaPollerOptions, "fetchStatus">>;

/**
 * Start resolving the placeholders of a server-rendered page.
 * Returns the running poller, or null when the page has nothing to resolve.
 */
export function startAsyncMedia(doc: Document, options: AsyncMediaOptions = {}): MediaPoller | null {
  const manifest = readBatchManifest(doc);
  if (!manifest || manifest.mediaKeys.length === 0) {
    return null;
  }

  const poller = new MediaPoller({
    ...options,
    fetchStatus: options.fetchStatus ?? createFetchStatusFetcher(doc.baseURI),
    surface: new DomPlaceholderSurface(doc, manifest.batchId, manifest.unavailableSrc)
  });

  poller.start(manifest.batchId, manifest.mediaKeys).catch((error: unknown) => {
    console.error("async media polling stopped:", error);
  });

  return poller;
}
