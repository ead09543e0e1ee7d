import test from "node:test";
import assert from "node:assert/strict";

import { MediaPoller, type PlaceholderSurface, type StatusFetcher } from "../../packages/client/src/index.ts";
import { BatchContext } from "../src/media/batch-context.ts";
import { AsyncResolver } from "../src/media/resolver.ts";

class RecordingSurface implements PlaceholderSurface {
  readonly shown = new Map<string, string>();

  showResolved(mediaKey: string, src: string): void {
    this.shown.set(mediaKey, `ready ${src}`);
  }

  showUnavailable(mediaKey: string, reason: string, error: string | null): void {
    this.shown.set(mediaKey, error ? `${reason} ${error}` : reason);
  }
}

test("a rendered batch resolves end to end through status polling", async () => {
  const clock = { now: 0 };
  const resolver = new AsyncResolver({
    batchTtlMs: 60_000,
    maxAttempts: 2,
    attemptTimeoutMs: 1000,
    retryBackoffMs: 1,
    concurrency: 2,
    now: () => clock.now
  });

  const batch = BatchContext.open(resolver, { placeholderSrc: "/static/media-loading.svg", batchId: "render-1" });
  batch.register("k1", async () => "/media/thumbnails/k1.jpg");
  batch.register("k2", async () => {
    throw new Error("decoder rejected the source");
  });
  batch.close();

  const requested: string[][] = [];
  const fetchStatus: StatusFetcher = async (batchId, mediaKeys) => {
    requested.push([...mediaKeys]);
    return { batchId, entries: resolver.status(batchId, mediaKeys) };
  };
  const surface = new RecordingSurface();
  const poller = new MediaPoller({ fetchStatus, surface, initialIntervalMs: 5, maxIntervalMs: 20, timeoutMs: 5000 });

  const outcome = await poller.start(batch.batchId, batch.mediaKeys);

  assert.equal(outcome.timedOut, false);
  assert.deepEqual([...outcome.resolved, ...outcome.unavailable].sort(), ["k1", "k2"]);
  assert.deepEqual(Object.fromEntries(surface.shown), {
    k1: "ready /media/thumbnails/k1.jpg",
    k2: "failed decoder rejected the source"
  });
  assert.deepEqual(requested[0], ["k1", "k2"]);
});

test("a poller for an expired batch marks every key unavailable at once", async () => {
  const resolver = new AsyncResolver({
    batchTtlMs: 60_000,
    maxAttempts: 1,
    attemptTimeoutMs: 1000,
    retryBackoffMs: 0,
    concurrency: 1
  });
  const surface = new RecordingSurface();
  const poller = new MediaPoller({
    fetchStatus: async (batchId, mediaKeys) => ({ batchId, entries: resolver.status(batchId, mediaKeys) }),
    surface,
    initialIntervalMs: 1
  });

  const outcome = await poller.start("gone", ["k1", "k2"]);

  assert.deepEqual(outcome.unavailable, ["k1", "k2"]);
  assert.deepEqual(Object.fromEntries(surface.shown), { k1: "expired", k2: "expired" });
});
