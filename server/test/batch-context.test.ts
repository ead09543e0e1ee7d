import test from "node:test";
import assert from "node:assert/strict";

import { BatchContext } from "../src/media/batch-context.ts";
import { BatchClosedError } from "../src/media/errors.ts";
import { AsyncResolver, type GenerationFn } from "../src/media/resolver.ts";

function makeResolver(): AsyncResolver {
  return new AsyncResolver({
    batchTtlMs: 60_000,
    maxAttempts: 1,
    attemptTimeoutMs: 1000,
    retryBackoffMs: 0,
    concurrency: 2
  });
}

test("register returns placeholders and enqueues each key once", async () => {
  const resolver = makeResolver();
  let calls = 0;
  const generate: GenerationFn = async () => {
    calls += 1;
    return "/media/thumbnails/a.jpg";
  };

  const batch = BatchContext.open(resolver, { placeholderSrc: "/static/loading.svg", batchId: "page-1" });
  const first = batch.register("a", generate);
  const again = batch.register("a", generate);
  batch.register("b", async () => "/media/thumbnails/b.jpg");
  batch.close();

  assert.equal(first, again);
  assert.deepEqual(first, { mediaKey: "a", batchId: "page-1", placeholderSrc: "/static/loading.svg" });
  assert.deepEqual(batch.mediaKeys, ["a", "b"]);

  await resolver.whenSettled("a");
  assert.equal(calls, 1);
  assert.equal(resolver.status("page-1", ["a"]).a?.state, "ready");
});

test("register after close raises BatchClosedError", () => {
  const resolver = makeResolver();
  const batch = BatchContext.open(resolver, { placeholderSrc: "/static/loading.svg", batchId: "page-2" });
  batch.close();

  assert.equal(batch.isClosed, true);
  assert.throws(() => batch.register("late", async () => "/x.jpg"), BatchClosedError);
  assert.throws(() => batch.register("late", async () => "/x.jpg"), /batch page-2 is closed/);
});

test("closing a batch leaves its jobs running", async () => {
  const resolver = makeResolver();
  let release: (url: string) => void = () => {};

  const batch = BatchContext.open(resolver, { placeholderSrc: "/static/loading.svg" });
  batch.register(
    "slow",
    () =>
      new Promise<string>((resolve) => {
        release = resolve;
      })
  );
  batch.close();

  assert.equal(resolver.status(batch.batchId, ["slow"]).slow?.state, "pending");
  release("/media/thumbnails/slow.jpg");
  await resolver.whenSettled("slow");
  assert.equal(resolver.status(batch.batchId, ["slow"]).slow?.resolvedSrc, "/media/thumbnails/slow.jpg");
});

test("each open allocates a distinct batch id", () => {
  const resolver = makeResolver();
  const first = BatchContext.open(resolver, { placeholderSrc: "/p.svg" });
  const second = BatchContext.open(resolver, { placeholderSrc: "/p.svg" });

  assert.notEqual(first.batchId, second.batchId);
});
