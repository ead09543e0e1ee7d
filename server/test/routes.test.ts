import assert from "node:assert/strict";
import fs from "node:fs";
import type { IncomingMessage, ServerResponse } from "node:http";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { ImageCatalog } from "../src/catalog/images.ts";
import { ClientBundle } from "../src/client-bundle.ts";
import { Router, type DispatchResult } from "../src/http/router.ts";
import { AsyncResolver, type GenerationFn } from "../src/media/resolver.ts";
import { registerRoutes, type RouteDependencies } from "../src/routes.ts";
import { LocalStorageAdapter } from "../src/storage/local-storage.ts";
import { ThumbnailService } from "../src/thumbnails/service.ts";

class FakeResponse {
  statusCode = 200;
  headersSent = false;
  readonly headers = new Map<string, string | number>();
  body: Buffer = Buffer.alloc(0);

  setHeader(name: string, value: string | number): this {
    this.headers.set(name.toLowerCase(), value);
    return this;
  }

  end(chunk?: string | Buffer): this {
    if (chunk !== undefined) {
      this.body = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, "utf8");
    }
    this.headersSent = true;
    return this;
  }

  json(): unknown {
    return JSON.parse(this.body.toString("utf8"));
  }
}

interface Harness {
  router: Router;
  resolver: AsyncResolver;
  thumbnails: ThumbnailService;
}

function tmpDirectory(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `lazythumb-${prefix}-`));
}

async function makeHarness(clientBundle: RouteDependencies["clientBundle"] = new ClientBundle()): Promise<Harness> {
  const storage = new LocalStorageAdapter(tmpDirectory("routes-media"));
  await storage.putMediaObject({ storageKey: "originals/reef/a.jpg", mimeType: "image/jpeg", bytes: Buffer.from("jpeg-a") });

  const staticFiles = new LocalStorageAdapter(tmpDirectory("routes-static"));
  await staticFiles.putMediaObject({
    storageKey: "media-loading.svg",
    mimeType: "image/svg+xml",
    bytes: Buffer.from("<svg/>")
  });

  const resolver = new AsyncResolver({
    batchTtlMs: 60_000,
    maxAttempts: 1,
    attemptTimeoutMs: 5000,
    retryBackoffMs: 0,
    concurrency: 1
  });
  const thumbnails = new ThumbnailService(storage, { width: 150, height: 150 });
  const router = new Router();

  registerRoutes(router, {
    config: {
      imagesPerPage: 20,
      jobsPerPage: 2,
      thumbnailWidth: 150,
      thumbnailHeight: 150,
      clientScriptUrl: "/static/async-media.js"
    },
    resolver,
    storage,
    staticFiles,
    catalog: new ImageCatalog(storage),
    thumbnails,
    clientBundle,
    now: () => new Date("2026-01-02T03:04:05.000Z")
  });

  return { router, resolver, thumbnails };
}

async function request(
  router: Router,
  url: string,
  method = "GET"
): Promise<{ result: DispatchResult; res: FakeResponse }> {
  const req = { url, method, headers: { host: "thumbs.test" } } as unknown as IncomingMessage;
  const res = new FakeResponse();
  const result = await router.dispatch(req, res as unknown as ServerResponse);
  return { result, res };
}

interface SourceJobsPage {
  sourceId: string;
  pageNumber: number;
  pageCount: number;
  totalJobs: number;
  jobs: Array<{ mediaKey: string; status: string; attempts: number }>;
}

function isSourceJobsPage(value: unknown): value is SourceJobsPage {
  return typeof value === "object" && value !== null && "jobs" in value && Array.isArray(value.jobs);
}

function blocking(): GenerationFn {
  return (signal) =>
    new Promise<string>((_, reject) => {
      signal.addEventListener("abort", () => reject(signal.reason), { once: true });
    });
}

test("GET /health reports the service", async () => {
  const { router } = await makeHarness();
  const { res } = await request(router, "/health");

  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { ok: true, service: "lazythumb-server", timestamp: "2026-01-02T03:04:05.000Z" });
});

test("GET /status answers every requested key without caching", async () => {
  const { router, resolver } = await makeHarness();
  resolver.openBatch("b1");
  resolver.enqueue("b1", "k1", async () => "/media/thumbnails/k1.jpg");
  await resolver.whenSettled("k1");

  const { res } = await request(router, "/status?batch_id=b1&keys=k1%2Cghost");

  assert.equal(res.statusCode, 200);
  assert.equal(res.headers.get("cache-control"), "no-store");
  assert.deepEqual(res.json(), {
    batchId: "b1",
    entries: {
      k1: { state: "ready", resolvedSrc: "/media/thumbnails/k1.jpg", error: null },
      ghost: { state: "expired", resolvedSrc: null, error: null }
    }
  });
});

test("GET /status rejects a malformed query", async () => {
  const { router } = await makeHarness();

  const missingBatch = await request(router, "/status?keys=k1");
  assert.equal(missingBatch.res.statusCode, 400);
  assert.deepEqual(missingBatch.res.json(), {
    error: "invalid_status_query",
    message: "batch_id must be a non-empty string"
  });

  const tooMany = Array.from({ length: 201 }, (_, index) => `k${index}`).join(",");
  const oversized = await request(router, `/status?batch_id=b1&keys=${tooMany}`);
  assert.equal(oversized.res.statusCode, 400);
  assert.deepEqual(oversized.res.json(), {
    error: "invalid_status_query",
    message: "keys must list at most 200 keys"
  });
});

test("GET /jobs lists groups with outstanding work first", async () => {
  const { router, resolver } = await makeHarness();
  resolver.openBatch("b1");
  resolver.enqueue("b1", "x", async () => "/media/thumbnails/x.jpg", { group: "alpha" });
  await resolver.whenSettled("x");
  resolver.enqueue("b1", "y", blocking(), { group: "zeta" });
  resolver.enqueue("b1", "z", blocking(), { group: "beta" });
  await new Promise((resolve) => setImmediate(resolve));

  const { res } = await request(router, "/jobs");

  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), {
    generatedAt: "2026-01-02T03:04:05.000Z",
    openBatches: 1,
    totals: { queued: 1, inProgress: 1, ready: 1, failed: 0 },
    groups: [
      { group: "beta", queued: 1, inProgress: 0, ready: 0, failed: 0 },
      { group: "zeta", queued: 0, inProgress: 1, ready: 0, failed: 0 },
      { group: "alpha", queued: 0, inProgress: 0, ready: 1, failed: 0 }
    ]
  });

  resolver.stop();
});

test("GET /sources/:sourceId/jobs pages through one source's jobs, busiest first", async () => {
  const { router, resolver } = await makeHarness();
  resolver.openBatch("b1");
  resolver.enqueue("b1", "x", async () => "/media/thumbnails/x.jpg", { group: "reef" });
  await resolver.whenSettled("x");
  await new Promise((resolve) => setImmediate(resolve));
  resolver.enqueue("b1", "y", blocking(), { group: "reef" });
  resolver.enqueue("b1", "z", blocking(), { group: "reef" });
  resolver.enqueue("b1", "w", blocking(), { group: "lagoon" });
  await new Promise((resolve) => setImmediate(resolve));

  const first = await request(router, "/sources/reef/jobs");
  assert.equal(first.res.statusCode, 200);
  assert.equal(first.res.headers.get("cache-control"), "no-store");
  const firstPage = first.res.json();
  assert.ok(isSourceJobsPage(firstPage));
  assert.equal(firstPage.sourceId, "reef");
  assert.equal(firstPage.pageNumber, 1);
  assert.equal(firstPage.pageCount, 2);
  assert.equal(firstPage.totalJobs, 3);
  assert.deepEqual(
    firstPage.jobs.map((job) => [job.mediaKey, job.status, job.attempts]),
    [
      ["y", "inProgress", 1],
      ["z", "queued", 0]
    ]
  );

  const second = await request(router, "/sources/reef/jobs?page=2");
  const secondPage = second.res.json();
  assert.ok(isSourceJobsPage(secondPage));
  assert.deepEqual(
    secondPage.jobs.map((job) => [job.mediaKey, job.status, job.attempts]),
    [["x", "ready", 1]]
  );

  const invalidPage = await request(router, "/sources/reef/jobs?page=abc");
  assert.equal(invalidPage.res.statusCode, 400);
  assert.deepEqual(invalidPage.res.json(), { error: "invalid_page", message: "page must be a positive integer" });

  const invalidSource = await request(router, "/sources/bad!id/jobs");
  assert.equal(invalidSource.res.statusCode, 400);

  resolver.stop();
});

test("the client script is bundled from its sources and served as JavaScript", async () => {
  const { router } = await makeHarness();

  const { res } = await request(router, "/static/async-media.js");

  assert.equal(res.statusCode, 200);
  assert.equal(res.headers.get("content-type"), "text/javascript; charset=utf-8");
  const script = res.body.toString("utf8");
  assert.ok(script.includes('"async-media-manifest"'));
  assert.ok(script.includes("startAsyncMedia(document)"));
});

test("a client bundle that cannot be built is reported as a server error", async () => {
  const { router } = await makeHarness({
    load: async () => {
      throw new Error("entry point missing");
    }
  });

  const { res } = await request(router, "/static/async-media.js");

  assert.equal(res.statusCode, 500);
  assert.deepEqual(res.json(), { error: "client_bundle_failed", message: "entry point missing" });
});

test("GET /sources/:sourceId/browse renders the grid or explains why not", async () => {
  const { router, resolver, thumbnails } = await makeHarness();

  const page = await request(router, "/sources/reef/browse");
  assert.equal(page.res.statusCode, 200);
  assert.equal(page.res.headers.get("content-type"), "text/html; charset=utf-8");
  const mediaKey = thumbnails.mediaKeyFor("originals/reef/a.jpg");
  assert.ok(page.res.body.toString("utf8").includes(`data-media-key="${mediaKey}"`));
  await resolver.whenSettled(mediaKey);

  const missing = await request(router, "/sources/lagoon/browse");
  assert.equal(missing.res.statusCode, 404);
  assert.deepEqual(missing.res.json(), { error: "source_not_found" });

  const invalidSource = await request(router, "/sources/bad!id/browse");
  assert.equal(invalidSource.res.statusCode, 400);
  assert.deepEqual(invalidSource.res.json(), { error: "invalid_source_id" });

  const invalidPage = await request(router, "/sources/reef/browse?page=0");
  assert.equal(invalidPage.res.statusCode, 400);
  assert.deepEqual(invalidPage.res.json(), { error: "invalid_page", message: "page must be a positive integer" });
});

test("media and static routes serve stored objects", async () => {
  const { router } = await makeHarness();

  const original = await request(router, "/media/originals/reef/a.jpg");
  assert.equal(original.res.statusCode, 200);
  assert.equal(original.res.headers.get("content-type"), "image/jpeg");
  assert.equal(original.res.body.toString("utf8"), "jpeg-a");

  const asset = await request(router, "/static/media-loading.svg");
  assert.equal(asset.res.statusCode, 200);
  assert.equal(asset.res.headers.get("content-type"), "image/svg+xml");
  assert.equal(asset.res.headers.get("cache-control"), "public, max-age=3600");

  const missing = await request(router, "/media/thumbnails/none.jpg");
  assert.equal(missing.res.statusCode, 404);
  assert.deepEqual(missing.res.json(), { error: "media_not_found" });

  const traversal = await request(router, "/media/thumbnails/..%2Fsecret.jpg");
  assert.equal(traversal.res.statusCode, 400);
  assert.deepEqual(traversal.res.json(), { error: "invalid_media_path" });
});

test("unknown paths and methods are reported to the caller", async () => {
  const { router } = await makeHarness();

  assert.equal((await request(router, "/nowhere")).result, "not_found");
  assert.equal((await request(router, "/status?batch_id=b1&keys=k1", "POST")).result, "method_not_allowed");
});
