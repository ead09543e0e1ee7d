import { setTimeout as delay } from "node:timers/promises";

import type {
  BatchId,
  JobCounts,
  JobGroupSummary,
  JobRow,
  JobStatus,
  MediaKey,
  ResolutionRecord,
  StatusEntry
} from "../../../packages/shared/src/index.ts";
import { GenerationCancelledError, GenerationTimeoutError, MediaError, summarizeError } from "./errors.ts";
import { WorkerPool } from "./worker-pool.ts";

/**
 * Produces the final URL of a derived asset. Must honour `signal` to be cancellable.
 */
export type GenerationFn = (signal: AbortSignal) => Promise<string>;

export interface EnqueueOptions {
  /** Label used to aggregate jobs on the dashboard, usually the source id. */
  group?: string;
}

export interface AsyncResolverOptions {
  batchTtlMs: number;
  maxAttempts: number;
  attemptTimeoutMs: number;
  retryBackoffMs: number;
  concurrency: number;
  /**
   * How long a timed-out or cancelled attempt may keep running before its key is failed outright.
   * Defaults to `attemptTimeoutMs`.
   */
  abandonGraceMs?: number;
  now?: () => number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface ResolverSnapshot {
  openBatches: number;
  totals: JobCounts;
  groups: JobGroupSummary[];
}

type JobPhase = "queued" | "running" | "done";

interface BatchEntry {
  openedAt: number;
  keys: Set<MediaKey>;
}

interface JobEntry {
  mediaKey: MediaKey;
  group: string | null;
  record: ResolutionRecord;
  phase: JobPhase;
  /** Batches still awaiting this key; its size is the reference count. */
  batches: Set<BatchId>;
  controller: AbortController;
  ticket: number | null;
  attempts: number;
  createdAt: number;
  updatedAt: number;
  /** Resolves once the record is terminal or the job has been dropped. */
  settled: Promise<void>;
  markSettled: () => void;
  /** Resolves once no generation for this job is running any more. */
  stopped: Promise<void>;
  markStopped: () => void;
}

type AttemptOutcome =
  | { ok: true; resolvedSrc: string }
  | { ok: false; error: unknown; straggler: Promise<void> | null };

const EXPIRED_ENTRY: StatusEntry = { state: "expired", resolvedSrc: null, error: null };

/**
 * Process-wide registry of in-flight media generation.
 *
 * Holds at most one job per media key across all batches. Records are reference counted by the
 * batches that registered them and dropped once the last of those batches expires.
 */
export class AsyncResolver {
  private readonly batches = new Map<BatchId, BatchEntry>();
  private readonly jobs = new Map<MediaKey, JobEntry>();
  /** Dropped jobs whose generation has not stopped yet. */
  private readonly stopping = new Map<MediaKey, Promise<void>>();
  private readonly pool: WorkerPool;
  private readonly options: AsyncResolverOptions;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(options: AsyncResolverOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new Error("maxAttempts must be a positive integer");
    }

    this.options = options;
    this.pool = new WorkerPool(options.concurrency);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));
  }

  /**
   * Start tracking a batch. Its TTL runs from this moment.
   */
  openBatch(batchId: BatchId): void {
    if (this.batches.has(batchId)) {
      throw new MediaError("duplicate_batch", `batch ${batchId} is already open`);
    }

    this.batches.set(batchId, { openedAt: this.now(), keys: new Set() });
  }

  /**
   * Attach `mediaKey` to a batch and make sure exactly one generation job exists for it.
   * Repeated calls for the same (batch, key) are no-ops. A key whose job failed permanently is
   * generated again, keeping the batches that already reference it.
   */
  enqueue(batchId: BatchId, mediaKey: MediaKey, generate: GenerationFn, options: EnqueueOptions = {}): void {
    const batch = this.batches.get(batchId);
    if (!batch || this.isExpired(batch)) {
      throw new MediaError("unknown_batch", `batch ${batchId} is unknown or expired`);
    }

    if (batch.keys.has(mediaKey)) {
      return;
    }

    // Check-and-insert happens without yielding, so no other caller can interleave between them.
    batch.keys.add(mediaKey);
    const existing = this.jobs.get(mediaKey);
    if (existing && !isRetryable(existing)) {
      existing.batches.add(batchId);
      return;
    }

    const batches = new Set<BatchId>(existing?.batches);
    batches.add(batchId);
    const job = this.createJob(mediaKey, options.group ?? existing?.group ?? null, batches);
    this.jobs.set(mediaKey, job);
    job.ticket = this.pool.submit(() => this.runJob(job, generate));
  }

  /**
   * Read the current state of `mediaKeys` as seen by one batch.
   * Keys outside the batch, or belonging to an expired batch, report `expired`.
   */
  status(batchId: BatchId, mediaKeys: readonly MediaKey[]): Record<MediaKey, StatusEntry> {
    const batch = this.batches.get(batchId);
    const live = batch !== undefined && !this.isExpired(batch);
    const entries: Record<MediaKey, StatusEntry> = {};

    for (const mediaKey of mediaKeys) {
      const job = live && batch.keys.has(mediaKey) ? this.jobs.get(mediaKey) : undefined;
      entries[mediaKey] = job ? toStatusEntry(job.record) : EXPIRED_ENTRY;
    }

    return entries;
  }

  /**
   * Number of open batches currently referencing `mediaKey`.
   */
  referenceCount(mediaKey: MediaKey): number {
    return this.jobs.get(mediaKey)?.batches.size ?? 0;
  }

  /**
   * Attempts made so far for `mediaKey`, or 0 when no job is tracked.
   */
  attemptCount(mediaKey: MediaKey): number {
    return this.jobs.get(mediaKey)?.attempts ?? 0;
  }

  /**
   * Resolve once the job for `mediaKey` reaches a terminal state or is cancelled.
   */
  whenSettled(mediaKey: MediaKey): Promise<void> {
    return this.jobs.get(mediaKey)?.settled ?? Promise.resolve();
  }

  /**
   * Evict every batch whose TTL has elapsed. Returns the number of batches evicted.
   */
  evictExpired(now: number = this.now()): number {
    let evicted = 0;

    for (const [batchId, batch] of this.batches) {
      if (batch.openedAt + this.options.batchTtlMs <= now) {
        this.releaseBatch(batchId);
        evicted += 1;
      }
    }

    return evicted;
  }

  /**
   * Forget a batch and drop its reference on every key. Jobs nobody else awaits are cancelled.
   */
  releaseBatch(batchId: BatchId): void {
    const batch = this.batches.get(batchId);
    if (!batch) {
      return;
    }

    this.batches.delete(batchId);
    for (const mediaKey of batch.keys) {
      const job = this.jobs.get(mediaKey);
      if (!job) {
        continue;
      }

      job.batches.delete(batchId);
      if (job.batches.size === 0) {
        this.dropJob(job);
      }
    }
  }

  /**
   * Every tracked job of `group`: running first, then queued, then finished, most recently
   * updated first within each.
   */
  listJobs(group: string): JobRow[] {
    return [...this.jobs.values()]
      .filter((job) => job.group === group)
      .sort((left, right) => {
        const byStatus = STATUS_RANK[countBucket(left)] - STATUS_RANK[countBucket(right)];
        return byStatus !== 0 ? byStatus : right.updatedAt - left.updatedAt;
      })
      .map((job) => ({
        mediaKey: job.mediaKey,
        status: countBucket(job),
        attempts: job.attempts,
        error: job.record.state === "failed" ? job.record.error : null,
        createdAt: new Date(job.createdAt).toISOString(),
        updatedAt: new Date(job.updatedAt).toISOString()
      }));
  }

  snapshot(): ResolverSnapshot {
    const totals = emptyCounts();
    const groups = new Map<string, JobGroupSummary>();

    for (const job of this.jobs.values()) {
      const bucket = countBucket(job);
      totals[bucket] += 1;

      if (job.group !== null) {
        const summary = groups.get(job.group) ?? { group: job.group, ...emptyCounts() };
        summary[bucket] += 1;
        groups.set(job.group, summary);
      }
    }

    return {
      openBatches: this.batches.size,
      totals,
      groups: [...groups.values()]
    };
  }

  /**
   * Cancel all work and forget every batch.
   */
  stop(): void {
    for (const batchId of [...this.batches.keys()]) {
      this.releaseBatch(batchId);
    }
    this.pool.clear();
  }

  private isExpired(batch: BatchEntry): boolean {
    return batch.openedAt + this.options.batchTtlMs <= this.now();
  }

  private createJob(mediaKey: MediaKey, group: string | null, batches: Set<BatchId>): JobEntry {
    let markSettled = (): void => {};
    const settled = new Promise<void>((resolve) => {
      markSettled = resolve;
    });
    let markStopped = (): void => {};
    const stopped = new Promise<void>((resolve) => {
      markStopped = resolve;
    });
    const createdAt = this.now();

    return {
      mediaKey,
      group,
      record: { mediaKey, state: "pending" },
      phase: "queued",
      batches,
      controller: new AbortController(),
      ticket: null,
      attempts: 0,
      createdAt,
      updatedAt: createdAt,
      settled,
      markSettled,
      stopped,
      markStopped
    };
  }

  private dropJob(job: JobEntry): void {
    this.jobs.delete(job.mediaKey);

    if (job.phase === "queued" && job.ticket !== null) {
      this.pool.cancel(job.ticket);
      job.markStopped();
    } else if (job.phase === "running") {
      const { mediaKey, stopped } = job;
      this.stopping.set(mediaKey, stopped);
      void stopped.then(() => {
        if (this.stopping.get(mediaKey) === stopped) {
          this.stopping.delete(mediaKey);
        }
      });
    }

    if (job.phase !== "done") {
      job.controller.abort(new GenerationCancelledError(job.mediaKey));
      job.phase = "done";
    }

    job.markSettled();
  }

  private finish(job: JobEntry, record: ResolutionRecord, phase: JobPhase = "done"): void {
    job.record = record;
    job.phase = phase;
    job.updatedAt = this.now();
    job.markSettled();
  }

  private async runJob(job: JobEntry, generate: GenerationFn): Promise<void> {
    if (job.controller.signal.aborted) {
      job.markStopped();
      return;
    }

    job.phase = "running";
    job.updatedAt = this.now();

    try {
      // A dropped job for the same key may still be winding down.
      await this.stopping.get(job.mediaKey);
      await this.attemptAll(job, generate);
    } finally {
      job.phase = "done";
      job.markSettled();
      job.markStopped();
    }
  }

  private async attemptAll(job: JobEntry, generate: GenerationFn): Promise<void> {
    const { signal } = job.controller;
    if (signal.aborted) {
      return;
    }

    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt += 1) {
      job.attempts = attempt;
      job.updatedAt = this.now();

      const outcome = await this.runAttempt(generate, signal);
      if (outcome.ok) {
        if (!signal.aborted) {
          this.finish(job, { mediaKey: job.mediaKey, state: "ready", resolvedSrc: outcome.resolvedSrc });
        }
        return;
      }

      if (outcome.straggler) {
        if (!signal.aborted) {
          this.finish(
            job,
            {
              mediaKey: job.mediaKey,
              state: "failed",
              error: `${summarizeError(outcome.error)}; generation ignored its abort signal`
            },
            "running"
          );
        }
        console.error(`generation for ${job.mediaKey} kept running after abort; holding its worker slot`);
        await outcome.straggler;
        return;
      }

      if (signal.aborted) {
        return;
      }

      lastError = outcome.error;
      console.error(
        `generation attempt ${attempt}/${this.options.maxAttempts} failed for ${job.mediaKey}:`,
        summarizeError(outcome.error)
      );

      if (attempt < this.options.maxAttempts) {
        try {
          await this.sleep(this.options.retryBackoffMs * 2 ** (attempt - 1), signal);
        } catch {
          // Aborted while backing off; the job has been dropped.
          return;
        }
      }
    }

    this.finish(job, { mediaKey: job.mediaKey, state: "failed", error: summarizeError(lastError) });
    console.error(`generation failed permanently for ${job.mediaKey}:`, summarizeError(lastError));
  }

  /**
   * Run one attempt and return only once its generation has stopped, or once the grace period after
   * an abort has run out. In the latter case the still running generation comes back as `straggler`.
   */
  private async runAttempt(generate: GenerationFn, jobSignal: AbortSignal): Promise<AttemptOutcome> {
    const attemptController = new AbortController();
    const forwardAbort = (): void => {
      attemptController.abort(jobSignal.reason);
    };
    jobSignal.addEventListener("abort", forwardAbort, { once: true });

    let generationDone = false;
    const generation = startGeneration(generate, attemptController.signal).then<
      AttemptOutcome,
      AttemptOutcome
    >(
      (resolvedSrc) => ({ ok: true, resolvedSrc }),
      (error: unknown) => ({ ok: false, error, straggler: null })
    );
    void generation.then(() => {
      generationDone = true;
    });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<AttemptOutcome>((resolve) => {
      timer = setTimeout(() => {
        const error = new GenerationTimeoutError(this.options.attemptTimeoutMs);
        attemptController.abort(error);
        resolve({ ok: false, error, straggler: null });
      }, this.options.attemptTimeoutMs);
    });

    try {
      const outcome = await Promise.race([generation, timeout]);
      if (outcome.ok || generationDone) {
        return outcome;
      }

      const graceMs = this.options.abandonGraceMs ?? this.options.attemptTimeoutMs;
      const stoppedInTime = await settlesWithin(generation, graceMs);
      return {
        ok: false,
        error: outcome.error,
        straggler: stoppedInTime ? null : generation.then(() => undefined)
      };
    } finally {
      clearTimeout(timer);
      jobSignal.removeEventListener("abort", forwardAbort);
    }
  }
}

const STATUS_RANK: Record<JobStatus, number> = { inProgress: 0, queued: 1, ready: 2, failed: 2 };

function isRetryable(job: JobEntry): boolean {
  return job.record.state === "failed" && job.phase === "done";
}

async function startGeneration(generate: GenerationFn, signal: AbortSignal): Promise<string> {
  return generate(signal);
}

function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });

  return Promise.race([promise.then(() => true), expired]).finally(() => {
    clearTimeout(timer);
  });
}

function toStatusEntry(record: ResolutionRecord): StatusEntry {
  switch (record.state) {
    case "pending":
      return { state: "pending", resolvedSrc: null, error: null };
    case "ready":
      return { state: "ready", resolvedSrc: record.resolvedSrc, error: null };
    case "failed":
      return { state: "failed", resolvedSrc: null, error: record.error };
  }
}

function emptyCounts(): JobCounts {
  return { queued: 0, inProgress: 0, ready: 0, failed: 0 };
}

function countBucket(job: JobEntry): JobStatus {
  switch (job.record.state) {
    case "ready":
      return "ready";
    case "failed":
      return "failed";
    case "pending":
      return job.phase === "queued" ? "queued" : "inProgress";
  }
}
