/**
 * Browser-side poller that swaps thumbnail placeholders for their resolved media.
 */

import { isTerminalState, type BatchId, type MediaKey, type StatusEntry, type StatusResponse } from "../../shared/src/index.ts";

export type StatusFetcher = (batchId: BatchId, mediaKeys: MediaKey[], signal: AbortSignal) => Promise<StatusResponse>;

export type UnavailableReason = "failed" | "expired" | "timeout";

/**
 * Where resolution results are shown. The DOM implementation lives in `dom-surface.ts`.
 */
export interface PlaceholderSurface {
  showResolved(mediaKey: MediaKey, src: string): void;
  showUnavailable(mediaKey: MediaKey, reason: UnavailableReason, error: string | null): void;
}

export interface MediaPollerOptions {
  fetchStatus: StatusFetcher;
  surface: PlaceholderSurface;
  initialIntervalMs?: number;
  maxIntervalMs?: number;
  backoffFactor?: number;
  /** Global deadline after which every unresolved key is shown as unavailable. */
  timeoutMs?: number;
  maxKeysPerRequest?: number;
  now?: () => number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface PollOutcome {
  resolved: MediaKey[];
  unavailable: MediaKey[];
  timedOut: boolean;
  cancelled: boolean;
}

const DEFAULTS = {
  initialIntervalMs: 500,
  maxIntervalMs: 5000,
  backoffFactor: 1.5,
  timeoutMs: 120_000,
  maxKeysPerRequest: 100
};

/**
 * Cooperative polling loop over one batch. Each key is dropped from the poll set once it
 * reaches a terminal state; the loop ends when none are left, on timeout, or on `stop()`.
 */
export class MediaPoller {
  private readonly options: Required<MediaPollerOptions>;
  private controller: AbortController | null = null;

  constructor(options: MediaPollerOptions) {
    this.options = {
      fetchStatus: options.fetchStatus,
      surface: options.surface,
      initialIntervalMs: options.initialIntervalMs ?? DEFAULTS.initialIntervalMs,
      maxIntervalMs: options.maxIntervalMs ?? DEFAULTS.maxIntervalMs,
      backoffFactor: options.backoffFactor ?? DEFAULTS.backoffFactor,
      timeoutMs: options.timeoutMs ?? DEFAULTS.timeoutMs,
      maxKeysPerRequest: options.maxKeysPerRequest ?? DEFAULTS.maxKeysPerRequest,
      now: options.now ?? (() => Date.now()),
      sleep: options.sleep ?? abortableSleep
    };
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  async start(batchId: BatchId, mediaKeys: readonly MediaKey[]): Promise<PollOutcome> {
    if (this.controller) {
      throw new Error("poller is already running");
    }

    const controller = new AbortController();
    this.controller = controller;

    try {
      return await this.run(batchId, mediaKeys, controller.signal);
    } finally {
      this.controller = null;
    }
  }

  stop(): void {
    this.controller?.abort();
  }

  private async run(batchId: BatchId, mediaKeys: readonly MediaKey[], signal: AbortSignal): Promise<PollOutcome> {
    const { surface } = this.options;
    const pending = new Set(mediaKeys);
    const deadline = this.options.now() + this.options.timeoutMs;
    const outcome: PollOutcome = { resolved: [], unavailable: [], timedOut: false, cancelled: false };
    let intervalMs = this.options.initialIntervalMs;

    const settle = (mediaKey: MediaKey, entry: StatusEntry): void => {
      if (!isTerminalState(entry.state) || !pending.has(mediaKey)) {
        return;
      }

      pending.delete(mediaKey);
      if (entry.state === "ready" && entry.resolvedSrc) {
        surface.showResolved(mediaKey, entry.resolvedSrc);
        outcome.resolved.push(mediaKey);
        return;
      }

      const reason = entry.state === "expired" ? "expired" : "failed";
      surface.showUnavailable(mediaKey, reason, entry.error);
      outcome.unavailable.push(mediaKey);
    };

    while (pending.size > 0) {
      if (signal.aborted) {
        outcome.cancelled = true;
        break;
      }

      const remainingMs = deadline - this.options.now();
      if (remainingMs <= 0) {
        outcome.timedOut = true;
        break;
      }

      try {
        await this.options.sleep(Math.min(intervalMs, remainingMs), signal);
      } catch {
        outcome.cancelled = true;
        break;
      }

      for (const chunk of chunked([...pending], this.options.maxKeysPerRequest)) {
        let response: StatusResponse;
        try {
          response = await this.options.fetchStatus(batchId, chunk, signal);
        } catch {
          if (signal.aborted) {
            break;
          }
          // Treated as an empty response; the keys stay pending until the deadline.
          continue;
        }

        for (const mediaKey of chunk) {
          const entry = response.entries[mediaKey];
          if (entry) {
            settle(mediaKey, entry);
          }
        }
      }

      intervalMs = Math.min(intervalMs * this.options.backoffFactor, this.options.maxIntervalMs);
    }

    if (outcome.timedOut) {
      for (const mediaKey of pending) {
        surface.showUnavailable(mediaKey, "timeout", null);
        outcome.unavailable.push(mediaKey);
      }
    }

    return outcome;
  }
}

function chunked<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
