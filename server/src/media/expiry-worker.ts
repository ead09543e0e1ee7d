import type { AsyncResolver } from "./resolver.ts";

interface BatchExpiryWorkerOptions {
  resolver: AsyncResolver;
  intervalMs: number;
  onEvicted?: (count: number) => void;
}

/**
 * Background worker that evicts batches past their TTL, cancelling jobs no batch still awaits.
 */
export class BatchExpiryWorker {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private readonly options: BatchExpiryWorkerOptions;

  constructor(options: BatchExpiryWorkerOptions) {
    this.options = options;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.tick();
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;
  }

  tick(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    try {
      const evicted = this.options.resolver.evictExpired();
      if (evicted > 0) {
        this.options.onEvicted?.(evicted);
      }
    } catch (error) {
      console.error("batch expiry tick failed:", error);
    } finally {
      this.running = false;
    }
  }
}
