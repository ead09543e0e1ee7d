import { randomUUID } from "node:crypto";

import type { BatchId, MediaKey, PlaceholderDescriptor } from "../../../packages/shared/src/index.ts";
import { BatchClosedError } from "./errors.ts";
import type { AsyncResolver, EnqueueOptions, GenerationFn } from "./resolver.ts";

export interface BatchContextOptions {
  placeholderSrc: string;
  batchId?: BatchId;
}

/**
 * Deferred media requested during one page render.
 */
export class BatchContext {
  readonly batchId: BatchId;
  private readonly resolver: AsyncResolver;
  private readonly placeholderSrc: string;
  private readonly descriptors = new Map<MediaKey, PlaceholderDescriptor>();
  private closed = false;

  private constructor(resolver: AsyncResolver, batchId: BatchId, placeholderSrc: string) {
    this.resolver = resolver;
    this.batchId = batchId;
    this.placeholderSrc = placeholderSrc;
  }

  /**
   * Allocate a fresh batch and register it with the resolver.
   */
  static open(resolver: AsyncResolver, options: BatchContextOptions): BatchContext {
    const batchId = options.batchId ?? randomUUID();
    resolver.openBatch(batchId);
    return new BatchContext(resolver, batchId, options.placeholderSrc);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Keys registered so far, in registration order.
   */
  get mediaKeys(): MediaKey[] {
    return [...this.descriptors.keys()];
  }

  /**
   * Request `mediaKey` for this render and return its placeholder.
   * Registering a key twice returns the same descriptor and does not enqueue again.
   */
  register(mediaKey: MediaKey, generate: GenerationFn, options?: EnqueueOptions): PlaceholderDescriptor {
    if (this.closed) {
      throw new BatchClosedError(this.batchId);
    }

    const existing = this.descriptors.get(mediaKey);
    if (existing) {
      return existing;
    }

    this.resolver.enqueue(this.batchId, mediaKey, generate, options);

    const descriptor: PlaceholderDescriptor = {
      mediaKey,
      batchId: this.batchId,
      placeholderSrc: this.placeholderSrc
    };
    this.descriptors.set(mediaKey, descriptor);
    return descriptor;
  }

  /**
   * Seal the batch. Registered work keeps running until the batch expires.
   */
  close(): void {
    this.closed = true;
  }
}
