export type PoolTask = () => Promise<void>;

/**
 * Bounded-concurrency task pool.
 * Tasks are started in submission order; at most `concurrency` run at once.
 */
export class WorkerPool {
  private readonly concurrency: number;
  // Map iteration order is insertion order, which gives a FIFO queue with O(1) cancellation.
  private readonly queue = new Map<number, PoolTask>();
  private nextTicket = 1;
  private running = 0;

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error("worker pool concurrency must be a positive integer");
    }

    this.concurrency = concurrency;
  }

  get queuedCount(): number {
    return this.queue.size;
  }

  get runningCount(): number {
    return this.running;
  }

  /**
   * Queue a task and return a ticket usable with `cancel`.
   */
  submit(task: PoolTask): number {
    const ticket = this.nextTicket;
    this.nextTicket += 1;
    this.queue.set(ticket, task);
    this.drain();
    return ticket;
  }

  /**
   * Remove a task that has not started yet. Returns false when it already started or finished.
   */
  cancel(ticket: number): boolean {
    return this.queue.delete(ticket);
  }

  /**
   * Drop every queued task. Running tasks are left to finish.
   */
  clear(): void {
    this.queue.clear();
  }

  private drain(): void {
    while (this.running < this.concurrency) {
      const next = this.queue.entries().next();
      if (next.done) {
        return;
      }

      const [ticket, task] = next.value;
      this.queue.delete(ticket);
      this.running += 1;
      void this.run(task);
    }
  }

  private async run(task: PoolTask): Promise<void> {
    try {
      await task();
    } catch (error) {
      console.error("worker pool task failed:", error);
    } finally {
      this.running -= 1;
      this.drain();
    }
  }
}
