/**
 * AsyncQueue - sequential queue with concatMap semantics
 *
 * Items are processed one at a time in arrival order. Items can be added
 * while processing is in progress.
 */

/**
 * Function that processes a single item
 */
export type QueueProcessor<T> = (item: T) => Promise<void> | void;

/**
 * Called when the processor throws; processing continues with the next item
 */
export type QueueErrorHandler<T> = (error: unknown, item: T) => void;

export type QueueStatus = {
  queueLength: number;
  isProcessing: boolean;
  processedCount: number;
  failedCount: number;
};

export class AsyncQueue<T> {
  private queue: T[] = [];
  private processing = false;
  private stopped = false;
  private processedCount = 0;
  private failedCount = 0;
  private drainWaiters: Array<() => void> = [];
  private currentProcessPromise: Promise<void> | null = null;

  /**
   * @param processor - Function to process each item
   * @param onError - Receives processor failures
   */
  constructor(
    private readonly processor: QueueProcessor<T>,
    private readonly onError: QueueErrorHandler<T>,
  ) {}

  /**
   * Add an item and start processing if idle
   */
  add(item: T): void {
    if (this.stopped) {
      throw new Error('Cannot add items to a stopped queue');
    }

    this.queue.push(item);

    if (!this.processing) {
      this.currentProcessPromise = this.processQueue();
    }
  }

  /**
   * Stop the queue after the item being processed; pending items are dropped
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.queue = [];

    if (this.currentProcessPromise) {
      await this.currentProcessPromise;
    }

    this.resolveDrainWaiters();
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  isProcessing(): boolean {
    return this.processing;
  }

  isStopped(): boolean {
    return this.stopped;
  }

  getStatus(): QueueStatus {
    return {
      queueLength: this.queue.length,
      isProcessing: this.processing,
      processedCount: this.processedCount,
      failedCount: this.failedCount,
    };
  }

  /**
   * Resolve once the queue is empty and nothing is being processed
   */
  drain(): Promise<void> {
    if (this.queue.length === 0 && !this.processing) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  private async processQueue(): Promise<void> {
    this.processing = true;

    try {
      while (this.queue.length > 0 && !this.stopped) {
        const item = this.queue.shift();

        if (item === undefined) {
          continue;
        }

        try {
          // biome-ignore lint/performance/noAwaitInLoops: Sequential processing is intentional for queue semantics
          await this.processor(item);
          this.processedCount++;
        } catch (error) {
          this.failedCount++;
          this.onError(error, item);
        }
      }
    } finally {
      this.processing = false;
      this.currentProcessPromise = null;
    }

    this.resolveDrainWaiters();
  }

  private resolveDrainWaiters(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
