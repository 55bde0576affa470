/**
 * Anything the caller can hand over as a lazily produced task sequence
 */
export type TaskSource<T> = Iterable<T> | AsyncIterable<T>;

function isAsyncIterable<T>(source: TaskSource<T>): source is AsyncIterable<T> {
  return Symbol.asyncIterator in source;
}

/**
 * FIFO buffer over a lazy source. Pulls from the source only as far as the
 * next batch needs; re-queued tasks go to the back of the buffer.
 */
export class PendingQueue<T> {
  private readonly buffer: T[] = [];
  private readonly iterator: Iterator<T> | AsyncIterator<T>;
  private sourceDone = false;

  constructor(source: TaskSource<T>) {
    this.iterator = isAsyncIterable(source)
      ? source[Symbol.asyncIterator]()
      : source[Symbol.iterator]();
  }

  /**
   * Remove and return up to `count` tasks in submission order
   */
  async take(count: number): Promise<T[]> {
    while (this.buffer.length < count && !this.sourceDone) {
      const result = await this.iterator.next();
      if (result.done) {
        this.sourceDone = true;
      } else {
        this.buffer.push(result.value);
      }
    }
    return this.buffer.splice(0, count);
  }

  requeue(task: T): void {
    this.buffer.push(task);
  }

  /**
   * Tasks pulled from the source but not yet handed out
   */
  get buffered(): number {
    return this.buffer.length;
  }

  get exhausted(): boolean {
    return this.sourceDone && this.buffer.length === 0;
  }

  /**
   * Release the source when the run stops before reaching its end
   */
  async close(): Promise<void> {
    if (!this.sourceDone && this.iterator.return) {
      this.sourceDone = true;
      await this.iterator.return();
    }
  }
}

/**
 * Sizes batches after current concurrency so every worker stays busy
 */
export class Batcher {
  static readonly MIN_BATCH_SIZE = 5;
  static readonly TASKS_PER_WORKER = 2;

  static batchSize(currentWorkers: number): number {
    return Math.max(Batcher.MIN_BATCH_SIZE, currentWorkers * Batcher.TASKS_PER_WORKER);
  }

  nextBatch<T>(queue: PendingQueue<T>, currentWorkers: number): Promise<T[]> {
    return queue.take(Batcher.batchSize(currentWorkers));
  }
}
