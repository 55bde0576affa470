import { describe, it, expect } from '@jest/globals';
import { Batcher, PendingQueue } from './Batcher';

describe('Batcher', () => {
  it('should size batches at twice the workers, never below five', () => {
    expect(Batcher.batchSize(3)).toBe(6);
    expect(Batcher.batchSize(1)).toBe(5);
    expect(Batcher.batchSize(8)).toBe(16);
  });

  it('should take one batch from the queue', async () => {
    const queue = new PendingQueue(Array.from({ length: 10 }, (_, i) => i));

    expect(await new Batcher().nextBatch(queue, 3)).toEqual([0, 1, 2, 3, 4, 5]);
  });
});

describe('PendingQueue', () => {
  it('should pull from the source only as far as requested', async () => {
    let pulled = 0;
    function* source() {
      for (let i = 0; i < 20; i++) {
        pulled++;
        yield i;
      }
    }

    const queue = new PendingQueue(source());
    const batch = await queue.take(5);

    expect(batch).toEqual([0, 1, 2, 3, 4]);
    expect(pulled).toBe(5);
  });

  it('should hand re-queued tasks out ahead of unread source items', async () => {
    const queue = new PendingQueue(['a', 'b', 'c']);

    expect(await queue.take(2)).toEqual(['a', 'b']);
    queue.requeue('a');
    expect(queue.buffered).toBe(1);

    expect(await queue.take(5)).toEqual(['a', 'c']);
    expect(queue.exhausted).toBe(true);
    expect(await queue.take(5)).toEqual([]);
  });

  it('should accept async sources', async () => {
    async function* source() {
      yield 'x';
      yield 'y';
    }

    const queue = new PendingQueue(source());

    expect(await queue.take(5)).toEqual(['x', 'y']);
    expect(queue.exhausted).toBe(true);
  });

  it('should release an unfinished source on close', async () => {
    let released = false;
    function* source() {
      try {
        yield 1;
        yield 2;
      } finally {
        released = true;
      }
    }

    const queue = new PendingQueue(source());
    await queue.take(1);
    await queue.close();

    expect(released).toBe(true);
  });
});
