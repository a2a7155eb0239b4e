import { EmptyQueueError } from '../errors';
import { QueueSectionSchema } from '../schemas/state';
import type { QueueSnapshot } from '../types';

/**
 * FIFO queue of job ids.
 *
 * Dequeued slots are reclaimed lazily: the backing array is compacted once
 * the consumed prefix outgrows the live part, which keeps both ends O(1)
 * amortized.
 */
export class Queue {
  private items: string[] = [];
  private head = 0;

  enqueue(item: string): void {
    this.items.push(item);
  }

  /** @throws {EmptyQueueError} when the queue holds nothing. */
  dequeue(): string {
    if (this.isEmpty()) throw new EmptyQueueError();
    const item = this.items[this.head];
    this.head++;
    if (this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }

  peek(): string | null {
    return this.isEmpty() ? null : this.items[this.head];
  }

  size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  toArray(): string[] {
    return this.items.slice(this.head);
  }

  toDict(): QueueSnapshot {
    return { items: this.toArray() };
  }

  static fromDict(data: unknown): Queue {
    const queue = new Queue();
    const { items } = QueueSectionSchema.parse(data);
    for (const item of items) {
      if (typeof item === 'string') queue.enqueue(item);
    }
    return queue;
  }
}
