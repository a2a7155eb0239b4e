import { formatTimestamp, systemClock } from '../runtime/clock';
import { HistoryPairSchema, HistorySectionSchema } from '../schemas/state';
import type { Clock, HistoryEntry, HistorySnapshot } from '../types';

class HistoryNode {
  next: HistoryNode | null = null;
  constructor(readonly jobId: string, readonly timestamp: string) {}
}

/**
 * Singly linked execution log, newest entry at the head.
 */
export class HistoryLog {
  private head: HistoryNode | null = null;
  private length = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  addToHistory(jobId: string, timestamp?: string): void {
    const node = new HistoryNode(jobId, timestamp ?? formatTimestamp(this.clock()));
    node.next = this.head;
    this.head = node;
    this.length++;
  }

  /** The `n` most recent entries, newest first. */
  getLastN(n: number): HistoryEntry[] {
    const result: HistoryEntry[] = [];
    if (n <= 0) return result;
    for (let node = this.head; node && result.length < n; node = node.next) {
      result.push({ jobId: node.jobId, timestamp: node.timestamp });
    }
    return result;
  }

  getAll(): HistoryEntry[] {
    return this.getLastN(this.length);
  }

  size(): number {
    return this.length;
  }

  isEmpty(): boolean {
    return this.head === null;
  }

  toDict(): HistorySnapshot {
    const entries: Array<[string, string]> = [];
    for (let node = this.head; node; node = node.next) entries.push([node.jobId, node.timestamp]);
    return { entries };
  }

  static fromDict(data: unknown, clock?: Clock): HistoryLog {
    const log = new HistoryLog(clock);
    const { entries } = HistorySectionSchema.parse(data);
    // Prepending in reverse leaves the first serialized entry at the head.
    for (let i = entries.length - 1; i >= 0; i--) {
      const pair = HistoryPairSchema.safeParse(entries[i]);
      if (pair.success) log.addToHistory(pair.data[0], pair.data[1]);
    }
    return log;
  }
}
