import { EventEmitter } from 'events';
import { formatTimestamp, systemClock } from './runtime/clock';
import { bindLogger, type BoundLogger } from './runtime/log';
import { ConfigSectionSchema, JobRecordSchema } from './schemas/state';
import type { StateManager } from './StateManager';
import { HashTable } from './structures/HashTable';
import { HistoryLog } from './structures/HistoryLog';
import { Queue } from './structures/Queue';
import type {
  Clock, ExecuteHook, HistoryEntry, JobRecord, LoggerLike, SchedulerSnapshot, SchedulerStats,
} from './types';

export interface SchedulerOptions {
  stateManager?: StateManager;
  logger?: LoggerLike;
  clock?: Clock;
  capacity?: number;
  execute?: ExecuteHook;
}

/**
 * Owns the pending queue, the job index and the execution history.
 *
 * The queue decides execution order; the hash table is only a metadata
 * index, so removing a job from it leaves the job queued. Every mutation is
 * followed by a full snapshot save when a {@link StateManager} is attached.
 *
 * Emits `submitted(record)`, `executed(jobId, timestamp)`, `removed(jobId)`
 * and `saved(ok)` on {@link Scheduler.events}.
 */
export class Scheduler {
  readonly events = new EventEmitter();
  private queue = new Queue();
  private hashTable: HashTable<JobRecord>;
  private history: HistoryLog;
  private config: Record<string, unknown> = {};
  private readonly stateManager?: StateManager;
  private readonly log: BoundLogger;
  private readonly clock: Clock;
  private readonly capacity?: number;
  private readonly execute: ExecuteHook;

  constructor(options: SchedulerOptions = {}) {
    this.stateManager = options.stateManager;
    this.log = bindLogger(options.logger);
    this.clock = options.clock || systemClock;
    this.capacity = options.capacity;
    this.execute = options.execute || ((jobId) => this.log.info(`Executing task: ${jobId}`));
    this.hashTable = new HashTable<JobRecord>(this.capacity);
    this.history = new HistoryLog(this.clock);
  }

  async submitTask(jobId: string): Promise<boolean> {
    this.queue.enqueue(jobId);
    const record: JobRecord = { job_id: jobId, status: 'pending', submitted_at: this.now() };
    this.hashTable.insert(jobId, record);
    this.log.dbg('submitted', jobId);
    this.events.emit('submitted', { ...record });
    await this.saveState();
    return true;
  }

  /** Runs the front of the queue; resolves its id, or `null` when idle. */
  async runNextTask(): Promise<string | null> {
    if (this.queue.isEmpty()) return null;
    const jobId = this.queue.dequeue();
    try {
      await this.execute(jobId);
    } catch (e) {
      this.log.err(`Task ${jobId} failed and was dropped from the queue:`, e);
      throw e;
    }

    const timestamp = this.now();
    const record = this.hashTable.search(jobId);
    if (record) {
      this.hashTable.insert(jobId, { ...record, status: 'completed', completed_at: timestamp });
    }
    this.history.addToHistory(jobId, timestamp);
    this.events.emit('executed', jobId, timestamp);
    await this.saveState();
    return jobId;
  }

  async runAll(): Promise<number> {
    let count = 0;
    while (!this.queue.isEmpty()) {
      await this.runNextTask();
      count++;
    }
    return count;
  }

  findJob(jobId: string): JobRecord | null {
    const record = this.hashTable.search(jobId);
    return record ? { ...record } : null;
  }

  async removeJob(jobId: string): Promise<boolean> {
    const removed = this.hashTable.remove(jobId);
    if (removed) {
      this.events.emit('removed', jobId);
      await this.saveState();
    }
    return removed;
  }

  getQueueSize(): number {
    return this.queue.size();
  }

  getHistorySize(): number {
    return this.history.size();
  }

  getJobCount(): number {
    return this.hashTable.size;
  }

  getLastNTasks(n: number): HistoryEntry[] {
    return this.history.getLastN(n);
  }

  getHistory(): HistoryEntry[] {
    return this.history.getAll();
  }

  peekNextTask(): string | null {
    return this.queue.peek();
  }

  getPendingTasks(): string[] {
    return this.queue.toArray();
  }

  listJobs(): JobRecord[] {
    return this.hashTable.entries().map(([, record]) => ({ ...record }));
  }

  getStats(): SchedulerStats {
    return { queued: this.queue.size(), jobs: this.hashTable.size, history: this.history.size() };
  }

  toDict(): SchedulerSnapshot {
    return {
      queue: this.queue.toDict(),
      hash_table: this.hashTable.toDict(),
      history: this.history.toDict(),
      config: { ...this.config },
    };
  }

  /** Replaces every structure with the contents of `data`; bad sections restore empty. */
  loadFromDict(data: Record<string, unknown>): void {
    this.queue = Queue.fromDict(data.queue);
    this.hashTable = data.hash_table === undefined
      ? new HashTable<JobRecord>(this.capacity)
      : HashTable.fromDict(data.hash_table, JobRecordSchema, (record) => record.job_id);
    this.history = HistoryLog.fromDict(data.history, this.clock);
    this.config = ConfigSectionSchema.parse(data.config);
  }

  /** Resolves `true` when a prior snapshot was found and restored. */
  async loadState(): Promise<boolean> {
    if (!this.stateManager) return false;
    const data = await this.stateManager.loadState();
    if (!data) return false;
    this.loadFromDict(data);
    return true;
  }

  async saveState(): Promise<boolean> {
    if (!this.stateManager) return false;
    const ok = await this.stateManager.saveState(this);
    this.events.emit('saved', ok);
    return ok;
  }

  async close(): Promise<void> {
    if (this.stateManager) await this.stateManager.close();
  }

  private now(): string {
    return formatTimestamp(this.clock());
  }
}
