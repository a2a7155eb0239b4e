import type { RedisClientOptions } from 'redis';
import type { StateStore } from './store/StateStore';

export type JobStatus = 'pending' | 'completed';

export interface JobRecord {
  job_id: string;
  status: JobStatus;
  submitted_at: string;
  completed_at?: string; // set once status is 'completed'
}

export interface HistoryEntry {
  jobId: string;
  timestamp: string;
}

export interface QueueSnapshot {
  items: string[];
}

export interface HistorySnapshot {
  entries: Array<[string, string]>; // head-first
}

export interface HashTableSnapshot<V> {
  capacity: number;
  entries: Array<[string, V]>;
}

export interface SchedulerSnapshot {
  queue: QueueSnapshot;
  hash_table: HashTableSnapshot<JobRecord>;
  history: HistorySnapshot;
  config: Record<string, unknown>;
}

export interface StateMetadata {
  saved_at: string;
  version: number;
}

export interface StateDocument extends SchedulerSnapshot {
  metadata: StateMetadata;
}

export interface Snapshotable {
  toDict(): SchedulerSnapshot;
}

export type Clock = () => Date;

export type ExecuteHook = (jobId: string) => void | Promise<void>;

export interface SchedulerStats {
  queued: number;
  jobs: number;
  history: number;
}

export interface LoggerLike {
  debug?: (...args: unknown[]) => void;
  info?: (...args: unknown[]) => void;
  warn?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}

export interface RedisOptions {
  url?: string;
  host?: string;
  port?: number;
  database?: number;
  options?: RedisClientOptions;
}

export interface StoreOptions {
  type: 'memory' | 'file' | 'redis' | 'custom';
  path?: string; // for file store
  initial?: string; // for memory store
  key?: string; // for redis store, defaults to `<prefix>:state`
  impl?: StateStore; // for custom store
}

export interface CreateOptions {
  store?: StoreOptions;
  redis?: RedisOptions;
  prefix?: string;
  capacity?: number;
  logger?: LoggerLike;
  clock?: Clock;
  execute?: ExecuteHook;
}
