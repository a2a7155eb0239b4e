import { createClient } from 'redis';
import { systemClock } from './runtime/clock';
import { bindLogger, type BoundLogger } from './runtime/log';
import { Scheduler } from './Scheduler';
import { StateManager } from './StateManager';
import { DEFAULT_STATE_FILE, FileStore } from './store/FileStore';
import { MemoryStore } from './store/MemoryStore';
import { RedisStore } from './store/RedisStore';
import type { StateStore } from './store/StateStore';
import type { CreateOptions } from './types';

export const DEFAULT_PREFIX = 'taskbook';

export function redisUrl(options: CreateOptions): string | undefined {
  const redis = options.redis || {};
  if (redis.url) return redis.url;
  if (redis.host || redis.port) {
    const host = redis.host || '127.0.0.1';
    const port = redis.port || 6379;
    return 'redis://' + host + ':' + port;
  }
  return undefined;
}

async function connectRedis(options: CreateOptions, log: BoundLogger): Promise<StateStore> {
  const redis = options.redis || {};
  const client = createClient({ ...(redis.options || {}), url: redisUrl(options), database: redis.database });
  client.on('error', (e) => log.err('Redis client error', e));
  await client.connect();
  const prefix = options.prefix || DEFAULT_PREFIX;
  const key = options.store && options.store.key ? options.store.key : prefix + ':state';
  log.dbg('using redis key', key);
  return new RedisStore({
    get: (k) => client.get(k),
    set: (k, v) => client.set(k, v),
    quit: () => client.quit(),
  }, key);
}

export async function createStore(options: CreateOptions, log: BoundLogger = bindLogger(options.logger)): Promise<StateStore> {
  const store = options.store || { type: 'file' };
  switch (store.type) {
    case 'file': return new FileStore(store.path || DEFAULT_STATE_FILE);
    case 'memory': return new MemoryStore(store.initial ?? null);
    case 'redis': return connectRedis(options, log);
    case 'custom':
      if (!store.impl) throw new Error('Custom store requires an impl');
      return store.impl;
    default:
      throw new Error(`Unknown store type: ${String(store.type)}`);
  }
}

/**
 * Builds a scheduler wired to its store and restores any saved state.
 */
export async function create(options?: CreateOptions): Promise<Scheduler> {
  options = options || {};
  const log = bindLogger(options.logger);
  const clock = options.clock || systemClock;

  const store = await createStore(options, log);
  const stateManager = new StateManager(store, { logger: options.logger, clock });
  const scheduler = new Scheduler({
    stateManager,
    logger: options.logger,
    clock,
    capacity: options.capacity,
    execute: options.execute,
  });

  if (await scheduler.loadState()) log.dbg('state loaded from', store.location);
  else log.dbg('starting with a fresh state');
  return scheduler;
}

export { Scheduler } from './Scheduler';
export { StateManager } from './StateManager';
export { Queue } from './structures/Queue';
export { HistoryLog } from './structures/HistoryLog';
export { HashTable, DEFAULT_CAPACITY, LOAD_FACTOR } from './structures/HashTable';
export { FileStore } from './store/FileStore';
export { MemoryStore } from './store/MemoryStore';
export { RedisStore } from './store/RedisStore';
export type { RedisStateClient } from './store/RedisStore';
export type { StateStore } from './store/StateStore';
export { EmptyQueueError } from './errors';
export { formatTimestamp } from './runtime/clock';
export * from './types';
