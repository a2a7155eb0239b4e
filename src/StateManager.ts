import { systemClock } from './runtime/clock';
import { bindLogger, type BoundLogger } from './runtime/log';
import { STATE_VERSION, StateDocumentSchema } from './schemas/state';
import type { StateStore } from './store/StateStore';
import type { Clock, LoggerLike, Snapshotable, StateDocument } from './types';

export interface StateManagerOptions {
  logger?: LoggerLike;
  clock?: Clock;
}

/**
 * Persists full scheduler snapshots through a {@link StateStore}.
 *
 * Persistence failures are reported through the logger and surface as
 * `false` or `null`; nothing here throws.
 */
export class StateManager {
  private readonly log: BoundLogger;
  private readonly clock: Clock;

  constructor(readonly store: StateStore, options: StateManagerOptions = {}) {
    this.log = bindLogger(options.logger);
    this.clock = options.clock || systemClock;
  }

  async saveState(source: Snapshotable): Promise<boolean> {
    const document: StateDocument = {
      ...source.toDict(),
      metadata: { saved_at: this.clock().toISOString(), version: STATE_VERSION },
    };
    try {
      await this.store.write(JSON.stringify(document, null, 2));
      this.log.dbg('state saved to', this.store.location);
      return true;
    } catch (e) {
      this.log.err('Error saving application state:', e);
      return false;
    }
  }

  /** The stored document as parsed, or `null` when there is none usable. */
  async loadState(): Promise<Record<string, unknown> | null> {
    let txt: string | null;
    try {
      txt = await this.store.read();
    } catch (e) {
      this.log.err('Error loading application state:', e);
      return null;
    }
    if (txt === null) return null;

    let data: unknown;
    try {
      data = JSON.parse(txt);
    } catch {
      this.log.warn(`State in ${this.store.location} is corrupted. Starting fresh.`);
      return null;
    }
    const parsed = StateDocumentSchema.safeParse(data);
    if (!parsed.success) {
      this.log.warn(`State in ${this.store.location} is not an object. Starting fresh.`);
      return null;
    }
    return parsed.data;
  }

  async close(): Promise<void> {
    if (this.store.close) await this.store.close();
  }
}
