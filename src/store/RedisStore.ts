import type { StateStore } from './StateStore';

/** The slice of a redis client the store talks to. */
export interface RedisStateClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  quit?(): Promise<unknown>;
}

export class RedisStore implements StateStore {
  constructor(private readonly client: RedisStateClient, readonly location: string) {}
  async read(): Promise<string | null> {
    const txt = await this.client.get(this.location);
    if (!txt || !txt.trim()) return null;
    return txt;
  }
  async write(text: string): Promise<void> {
    await this.client.set(this.location, text);
  }
  async close(): Promise<void> {
    if (this.client.quit) await this.client.quit();
  }
}
