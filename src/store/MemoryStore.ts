import type { StateStore } from './StateStore';

export class MemoryStore implements StateStore {
  readonly location = 'memory';
  private text: string | null;
  constructor(initial: string | null = null) {
    this.text = initial;
  }
  async read(): Promise<string | null> { return this.text; }
  async write(text: string): Promise<void> { this.text = text; }
}
