import * as fs from 'fs';
import * as path from 'path';
import type { StateStore } from './StateStore';

export const DEFAULT_STATE_FILE = 'app_state.json';

export class FileStore implements StateStore {
  readonly location: string;
  constructor(filePath: string = DEFAULT_STATE_FILE) {
    this.location = path.resolve(filePath);
  }
  async read(): Promise<string | null> {
    if (!fs.existsSync(this.location)) return null;
    const txt = fs.readFileSync(this.location, 'utf8');
    if (!txt.trim()) return null;
    return txt;
  }
  // Write beside the target and rename over it so a crash keeps the last snapshot.
  async write(text: string): Promise<void> {
    const tmpPath = `${this.location}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tmpPath, text, 'utf8');
      fs.renameSync(tmpPath, this.location);
    } catch (e) {
      fs.rmSync(tmpPath, { force: true });
      throw e;
    }
  }
}
