import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileStore } from './FileStore';

describe('FileStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskbook-store-'));
    file = path.join(dir, 'state.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should resolve the location to an absolute path', () => {
    expect(new FileStore(file).location).toBe(path.resolve(file));
  });

  it('should read null when the file does not exist', async () => {
    expect(await new FileStore(file).read()).toBeNull();
  });

  it('should read null for a blank file', async () => {
    fs.writeFileSync(file, '  \n');
    expect(await new FileStore(file).read()).toBeNull();
  });

  it('should read back what was written', async () => {
    const store = new FileStore(file);
    await store.write('{"queue":{"items":[]}}');

    expect(await store.read()).toBe('{"queue":{"items":[]}}');
    expect(fs.readFileSync(file, 'utf8')).toBe('{"queue":{"items":[]}}');
  });

  it('should replace the previous contents and leave no temporary file', async () => {
    const store = new FileStore(file);
    await store.write('first');
    await store.write('second');

    expect(await store.read()).toBe('second');
    expect(fs.readdirSync(dir)).toEqual(['state.json']);
  });

  it('should remove the temporary file when the rename fails', async () => {
    fs.mkdirSync(file);
    const store = new FileStore(file);

    await expect(store.write('x')).rejects.toThrow();
    expect(fs.readdirSync(dir)).toEqual(['state.json']);
  });

  it('should reject when the directory is missing', async () => {
    const store = new FileStore(path.join(dir, 'missing', 'state.json'));
    await expect(store.write('x')).rejects.toThrow();
  });
});
