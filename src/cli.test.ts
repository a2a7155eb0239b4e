import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { cliOptions, parseArgs, runCli } from './cli';

describe('parseArgs', () => {
  it('should split positionals from flags', () => {
    expect(parseArgs(['node', 'taskbook', 'history', '--count', '5', '-v'])).toEqual({
      _: ['history'],
      flags: { count: '5', v: true },
    });
  });

  it('should keep several positionals', () => {
    expect(parseArgs(['node', 'taskbook', 'submit', 'a', 'b', '--file', 's.json'])._).toEqual(['submit', 'a', 'b']);
  });
});

describe('cliOptions', () => {
  it('should read the state file from the environment', () => {
    const options = cliOptions(parseArgs(['node', 'taskbook', 'stats']), { env: { TASKBOOK_STATE_FILE: '/tmp/x.json' } });
    expect(options.store).toEqual({ type: 'file', path: '/tmp/x.json' });
  });

  it('should prefer --file over the environment', () => {
    const options = cliOptions(parseArgs(['node', 'taskbook', 'stats', '--file', 'mine.json']), { env: { TASKBOOK_STATE_FILE: '/tmp/x.json' } });
    expect(options.store).toEqual({ type: 'file', path: 'mine.json' });
  });

  it('should switch to redis when a url is given', () => {
    const options = cliOptions(parseArgs(['node', 'taskbook', 'stats']), { env: { REDIS_URL: 'redis://cache:6379', TASKBOOK_PREFIX: 'tb' } });
    expect(options.store).toEqual({ type: 'redis' });
    expect(options.redis).toEqual({ url: 'redis://cache:6379' });
    expect(options.prefix).toBe('tb');
  });
});

describe('runCli', () => {
  let dir: string;
  let file: string;
  let out: string[];
  let errs: string[];

  const run = (...args: string[]) =>
    runCli(['node', 'taskbook', ...args, '--file', file], {
      out: (line) => out.push(line),
      errOut: (line) => errs.push(line),
      env: {},
    });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskbook-cli-'));
    file = path.join(dir, 'state.json');
    out = [];
    errs = [];
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should print usage without a command', async () => {
    expect(await runCli(['node', 'taskbook'], { out: (line) => out.push(line), env: {} })).toBe(1);
    expect(out[0].startsWith('taskbook CLI')).toBe(true);
  });

  it('should print usage for an unknown command', async () => {
    expect(await run('explode')).toBe(1);
    expect(fs.existsSync(file)).toBe(false);
  });

  it('should require an id', async () => {
    expect(await run('submit')).toBe(2);
    expect(errs).toEqual(['Missing <id>']);
  });

  it('should reject a non-numeric count', async () => {
    expect(await run('history', '--count', 'lots')).toBe(2);
    expect(errs).toEqual(['Invalid --count']);
  });

  it('should carry state between invocations', async () => {
    expect(await run('submit', 'a', 'b')).toBe(0);
    expect(out).toEqual(['Submitted a', 'Submitted b']);

    out = [];
    expect(await run('run')).toBe(0);
    expect(out).toEqual(['Executed a']);

    out = [];
    expect(await run('queue')).toBe(0);
    expect(JSON.parse(out[0])).toEqual({ size: 1, next: 'b', items: ['b'] });

    out = [];
    expect(await run('find', 'a')).toBe(0);
    expect(JSON.parse(out[0]).status).toBe('completed');

    out = [];
    expect(await run('history', '--count', '1')).toBe(0);
    expect(JSON.parse(out[0]).map((e: { jobId: string }) => e.jobId)).toEqual(['a']);

    out = [];
    expect(await run('stats')).toBe(0);
    expect(JSON.parse(out[0])).toEqual({ queued: 1, jobs: 2, history: 1 });
  });

  it('should run everything that is pending', async () => {
    await run('submit', 'a', 'b', 'c');
    out = [];

    expect(await run('run-all')).toBe(0);
    expect(out).toEqual(['Executed 3 task(s)']);

    out = [];
    await run('run');
    expect(out).toEqual(['Queue is empty']);
  });

  it('should report a missing job with exit code 3', async () => {
    expect(await run('find', 'ghost')).toBe(3);
    expect(await run('remove', 'ghost')).toBe(3);
    expect(errs).toEqual(['Job ghost not found', 'Job ghost not found']);
  });

  it('should remove a job from the index but not the queue', async () => {
    await run('submit', 'a');
    out = [];

    expect(await run('remove', 'a')).toBe(0);
    expect(out).toEqual(['Removed a']);

    out = [];
    await run('queue');
    expect(JSON.parse(out[0]).items).toEqual(['a']);
  });

  it('should start fresh from a corrupted file', async () => {
    fs.writeFileSync(file, 'not json');

    expect(await run('stats')).toBe(0);
    expect(errs).toEqual([`State in ${file} is corrupted. Starting fresh.`]);
    expect(JSON.parse(out[0])).toEqual({ queued: 0, jobs: 0, history: 0 });
  });
});
