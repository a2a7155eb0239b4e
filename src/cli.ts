import { create } from './taskbook';
import { DEFAULT_STATE_FILE } from './store/FileStore';
import type { CreateOptions } from './types';

export interface Args {
  _: string[];
  flags: Record<string, string | boolean>;
}

export interface CliIO {
  out?: (line: string) => void;
  errOut?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
}

const COMMANDS = ['submit', 'run', 'run-all', 'find', 'remove', 'history', 'queue', 'stats'];

export function parseArgs(argv: string[]): Args {
  const args: Args = { _: [], flags: {} };
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    if (a.startsWith('-')) {
      const key = a.replace(/^--?/, '');
      const next = argv[i + 1];
      if (next && !next.startsWith('-')) { args.flags[key] = next; i++; } else { args.flags[key] = true; }
    } else {
      args._.push(a);
    }
  }
  return args;
}

export function usage(): string {
  return `taskbook CLI

Usage:
  taskbook submit <id...>           [--file <state.json>] [--redis <url>] [--prefix <p>]
  taskbook run                      run the next pending task
  taskbook run-all                  run every pending task
  taskbook find <id>                print a job record
  taskbook remove <id>              drop a job record (the queue is untouched)
  taskbook history [--count <n>]    most recent executions first
  taskbook queue                    pending tasks in execution order
  taskbook stats

Environment:
  TASKBOOK_STATE_FILE can be used instead of --file
  REDIS_URL can be used instead of --redis (switches to the redis store)
  TASKBOOK_PREFIX can be used instead of --prefix
`;
}

function flag(args: Args, key: string): string | undefined {
  const v = args.flags[key];
  return typeof v === 'string' ? v : undefined;
}

export function cliOptions(args: Args, io: CliIO = {}): CreateOptions {
  const env = io.env || process.env;
  const errOut = io.errOut || console.error;
  const logger = { warn: (...a: unknown[]) => errOut(a.map(String).join(' ')), error: (...a: unknown[]) => errOut(a.map(String).join(' ')) };
  const redis = flag(args, 'redis') || env.REDIS_URL;
  const prefix = flag(args, 'prefix') || env.TASKBOOK_PREFIX;
  if (redis) return { store: { type: 'redis' }, redis: { url: redis }, prefix, logger };
  const path = flag(args, 'file') || env.TASKBOOK_STATE_FILE || DEFAULT_STATE_FILE;
  return { store: { type: 'file', path }, logger };
}

/** Runs one command and resolves the process exit code. */
export async function runCli(argv: string[], io: CliIO = {}): Promise<number> {
  const out = io.out || console.log;
  const errOut = io.errOut || console.error;
  const args = parseArgs(argv);
  const cmd = args._[0];
  if (!cmd || !COMMANDS.includes(cmd)) { out(usage()); return 1; }
  const ids = args._.slice(1);
  if ((cmd === 'submit' || cmd === 'find' || cmd === 'remove') && ids.length === 0) {
    errOut('Missing <id>');
    return 2;
  }
  let count: number | undefined;
  if (args.flags.count !== undefined) {
    count = parseInt(flag(args, 'count') || '', 10);
    if (Number.isNaN(count)) { errOut('Invalid --count'); return 2; }
  }

  const scheduler = await create(cliOptions(args, io));
  try {
    if (cmd === 'submit') {
      for (const id of ids) {
        await scheduler.submitTask(id);
        out(`Submitted ${id}`);
      }
    } else if (cmd === 'run') {
      const id = await scheduler.runNextTask();
      out(id === null ? 'Queue is empty' : `Executed ${id}`);
    } else if (cmd === 'run-all') {
      const n = await scheduler.runAll();
      out(`Executed ${n} task(s)`);
    } else if (cmd === 'find') {
      const job = scheduler.findJob(ids[0]);
      if (!job) { errOut(`Job ${ids[0]} not found`); return 3; }
      out(JSON.stringify(job, null, 2));
    } else if (cmd === 'remove') {
      if (!(await scheduler.removeJob(ids[0]))) { errOut(`Job ${ids[0]} not found`); return 3; }
      out(`Removed ${ids[0]}`);
    } else if (cmd === 'history') {
      const entries = count === undefined ? scheduler.getHistory() : scheduler.getLastNTasks(count);
      out(JSON.stringify(entries, null, 2));
    } else if (cmd === 'queue') {
      out(JSON.stringify({ size: scheduler.getQueueSize(), next: scheduler.peekNextTask(), items: scheduler.getPendingTasks() }, null, 2));
    } else {
      out(JSON.stringify(scheduler.getStats(), null, 2));
    }
    return 0;
  } finally {
    await scheduler.close();
  }
}
