/**
 * sacct collector
 *
 * Streams `user|partition|seconds` rows out of Slurm's accounting command one
 * line at a time. The child process and its output pipe are owned by the
 * returned generator and released on every exit path: exhaustion, `break`,
 * or an exception thrown by the consumer.
 */

import { spawn } from 'child_process';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { InvalidRangeError, ProcessError } from './errors.js';
import { formatIsoDate } from './months.js';
import { isFullyQualifiedPartition } from './partitions.js';

export const DEFAULT_SACCT_COMMAND = 'sacct';

// User name, partition and raw CPU seconds, in that order
export const USAGE_FIELDS = 'User,Partition,CPUTimeRAW';

// Keep only the end of stderr for error messages
const STDERR_TAIL_CHARS = 4096;

export interface CollectOptions {
  /** Partition name to push down to sacct if it is fully qualified */
  partition?: string;

  /** Accounting binary (default: sacct) */
  command?: string;
}

interface CloseStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

/**
 * Build the sacct argument vector for an inclusive date window
 */
export function buildSacctArgs(first: Date, last: Date, options: Pick<CollectOptions, 'partition'> = {}): string[] {
  const args = [
    '--allusers',
    '--noconvert',
    '-n', '-P',   // no header, pipe-separated
    '-o', USAGE_FIELDS,
    '-S', formatIsoDate(first),
    '-E', formatIsoDate(last),
  ];

  if (isFullyQualifiedPartition(options.partition)) {
    args.push('--partition', options.partition);
  }

  return args;
}

/**
 * Stream sacct rows for `[first, last]`.
 *
 * The range is checked immediately; the process is only spawned once the
 * first line is requested. After the last line, a non-zero exit surfaces as
 * ProcessError. Abandoning the iteration early kills the process instead and
 * never throws.
 *
 * @throws InvalidRangeError if `last` is before `first`
 */
export function collectUsageLines(
  first: Date,
  last: Date,
  options: CollectOptions = {},
): AsyncGenerator<string, void, undefined> {
  if (last < first) {
    throw new InvalidRangeError(first, last);
  }

  const command = options.command ?? DEFAULT_SACCT_COMMAND;
  return streamCommandLines(command, buildSacctArgs(first, last, options));
}

/**
 * Spawn a command and yield its stdout line by line
 */
export async function* streamCommandLines(
  command: string,
  args: readonly string[],
): AsyncGenerator<string, void, undefined> {
  const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
  const stderr = captureTail(child.stderr, STDERR_TAIL_CHARS);
  const closed = waitForClose(child);
  const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
  let drained = false;

  try {
    for await (const line of lines) {
      yield line;
    }
    drained = true;
  } finally {
    lines.close();
    if (!drained) {
      child.stdout.destroy();
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGTERM');
      }
    }
    await closed;
  }

  const status = await closed;
  if (status.error || status.code !== 0) {
    throw new ProcessError(command, status.code, status.signal, stderr(), { cause: status.error });
  }
}

function waitForClose(child: ReturnType<typeof spawn>): Promise<CloseStatus> {
  return new Promise((resolve) => {
    let spawnError: Error | undefined;

    child.once('error', (error) => {
      spawnError = error;
      // No pid means it never started and 'close' may not follow
      if (child.pid === undefined) {
        resolve({ code: null, signal: null, error });
      }
    });

    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ code, signal, error: spawnError });
    });
  });
}

function captureTail(stream: Readable, limit: number): () => string {
  let tail = '';
  stream.setEncoding('utf8');
  stream.on('data', (chunk: string) => {
    tail = (tail + chunk).slice(-limit);
  });
  return () => tail;
}
