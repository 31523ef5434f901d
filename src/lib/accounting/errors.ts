function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Error thrown when a date range ends before it starts.
 *
 * Raised before any accounting process is spawned.
 */
export class InvalidRangeError extends Error {
  constructor(readonly start: Date, readonly end: Date) {
    super(`Invalid date range: end ${isoDay(end)} is before start ${isoDay(start)}`);
    this.name = 'InvalidRangeError';
  }
}

/**
 * Error thrown when the accounting command fails.
 *
 * Only raised after its output has been fully drained, so rows consumed
 * before the failure stay valid.
 */
export class ProcessError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly signal: NodeJS.Signals | null,
    readonly stderr: string,
    options?: { cause?: unknown },
  ) {
    super(ProcessError.describe(command, exitCode, signal, stderr, options?.cause), options);
    this.name = 'ProcessError';
  }

  private static describe(
    command: string,
    exitCode: number | null,
    signal: NodeJS.Signals | null,
    stderr: string,
    cause: unknown,
  ): string {
    let reason: string;
    if (cause instanceof Error) {
      reason = `failed to start (${cause.message})`;
    } else if (signal) {
      reason = `was killed by ${signal}`;
    } else {
      reason = `exited with code ${exitCode}`;
    }
    const detail = stderr.trim();
    return detail ? `${command} ${reason}: ${detail}` : `${command} ${reason}`;
  }
}
