/**
 * Error taxonomy for a process invocation.
 *
 * A non-zero exit code is deliberately absent here: it is a regular
 * ProcessResult and only becomes an error through `validate()`.
 */

export enum ProcessErrorCode {
  LAUNCH_FAILED = 'LAUNCH_FAILED',
  STREAM_FAILED = 'STREAM_FAILED',
  INVALID_RESULT = 'INVALID_RESULT',
  CANCELLED = 'CANCELLED',
}

export type StreamName = 'stdin' | 'stdout' | 'stderr';

export class ProcessError extends Error {
  readonly code: ProcessErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: ProcessErrorCode,
    message: string,
    options: { cause?: unknown; context?: Record<string, unknown> } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProcessError';
    this.code = code;
    this.context = options.context;
  }
}

/**
 * The program could not be started. Raised before any stream pump runs.
 */
export class ProcessLaunchError extends ProcessError {
  readonly command: readonly string[];

  constructor(command: readonly string[], reason: string, cause?: unknown) {
    super(
      ProcessErrorCode.LAUNCH_FAILED,
      `Failed to launch ${command[0] ?? '<empty command>'}: ${reason}`,
      { cause, context: { command: [...command] } }
    );
    this.name = 'ProcessLaunchError';
    this.command = command;
  }
}

/**
 * Reading or writing one of the child's streams failed mid-invocation.
 */
export class StreamPumpError extends ProcessError {
  readonly stream: StreamName;

  constructor(stream: StreamName, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(ProcessErrorCode.STREAM_FAILED, `Stream ${stream} failed: ${detail}`, {
      cause,
      context: { stream },
    });
    this.name = 'StreamPumpError';
    this.stream = stream;
  }
}

export class InvalidResultError extends ProcessError {
  readonly exitCode: number;

  constructor(exitCode: number) {
    super(ProcessErrorCode.INVALID_RESULT, `Invalid result: ${exitCode}`, {
      context: { exitCode },
    });
    this.name = 'InvalidResultError';
    this.exitCode = exitCode;
  }
}

/**
 * Surfaced instead of a result when the invocation's signal aborts.
 * Named `AbortError` so generic abort handling recognises it.
 */
export class ProcessCancelledError extends ProcessError {
  constructor(reason: unknown) {
    super(ProcessErrorCode.CANCELLED, 'Process invocation was cancelled', { cause: reason });
    this.name = 'AbortError';
  }
}

export function isCancellation(err: unknown): err is ProcessCancelledError {
  return err instanceof ProcessError && err.code === ProcessErrorCode.CANCELLED;
}
