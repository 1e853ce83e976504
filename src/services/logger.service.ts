/**
 * Logger Service - timestamped console logging with a verbose switch
 *
 * Lines go to stderr so they never interleave with a child's inherited stdout.
 */

export interface Logger {
  debug(message: string, data?: unknown): void;
  warn(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  prefix?: string;
}

function timestamp(): string {
  return new Date().toISOString().slice(11, 19);
}

export class ConsoleLogger implements Logger {
  private verbose: boolean;
  private prefix: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.prefix = options.prefix ?? 'proc';
  }

  debug(message: string, data?: unknown): void {
    if (!this.verbose) return;
    const suffix = data !== undefined ? ` ${JSON.stringify(data)}` : '';
    console.error(`[${timestamp()}] [${this.prefix}] ${message}${suffix}`);
  }

  warn(message: string): void {
    console.error(`[${timestamp()}] [${this.prefix} WARN] ${message}`);
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};
