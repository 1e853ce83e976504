/**
 * Session configuration read from the environment
 */

import { z } from 'zod';

const ENCODINGS = [
  'utf8',
  'utf-8',
  'utf16le',
  'utf-16le',
  'ucs2',
  'ucs-2',
  'latin1',
  'binary',
  'ascii',
] as const satisfies readonly BufferEncoding[];

const booleanFlag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform((value) => value === '1' || value === 'true' || value === 'yes');

const EnvSchema = z.object({
  PROC_SESSION_DEBUG: booleanFlag.optional(),
  PROC_SESSION_ENCODING: z.enum(ENCODINGS).optional(),
  PROC_SESSION_KILL: z.enum(['graceful', 'forceful']).optional(),
});

export interface SessionConfig {
  verbose: boolean;
  encoding: BufferEncoding;
  destroyForcibly: boolean;
}

export const DEFAULT_CONFIG: SessionConfig = {
  verbose: false,
  encoding: 'utf8',
  destroyForcibly: false,
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  const parsed = EnvSchema.safeParse({
    PROC_SESSION_DEBUG: env['PROC_SESSION_DEBUG'] || undefined,
    PROC_SESSION_ENCODING: env['PROC_SESSION_ENCODING'] || undefined,
    PROC_SESSION_KILL: env['PROC_SESSION_KILL'] || undefined,
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    verbose: parsed.data.PROC_SESSION_DEBUG ?? DEFAULT_CONFIG.verbose,
    encoding: parsed.data.PROC_SESSION_ENCODING ?? DEFAULT_CONFIG.encoding,
    destroyForcibly: parsed.data.PROC_SESSION_KILL
      ? parsed.data.PROC_SESSION_KILL === 'forceful'
      : DEFAULT_CONFIG.destroyForcibly,
  };
}
