/**
 * proc-session - run one external process with arbitrated streams
 *
 * Main exports for programmatic usage
 */

// Core types
export type {
  LineConsumer,
  LineHandler,
  StdinWriter,
  StreamSink,
  ProcessOptions,
  ProcessResult,
} from './types';

// Policies and results
export { Redirect, resolveRedirects, resolveInput, type ResolvedRedirects } from './core/redirect';
export { InputSource } from './core/input-source';
export { createResult, isSuccessResult, validate, unwrap } from './core/result';
export {
  ProcessError,
  ProcessErrorCode,
  ProcessLaunchError,
  StreamPumpError,
  InvalidResultError,
  ProcessCancelledError,
  isCancellation,
  type StreamName,
} from './core/errors';

// Runner
export { ProcessSession, runProcess } from './runner/process-session';
export { readLines } from './runner/line-stream';

// Session machine
export {
  sessionMachine,
  getPhase,
  isTerminal,
  isCancelled,
  type SessionPhase,
  type SessionContext,
  type SessionEvent,
  type SessionSnapshot,
} from './workflows/session.workflow';

// Ports and adapters
export type {
  IProcessLauncher,
  LaunchedProcess,
  LaunchSpec,
  StdioDirective,
  ErrorDirective,
} from './ports';
export { ExecaProcessLauncher, type ExecaLauncherOptions } from './adapters';

// Ambient
export { loadConfig, DEFAULT_CONFIG, ConfigError, type SessionConfig } from './config';
export { ConsoleLogger, silentLogger, type Logger } from './services/logger.service';
