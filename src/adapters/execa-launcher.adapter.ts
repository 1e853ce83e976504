/**
 * Execa Launcher Adapter - Real implementation of IProcessLauncher
 *
 * Spawns the child with execa, leaving every stream unbuffered so the
 * session's pumps are the only readers. File directives are opened here and
 * handed to the child as descriptors.
 */

import { execa, type ExecaChildProcess, type ExecaReturnValue } from 'execa';
import { once } from 'node:events';
import { constants as fsConstants } from 'node:fs';
import { access, open, stat, type FileHandle } from 'node:fs/promises';
import { constants as osConstants } from 'node:os';
import { delimiter, join, resolve } from 'node:path';
import type { Readable, Writable } from 'node:stream';
import { ProcessLaunchError } from '../core/errors';
import type {
  FileMode,
  IProcessLauncher,
  LaunchedProcess,
  LaunchSpec,
  StdioDirective,
} from '../ports/process.port';

export interface ExecaLauncherOptions {
  /** POSIX shell used to merge stderr into stdout. */
  shell?: string;
}

type StdioValue = 'pipe' | 'ignore' | 'inherit' | number;

// `exec` replaces the shell, so the program inherits the dup'd descriptors
// and receives termination signals directly.
const MERGE_SCRIPT = 'exec "$@" 2>&1';

const FILE_FLAGS: Record<FileMode, string> = {
  read: 'r',
  truncate: 'w',
  append: 'a',
};

async function isExecutable(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isFile()) return false;
    await access(path, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve `program` the way execvp would: paths containing a slash are taken
 * relative to `cwd`, bare names are looked up in `searchPath`.
 */
export async function findExecutable(
  program: string,
  searchPath: string,
  cwd: string
): Promise<string | null> {
  if (program.includes('/')) {
    const candidate = resolve(cwd, program);
    return (await isExecutable(candidate)) ? candidate : null;
  }

  for (const dir of searchPath.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(resolve(cwd, dir), program);
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}

export function exitCodeOf(result: Pick<ExecaReturnValue, 'exitCode' | 'signal'>): number {
  if (result.signal) {
    const entry = Object.entries(osConstants.signals).find(([name]) => name === result.signal);
    return 128 + (entry?.[1] ?? 0);
  }
  return result.exitCode;
}

class ExecaLaunchedProcess implements LaunchedProcess {
  private subprocess: ExecaChildProcess;

  constructor(subprocess: ExecaChildProcess) {
    this.subprocess = subprocess;
  }

  get pid(): number | undefined {
    return this.subprocess.pid;
  }

  get stdin(): Writable | null {
    return this.subprocess.stdin;
  }

  get stdout(): Readable | null {
    return this.subprocess.stdout;
  }

  get stderr(): Readable | null {
    return this.subprocess.stderr;
  }

  async waitFor(): Promise<number> {
    const result = await this.subprocess;
    return exitCodeOf(result);
  }

  terminate(): void {
    this.subprocess.kill('SIGTERM');
  }

  terminateForcibly(): void {
    this.subprocess.kill('SIGKILL');
  }
}

export class ExecaProcessLauncher implements IProcessLauncher {
  private shell: string;

  constructor(options: ExecaLauncherOptions = {}) {
    this.shell = options.shell ?? '/bin/sh';
  }

  async launch(spec: LaunchSpec): Promise<LaunchedProcess> {
    const [program, ...args] = spec.command;
    if (!program) {
      throw new ProcessLaunchError(spec.command, 'command is empty');
    }

    const merge = spec.stderr.type === 'stdout';
    if (merge) {
      // The shell would report a missing program as exit 127 instead.
      const searchPath = spec.env?.['PATH'] ?? process.env['PATH'] ?? '';
      const found = await findExecutable(program, searchPath, spec.cwd ?? process.cwd());
      if (!found) {
        throw new ProcessLaunchError(spec.command, 'executable not found');
      }
    }

    const handles: FileHandle[] = [];
    try {
      const stdin = await this.toStdio(spec.stdin, handles);
      const stdout = await this.toStdio(spec.stdout, handles);
      const stderr = spec.stderr.type === 'stdout' ? 'ignore' : await this.toStdio(spec.stderr, handles);

      const file = merge ? this.shell : program;
      const fileArgs = merge ? ['-c', MERGE_SCRIPT, 'sh', program, ...args] : args;

      const subprocess = execa(file, fileArgs, {
        cwd: spec.cwd,
        env: spec.env,
        extendEnv: true,
        stdin,
        stdout,
        stderr,
        buffer: false,
        reject: false,
        stripFinalNewline: false,
        windowsHide: true,
      });

      // 'spawn' rejects on an asynchronous spawn error (ENOENT, EACCES, ...).
      // A synchronous one (invalid argument) emits nothing and only rejects
      // the execa promise, which otherwise settles at exit.
      const failure = await Promise.race([
        once(subprocess, 'spawn').then(() => null),
        subprocess.then(
          () => null,
          (err: unknown) => err
        ),
      ]);
      if (failure !== null) {
        throw failure;
      }
      return new ExecaLaunchedProcess(subprocess);
    } catch (err) {
      if (err instanceof ProcessLaunchError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ProcessLaunchError(spec.command, reason, err);
    } finally {
      // The child holds its own copies of the descriptors.
      await Promise.all(handles.map((handle) => handle.close()));
    }
  }

  private async toStdio(directive: StdioDirective, handles: FileHandle[]): Promise<StdioValue> {
    switch (directive.type) {
      case 'ignore':
      case 'inherit':
      case 'pipe':
        return directive.type;
      case 'file': {
        const handle = await open(directive.path, FILE_FLAGS[directive.mode]);
        handles.push(handle);
        return handle.fd;
      }
    }
  }
}
