import { describe, it, expect, beforeEach } from 'vitest';
import { MockProcessLauncher } from '../../../src/adapters/mocks';
import { DEFAULT_CONFIG } from '../../../src/config';
import {
  ProcessCancelledError,
  ProcessLaunchError,
  StreamPumpError,
} from '../../../src/core/errors';
import { InputSource } from '../../../src/core/input-source';
import { Redirect } from '../../../src/core/redirect';
import { ProcessSession } from '../../../src/runner/process-session';
import { silentLogger, type Logger } from '../../../src/services/logger.service';
import type { ProcessOptions } from '../../../src/types';

describe('ProcessSession', () => {
  let launcher: MockProcessLauncher;

  function session(command: string[], options: ProcessOptions = {}): ProcessSession {
    return new ProcessSession(command, { launcher, logger: silentLogger, ...options });
  }

  beforeEach(() => {
    launcher = new MockProcessLauncher();
  });

  describe('launch', () => {
    it('should merge stderr into stdout when both capture', async () => {
      launcher.setCommand(['build'], {
        output: [
          { stream: 'stdout', line: 'compiling' },
          { stream: 'stderr', line: 'warning: unused' },
          { stream: 'stdout', line: 'done' },
        ],
      });

      const result = await session(['build'], {
        stdout: Redirect.CAPTURE,
        stderr: Redirect.CAPTURE,
        env: { MODE: 'release' },
        cwd: '/work',
      }).run();

      expect(launcher.getLaunchHistory()).toEqual([
        {
          command: ['build'],
          env: { MODE: 'release' },
          cwd: '/work',
          stdin: { type: 'pipe' },
          stdout: { type: 'pipe' },
          stderr: { type: 'stdout' },
        },
      ]);
      expect(result).toEqual({
        exitCode: 0,
        output: ['compiling', 'warning: unused', 'done'],
      });
    });

    it('should print both streams by default', async () => {
      launcher.setCommand(['ls'], { output: [{ stream: 'stdout', line: 'file.txt' }] });

      const result = await session(['ls']).run();

      const [spec] = launcher.getLaunchHistory();
      expect(spec?.stdout).toEqual({ type: 'inherit' });
      expect(spec?.stderr).toEqual({ type: 'inherit' });
      expect(result.output).toEqual([]);
    });

    it('should redirect file input and output without pumps', async () => {
      launcher.setCommand(['sort'], {});
      const run = session(['sort'], {
        stdin: InputSource.fromFile('in.txt'),
        stdout: Redirect.toFile('out.txt'),
        stderr: Redirect.toFile('err.txt', true),
      });

      await run.run();

      const [spec] = launcher.getLaunchHistory();
      expect(spec?.stdin).toEqual({ type: 'file', path: 'in.txt', mode: 'read' });
      expect(spec?.stdout).toEqual({ type: 'file', path: 'out.txt', mode: 'truncate' });
      expect(spec?.stderr).toEqual({ type: 'file', path: 'err.txt', mode: 'append' });
      expect(run.snapshot.context.pumps).toEqual([]);
    });

    it('should surface launch failures', async () => {
      const run = session(['missing-tool']);

      await expect(run.run()).rejects.toThrow(ProcessLaunchError);
      expect(run.phase).toBe('failed');
      expect(run.snapshot.context.error).toBe('Failed to launch missing-tool: command not found');
    });

    it('should keep the launcher reason', async () => {
      launcher.setCommand(['locked'], { launchError: 'permission denied' });

      await expect(session(['locked']).run()).rejects.toThrow(
        'Failed to launch locked: permission denied'
      );
    });
  });

  describe('results', () => {
    it('should return non-zero exit codes as results', async () => {
      launcher.setCommand(['test'], {
        output: [{ stream: 'stdout', line: '1 failed' }],
        exitCode: 3,
      });

      const result = await session(['test'], { stdout: Redirect.CAPTURE }).run();

      expect(result).toEqual({ exitCode: 3, output: ['1 failed'] });
    });

    it('should capture stderr alone', async () => {
      launcher.setCommand(['lint'], {
        output: [
          { stream: 'stdout', line: 'ignored' },
          { stream: 'stderr', line: 'warn: a' },
        ],
      });

      const result = await session(['lint'], {
        stdout: Redirect.SILENT,
        stderr: Redirect.CAPTURE,
      }).run();

      expect(result.output).toEqual(['warn: a']);
    });

    it('should hand captured lines to the consumer in order', async () => {
      launcher.setCommand(['seq'], {
        output: ['1', '2', '3'].map((line) => ({ stream: 'stdout' as const, line })),
      });
      const seen: string[] = [];

      const result = await session(['seq'], {
        stdout: Redirect.CAPTURE,
        consumer: (line) => void seen.push(line),
      }).run();

      expect(seen).toEqual(['1', '2', '3']);
      expect(result.output).toEqual(['1', '2', '3']);
    });

    it('should keep consumed lines out of the result', async () => {
      launcher.setCommand(['mixed'], {
        output: [
          { stream: 'stdout', line: 'to handler' },
          { stream: 'stderr', line: 'to result' },
        ],
      });
      const handled: string[] = [];

      const result = await session(['mixed'], {
        stdout: Redirect.consume(async (lines) => {
          for await (const line of lines) handled.push(line);
        }),
        stderr: Redirect.CAPTURE,
      }).run();

      expect(handled).toEqual(['to handler']);
      expect(result.output).toEqual(['to result']);
    });

    it('should wait for every pump before waiting for exit', async () => {
      launcher.setCommand(['slow'], {
        output: [
          { stream: 'stdout', line: 'a' },
          { stream: 'stderr', line: 'b' },
        ],
        delay: 5,
      });

      await session(['slow'], {
        stdout: Redirect.consume(async (lines) => {
          for await (const line of lines) {
            await new Promise((resolve) => setTimeout(resolve, 10));
            launcher.trace.push(`consumed:${line}`);
          }
        }),
        stderr: Redirect.CAPTURE,
        consumer: (line) => void launcher.trace.push(`captured:${line}`),
      }).run();

      const waitAt = launcher.trace.indexOf('waitFor');
      expect(waitAt).toBe(launcher.trace.length - 1);
      expect(launcher.trace).toContain('consumed:a');
      expect(launcher.trace).toContain('captured:b');
    });

    it('should record the session phases', async () => {
      launcher.setCommand(['true'], {});
      const run = session(['true'], {
        stdin: InputSource.fromString('x'),
        stdout: Redirect.CAPTURE,
      });
      expect(run.phase).toBe('created');

      await run.run();

      expect(run.phase).toBe('exited');
      expect(run.snapshot.context.pumps).toEqual(['stdin:bytes', 'stdout:capture']);
      expect(run.snapshot.context.exitCode).toBe(0);
    });

    it('should refuse to run twice', async () => {
      launcher.setCommand(['true'], {});
      const run = session(['true']);
      await run.run();

      await expect(run.run()).rejects.toThrow('A ProcessSession can only be run once');
    });
  });

  describe('stdin', () => {
    it('should feed a string', async () => {
      launcher.setCommand(['cat'], { echoStdin: true });

      const result = await session(['cat'], {
        stdin: InputSource.fromString('hello\nworld\n'),
        stdout: Redirect.CAPTURE,
      }).run();

      expect(result.output).toEqual(['hello', 'world']);
      expect(launcher.lastProcess()?.receivedInput.join('')).toBe('hello\nworld\n');
    });

    it('should run a writer and close stdin afterwards', async () => {
      launcher.setCommand(['cat'], { echoStdin: true });

      const result = await session(['cat'], {
        stdin: InputSource.fromWriter(async (stdin) => {
          stdin.write('ping\n');
          await new Promise((resolve) => setTimeout(resolve, 5));
          stdin.write('pong\n');
        }),
        stdout: Redirect.CAPTURE,
      }).run();

      expect(result.output).toEqual(['ping', 'pong']);
    });
  });

  describe('stream failures', () => {
    it('should fail with the stdin stream when the writer throws', async () => {
      launcher.setCommand(['cat'], { echoStdin: true });
      const run = session(['cat'], {
        stdin: InputSource.fromWriter((stdin) => {
          stdin.write('partial\n');
          throw new Error('writer broke');
        }),
        stdout: Redirect.CAPTURE,
      });

      const error = await run.run().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StreamPumpError);
      if (!(error instanceof StreamPumpError)) return;
      expect(error.stream).toBe('stdin');
      expect(error.message).toBe('Stream stdin failed: writer broke');
      expect(run.phase).toBe('failed');
      expect(launcher.trace).toEqual(['exit:0', 'waitFor']);
    });

    it('should fail with the stdout stream when the consumer throws', async () => {
      launcher.setCommand(['gen'], {
        output: [
          { stream: 'stdout', line: 'ok' },
          { stream: 'stdout', line: 'bad' },
          { stream: 'stdout', line: 'after' },
        ],
      });

      const error = await session(['gen'], {
        stdout: Redirect.CAPTURE,
        consumer: (line) => {
          if (line === 'bad') throw new Error('rejected line');
        },
      })
        .run()
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StreamPumpError);
      if (!(error instanceof StreamPumpError)) return;
      expect(error.stream).toBe('stdout');
      expect(error.cause).toEqual(new Error('rejected line'));
    });

    it('should fail with the stream whose handler throws', async () => {
      launcher.setCommand(['gen'], { output: [{ stream: 'stderr', line: 'x' }] });

      await expect(
        session(['gen'], {
          stderr: Redirect.consume(async () => {
            throw new Error('handler broke');
          }),
        }).run()
      ).rejects.toThrow('Stream stderr failed: handler broke');
    });
  });

  describe('cancellation', () => {
    function hangingServer(): void {
      launcher.setCommand(['server'], {
        output: [{ stream: 'stdout', line: 'listening' }],
        hang: true,
      });
    }

    it('should terminate gracefully by default', async () => {
      hangingServer();
      const controller = new AbortController();
      const reason = new Error('shutting down');
      const run = session(['server'], {
        stdout: Redirect.CAPTURE,
        signal: controller.signal,
        consumer: () => controller.abort(reason),
      });

      const error = await run.run().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProcessCancelledError);
      if (!(error instanceof ProcessCancelledError)) return;
      expect(error.cause).toBe(reason);
      expect(launcher.lastProcess()?.terminatedWith).toBe('SIGTERM');
      expect(run.phase).toBe('terminated');
      expect(run.snapshot.context).toMatchObject({
        cancelReason: 'shutting down',
        forcibly: false,
      });
    });

    it('should kill forcibly when requested', async () => {
      hangingServer();
      const controller = new AbortController();
      const run = session(['server'], {
        stdout: Redirect.CAPTURE,
        signal: controller.signal,
        destroyForcibly: true,
        consumer: () => controller.abort(),
      });

      await expect(run.run()).rejects.toThrow(ProcessCancelledError);

      expect(launcher.lastProcess()?.terminatedWith).toBe('SIGKILL');
      expect(run.snapshot.context.forcibly).toBe(true);
    });

    it('should take the kill policy from the configuration', async () => {
      hangingServer();
      const controller = new AbortController();
      const run = new ProcessSession(
        ['server'],
        {
          launcher,
          logger: silentLogger,
          stdout: Redirect.SILENT,
          signal: controller.signal,
        },
        { ...DEFAULT_CONFIG, destroyForcibly: true }
      );

      const pending = run.run();
      setTimeout(() => controller.abort(), 10);

      await expect(pending).rejects.toThrow(ProcessCancelledError);
      expect(launcher.lastProcess()?.terminatedWith).toBe('SIGKILL');
    });

    it('should cancel while waiting for exit', async () => {
      hangingServer();
      const controller = new AbortController();
      const run = session(['server'], { signal: controller.signal });

      const pending = run.run();
      setTimeout(() => controller.abort(), 10);

      await expect(pending).rejects.toThrow('Process invocation was cancelled');
      expect(launcher.trace).toEqual(['waitFor', 'exit:143']);
    });

    it('should not launch when already cancelled', async () => {
      hangingServer();
      const controller = new AbortController();
      controller.abort();
      const run = session(['server'], { signal: controller.signal });

      await expect(run.run()).rejects.toThrow(ProcessCancelledError);
      expect(launcher.getLaunchHistory()).toEqual([]);
      expect(run.phase).toBe('terminated');
    });
  });

  describe('logging', () => {
    it('should log each phase through the logger', async () => {
      launcher.setCommand(['true'], {});
      const messages: string[] = [];
      const logger: Logger = {
        debug: (message) => void messages.push(message),
        warn: () => {},
      };

      await new ProcessSession(['true'], { launcher, logger }).run();

      expect(messages).toContain('true: started');
      expect(messages).toContain('true: streamsRunning');
      expect(messages).toContain('true: exited');
    });

    it('should warn about a failed stream', async () => {
      launcher.setCommand(['gen'], { output: [{ stream: 'stderr', line: 'x' }] });
      const warnings: string[] = [];
      const logger: Logger = {
        debug: () => {},
        warn: (message) => void warnings.push(message),
      };

      await expect(
        new ProcessSession(['gen'], {
          launcher,
          logger,
          stderr: Redirect.consume(async () => {
            throw new Error('handler broke');
          }),
        }).run()
      ).rejects.toThrow(StreamPumpError);

      expect(warnings).toEqual(['gen: Stream stderr failed: handler broke']);
    });
  });
});
