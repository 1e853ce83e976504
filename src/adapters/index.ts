/**
 * Adapters - Real and mock implementations for ports
 */

export {
  ExecaProcessLauncher,
  findExecutable,
  exitCodeOf,
  type ExecaLauncherOptions,
} from './execa-launcher.adapter';
export * from './mocks';
