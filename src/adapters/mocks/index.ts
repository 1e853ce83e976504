/**
 * Mock Adapters - Test implementations for Hexagonal Architecture ports
 */

export {
  MockProcessLauncher,
  MockLaunchedProcess,
  type MockCommand,
  type MockOutput,
  type MockProcessLauncherOptions,
} from './mock-process';
