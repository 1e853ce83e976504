/**
 * Ports - contracts for the OS facilities a session depends on
 *
 * The execa adapter implements them for real processes; the mocks stand in
 * for them in tests.
 */

export * from './process.port';
