/**
 * Process Result - terminal value of an invocation and its strict check
 */

import { InvalidResultError } from './errors';
import type { ProcessResult } from '../types';

export function createResult(exitCode: number, output: readonly string[]): ProcessResult {
  return Object.freeze({
    exitCode,
    output: Object.freeze([...output]),
  });
}

export function isSuccessResult(result: ProcessResult): boolean {
  return result.exitCode === 0;
}

/**
 * Ensure an invocation concluded with exit code 0.
 *
 * @returns the captured output
 * @throws InvalidResultError carrying the observed exit code otherwise
 */
export function validate(result: ProcessResult): readonly string[] {
  if (result.exitCode !== 0) {
    throw new InvalidResultError(result.exitCode);
  }
  return result.output;
}

export { validate as unwrap };
