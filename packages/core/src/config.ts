import { makeLogger } from './logger';

const logger = makeLogger('config');

export interface CompilerConfig {
  /**
   * Largest iteration space (number of index points) for which the assembler
   * enumerates an `assign` contraction to check its write pattern
   */
  readonly coverageCheckLimit: number;
  /**
   * Upper bound on interval propagation rounds when deriving index ranges
   */
  readonly boundsMaxRounds: number;
}

export const DEFAULT_COVERAGE_CHECK_LIMIT = 1 << 20;
export const DEFAULT_BOUNDS_MAX_ROUNDS = 64;

function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got '${raw}'`);
  }
  return value;
}

/**
 * Read compiler settings from the environment
 *
 * - `EINSUM_IR_COVERAGE_CHECK_LIMIT` (default 1048576)
 * - `EINSUM_IR_BOUNDS_MAX_ROUNDS` (default 64)
 */
export function getCompilerConfig(overrides: Partial<CompilerConfig> = {}): CompilerConfig {
  const coverageCheckLimit =
    overrides.coverageCheckLimit ??
    readPositiveInt('EINSUM_IR_COVERAGE_CHECK_LIMIT', DEFAULT_COVERAGE_CHECK_LIMIT);
  const boundsMaxRounds =
    overrides.boundsMaxRounds ??
    readPositiveInt('EINSUM_IR_BOUNDS_MAX_ROUNDS', DEFAULT_BOUNDS_MAX_ROUNDS);
  logger.trace(`coverageCheckLimit: ${coverageCheckLimit}, boundsMaxRounds: ${boundsMaxRounds}`);
  return { coverageCheckLimit, boundsMaxRounds };
}
