/**
 * Benchmark profiles
 */

import type { Options } from 'tinybench';

export type BenchmarkProfile = 'smoke' | 'quick' | 'standard' | 'precise';

export const BENCHMARK_PROFILES = {
  /**
   * A handful of iterations; only checks that every task runs
   */
  smoke: {
    time: 1,
    iterations: 2,
    warmupTime: 0,
    warmupIterations: 0,
  },

  /**
   * Quick profile for development
   */
  quick: {
    time: 250,
    iterations: 10,
    warmupTime: 50,
  },

  /**
   * Standard profile for regular benchmarking
   */
  standard: {
    time: 1000,
    warmupTime: 100,
  },

  /**
   * Longer runtime for comparing changes
   */
  precise: {
    time: 2000,
    iterations: 200,
    warmupTime: 250,
    warmupIterations: 20,
  },
} satisfies Record<BenchmarkProfile, Options>;

function isProfile(value: string): value is BenchmarkProfile {
  return value in BENCHMARK_PROFILES;
}

/**
 * Benchmark options for the profile named by `BENCHMARK_PROFILE`
 */
export function getBenchmarkConfig(env: NodeJS.ProcessEnv = process.env): Options {
  const profile = env['BENCHMARK_PROFILE'] ?? 'standard';
  return isProfile(profile) ? BENCHMARK_PROFILES[profile] : BENCHMARK_PROFILES.standard;
}
