// Re-export tinybench types
export { Bench } from 'tinybench';
export type { Task, Options, TaskResult } from 'tinybench';

// Export utilities
export * from './utils/sizes';
export * from './utils/data';
export * from './utils/formatting';
export * from './utils/config';
export * from './workloads';

// Export runners
export { runProgramBenchmarks, defaultWorkloads } from './runners/programs';
