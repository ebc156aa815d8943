export * from './dtype';
export * from './shape';
export * from './contraction';
export * from './tensor';
export * from './program';
export * from './errors';
export { getCompilerConfig, DEFAULT_BOUNDS_MAX_ROUNDS, DEFAULT_COVERAGE_CHECK_LIMIT } from './config';
export type { CompilerConfig } from './config';
export { makeLogger, logger } from './logger';
export type { Logger } from './logger';
