/**
 * Reference interpreter for assembled programs
 *
 * @module @einsum-ir/backend-cpu
 */

import { CPUDevice } from './device';

export { CPUDevice } from './device';
export { CPUExecutable, type BufferKey } from './executable';
export { BufferView, HostBuffer, type NumericArray, type BigIntArray } from './data';
export { ExecutionError } from './errors';

export const cpu = new CPUDevice();

// Export utils for testing or advanced usage
export * from './utils';
