import { EdslError, type ErrorContext } from '@einsum-ir/core';

/**
 * Failure while compiling or running a program on the CPU interpreter
 */
export class ExecutionError extends EdslError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'ExecutionError';
  }
}
