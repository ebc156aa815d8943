/**
 * Operation dispatcher for the CPU interpreter
 *
 * Routes scheduled program operations to their kernel implementations.
 */

import type { ScheduledOp } from '@einsum-ir/core';
import { assertExhaustiveSwitch } from '@einsum-ir/core';
import type { HostBuffer } from '../data';
import { ExecutionError } from '../errors';
import { executeContractionOp } from './contraction';
import { executeBinaryOp, executeCastOp, executeSelectOp, executeUnaryOp } from './elementwise';
import {
  executeConstantOp,
  executeIndexOp,
  executePrngOp,
  executeReshapeOp,
  executeShapeOp,
} from './structural';

/**
 * Values computed so far during one run, by node id
 */
export interface RunState {
  readonly values: Map<number, HostBuffer>;
  /** Updated generator state of each evaluated prng node */
  readonly prngStates: Map<number, HostBuffer>;
}

function operand(state: RunState, op: ScheduledOp, position: number): HostBuffer {
  const id = op.node.operands[position];
  const value = id === undefined ? undefined : state.values.get(id);
  if (value === undefined) {
    throw new ExecutionError(`Operand ${position} of ${op.ref} has not been computed`, {
      op: op.ref,
    });
  }
  return value;
}

/**
 * Execute one scheduled operation
 *
 * @returns the operation's value; prng nodes also record their next state
 */
export function executeOperation(op: ScheduledOp, state: RunState): HostBuffer {
  const { node, shape } = op;
  switch (node.kind) {
    case 'placeholder':
      throw new ExecutionError(`Placeholder ${op.ref} is bound by the caller, not executed`);

    case 'constant':
      return executeConstantOp(node, shape);

    case 'unary':
      return executeUnaryOp(node, operand(state, op, 0), shape);

    case 'binary':
      return executeBinaryOp(node, operand(state, op, 0), operand(state, op, 1), shape);

    case 'select':
      return executeSelectOp(
        operand(state, op, 0),
        operand(state, op, 1),
        operand(state, op, 2),
        shape,
      );

    case 'cast':
      return executeCastOp(operand(state, op, 0), shape);

    case 'shape':
      return executeShapeOp(operand(state, op, 0), shape);

    case 'index':
      return executeIndexOp(node, shape);

    case 'reshape':
      return executeReshapeOp(operand(state, op, 0), shape);

    case 'prng': {
      const { values, state: next } = executePrngOp(operand(state, op, 0), shape);
      state.prngStates.set(op.id, next);
      return values;
    }

    case 'prng_state': {
      const next = state.prngStates.get(node.operands[0]);
      if (next === undefined) {
        throw new ExecutionError(`prng state of ${op.ref} read before its generator ran`);
      }
      return next;
    }

    case 'contraction': {
      if (op.contraction === undefined) {
        throw new ExecutionError(`Contraction ${op.ref} was not resolved`);
      }
      const operands = node.operands.map((_, position) => operand(state, op, position));
      return executeContractionOp(node, op.contraction, operands, shape);
    }

    default:
      return assertExhaustiveSwitch(node);
  }
}
