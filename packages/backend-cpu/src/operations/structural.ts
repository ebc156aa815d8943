/**
 * Constants, shape queries, index grids, reshape and random numbers
 */

import type { ConstantNode, IndexNode, LogicalShape } from '@einsum-ir/core';
import { RuntimeShape } from '@einsum-ir/core';
import { HostBuffer } from '../data';
import { ExecutionError } from '../errors';
import { convertScalar } from '../utils';

export function executeConstantOp(node: ConstantNode, shape: LogicalShape): HostBuffer {
  const output = new HostBuffer(shape);
  const { value } = node.literal;
  const scalar = typeof value === 'boolean' ? (value ? 1 : 0) : value;
  output.set(0, convertScalar(scalar, shape.dtype));
  return output;
}

/**
 * The dimensions of `input` as a 1-D tensor
 */
export function executeShapeOp(input: HostBuffer, shape: LogicalShape): HostBuffer {
  const output = new HostBuffer(shape);
  input.shape.dims.forEach((dim, i) => output.set(i, convertScalar(dim, shape.dtype)));
  return output;
}

/**
 * Every element holds its own coordinate along `axis`
 */
export function executeIndexOp(node: IndexNode, shape: LogicalShape): HostBuffer {
  const output = new HostBuffer(shape);
  const stride = RuntimeShape.computeStrides(shape.dims)[node.axis] ?? 1;
  const extent = shape.dims[node.axis] ?? 1;
  for (let i = 0; i < output.size; i++) {
    output.set(i, convertScalar(Math.floor(i / stride) % extent, shape.dtype));
  }
  return output;
}

/**
 * Row-major order is unchanged, so the data is copied as is
 */
export function executeReshapeOp(input: HostBuffer, shape: LogicalShape): HostBuffer {
  if (input.size !== shape.size) {
    throw new ExecutionError(`Cannot reshape ${input.size} elements to ${shape.toTypeString()}`);
  }
  return new HostBuffer(shape, input.data.slice());
}

// =============================================================================
// Random Numbers
// =============================================================================

export interface PrngOutput {
  readonly values: HostBuffer;
  readonly state: HostBuffer;
}

// substitute for an all-zero word, which xorshift never leaves
const ZERO_WORD_SEED = 0x9e3779b9;

/**
 * Uniform floats in `[0, 1)` from a xorshift32 generator per state word
 *
 * Value `i` advances state word `i mod n` once, so the result depends only on
 * the input state.
 */
export function executePrngOp(state: HostBuffer, shape: LogicalShape): PrngOutput {
  if (state.size === 0) {
    throw new ExecutionError('prng state must not be empty');
  }
  const next = state.clone();
  const values = new HostBuffer(shape);
  for (let i = 0; i < values.size; i++) {
    const word = i % next.size;
    let s = Number(next.get(word)) >>> 0;
    if (s === 0) {
      s = ZERO_WORD_SEED;
    }
    s = (s ^ (s << 13)) >>> 0;
    s = (s ^ (s >>> 17)) >>> 0;
    s = (s ^ (s << 5)) >>> 0;
    next.set(word, s);
    values.set(i, (s >>> 8) / 16777216);
  }
  return { values, state: next };
}
