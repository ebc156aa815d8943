/**
 * Free-standing graph operations
 */

import { RankError, ShapeError } from '../errors';
import { toDType, type DTypeLike } from '../dtype';
import type { Tensor, TensorLike } from './tensor';

/**
 * Elementwise `condition ? whenTrue : whenFalse`; the condition must be bool
 *
 * @example
 * const relu = select(I.lt(0), 0, I);
 */
export function select(condition: Tensor, whenTrue: TensorLike, whenFalse: TensorLike): Tensor {
  const graph = condition.graph;
  const a = graph.lift(whenTrue);
  const b = graph.lift(whenFalse);
  return graph.addNode({ kind: 'select', operands: [condition.id, a.id, b.id] });
}

export function cast(tensor: Tensor, dtype: DTypeLike): Tensor {
  return tensor.cast(toDType(dtype));
}

/**
 * The dimensions of a tensor as a rank-1 int32 tensor
 */
export function shape(tensor: Tensor): Tensor {
  return tensor.graph.addNode({ kind: 'shape', operands: [tensor.id] });
}

/**
 * Tensor of the same dimensions holding each cell's coordinate along `axis`
 *
 * @example
 * index(T, 0); // T of shape [4] -> [0, 1, 2, 3]
 */
export function index(tensor: Tensor, axis: number): Tensor {
  const rank = tensor.rank;
  if (!Number.isInteger(axis) || axis < 0 || axis >= rank) {
    throw new RankError(`index axis ${axis} is out of range for rank ${rank}`, rank, axis);
  }
  return tensor.graph.addNode({ kind: 'index', axis, operands: [tensor.id] });
}

export interface PrngResult {
  /** float32 values in `[0, 1)` */
  readonly values: Tensor;
  /** Next generator state, same shape as the input state */
  readonly state: Tensor;
}

/**
 * Pseudo-random values from a uint32 generator state
 *
 * @example
 * const S = g.placeholder('uint32', [3, 2048]);
 * const { values, state } = prng(S, [2, 3, 4, 5]);
 */
export function prng(state: Tensor, dims: readonly number[]): PrngResult {
  for (const dim of dims) {
    if (!Number.isSafeInteger(dim) || dim < 0) {
      throw new ShapeError(`Invalid prng dimension ${dim}`, { dims });
    }
  }
  const graph = state.graph;
  const values = graph.addNode({ kind: 'prng', dims: [...dims], operands: [state.id] });
  const next = graph.addNode({ kind: 'prng_state', operands: [values.id] });
  return { values, state: next };
}
