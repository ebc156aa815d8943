/**
 * Type promotion rules
 *
 * The lattice is a chain ordered by {@link RuntimeDType.rank}:
 *
 *   bool < int8 < uint8 < int16 < uint16 < int32 < uint32 < int64 < uint64 < float32 < float64
 *
 * so the join of two dtypes is the one with the higher rank. Mixed signedness
 * at equal width resolves to the unsigned type; any float wins over any
 * integer. Implicit promotion never narrows; narrowing requires a cast.
 */

import type { DTypeKind } from './types';
import { PROMOTION_ORDER, type RuntimeDType, getDType } from './runtime';

// =============================================================================
// Runtime Type Promotion
// =============================================================================

/**
 * Join of two runtime dtypes
 */
export function joinDTypes(a: RuntimeDType, b: RuntimeDType): RuntimeDType {
  return a.rank >= b.rank ? a : b;
}

/**
 * True when values of `from` convert to `to` implicitly
 */
export function isWidening(from: RuntimeDType, to: RuntimeDType): boolean {
  return joinDTypes(from, to) === to;
}

/**
 * Compare two dtype kinds in lattice order
 */
export function compareKinds(a: DTypeKind, b: DTypeKind): number {
  const order: Record<DTypeKind, number> = { bool: 0, int: 1, float: 2 };
  return order[a] - order[b];
}

/**
 * Lowest dtype of the given kind, used as the starting point for literals
 */
export function smallestOfKind(kind: DTypeKind): RuntimeDType {
  const dtype = PROMOTION_ORDER.find((candidate) => candidate.kind === kind);
  if (dtype === undefined) {
    throw new Error(`No dtype of kind ${kind}`);
  }
  return dtype;
}

// =============================================================================
// Result Type Computation
// =============================================================================

/**
 * Unary operations that are only defined on floating-point values
 */
export const FLOATING_UNARY_OPS = ['exp', 'log', 'sqrt', 'tanh'] as const;

/**
 * Result dtype of a unary operation
 *
 * Sign and bit manipulation keep the input dtype. Transcendental functions on
 * integers produce float32 for inputs up to 16 bits and float64 above that.
 *
 * @example
 * computeUnaryResultType(getDType('int8'), 'exp'); // float32
 * computeUnaryResultType(getDType('int32'), 'sqrt'); // float64
 * computeUnaryResultType(getDType('uint8'), 'neg'); // uint8
 */
export function computeUnaryResultType(input: RuntimeDType, operation: string): RuntimeDType {
  if (FLOATING_UNARY_OPS.some((op) => op === operation) && !input.isFloat) {
    return input.byteSize <= 2 ? getDType('float32') : getDType('float64');
  }
  return input;
}

// =============================================================================
// Literal Representability
// =============================================================================

/**
 * Whether a literal of the given kind and value can be stored in `dtype`
 * without changing its value
 *
 * @example
 * isRepresentable(-2, 'int', getDType('uint64')); // false
 * isRepresentable(300, 'int', getDType('int8')); // false
 * isRepresentable(0.5, 'float', getDType('float32')); // true
 */
export function isRepresentable(
  value: number | bigint | boolean,
  kind: DTypeKind,
  dtype: RuntimeDType,
): boolean {
  if (compareKinds(kind, dtype.kind) > 0) {
    return false;
  }
  if (kind !== 'int' || dtype.kind !== 'int' || typeof value === 'boolean') {
    return true;
  }
  const asBigInt = typeof value === 'bigint' ? value : BigInt(value);
  return asBigInt >= BigInt(dtype.minValue) && asBigInt <= BigInt(dtype.maxValue);
}
