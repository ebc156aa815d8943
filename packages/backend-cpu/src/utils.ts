/**
 * Utility functions for the CPU interpreter
 *
 * Provides scalar conversion between dtypes, comparison across number and
 * BigInt values, and broadcast index iteration.
 */

import { RuntimeShape, type RuntimeDType } from '@einsum-ir/core';

/**
 * One element as read from a host buffer
 */
export type Scalar = number | bigint;

/**
 * Convert a value to the domain of `to`
 *
 * Floats truncate toward zero when converted to integers (non-finite values
 * become 0); integers wrap modulo the target width.
 *
 * @example
 * convertScalar(300.7, getDType('uint8')); // 44
 * convertScalar(-1, getDType('uint64')); // 18446744073709551615n
 */
export function convertScalar(value: Scalar, to: RuntimeDType): Scalar {
  switch (to.kind) {
    case 'bool':
      return value === 0 || value === 0n ? 0 : 1;
    case 'float': {
      const n = Number(value);
      return to.byteSize === 4 ? Math.fround(n) : n;
    }
    case 'int': {
      if (
        to.jsType === 'number' &&
        typeof value === 'number' &&
        Number.isInteger(value) &&
        value >= Number(to.minValue) &&
        value <= Number(to.maxValue)
      ) {
        return value;
      }
      let integral: bigint;
      if (typeof value === 'bigint') {
        integral = value;
      } else {
        integral = Number.isFinite(value) ? BigInt(Math.trunc(value)) : 0n;
      }
      const wrapped = to.signed
        ? BigInt.asIntN(to.bitWidth, integral)
        : BigInt.asUintN(to.bitWidth, integral);
      return to.jsType === 'bigint' ? wrapped : Number(wrapped);
    }
  }
}

/**
 * Three-way comparison across number and BigInt values
 *
 * @returns negative, zero or positive; undefined when either side is NaN
 */
export function compareScalars(a: Scalar, b: Scalar): number | undefined {
  if (Number.isNaN(a) || Number.isNaN(b)) {
    return undefined;
  }
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

export function isTruthy(value: Scalar): boolean {
  return value !== 0 && value !== 0n;
}

/**
 * Strides of `inputDims` laid over `outputDims`, right-aligned, with 0 on
 * broadcast axes
 *
 * @example
 * broadcastStrides([3, 4], [4]); // [0, 1]
 * broadcastStrides([3, 4], [3, 1]); // [1, 0]
 */
export function broadcastStrides(
  outputDims: readonly number[],
  inputDims: readonly number[],
): number[] {
  const strides = RuntimeShape.computeStrides(inputDims);
  const offset = outputDims.length - inputDims.length;
  return outputDims.map((_, axis) => {
    const inputAxis = axis - offset;
    if (inputAxis < 0 || inputDims[inputAxis] === 1) {
      return 0;
    }
    return strides[inputAxis] ?? 0;
  });
}

/**
 * Iterator over every output position with the matching offset into each
 * broadcast input
 *
 * The yielded `inputOffsets` array is reused between steps.
 *
 * @example
 * for (const { outputIndex, inputOffsets } of broadcastIndices([2, 2], [[2, 2], [2]])) {
 *   // inputOffsets: [0, 0], [1, 1], [2, 0], [3, 1]
 * }
 */
export function* broadcastIndices(
  outputDims: readonly number[],
  inputDims: readonly (readonly number[])[],
): Generator<{ outputIndex: number; inputOffsets: readonly number[] }> {
  const size = RuntimeShape.product(outputDims);
  if (size === 0) {
    return;
  }
  const strides = inputDims.map((dims) => broadcastStrides(outputDims, dims));
  const coords = outputDims.map(() => 0);
  const inputOffsets = inputDims.map(() => 0);

  for (let outputIndex = 0; outputIndex < size; outputIndex++) {
    yield { outputIndex, inputOffsets };
    // odometer step, innermost axis first
    for (let axis = outputDims.length - 1; axis >= 0; axis--) {
      const coord = (coords[axis] ?? 0) + 1;
      const extent = outputDims[axis] ?? 1;
      const wrapped = coord === extent;
      coords[axis] = wrapped ? 0 : coord;
      strides.forEach((inputStrides, input) => {
        const stride = inputStrides[axis] ?? 0;
        inputOffsets[input] = (inputOffsets[input] ?? 0) + (wrapped ? -(extent - 1) * stride : stride);
      });
      if (!wrapped) {
        break;
      }
    }
  }
}
