/**
 * Concrete shapes
 *
 * A {@link RuntimeShape} is an ordered list of non-negative integer extents
 * with row-major strides. {@link LogicalShape} pairs one with a dtype and is
 * what shape inference produces for every node.
 */

import { ShapeError } from '../errors';
import type { RuntimeDType } from '../dtype';

/**
 * Maximum number of elements for a tensor
 */
export const MAX_TENSOR_SIZE = Number.MAX_SAFE_INTEGER;

// =============================================================================
// RuntimeShape
// =============================================================================

export class RuntimeShape {
  readonly dims: readonly number[];
  readonly size: number;
  readonly strides: readonly number[];

  constructor(dims: readonly number[]) {
    for (const dim of dims) {
      if (!Number.isSafeInteger(dim) || dim < 0) {
        throw new ShapeError(`Invalid dimension ${String(dim)} in shape [${dims.join(', ')}]`, {
          dims,
        });
      }
    }
    this.dims = Object.freeze([...dims]);
    this.size = RuntimeShape.product(dims);
    if (this.size > MAX_TENSOR_SIZE) {
      throw new ShapeError(`Shape [${dims.join(', ')}] exceeds the maximum tensor size`, { dims });
    }
    this.strides = Object.freeze(RuntimeShape.computeStrides(dims));
  }

  get rank(): number {
    return this.dims.length;
  }

  get isScalar(): boolean {
    return this.dims.length === 0;
  }

  /**
   * Get a dimension size by index, with support for negative indexing
   */
  dim(index: number): number {
    const normalized = index < 0 ? this.rank + index : index;
    const dimension = this.dims[normalized];
    if (dimension === undefined) {
      throw new RangeError(`Dimension index ${index} out of bounds for rank ${this.rank} tensor`);
    }
    return dimension;
  }

  equals(other: RuntimeShape): boolean {
    return RuntimeShape.equals(this.dims, other.dims);
  }

  /**
   * Convert a linear index to per-dimension coordinates
   */
  unravel(index: number): number[] {
    if (index < 0 || index >= this.size) {
      throw new RangeError(`Index ${index} out of bounds for tensor with ${this.size} elements`);
    }
    const coords = new Array<number>(this.rank);
    let remaining = index;
    for (let i = 0; i < this.rank; i++) {
      const stride = this.strides[i] ?? 1;
      coords[i] = Math.floor(remaining / stride);
      remaining %= stride;
    }
    return coords;
  }

  /**
   * Convert per-dimension coordinates to a linear index
   */
  ravel(coords: readonly number[]): number {
    if (coords.length !== this.rank) {
      throw new RangeError(`Expected ${this.rank} coordinates, got ${coords.length}`);
    }
    let index = 0;
    for (let i = 0; i < this.rank; i++) {
      const coord = coords[i] ?? 0;
      const dim = this.dims[i] ?? 0;
      if (coord < 0 || coord >= dim) {
        throw new RangeError(`Coordinate ${coord} out of bounds for dimension ${i} of size ${dim}`);
      }
      index += coord * (this.strides[i] ?? 1);
    }
    return index;
  }

  toString(): string {
    return `Shape[${this.dims.join(', ')}]`;
  }

  // ===========================================================================
  // Static Utility Methods
  // ===========================================================================

  static product(dims: readonly number[]): number {
    return dims.reduce((acc, dim) => acc * dim, 1);
  }

  static equals(a: readonly number[], b: readonly number[]): boolean {
    return a.length === b.length && a.every((dim, i) => dim === b[i]);
  }

  static computeStrides(dims: readonly number[]): number[] {
    const strides = new Array<number>(dims.length);
    let stride = 1;
    for (let i = dims.length - 1; i >= 0; i--) {
      strides[i] = stride;
      stride *= dims[i] ?? 1;
    }
    return strides;
  }
}

// =============================================================================
// LogicalShape
// =============================================================================

/**
 * Dtype plus concrete dimensions
 *
 * @example
 * const shape = new LogicalShape(getDType('float32'), [1, 10]);
 * shape.toString(); // 'LogicalShape(float32, [1, 10])'
 * shape.toTypeString(); // 'tensor<1x10xf32>'
 */
export class LogicalShape {
  readonly shape: RuntimeShape;

  constructor(
    readonly dtype: RuntimeDType,
    dims: readonly number[],
  ) {
    this.shape = new RuntimeShape(dims);
  }

  get dims(): readonly number[] {
    return this.shape.dims;
  }

  get rank(): number {
    return this.shape.rank;
  }

  get size(): number {
    return this.shape.size;
  }

  withDType(dtype: RuntimeDType): LogicalShape {
    return new LogicalShape(dtype, this.dims);
  }

  equals(other: LogicalShape): boolean {
    return this.dtype === other.dtype && this.shape.equals(other.shape);
  }

  /**
   * Compact type spelling used in program dumps
   */
  toTypeString(): string {
    return `tensor<${[...this.dims.map(String), this.dtype.shortName].join('x')}>`;
  }

  toString(): string {
    return `LogicalShape(${this.dtype.name}, [${this.dims.join(', ')}])`;
  }
}
