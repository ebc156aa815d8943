/**
 * Host storage for interpreted tensors
 *
 * Each tensor value lives in one typed array matching its dtype. 64-bit
 * integers use BigInt arrays; `bool` is stored as 0/1 bytes.
 */

import type { LogicalShape, RuntimeDType } from '@einsum-ir/core';
import { ExecutionError } from './errors';
import { convertScalar, type Scalar } from './utils';

export type NumericArray =
  | Int8Array
  | Uint8Array
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

export type BigIntArray = BigInt64Array | BigUint64Array;

function allocate(dtype: RuntimeDType, size: number): NumericArray | BigIntArray {
  switch (dtype.name) {
    case 'bool':
    case 'uint8':
      return new Uint8Array(size);
    case 'int8':
      return new Int8Array(size);
    case 'int16':
      return new Int16Array(size);
    case 'uint16':
      return new Uint16Array(size);
    case 'int32':
      return new Int32Array(size);
    case 'uint32':
      return new Uint32Array(size);
    case 'int64':
      return new BigInt64Array(size);
    case 'uint64':
      return new BigUint64Array(size);
    case 'float32':
      return new Float32Array(size);
    case 'float64':
      return new Float64Array(size);
  }
}

/**
 * Dense row-major buffer holding one tensor value
 */
export class HostBuffer {
  readonly data: NumericArray | BigIntArray;

  constructor(
    readonly shape: LogicalShape,
    data?: NumericArray | BigIntArray,
  ) {
    this.data = data ?? allocate(shape.dtype, shape.size);
  }

  get dtype(): RuntimeDType {
    return this.shape.dtype;
  }

  get size(): number {
    return this.shape.size;
  }

  get(index: number): Scalar {
    return this.data[index] ?? 0;
  }

  /**
   * Store a value that is already in this buffer's dtype domain
   *
   * Typed-array stores wrap integers modulo their width.
   */
  set(index: number, value: Scalar): void {
    const data = this.data;
    if (data instanceof BigInt64Array || data instanceof BigUint64Array) {
      data[index] = typeof value === 'bigint' ? value : BigInt(value);
    } else if (this.dtype.isBool) {
      data[index] = value === 0 || value === 0n ? 0 : 1;
    } else {
      data[index] = Number(value);
    }
  }

  /**
   * Store a value of any dtype, converting it first
   */
  store(index: number, value: Scalar, from: RuntimeDType): void {
    this.set(index, from === this.dtype ? value : convertScalar(value, this.dtype));
  }

  /**
   * Overwrite with the contents of a buffer of the same shape
   */
  assign(source: HostBuffer): void {
    if (!source.shape.equals(this.shape)) {
      throw new ExecutionError(
        `Cannot copy ${source.shape.toTypeString()} into ${this.shape.toTypeString()}`,
      );
    }
    for (let i = 0; i < this.size; i++) {
      this.set(i, source.get(i));
    }
  }

  clone(): HostBuffer {
    return new HostBuffer(this.shape, this.data.slice());
  }
}

/**
 * Host-side access to one program argument or result
 *
 * @example
 * executable.input(A).copyFrom([1, 2, 3]);
 * await executable.run();
 * executable.output(C).toArray(); // [2, 4, 6]
 */
export class BufferView {
  constructor(
    private readonly buffer: HostBuffer,
    readonly name: string,
    readonly writable: boolean,
  ) {}

  get dtype(): RuntimeDType {
    return this.buffer.dtype;
  }

  get dims(): readonly number[] {
    return this.buffer.shape.dims;
  }

  get size(): number {
    return this.buffer.size;
  }

  /**
   * Fill the buffer in row-major order; values are converted to its dtype
   */
  copyFrom(values: ArrayLike<Scalar | boolean>): void {
    if (!this.writable) {
      throw new ExecutionError(`Buffer ${this.name} is read-only`, { buffer: this.name });
    }
    if (values.length !== this.size) {
      throw new ExecutionError(
        `Buffer ${this.name} holds ${this.size} elements, got ${values.length}`,
        { buffer: this.name, expected: this.size, actual: values.length },
      );
    }
    for (let i = 0; i < values.length; i++) {
      const value = values[i] ?? 0;
      const scalar = typeof value === 'boolean' ? (value ? 1 : 0) : value;
      this.buffer.set(i, convertScalar(scalar, this.dtype));
    }
  }

  toArray(): Scalar[] {
    return Array.from({ length: this.size }, (_, i) => this.buffer.get(i));
  }
}
