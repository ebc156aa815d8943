/**
 * Runtime DType registry
 *
 * Each dtype has one shared {@link RuntimeDType} instance carrying its range,
 * dump spelling and position in the promotion lattice. Instances are
 * compared by identity.
 */

import type {
  AnyDType,
  Bool,
  DTypeFromName,
  DTypeKind,
  DTypeName,
  Float32,
  Float64,
  Int16,
  Int32,
  Int64,
  Int8,
  JSTypeOf,
  Uint16,
  Uint32,
  Uint64,
  Uint8,
} from './types';

// =============================================================================
// Runtime DType Class
// =============================================================================

export class RuntimeDType<T extends AnyDType = AnyDType> {
  constructor(
    public readonly name: T['__dtype'],
    /** Compact spelling used in program dumps, e.g. `f32` */
    public readonly shortName: string,
    public readonly jsType: 'number' | 'boolean' | 'bigint',
    public readonly byteSize: number,
    public readonly signed: boolean,
    public readonly kind: DTypeKind,
    /** Position in the promotion chain */
    public readonly rank: number,
    public readonly minValue: number | bigint,
    public readonly maxValue: number | bigint,
  ) {}

  get isInteger(): boolean {
    return this.kind === 'int';
  }

  get isFloat(): boolean {
    return this.kind === 'float';
  }

  get isBool(): boolean {
    return this.kind === 'bool';
  }

  get bitWidth(): number {
    return this.kind === 'bool' ? 1 : this.byteSize * 8;
  }

  /**
   * Type guard for values of this dtype, with range checking
   */
  isValidValue(value: unknown): value is JSTypeOf<T> {
    if (typeof value !== this.jsType) {
      return false;
    }
    if (typeof value === 'boolean') {
      return true;
    }
    if (typeof value === 'bigint') {
      return value >= BigInt(this.minValue) && value <= BigInt(this.maxValue);
    }
    if (typeof value !== 'number') {
      return false;
    }
    if (!Number.isFinite(value)) {
      return this.kind === 'float';
    }
    if (this.kind === 'int' && !Number.isInteger(value)) {
      return false;
    }
    return value >= this.minValue && value <= this.maxValue;
  }

  toString(): string {
    return this.name;
  }
}

// =============================================================================
// DType Registry
// =============================================================================

export const DTYPES = {
  bool: new RuntimeDType<Bool>('bool', 'i1', 'boolean', 1, false, 'bool', 0, 0, 1),
  int8: new RuntimeDType<Int8>('int8', 'i8', 'number', 1, true, 'int', 1, -128, 127),
  uint8: new RuntimeDType<Uint8>('uint8', 'u8', 'number', 1, false, 'int', 2, 0, 255),
  int16: new RuntimeDType<Int16>('int16', 'i16', 'number', 2, true, 'int', 3, -32768, 32767),
  uint16: new RuntimeDType<Uint16>('uint16', 'u16', 'number', 2, false, 'int', 4, 0, 65535),
  int32: new RuntimeDType<Int32>(
    'int32',
    'i32',
    'number',
    4,
    true,
    'int',
    5,
    -2147483648,
    2147483647,
  ),
  uint32: new RuntimeDType<Uint32>('uint32', 'u32', 'number', 4, false, 'int', 6, 0, 4294967295),
  int64: new RuntimeDType<Int64>(
    'int64',
    'i64',
    'bigint',
    8,
    true,
    'int',
    7,
    -9223372036854775808n,
    9223372036854775807n,
  ),
  uint64: new RuntimeDType<Uint64>(
    'uint64',
    'u64',
    'bigint',
    8,
    false,
    'int',
    8,
    0n,
    18446744073709551615n,
  ),
  float32: new RuntimeDType<Float32>(
    'float32',
    'f32',
    'number',
    4,
    true,
    'float',
    9,
    -3.4028234663852886e38,
    3.4028234663852886e38,
  ),
  float64: new RuntimeDType<Float64>(
    'float64',
    'f64',
    'number',
    8,
    true,
    'float',
    10,
    -Number.MAX_VALUE,
    Number.MAX_VALUE,
  ),
} as const satisfies { [N in DTypeName]: RuntimeDType<DTypeFromName<N>> };

/**
 * Dtypes ordered by promotion rank
 */
export const PROMOTION_ORDER: readonly RuntimeDType[] = Object.values(DTYPES).sort(
  (a, b) => a.rank - b.rank,
);

/**
 * Look up the shared RuntimeDType for a name
 *
 * @example
 * const f32 = getDType('float32'); // RuntimeDType<Float32>
 */
export function getDType<N extends DTypeName>(name: N): (typeof DTYPES)[N] {
  const dtype: (typeof DTYPES)[N] | undefined = DTYPES[name];
  if (dtype === undefined) {
    throw new Error(`Unknown DType: ${String(name)}`);
  }
  return dtype;
}

export function getDTypeNames(): readonly DTypeName[] {
  return PROMOTION_ORDER.map((dtype) => dtype.name);
}

export function isValidDTypeName(name: string): name is DTypeName {
  return Object.prototype.hasOwnProperty.call(DTYPES, name);
}

/**
 * Accept either a dtype name or a RuntimeDType
 */
export type DTypeLike = DTypeName | RuntimeDType;

export function toDType(dtype: DTypeLike): RuntimeDType {
  return typeof dtype === 'string' ? getDType(dtype) : dtype;
}
