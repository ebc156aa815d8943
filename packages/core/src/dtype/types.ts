/**
 * Type-level DType definitions
 *
 * Branded phantom types for every element type the language supports. The
 * runtime registry lives in `runtime.ts`, the lattice in `promotion.ts`.
 */

// =============================================================================
// Core DType Branded Types
// =============================================================================

/**
 * Branded type describing one element type
 */
export interface DType<
  Name extends string,
  JSType extends number | boolean | bigint,
  ByteSize extends number = number,
  Signed extends boolean = boolean,
  IsInteger extends boolean = boolean,
> {
  readonly __dtype: Name;
  readonly __jsType: JSType;
  readonly __byteSize: ByteSize;
  readonly __signed: Signed;
  readonly __isInteger: IsInteger;
}

// =============================================================================
// Concrete DType Definitions
// =============================================================================

export type Bool = DType<'bool', boolean, 1, false, true>;
export type Int8 = DType<'int8', number, 1, true, true>;
export type Uint8 = DType<'uint8', number, 1, false, true>;
export type Int16 = DType<'int16', number, 2, true, true>;
export type Uint16 = DType<'uint16', number, 2, false, true>;
export type Int32 = DType<'int32', number, 4, true, true>;
export type Uint32 = DType<'uint32', number, 4, false, true>;
export type Int64 = DType<'int64', bigint, 8, true, true>;
export type Uint64 = DType<'uint64', bigint, 8, false, true>;
export type Float32 = DType<'float32', number, 4, true, false>;
export type Float64 = DType<'float64', number, 8, true, false>;

// =============================================================================
// DType Utility Types
// =============================================================================

export type AnyDType =
  | Bool
  | Int8
  | Uint8
  | Int16
  | Uint16
  | Int32
  | Uint32
  | Int64
  | Uint64
  | Float32
  | Float64;

export type DTypeName = AnyDType['__dtype'];

export type IntegerDTypeName =
  | 'int8'
  | 'uint8'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'int64'
  | 'uint64';

export type FloatDTypeName = 'float32' | 'float64';

/**
 * Category of a dtype in the promotion lattice
 */
export type DTypeKind = 'bool' | 'int' | 'float';

/**
 * Get DType from name
 *
 * @example
 * type Type = DTypeFromName<'float32'> // Float32
 */
export type DTypeFromName<Name extends DTypeName> = Extract<AnyDType, { __dtype: Name }>;

/**
 * Extract the JavaScript value type from a DType
 *
 * @example
 * type V = JSTypeOf<Uint64> // bigint
 */
export type JSTypeOf<T extends AnyDType> = T['__jsType'];
