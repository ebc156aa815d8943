/**
 * DType System
 *
 * Element types, their runtime registry and the promotion lattice.
 *
 * @example
 * ```typescript
 * import { getDType, joinDTypes } from './dtype';
 *
 * const joined = joinDTypes(getDType('int16'), getDType('uint8')); // int16
 * ```
 */

export type {
  DType,
  AnyDType,
  DTypeName,
  DTypeKind,
  IntegerDTypeName,
  FloatDTypeName,
  Bool,
  Int8,
  Uint8,
  Int16,
  Uint16,
  Int32,
  Uint32,
  Int64,
  Uint64,
  Float32,
  Float64,
  DTypeFromName,
  JSTypeOf,
} from './types';

export {
  RuntimeDType,
  DTYPES,
  PROMOTION_ORDER,
  getDType,
  getDTypeNames,
  isValidDTypeName,
  toDType,
  type DTypeLike,
} from './runtime';

export {
  joinDTypes,
  isWidening,
  compareKinds,
  smallestOfKind,
  computeUnaryResultType,
  isRepresentable,
  FLOATING_UNARY_OPS,
} from './promotion';
