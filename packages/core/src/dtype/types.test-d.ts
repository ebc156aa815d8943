/**
 * Type tests for the dtype brands and registry lookups
 */

import { expectTypeOf } from 'expect-type';
import type { Bool, Float32, Int64, Uint32, Uint64, DTypeFromName, DTypeName, JSTypeOf } from './types';
import { getDType, type RuntimeDType } from './runtime';

// Name lookup
expectTypeOf<DTypeFromName<'uint32'>>().toEqualTypeOf<Uint32>();
expectTypeOf<DTypeFromName<'bool'>>().toEqualTypeOf<Bool>();

// Value types
expectTypeOf<JSTypeOf<Uint64>>().toEqualTypeOf<bigint>();
expectTypeOf<JSTypeOf<Float32>>().toEqualTypeOf<number>();
expectTypeOf<JSTypeOf<Bool>>().toEqualTypeOf<boolean>();

// Registry lookups keep the literal name
expectTypeOf(getDType('float32')).toEqualTypeOf<RuntimeDType<Float32>>();
expectTypeOf(getDType('int64').name).toEqualTypeOf<'int64'>();
expectTypeOf<RuntimeDType<Int64>['name']>().toEqualTypeOf<'int64'>();
expectTypeOf<RuntimeDType['name']>().toEqualTypeOf<DTypeName>();
