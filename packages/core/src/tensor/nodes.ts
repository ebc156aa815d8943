/**
 * Graph node variants
 *
 * Nodes live in the arena of a {@link TensorGraph} and refer to their
 * operands by arena id. A node never changes after it is added, so an id
 * identifies one immutable value for the lifetime of the graph.
 */

import type { RuntimeDType } from '../dtype';
import type { DimNode } from '../shape';
import type { Constraint, IndexExpr, TensorIndex } from '../contraction/affine';

// =============================================================================
// Literals
// =============================================================================

export type LiteralKind = 'bool' | 'int' | 'float';
export type LiteralValue = number | bigint | boolean;

/**
 * A scalar literal with an explicit kind
 *
 * Plain JS numbers are classified by value: integral numbers become int
 * literals and everything else float literals. Use {@link float} to force a
 * float literal for an integral value.
 */
export class Literal {
  constructor(
    readonly value: LiteralValue,
    readonly kind: LiteralKind,
  ) {}

  static of(value: LiteralValue): Literal {
    if (typeof value === 'boolean') {
      return new Literal(value, 'bool');
    }
    if (typeof value === 'bigint') {
      return new Literal(value, 'int');
    }
    return new Literal(value, Number.isInteger(value) ? 'int' : 'float');
  }

  toString(): string {
    return formatLiteral(this.value, this.kind);
  }
}

/**
 * @example
 * A.add(float(2)); // float literal 2.0
 */
export function float(value: number): Literal {
  return new Literal(value, 'float');
}

export function int(value: number | bigint): Literal {
  if (typeof value === 'number' && !Number.isInteger(value)) {
    throw new RangeError(`int() requires an integral value, got ${value}`);
  }
  return new Literal(value, 'int');
}

export function bool(value: boolean): Literal {
  return new Literal(value, 'bool');
}

/**
 * Spelling of a literal in program dumps; floats always carry a decimal point
 */
export function formatLiteral(value: LiteralValue, kind: LiteralKind): string {
  if (kind === 'float' && typeof value === 'number' && Number.isInteger(value)) {
    return value.toFixed(1);
  }
  return String(value);
}

// =============================================================================
// Operation Tags
// =============================================================================

export type UnaryOp = 'neg' | 'abs' | 'exp' | 'log' | 'sqrt' | 'tanh' | 'bit_not';

export type ArithmeticOp = 'add' | 'sub' | 'mul' | 'div';
export type BitwiseOp = 'bit_and' | 'bit_or' | 'bit_xor' | 'bit_shl' | 'bit_shr';
export type CompareOp = 'cmp_eq' | 'cmp_ne' | 'cmp_lt' | 'cmp_le' | 'cmp_gt' | 'cmp_ge';
export type BinaryOp = ArithmeticOp | BitwiseOp | CompareOp;

export const BITWISE_OPS: readonly BinaryOp[] = ['bit_and', 'bit_or', 'bit_xor', 'bit_shl', 'bit_shr'];
export const COMPARE_OPS: readonly BinaryOp[] = [
  'cmp_eq',
  'cmp_ne',
  'cmp_lt',
  'cmp_le',
  'cmp_gt',
  'cmp_ge',
];

/**
 * How contributions landing on the same output cell are combined
 */
export type AggregationOp = 'add' | 'max' | 'min' | 'assign';

/**
 * How the source accesses of one index point are combined
 *
 * - `none`: a single access
 * - `mul`: product of two accesses
 * - `cond`: the third access, where the first two are equal
 */
export type CombineOp = 'none' | 'mul' | 'cond';

// =============================================================================
// Nodes
// =============================================================================

export interface PlaceholderNode {
  readonly kind: 'placeholder';
  readonly dtype: RuntimeDType;
  readonly dims: readonly number[];
  readonly name: string | undefined;
  readonly operands: readonly [];
}

export interface ConstantNode {
  readonly kind: 'constant';
  readonly literal: Literal;
  readonly operands: readonly [];
}

export interface UnaryNode {
  readonly kind: 'unary';
  readonly op: UnaryOp;
  readonly operands: readonly [number];
}

export interface BinaryNode {
  readonly kind: 'binary';
  readonly op: BinaryOp;
  readonly operands: readonly [number, number];
}

export interface SelectNode {
  readonly kind: 'select';
  readonly operands: readonly [condition: number, whenTrue: number, whenFalse: number];
}

export interface CastNode {
  readonly kind: 'cast';
  readonly dtype: RuntimeDType;
  readonly operands: readonly [number];
}

export interface ShapeNode {
  readonly kind: 'shape';
  readonly operands: readonly [number];
}

export interface IndexNode {
  readonly kind: 'index';
  readonly axis: number;
  readonly operands: readonly [number];
}

export interface ReshapeNode {
  readonly kind: 'reshape';
  readonly dims: readonly DimNode[];
  readonly operands: readonly [number];
}

export interface PrngNode {
  readonly kind: 'prng';
  readonly dims: readonly number[];
  readonly operands: readonly [state: number];
}

/**
 * Updated generator state of a {@link PrngNode}
 */
export interface PrngStateNode {
  readonly kind: 'prng_state';
  readonly operands: readonly [prng: number];
}

export interface ContractionAccess {
  readonly operand: number;
  readonly indices: readonly IndexExpr[];
}

export interface ContractionNode {
  readonly kind: 'contraction';
  readonly aggregation: AggregationOp;
  readonly combine: CombineOp;
  readonly dims: readonly DimNode[];
  /** Index variables in order of first appearance */
  readonly indexes: readonly TensorIndex[];
  readonly sink: readonly IndexExpr[];
  readonly sources: readonly ContractionAccess[];
  readonly constraints: readonly Constraint[];
  readonly noReduce: boolean;
  readonly defaultOperand: number | undefined;
  /** `[default?, ...source tensors]` */
  readonly operands: readonly number[];
}

export type TensorNode =
  | PlaceholderNode
  | ConstantNode
  | UnaryNode
  | BinaryNode
  | SelectNode
  | CastNode
  | ShapeNode
  | IndexNode
  | ReshapeNode
  | PrngNode
  | PrngStateNode
  | ContractionNode;

export type NodeKind = TensorNode['kind'];
