/**
 * Tensor handles
 *
 * A {@link Tensor} is a lightweight reference to one node of a
 * {@link TensorGraph}. Operations never mutate their operands; each one adds
 * a node to the graph and returns a handle to it. Shapes and dtypes are
 * checked as soon as the node is added, so most mistakes surface at the call
 * that made them.
 *
 * @example
 * const g = new TensorGraph();
 * const A = g.placeholder('float32', [3, 3], 'A');
 * const B = g.placeholder('float32', [3], 'B');
 * const C = A.add(B).mul(2); // broadcast add, weak literal adopts float32
 */

import { RankError } from '../errors';
import { toDType, type DTypeLike } from '../dtype';
import { TensorDim, toDimNode, type DimLike, type LogicalShape } from '../shape';
import { TensorAccess } from '../contraction/builder';
import { IndexExpr, type IndexLike } from '../contraction/affine';
import type { TensorGraph } from './graph';
import type { BinaryOp, Literal, LiteralValue, TensorNode, UnaryOp } from './nodes';

/**
 * Anything that can stand in for a tensor operand: a handle, or a scalar
 * literal that becomes a constant node
 */
export type TensorLike = Tensor | Literal | LiteralValue;

export class Tensor {
  constructor(
    readonly graph: TensorGraph,
    readonly id: number,
  ) {}

  get node(): TensorNode {
    return this.graph.node(this.id);
  }

  get rank(): number {
    return this.graph.rankOf(this.id);
  }

  /**
   * Name given to a placeholder, if any
   */
  get name(): string | undefined {
    const node = this.node;
    return node.kind === 'placeholder' ? node.name : undefined;
  }

  // ===========================================================================
  // Arithmetic
  // ===========================================================================

  add(other: TensorLike): Tensor {
    return this.binary('add', other);
  }

  sub(other: TensorLike): Tensor {
    return this.binary('sub', other);
  }

  mul(other: TensorLike): Tensor {
    return this.binary('mul', other);
  }

  /**
   * Division; truncating for integer dtypes
   */
  div(other: TensorLike): Tensor {
    return this.binary('div', other);
  }

  neg(): Tensor {
    return this.unary('neg');
  }

  abs(): Tensor {
    return this.unary('abs');
  }

  exp(): Tensor {
    return this.unary('exp');
  }

  log(): Tensor {
    return this.unary('log');
  }

  sqrt(): Tensor {
    return this.unary('sqrt');
  }

  tanh(): Tensor {
    return this.unary('tanh');
  }

  // ===========================================================================
  // Bitwise
  // ===========================================================================

  bitAnd(other: TensorLike): Tensor {
    return this.binary('bit_and', other);
  }

  bitOr(other: TensorLike): Tensor {
    return this.binary('bit_or', other);
  }

  bitXor(other: TensorLike): Tensor {
    return this.binary('bit_xor', other);
  }

  shl(other: TensorLike): Tensor {
    return this.binary('bit_shl', other);
  }

  shr(other: TensorLike): Tensor {
    return this.binary('bit_shr', other);
  }

  bitNot(): Tensor {
    return this.unary('bit_not');
  }

  // ===========================================================================
  // Comparison
  // ===========================================================================

  eq(other: TensorLike): Tensor {
    return this.binary('cmp_eq', other);
  }

  ne(other: TensorLike): Tensor {
    return this.binary('cmp_ne', other);
  }

  lt(other: TensorLike): Tensor {
    return this.binary('cmp_lt', other);
  }

  le(other: TensorLike): Tensor {
    return this.binary('cmp_le', other);
  }

  gt(other: TensorLike): Tensor {
    return this.binary('cmp_gt', other);
  }

  ge(other: TensorLike): Tensor {
    return this.binary('cmp_ge', other);
  }

  // ===========================================================================
  // Structure
  // ===========================================================================

  /**
   * Convert to another dtype; narrowing is allowed here and only here
   */
  cast(dtype: DTypeLike): Tensor {
    return this.graph.addNode({ kind: 'cast', dtype: toDType(dtype), operands: [this.id] });
  }

  /**
   * Reinterpret with new dimensions; the element count must not change
   */
  reshape(...dims: DimLike[]): Tensor {
    return this.graph.addNode({ kind: 'reshape', dims: dims.map(toDimNode), operands: [this.id] });
  }

  /**
   * Access for a contraction source or sink
   */
  at(...indices: IndexLike[]): TensorAccess {
    const rank = this.rank;
    if (indices.length !== rank) {
      throw new RankError(
        `${this.toString()} has rank ${rank} but is accessed with ${indices.length} indices`,
        rank,
        indices.length,
      );
    }
    return new TensorAccess(
      this,
      indices.map((index) => IndexExpr.of(index)),
    );
  }

  /**
   * Unify this tensor's dimensions with the given slots
   *
   * Unbound dimension symbols are bound to the tensor's extents; anything
   * else must agree with them.
   *
   * @example
   * const [N, M] = g.dims('N', 'M');
   * A.bindDims(N, M);
   * B.bindDims(M, N); // ShapeError unless B is the transpose shape of A
   */
  bindDims(...slots: DimLike[]): this {
    const actual = this.graph.symbolicDims(this.id);
    if (slots.length !== actual.length) {
      throw new RankError(
        `${this.toString()} has rank ${actual.length} but ${slots.length} dimensions were bound`,
        actual.length,
        slots.length,
      );
    }
    slots.forEach((slot, i) => {
      const dim = actual[i];
      if (dim !== undefined) {
        this.graph.env.unify(slot, dim, `${this.toString()} dimension ${i}`);
      }
    });
    return this;
  }

  /**
   * Symbolic dimensions, resolved to constants where known
   */
  dims(): TensorDim[] {
    return this.graph.symbolicDims(this.id).map((node) => new TensorDim(node));
  }

  /**
   * Concrete dtype and dimensions; fails while dimensions are unbound
   */
  computeShape(): LogicalShape {
    return this.graph.computeShape(this.id);
  }

  toString(): string {
    return this.name ?? `tensor#${this.id}`;
  }

  private unary(op: UnaryOp): Tensor {
    return this.graph.addNode({ kind: 'unary', op, operands: [this.id] });
  }

  private binary(op: BinaryOp, other: TensorLike): Tensor {
    const rhs = this.graph.lift(other);
    return this.graph.addNode({ kind: 'binary', op, operands: [this.id, rhs.id] });
  }
}
