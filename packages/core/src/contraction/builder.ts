/**
 * Contraction builder
 *
 * A contraction is declared in one chain: the output dimensions, one
 * aggregation with its sink indices and source expression, then optional
 * constraints and flags. Builders are immutable; every call returns a new
 * builder, so a partially declared contraction can be reused.
 *
 * @example
 * const [M, N, K] = g.dims('M', 'N', 'K');
 * const [i, j, k] = g.indexes('i', 'j', 'k');
 * A.bindDims(M, K);
 * B.bindDims(K, N);
 * const C = g.output(M, N).sum([i, j], A.at(i, k).mul(B.at(k, j))).build();
 */

import { ContractionError, RankError } from '../errors';
import { toDimNode, type DimLike, type DimNode } from '../shape';
import type { TensorGraph } from '../tensor/graph';
import type { AggregationOp, CombineOp, ContractionNode } from '../tensor/nodes';
import type { Tensor } from '../tensor/tensor';
import { IndexExpr, type Constraint, type IndexLike, type TensorIndex } from './affine';

// =============================================================================
// Source Expressions
// =============================================================================

/**
 * A tensor read at an index tuple, as produced by `tensor.at(...)`
 */
export class TensorAccess {
  constructor(
    readonly tensor: Tensor,
    readonly indices: readonly IndexExpr[],
  ) {}

  /**
   * Product of two accesses
   */
  mul(other: TensorAccess): ContractionSource {
    return { combine: 'mul', accesses: [this, other] };
  }
}

/**
 * Combined source accesses of a contraction
 */
export interface ContractionSource {
  readonly combine: CombineOp;
  readonly accesses: readonly TensorAccess[];
}

export type SourceLike = TensorAccess | ContractionSource;

/**
 * `value` wherever `lhs == rhs`; no contribution elsewhere
 *
 * @example
 * // index of the maximum along x1
 * g.output(X0, X2).max([x0, x2], cond(I.at(x0, x1, x2), Max.at(x0, x2), IX.at(x1)));
 */
export function cond(lhs: TensorAccess, rhs: TensorAccess, value: TensorAccess): ContractionSource {
  return { combine: 'cond', accesses: [lhs, rhs, value] };
}

function toSource(source: SourceLike): ContractionSource {
  return source instanceof TensorAccess ? { combine: 'none', accesses: [source] } : source;
}

// =============================================================================
// Builder
// =============================================================================

interface Aggregation {
  readonly op: AggregationOp;
  readonly sink: readonly IndexExpr[];
  readonly source: ContractionSource;
}

interface BuilderState {
  readonly graph: TensorGraph;
  readonly dims: readonly DimNode[];
  readonly aggregation: Aggregation | undefined;
  readonly constraints: readonly Constraint[];
  readonly noReduce: boolean;
  readonly fallback: Tensor | undefined;
}

export class ContractionBuilder {
  private constructor(private readonly state: BuilderState) {}

  static create(graph: TensorGraph, dims: readonly DimLike[]): ContractionBuilder {
    return new ContractionBuilder({
      graph,
      dims: dims.map(toDimNode),
      aggregation: undefined,
      constraints: [],
      noReduce: false,
      fallback: undefined,
    });
  }

  get rank(): number {
    return this.state.dims.length;
  }

  /**
   * Sum contributions into each output cell
   */
  sum(sink: readonly IndexLike[], source: SourceLike): ContractionBuilder {
    return this.aggregate('add', sink, source);
  }

  max(sink: readonly IndexLike[], source: SourceLike): ContractionBuilder {
    return this.aggregate('max', sink, source);
  }

  min(sink: readonly IndexLike[], source: SourceLike): ContractionBuilder {
    return this.aggregate('min', sink, source);
  }

  /**
   * Write contributions without reducing; each output cell must receive at
   * most one contribution unless {@link noReduce} is set
   */
  assign(sink: readonly IndexLike[], source: SourceLike): ContractionBuilder {
    return this.aggregate('assign', sink, source);
  }

  /**
   * Restrict the iteration domain
   *
   * @example
   * builder.constrain(k.lt(3)); // 0 <= k < 3
   * builder.constrain(i.sub(k).lt(N)); // 0 <= i - k < N
   */
  constrain(...constraints: Constraint[]): ContractionBuilder {
    return this.with({ constraints: [...this.state.constraints, ...constraints] });
  }

  /**
   * Allow several contributions to the same cell without reduction
   */
  noReduce(): ContractionBuilder {
    return this.with({ noReduce: true });
  }

  /**
   * Take values for cells that receive no contribution from `tensor`
   * instead of zero
   */
  useDefault(tensor: Tensor): ContractionBuilder {
    return this.with({ fallback: tensor });
  }

  build(): Tensor {
    const { graph, dims, aggregation, constraints, noReduce, fallback } = this.state;
    if (aggregation === undefined) {
      throw new ContractionError('Contraction has no aggregation; call sum, max, min or assign');
    }

    const { sink, source } = aggregation;
    const expected: Record<CombineOp, number> = { none: 1, mul: 2, cond: 3 };
    if (source.accesses.length !== expected[source.combine]) {
      throw new ContractionError(
        `${source.combine} combination takes ${expected[source.combine]} accesses, got ${source.accesses.length}`,
      );
    }

    const indexes: TensorIndex[] = [];
    const seen = new Set<TensorIndex>();
    const collect = (exprs: readonly IndexExpr[]): void => {
      for (const expr of exprs) {
        for (const index of expr.indices) {
          if (!seen.has(index)) {
            seen.add(index);
            indexes.push(index);
          }
        }
      }
    };
    collect(sink);
    source.accesses.forEach((access) => collect(access.indices));
    constraints.forEach((constraint) => collect(constraint.inequalities));

    const fallbackId = fallback === undefined ? undefined : graph.lift(fallback).id;
    const sources = source.accesses.map((access) => ({
      operand: graph.lift(access.tensor).id,
      indices: access.indices,
    }));

    const node: ContractionNode = {
      kind: 'contraction',
      aggregation: aggregation.op,
      combine: source.combine,
      dims,
      indexes,
      sink,
      sources,
      constraints,
      noReduce,
      defaultOperand: fallbackId,
      operands: [...(fallbackId === undefined ? [] : [fallbackId]), ...sources.map((s) => s.operand)],
    };
    return graph.addNode(node);
  }

  private aggregate(
    op: AggregationOp,
    sink: readonly IndexLike[],
    source: SourceLike,
  ): ContractionBuilder {
    if (this.state.aggregation !== undefined) {
      throw new ContractionError(
        `Contraction already has a ${this.state.aggregation.op} aggregation`,
        { existing: this.state.aggregation.op, requested: op },
      );
    }
    if (sink.length !== this.state.dims.length) {
      throw new RankError(
        `Sink has ${sink.length} indices but the output has rank ${this.state.dims.length}`,
        this.state.dims.length,
        sink.length,
      );
    }
    return this.with({
      aggregation: { op, sink: sink.map((index) => IndexExpr.of(index)), source: toSource(source) },
    });
  }

  private with(patch: Partial<BuilderState>): ContractionBuilder {
    return new ContractionBuilder({ ...this.state, ...patch });
  }
}
