/**
 * Shape and dtype inference over the node arena
 *
 * Resolution is memoized per resolver. A node whose dimensions depend on
 * symbols that are still unbound is reported as deferred instead of failing;
 * the assembler turns a reachable deferred node into an AssemblyError.
 */

import {
  AssemblyError,
  BroadcastError,
  DTypeError,
  RankError,
  ShapeError,
  UnboundIndexError,
  assertExhaustiveSwitch,
} from '../errors';
import {
  type RuntimeDType,
  compareKinds,
  computeUnaryResultType,
  getDType,
  isRepresentable,
  joinDTypes,
} from '../dtype';
import {
  LogicalShape,
  RuntimeShape,
  broadcastShapes,
  formatDim,
  type DimNode,
  type SymbolicEnvironment,
} from '../shape';
import type { AffineExpr, TensorIndex } from '../contraction/affine';
import {
  type IndexRange,
  type Inequality,
  accessInequalities,
  deriveIndexRanges,
  fromAffine,
} from '../contraction/bounds';
import {
  BITWISE_OPS,
  COMPARE_OPS,
  type ContractionNode,
  type Literal,
  type TensorNode,
} from '../tensor/nodes';

// =============================================================================
// Types
// =============================================================================

/**
 * Read access to a node arena
 */
export interface GraphView {
  readonly env: SymbolicEnvironment;
  node(id: number): TensorNode;
}

export interface ResolverOptions {
  /** Float literals are elevated to at least this dtype and become strong */
  readonly floatType?: RuntimeDType | undefined;
  /** Int literals are elevated to at least this dtype and become strong */
  readonly intType?: RuntimeDType | undefined;
  readonly boundsMaxRounds: number;
}

/**
 * A contraction with every index expression reduced to numbers
 */
export interface ResolvedContraction {
  readonly indexes: readonly TensorIndex[];
  readonly sink: readonly AffineExpr[];
  readonly sources: readonly (readonly AffineExpr[])[];
  /** Explicit constraints, each meaning `expr >= 0` */
  readonly constraints: readonly AffineExpr[];
  /** Access bounds and explicit constraints together */
  readonly inequalities: readonly Inequality[];
  readonly ranges: readonly IndexRange[];
}

export interface ResolvedNode {
  readonly shape: LogicalShape;
  /**
   * Set for untyped literals and values computed only from them; a weak
   * value adopts the dtype of the strong operand it is combined with
   */
  readonly weak: boolean;
  readonly contraction?: ResolvedContraction;
}

export type Resolution =
  | { readonly status: 'resolved'; readonly node: ResolvedNode }
  | { readonly status: 'deferred'; readonly reason: string };

type Deferred = Extract<Resolution, { status: 'deferred' }>;

function isDeferred<T>(value: T | Deferred): value is Deferred {
  return (
    typeof value === 'object' && value !== null && 'status' in value && value.status === 'deferred'
  );
}

// =============================================================================
// Literal Dtypes
// =============================================================================

const INT_LITERAL_CANDIDATES = ['int32', 'int64', 'uint64'] as const;

/**
 * Natural dtype of a literal before any promotion
 *
 * @example
 * literalDType(Literal.of(1)); // int32
 * literalDType(Literal.of(2n ** 40n)); // int64
 * literalDType(Literal.of(0.5)); // float32
 */
export function literalDType(literal: Literal): RuntimeDType {
  switch (literal.kind) {
    case 'bool':
      return getDType('bool');
    case 'float':
      return getDType('float32');
    case 'int': {
      for (const name of INT_LITERAL_CANDIDATES) {
        const dtype = getDType(name);
        if (isRepresentable(literal.value, 'int', dtype)) {
          return dtype;
        }
      }
      throw new DTypeError(`Integer literal ${literal.toString()} does not fit in 64 bits`, {
        value: String(literal.value),
      });
    }
  }
}

// =============================================================================
// Resolver
// =============================================================================

interface Operand {
  readonly id: number;
  readonly resolved: ResolvedNode;
}

export class ShapeResolver {
  private readonly cache = new Map<number, ResolvedNode>();

  constructor(
    private readonly graph: GraphView,
    private readonly options: ResolverOptions,
  ) {}

  resolve(id: number): Resolution {
    const cached = this.cache.get(id);
    if (cached !== undefined) {
      return { status: 'resolved', node: cached };
    }
    const result = this.compute(id);
    if (isDeferred(result)) {
      return result;
    }
    this.cache.set(id, result);
    return { status: 'resolved', node: result };
  }

  /**
   * Resolve a node that must be fully known
   */
  require(id: number): ResolvedNode {
    const result = this.resolve(id);
    if (result.status === 'deferred') {
      const kind = this.graph.node(id).kind;
      throw new AssemblyError(`Node ${id} (${kind}) is unresolved: ${result.reason}`, { node: id });
    }
    return result.node;
  }

  // ===========================================================================
  // Per-Kind Rules
  // ===========================================================================

  private compute(id: number): ResolvedNode | Deferred {
    const node = this.graph.node(id);
    const operands = this.resolveOperands(node.operands);
    if (isDeferred(operands)) {
      if (node.kind === 'shape') {
        throw new ShapeError(`shape requires concrete dimensions: ${operands.reason}`);
      }
      return operands;
    }

    switch (node.kind) {
      case 'placeholder':
        return { shape: new LogicalShape(node.dtype, node.dims), weak: false };

      case 'constant':
        return this.resolveConstant(node.literal);

      case 'unary': {
        const x = this.operandAt(operands, 0);
        const dtype = x.resolved.shape.dtype;
        if (node.op === 'bit_not' && !dtype.isInteger) {
          throw new DTypeError(`Bitwise not is not defined for ${dtype.name}`, {
            dtype: dtype.name,
          });
        }
        return {
          shape: new LogicalShape(computeUnaryResultType(dtype, node.op), x.resolved.shape.dims),
          weak: x.resolved.weak,
        };
      }

      case 'binary': {
        const a = this.operandAt(operands, 0);
        const b = this.operandAt(operands, 1);
        const joined = this.joinOperands(a, b);
        if (BITWISE_OPS.includes(node.op) && !joined.dtype.isInteger) {
          throw new DTypeError(`${node.op} is not defined for ${joined.dtype.name}`, {
            dtype: joined.dtype.name,
          });
        }
        const dims = broadcastShapes(a.resolved.shape.dims, b.resolved.shape.dims);
        if (COMPARE_OPS.includes(node.op)) {
          return { shape: new LogicalShape(getDType('bool'), dims), weak: false };
        }
        return { shape: new LogicalShape(joined.dtype, dims), weak: joined.weak };
      }

      case 'select': {
        const condition = this.operandAt(operands, 0);
        const whenTrue = this.operandAt(operands, 1);
        const whenFalse = this.operandAt(operands, 2);
        if (!condition.resolved.shape.dtype.isBool) {
          throw new DTypeError(
            `select requires a bool condition, got ${condition.resolved.shape.dtype.name}`,
            { dtype: condition.resolved.shape.dtype.name },
          );
        }
        const joined = this.joinOperands(whenTrue, whenFalse);
        const dims = broadcastShapes(
          condition.resolved.shape.dims,
          whenTrue.resolved.shape.dims,
          whenFalse.resolved.shape.dims,
        );
        return { shape: new LogicalShape(joined.dtype, dims), weak: joined.weak };
      }

      case 'cast': {
        const x = this.operandAt(operands, 0);
        return { shape: new LogicalShape(node.dtype, x.resolved.shape.dims), weak: false };
      }

      case 'shape': {
        const x = this.operandAt(operands, 0);
        return { shape: new LogicalShape(getDType('int32'), [x.resolved.shape.rank]), weak: false };
      }

      case 'index': {
        const x = this.operandAt(operands, 0);
        const rank = x.resolved.shape.rank;
        if (node.axis < 0 || node.axis >= rank) {
          throw new RankError(
            `index axis ${node.axis} is out of range for rank ${rank}`,
            rank,
            node.axis,
          );
        }
        return { shape: new LogicalShape(getDType('int32'), x.resolved.shape.dims), weak: false };
      }

      case 'reshape': {
        const x = this.operandAt(operands, 0);
        const dims = this.evaluateDims(node.dims, 'reshape');
        if (isDeferred(dims)) {
          return dims;
        }
        const size = RuntimeShape.product(dims);
        if (size !== x.resolved.shape.size) {
          throw new ShapeError(
            `Cannot reshape ${x.resolved.shape.size} elements [${x.resolved.shape.dims.join(', ')}] into [${dims.join(', ')}]`,
            { from: x.resolved.shape.dims, to: dims },
          );
        }
        return { shape: new LogicalShape(x.resolved.shape.dtype, dims), weak: x.resolved.weak };
      }

      case 'prng': {
        const state = this.operandAt(operands, 0);
        this.checkPrngState(state);
        return { shape: new LogicalShape(getDType('float32'), node.dims), weak: false };
      }

      case 'prng_state': {
        const prng = this.operandAt(operands, 0);
        const prngNode = this.graph.node(prng.id);
        if (prngNode.kind !== 'prng') {
          throw new AssemblyError(`prng_state must refer to a prng node, got ${prngNode.kind}`);
        }
        const state = this.require(prngNode.operands[0]);
        return { shape: state.shape, weak: false };
      }

      case 'contraction':
        return this.resolveContraction(node, operands);

      default:
        return assertExhaustiveSwitch(node);
    }
  }

  private resolveConstant(literal: Literal): ResolvedNode {
    const natural = literalDType(literal);
    const override =
      literal.kind === 'float'
        ? this.options.floatType
        : literal.kind === 'int'
          ? this.options.intType
          : undefined;
    if (override === undefined) {
      return { shape: new LogicalShape(natural, []), weak: true };
    }
    const dtype = joinDTypes(natural, override);
    if (!isRepresentable(literal.value, literal.kind, dtype)) {
      throw new DTypeError(`Literal ${literal.toString()} cannot be represented as ${dtype.name}`, {
        value: String(literal.value),
        dtype: dtype.name,
      });
    }
    return { shape: new LogicalShape(dtype, []), weak: false };
  }

  private checkPrngState(state: Operand): void {
    const dtype = state.resolved.shape.dtype;
    if (dtype.name !== 'uint32') {
      throw new DTypeError(`prng state must be uint32, got ${dtype.name}`, { dtype: dtype.name });
    }
  }

  /**
   * Join two operand dtypes
   *
   * Two strong (or two weak) operands take the lattice join. A weak operand
   * adopts the strong operand's dtype when its kind is not higher and its
   * value is representable there; a weak float meeting a strong integer
   * promotes the result to float. A weak integer whose value cannot be
   * folded at assembly joins as if it were strong.
   */
  private joinOperands(a: Operand, b: Operand): { dtype: RuntimeDType; weak: boolean } {
    const da = a.resolved.shape.dtype;
    const db = b.resolved.shape.dtype;
    if (a.resolved.weak === b.resolved.weak) {
      return { dtype: joinDTypes(da, db), weak: a.resolved.weak };
    }
    const [strong, weak] = a.resolved.weak ? [b, a] : [a, b];
    const strongType = strong.resolved.shape.dtype;
    const weakType = weak.resolved.shape.dtype;
    if (compareKinds(weakType.kind, strongType.kind) > 0) {
      return { dtype: joinDTypes(weakType, strongType), weak: false };
    }
    if (weakType.kind !== 'int') {
      return { dtype: strongType, weak: false };
    }
    const value = this.foldInteger(weak.id);
    if (value === undefined) {
      return { dtype: joinDTypes(weakType, strongType), weak: false };
    }
    if (!isRepresentable(value, 'int', strongType)) {
      throw new DTypeError(`Literal ${value} cannot be represented as ${strongType.name}`, {
        value: String(value),
        dtype: strongType.name,
      });
    }
    return { dtype: strongType, weak: false };
  }

  /**
   * Value of an integer expression built only from literals, when it folds
   */
  private foldInteger(id: number): bigint | undefined {
    const node = this.graph.node(id);
    switch (node.kind) {
      case 'constant': {
        const { value, kind } = node.literal;
        return kind === 'int' && typeof value !== 'boolean' ? BigInt(value) : undefined;
      }
      case 'unary': {
        const x = this.foldInteger(node.operands[0]);
        if (x === undefined) {
          return undefined;
        }
        if (node.op === 'neg') {
          return -x;
        }
        return node.op === 'abs' ? (x < 0n ? -x : x) : undefined;
      }
      case 'binary': {
        const x = this.foldInteger(node.operands[0]);
        const y = this.foldInteger(node.operands[1]);
        if (x === undefined || y === undefined) {
          return undefined;
        }
        switch (node.op) {
          case 'add':
            return x + y;
          case 'sub':
            return x - y;
          case 'mul':
            return x * y;
          default:
            return undefined;
        }
      }
      default:
        return undefined;
    }
  }

  // ===========================================================================
  // Contractions
  // ===========================================================================

  private resolveContraction(
    node: ContractionNode,
    operands: readonly Operand[],
  ): ResolvedNode | Deferred {
    const dims = this.evaluateDims(node.dims, 'contraction output');
    if (isDeferred(dims)) {
      return dims;
    }

    const hasDefault = node.defaultOperand !== undefined;
    const sources = hasDefault ? operands.slice(1) : operands;
    const positions = new Map(node.indexes.map((index, i) => [index, i] as const));
    const evaluate = this.graph.env.evaluate.bind(this.graph.env);

    const sink: AffineExpr[] = [];
    for (const expr of node.sink) {
      const affine = expr.resolve(positions, evaluate);
      if (affine === undefined) {
        return this.deferUnbound(`sink expression ${expr.toString()}`);
      }
      sink.push(affine);
    }

    const sourceMaps: AffineExpr[][] = [];
    for (const access of node.sources) {
      const map: AffineExpr[] = [];
      for (const expr of access.indices) {
        const affine = expr.resolve(positions, evaluate);
        if (affine === undefined) {
          return this.deferUnbound(`source expression ${expr.toString()}`);
        }
        map.push(affine);
      }
      sourceMaps.push(map);
    }

    const constraints: AffineExpr[] = [];
    for (const constraint of node.constraints) {
      for (const expr of constraint.inequalities) {
        const affine = expr.resolve(positions, evaluate);
        if (affine === undefined) {
          return this.deferUnbound(`constraint ${expr.toString()}`);
        }
        constraints.push(affine);
      }
    }

    const inequalities: Inequality[] = [];
    sink.forEach((expr, i) => inequalities.push(...accessInequalities(expr, dims[i] ?? 0)));
    sourceMaps.forEach((map, s) => {
      const sourceDims = sources[s]?.resolved.shape.dims ?? [];
      if (map.length !== sourceDims.length) {
        throw new RankError(
          `Access of rank ${map.length} into a tensor of rank ${sourceDims.length}`,
          sourceDims.length,
          map.length,
        );
      }
      map.forEach((expr, i) => inequalities.push(...accessInequalities(expr, sourceDims[i] ?? 0)));
    });
    inequalities.push(...constraints.map(fromAffine));

    const ranges = deriveIndexRanges(
      node.indexes.length,
      inequalities,
      this.options.boundsMaxRounds,
    );
    ranges.forEach((range, i) => {
      if (!Number.isFinite(range.lower) || !Number.isFinite(range.upper)) {
        const name = node.indexes[i]?.name ?? `d${i}`;
        throw new UnboundIndexError(`Index ${name} has no determinable range`, name, {
          lower: range.lower,
          upper: range.upper,
        });
      }
    });

    const dtype = this.contractionDType(node, sources);
    if (hasDefault) {
      const fallback = operands[0];
      if (fallback !== undefined) {
        const fallbackDims = fallback.resolved.shape.dims;
        const merged = broadcastShapes(dims, fallbackDims);
        if (!RuntimeShape.equals(merged, dims)) {
          throw new BroadcastError(
            `Default of shape [${fallbackDims.join(', ')}] does not broadcast to the output shape [${dims.join(', ')}]`,
            [dims, fallbackDims],
          );
        }
      }
    }

    return {
      shape: new LogicalShape(
        hasDefault && operands[0] !== undefined
          ? joinDTypes(dtype, operands[0].resolved.shape.dtype)
          : dtype,
        dims,
      ),
      weak: false,
      contraction: {
        indexes: node.indexes,
        sink,
        sources: sourceMaps,
        constraints,
        inequalities,
        ranges,
      },
    };
  }

  private contractionDType(node: ContractionNode, sources: readonly Operand[]): RuntimeDType {
    switch (node.combine) {
      case 'none':
        return this.operandAt(sources, 0).resolved.shape.dtype;
      case 'mul':
        return this.joinOperands(this.operandAt(sources, 0), this.operandAt(sources, 1)).dtype;
      case 'cond':
        return this.operandAt(sources, 2).resolved.shape.dtype;
      default:
        return assertExhaustiveSwitch(node.combine);
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private resolveOperands(ids: readonly number[]): Operand[] | Deferred {
    const operands: Operand[] = [];
    for (const id of ids) {
      const result = this.resolve(id);
      if (result.status === 'deferred') {
        return result;
      }
      operands.push({ id, resolved: result.node });
    }
    return operands;
  }

  private evaluateDims(nodes: readonly DimNode[], what: string): number[] | Deferred {
    const dims: number[] = [];
    for (const node of nodes) {
      const value = this.graph.env.evaluate(node);
      if (value === undefined) {
        const unbound = this.graph.env.unboundSymbols(node);
        return {
          status: 'deferred',
          reason: `${what} dimension ${formatDim(node)} depends on unbound ${unbound.join(', ')}`,
        };
      }
      if (value < 0) {
        throw new ShapeError(`${what} dimension ${formatDim(node)} evaluates to ${value}`, {
          dimension: formatDim(node),
          value,
        });
      }
      dims.push(value);
    }
    return dims;
  }

  private deferUnbound(what: string): Deferred {
    return { status: 'deferred', reason: `${what} depends on unbound dimensions` };
  }

  private operandAt(operands: readonly Operand[], index: number): Operand {
    const operand = operands[index];
    if (operand === undefined) {
      throw new AssemblyError(`Missing operand ${index}, node has ${operands.length}`);
    }
    return operand;
  }
}
