/**
 * Tensor graph
 *
 * The arena that owns the nodes of one trace together with the symbolic
 * environment their dimensions live in. Handles ({@link Tensor}) refer to
 * nodes by id; nodes refer to their operands the same way, so the graph is
 * acyclic by construction.
 */

import { AssemblyError, BroadcastError, ShapeError, assertExhaustiveSwitch } from '../errors';
import { getCompilerConfig, type CompilerConfig } from '../config';
import { makeLogger } from '../logger';
import { toDType, type DTypeLike, type RuntimeDType } from '../dtype';
import {
  SymbolicEnvironment,
  constDim,
  dimNodesEqual,
  formatDim,
  type DimLike,
  type DimNode,
  type LogicalShape,
  type TensorDim,
} from '../shape';
import { TensorIndex } from '../contraction/affine';
import { ContractionBuilder } from '../contraction/builder';
import { ShapeResolver, type GraphView, type Resolution } from '../program/resolver';
import { Literal, type TensorNode } from './nodes';
import { Tensor, type TensorLike } from './tensor';

const logger = makeLogger('graph');

export class TensorGraph implements GraphView {
  readonly env = new SymbolicEnvironment();
  readonly config: CompilerConfig;
  private readonly nodes: TensorNode[] = [];
  private readonly constants = new Map<string, number>();
  private readonly widened = new Map<string, number>();
  private readonly resolver: ShapeResolver;

  constructor(config: Partial<CompilerConfig> = {}) {
    this.config = getCompilerConfig(config);
    this.resolver = new ShapeResolver(this, { boundsMaxRounds: this.config.boundsMaxRounds });
  }

  get size(): number {
    return this.nodes.length;
  }

  node(id: number): TensorNode {
    const node = this.nodes[id];
    if (node === undefined) {
      throw new AssemblyError(`Unknown node ${id}`, { node: id });
    }
    return node;
  }

  // ===========================================================================
  // Leaves
  // ===========================================================================

  /**
   * Declare a program input
   *
   * @example
   * const A = g.placeholder('float32', [3, 3], 'A');
   */
  placeholder(dtype: DTypeLike, dims: readonly number[], name?: string): Tensor {
    for (const dim of dims) {
      if (!Number.isSafeInteger(dim) || dim < 0) {
        throw new ShapeError(`Invalid placeholder dimension ${dim}`, { dims });
      }
    }
    return this.addNode({
      kind: 'placeholder',
      dtype: toDType(dtype),
      dims: [...dims],
      name,
      operands: [],
    });
  }

  /**
   * A scalar constant; untyped numbers are weak and adopt the dtype of the
   * tensor they are combined with
   */
  constant(value: Literal | Literal['value']): Tensor {
    const literal = value instanceof Literal ? value : Literal.of(value);
    // Equal literals share one node
    const key = `${literal.kind}:${String(literal.value)}`;
    const existing = this.constants.get(key);
    if (existing !== undefined) {
      return new Tensor(this, existing);
    }
    const tensor = this.addNode({ kind: 'constant', literal, operands: [] });
    this.constants.set(key, tensor.id);
    return tensor;
  }

  /**
   * Turn an operand into a handle of this graph
   */
  lift(value: TensorLike): Tensor {
    if (value instanceof Tensor) {
      if (value.graph !== this) {
        throw new AssemblyError(`${value.toString()} belongs to a different graph`);
      }
      return value;
    }
    return this.constant(value);
  }

  /**
   * Cast used to widen a program output; every program asking for the same
   * widening of the same tensor shares one node
   */
  widen(tensor: Tensor, dtype: RuntimeDType): Tensor {
    const key = `${tensor.id}:${dtype.name}`;
    const existing = this.widened.get(key);
    if (existing !== undefined) {
      return new Tensor(this, existing);
    }
    const cast = tensor.cast(dtype);
    this.widened.set(key, cast.id);
    return cast;
  }

  // ===========================================================================
  // Symbols
  // ===========================================================================

  dim(name?: string): TensorDim {
    return this.env.define(name);
  }

  /**
   * Several dimensions at once, either unnamed by count or one per name
   *
   * @example
   * const [N, M] = g.dims('N', 'M');
   * const [X, Y, Z] = g.dims(3);
   */
  dims(count: number): TensorDim[];
  dims(...names: string[]): TensorDim[];
  dims(...args: (number | string)[]): TensorDim[] {
    const [first] = args;
    if (typeof first === 'number') {
      return Array.from({ length: first }, () => this.env.define());
    }
    return args.map((name) => this.env.define(String(name)));
  }

  index(name?: string): TensorIndex {
    return new TensorIndex(name);
  }

  indexes(count: number): TensorIndex[];
  indexes(...names: string[]): TensorIndex[];
  indexes(...args: (number | string)[]): TensorIndex[] {
    const [first] = args;
    if (typeof first === 'number') {
      return Array.from({ length: first }, () => new TensorIndex());
    }
    return args.map((name) => new TensorIndex(String(name)));
  }

  /**
   * Start a contraction with the given output dimensions
   */
  output(...dims: DimLike[]): ContractionBuilder {
    return ContractionBuilder.create(this, dims);
  }

  // ===========================================================================
  // Nodes
  // ===========================================================================

  /**
   * Append a node and check it against everything known so far
   *
   * A node whose shape cannot be decided yet is kept; the assembler reports
   * it if it is still undecided when a program needs it.
   */
  addNode(node: TensorNode): Tensor {
    const id = this.nodes.length;
    this.nodes.push(Object.freeze(node));
    try {
      const result = this.resolver.resolve(id);
      if (result.status === 'deferred') {
        logger.trace(`node ${id} (${node.kind}) deferred: ${result.reason}`);
      }
    } catch (error) {
      this.nodes.pop();
      throw error;
    }
    return new Tensor(this, id);
  }

  resolve(id: number): Resolution {
    return this.resolver.resolve(id);
  }

  computeShape(id: number): LogicalShape {
    return this.resolver.require(id).shape;
  }

  /**
   * Number of dimensions; always known, even while extents are not
   */
  rankOf(id: number): number {
    const node = this.node(id);
    switch (node.kind) {
      case 'placeholder':
      case 'prng':
        return node.dims.length;
      case 'constant':
        return 0;
      case 'shape':
        return 1;
      case 'reshape':
      case 'contraction':
        return node.dims.length;
      case 'unary':
      case 'cast':
      case 'index':
        return this.rankOf(node.operands[0]);
      case 'prng_state':
        return this.rankOf(this.prngStateOperand(node.operands[0]));
      case 'binary':
      case 'select':
        return Math.max(...node.operands.map((operand) => this.rankOf(operand)));
      default:
        return assertExhaustiveSwitch(node);
    }
  }

  /**
   * Dimensions as expressions; concrete wherever the node is resolved
   */
  symbolicDims(id: number): DimNode[] {
    const resolution = this.resolver.resolve(id);
    if (resolution.status === 'resolved') {
      return resolution.node.shape.dims.map(constDim);
    }
    const node = this.node(id);
    switch (node.kind) {
      case 'reshape':
      case 'contraction':
        return [...node.dims];
      case 'unary':
      case 'cast':
      case 'index':
        return this.symbolicDims(node.operands[0]);
      case 'prng_state':
        return this.symbolicDims(this.prngStateOperand(node.operands[0]));
      case 'binary':
      case 'select':
        return this.broadcastSymbolic(node.operands.map((operand) => this.symbolicDims(operand)));
      case 'placeholder':
      case 'prng':
        return node.dims.map(constDim);
      case 'constant':
        return [];
      case 'shape':
        return [constDim(this.rankOf(node.operands[0]))];
      default:
        return assertExhaustiveSwitch(node);
    }
  }

  private prngStateOperand(prngId: number): number {
    const prng = this.node(prngId);
    if (prng.kind !== 'prng') {
      throw new AssemblyError(`prng_state must refer to a prng node, got ${prng.kind}`);
    }
    return prng.operands[0];
  }

  /**
   * Broadcast dimension expressions that are not all known yet
   */
  private broadcastSymbolic(shapes: readonly (readonly DimNode[])[]): DimNode[] {
    const rank = Math.max(0, ...shapes.map((shape) => shape.length));
    const result: DimNode[] = [];
    for (let axis = 0; axis < rank; axis++) {
      const candidates: DimNode[] = [];
      for (const shape of shapes) {
        const dim = shape[axis - (rank - shape.length)];
        if (dim === undefined || (dim.kind === 'const' && dim.value === 1)) {
          continue;
        }
        if (!candidates.some((candidate) => dimNodesEqual(candidate, dim))) {
          candidates.push(dim);
        }
      }
      const [only, ...others] = candidates;
      if (only === undefined) {
        result.push(constDim(1));
      } else if (others.length === 0) {
        result.push(only);
      } else {
        throw new BroadcastError(
          `Cannot broadcast dimensions ${candidates.map(formatDim).join(' and ')} before they are bound`,
          [],
        );
      }
    }
    return result;
  }
}
