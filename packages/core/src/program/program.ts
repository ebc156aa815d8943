/**
 * Program assembly
 *
 * A {@link Program} freezes the part of a graph reachable from its outputs:
 * every node is resolved, placeholders become ordered, uniquely named
 * arguments, and the remaining nodes are scheduled once each in dependency
 * order.
 */

import { AssemblyError, DTypeError } from '../errors';
import { getCompilerConfig, type CompilerConfig } from '../config';
import { makeLogger } from '../logger';
import { getDType, isWidening, toDType, type DTypeLike } from '../dtype';
import type { FloatDTypeName, IntegerDTypeName } from '../dtype';
import type { LogicalShape } from '../shape';
import type { TensorGraph } from '../tensor/graph';
import type { TensorNode } from '../tensor/nodes';
import type { Tensor } from '../tensor/tensor';
import { checkAssignCoverage } from './coverage';
import { printProgram } from './printer';
import { ShapeResolver, type ResolvedContraction, type ResolvedNode } from './resolver';

const logger = makeLogger('assembler');

// =============================================================================
// Types
// =============================================================================

export interface ProgramOptions {
  /** Elevate float literals to at least this dtype */
  readonly floatType?: FloatDTypeName;
  /** Elevate int literals to at least this dtype */
  readonly intType?: IntegerDTypeName;
  readonly config?: Partial<CompilerConfig>;
}

/**
 * An output, optionally widened to a requested dtype
 */
export type ProgramOutput = Tensor | { readonly tensor: Tensor; readonly dtype: DTypeLike };

export interface ProgramArgument {
  readonly id: number;
  /** `%argN` */
  readonly ref: string;
  /** Unique argument name; absent for unnamed placeholders */
  readonly name: string | undefined;
  readonly shape: LogicalShape;
}

export interface ProgramResult {
  /** The node whose value is returned, after any widening cast */
  readonly id: number;
  readonly ref: string;
  readonly shape: LogicalShape;
}

export interface ScheduledOp {
  readonly id: number;
  /** `%N` */
  readonly ref: string;
  readonly node: TensorNode;
  readonly shape: LogicalShape;
  readonly operands: readonly string[];
  readonly contraction: ResolvedContraction | undefined;
}

// =============================================================================
// Program
// =============================================================================

/**
 * @example
 * const g = new TensorGraph();
 * const A = g.placeholder('float32', [3, 3], 'A');
 * const B = g.placeholder('float32', [3, 3], 'B');
 * const program = new Program('add', [A.add(B)]);
 * program.inputs.map((arg) => arg.name); // ['B', 'A']
 */
export class Program {
  readonly graph: TensorGraph;
  readonly config: CompilerConfig;
  readonly inputs: readonly ProgramArgument[];
  readonly outputs: readonly ProgramResult[];
  readonly ops: readonly ScheduledOp[];
  private readonly resolver: ShapeResolver;
  private readonly refs = new Map<number, string>();

  constructor(
    readonly name: string,
    outputs: readonly ProgramOutput[],
    readonly options: ProgramOptions = {},
  ) {
    const [first] = outputs;
    if (first === undefined) {
      throw new AssemblyError(`Program ${name} has no outputs`);
    }
    const graph = 'tensor' in first ? first.tensor.graph : first.graph;
    this.graph = graph;
    this.config = getCompilerConfig({ ...graph.config, ...options.config });
    this.resolver = new ShapeResolver(graph, {
      floatType: options.floatType === undefined ? undefined : getDType(options.floatType),
      intType: options.intType === undefined ? undefined : getDType(options.intType),
      boundsMaxRounds: this.config.boundsMaxRounds,
    });

    const roots = outputs.map((output) => this.widen(output));
    const reachable = this.resolveReachable(roots);

    const pending = graph.env.checkConstraints();
    if (pending > 0) {
      logger.debug(`${pending} dimension constraint(s) left undecided`, { program: name });
    }
    this.checkContractions(reachable);

    this.inputs = this.collectInputs(roots);
    this.ops = this.schedule(roots);
    this.outputs = roots.map((id) => ({
      id,
      ref: this.refOf(id),
      shape: this.resolver.require(id).shape,
    }));

    logger.debug('program assembled', {
      program: name,
      inputs: this.inputs.length,
      ops: this.ops.length,
      outputs: this.outputs.length,
    });
  }

  /**
   * SSA name of a node in this program (`%argN` or `%N`)
   */
  refOf(id: number): string {
    const ref = this.refs.get(id);
    if (ref === undefined) {
      throw new AssemblyError(`Node ${id} is not part of program ${this.name}`, { node: id });
    }
    return ref;
  }

  resolved(id: number): ResolvedNode {
    return this.resolver.require(id);
  }

  toString(): string {
    return printProgram(this);
  }

  // ===========================================================================
  // Assembly Steps
  // ===========================================================================

  private widen(output: ProgramOutput): number {
    const tensor = 'tensor' in output ? output.tensor : output;
    if (tensor.graph !== this.graph) {
      throw new AssemblyError(`Output ${tensor.toString()} belongs to a different graph`);
    }
    if (!('tensor' in output)) {
      return tensor.id;
    }
    const requested = toDType(output.dtype);
    const actual = this.resolver.require(tensor.id).shape.dtype;
    if (actual === requested) {
      return tensor.id;
    }
    if (!isWidening(actual, requested)) {
      throw new DTypeError(
        `Output ${tensor.toString()} cannot be narrowed from ${actual.name} to ${requested.name}`,
        { from: actual.name, to: requested.name },
      );
    }
    return this.graph.widen(tensor, requested).id;
  }

  /**
   * Resolve everything the outputs depend on, in postorder
   */
  private resolveReachable(roots: readonly number[]): number[] {
    const order: number[] = [];
    const visited = new Set<number>();
    const visit = (id: number): void => {
      if (visited.has(id)) {
        return;
      }
      visited.add(id);
      this.graph.node(id).operands.forEach(visit);
      this.resolver.require(id);
      order.push(id);
    };
    roots.forEach(visit);
    return order;
  }

  private checkContractions(ids: readonly number[]): void {
    for (const id of ids) {
      const node = this.graph.node(id);
      if (node.kind !== 'contraction' || node.aggregation !== 'assign') {
        continue;
      }
      const resolved = this.resolver.require(id);
      if (resolved.contraction !== undefined) {
        checkAssignCoverage(node, resolved.contraction, resolved.shape, this.config.coverageCheckLimit);
      }
    }
  }

  /**
   * Placeholders in preorder, visiting outputs and operands last to first,
   * named uniquely
   */
  private collectInputs(roots: readonly number[]): ProgramArgument[] {
    const placeholders: number[] = [];
    const visited = new Set<number>();
    const visit = (id: number): void => {
      if (visited.has(id)) {
        return;
      }
      visited.add(id);
      const node = this.graph.node(id);
      if (node.kind === 'placeholder') {
        placeholders.push(id);
      }
      [...node.operands].reverse().forEach(visit);
    };
    [...roots].reverse().forEach(visit);

    const taken = new Set<string>();
    return placeholders.map((id, position) => {
      const node = this.graph.node(id);
      const name = node.kind === 'placeholder' ? uniqueName(node.name, taken) : undefined;
      const ref = `%arg${position}`;
      this.refs.set(id, ref);
      return { id, ref, name, shape: this.resolver.require(id).shape };
    });
  }

  /**
   * Non-placeholder nodes in postorder, visiting outputs and operands first
   * to last
   */
  private schedule(roots: readonly number[]): ScheduledOp[] {
    const ops: ScheduledOp[] = [];
    const visited = new Set<number>();
    const visit = (id: number): void => {
      if (visited.has(id)) {
        return;
      }
      visited.add(id);
      const node = this.graph.node(id);
      node.operands.forEach(visit);
      if (node.kind === 'placeholder') {
        return;
      }
      const ref = `%${ops.length}`;
      this.refs.set(id, ref);
      const resolved = this.resolver.require(id);
      ops.push({
        id,
        ref,
        node,
        shape: resolved.shape,
        operands: node.operands.map((operand) => this.refOf(operand)),
        contraction: resolved.contraction,
      });
    };
    roots.forEach(visit);
    return ops;
  }
}

/**
 * Keep the first use of a name; later uses get the first free `_N` suffix
 *
 * @example
 * // C, C, B -> C, C_0, B
 */
function uniqueName(name: string | undefined, taken: Set<string>): string | undefined {
  if (name === undefined) {
    return undefined;
  }
  let candidate = name;
  for (let n = 0; taken.has(candidate); n++) {
    candidate = `${name}_${n}`;
  }
  taken.add(candidate);
  return candidate;
}
