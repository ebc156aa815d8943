/**
 * Symbolic dimensions
 *
 * A dimension is a small expression tree over integer constants and symbols.
 * Symbols are created by a {@link SymbolicEnvironment}, which also owns their
 * bindings. A symbol is bound once (usually by `bindDims`), and every derived
 * expression evaluates as soon as the symbols it mentions are bound.
 */

import { AssemblyError, ShapeError } from '../errors';

// =============================================================================
// Dimension Expressions
// =============================================================================

export type DimBinaryOp = 'add' | 'sub' | 'mul' | 'div';

/**
 * Expression tree for a dimension; `div` is floor division
 */
export type DimNode =
  | { readonly kind: 'const'; readonly value: number }
  | { readonly kind: 'symbol'; readonly id: number; readonly name: string | undefined }
  | { readonly kind: 'neg'; readonly operand: DimNode }
  | {
      readonly kind: 'binary';
      readonly op: DimBinaryOp;
      readonly lhs: DimNode;
      readonly rhs: DimNode;
    };

export type DimLike = TensorDim | number;

export function constDim(value: number): DimNode {
  if (!Number.isSafeInteger(value)) {
    throw new ShapeError(`Dimension literal must be an integer, got ${value}`, { value });
  }
  // + 0 turns -0 into 0
  return { kind: 'const', value: value + 0 };
}

export function toDimNode(dim: DimLike): DimNode {
  return typeof dim === 'number' ? constDim(dim) : dim.node;
}

function floorDiv(a: number, b: number): number {
  return Math.floor(a / b);
}

function applyBinary(op: DimBinaryOp, a: number, b: number): number {
  switch (op) {
    case 'add':
      return a + b;
    case 'sub':
      return a - b;
    case 'mul':
      return a * b;
    case 'div':
      if (b <= 0) {
        throw new ShapeError(`Dimension division by non-positive value ${b}`, { divisor: b });
      }
      return floorDiv(a, b);
  }
}

function binaryDim(op: DimBinaryOp, lhs: DimNode, rhs: DimNode): DimNode {
  if (lhs.kind === 'const' && rhs.kind === 'const') {
    return constDim(applyBinary(op, lhs.value, rhs.value));
  }
  if (op === 'div' && rhs.kind === 'const' && rhs.value <= 0) {
    throw new ShapeError(`Dimension division by non-positive value ${rhs.value}`, {
      divisor: rhs.value,
    });
  }
  // Identities keep dumps and error messages readable
  if (rhs.kind === 'const') {
    if ((op === 'add' || op === 'sub') && rhs.value === 0) {
      return lhs;
    }
    if ((op === 'mul' || op === 'div') && rhs.value === 1) {
      return lhs;
    }
  }
  if (lhs.kind === 'const' && op === 'mul' && lhs.value === 1) {
    return rhs;
  }
  if (lhs.kind === 'const' && op === 'add' && lhs.value === 0) {
    return rhs;
  }
  return { kind: 'binary', op, lhs, rhs };
}

/**
 * Render a dimension expression
 *
 * @example
 * formatDim(N.sub(K.sub(1)).node); // '(N - (K - 1))'
 */
export function formatDim(node: DimNode): string {
  switch (node.kind) {
    case 'const':
      return String(node.value);
    case 'symbol':
      return node.name ?? `s${node.id}`;
    case 'neg':
      return `-${formatDim(node.operand)}`;
    case 'binary': {
      const symbol = { add: '+', sub: '-', mul: '*', div: '/' }[node.op];
      return `(${formatDim(node.lhs)} ${symbol} ${formatDim(node.rhs)})`;
    }
  }
}

/**
 * Structural equality of two expression trees
 */
export function dimNodesEqual(a: DimNode, b: DimNode): boolean {
  switch (a.kind) {
    case 'const':
      return b.kind === 'const' && a.value === b.value;
    case 'symbol':
      return b.kind === 'symbol' && a.id === b.id;
    case 'neg':
      return b.kind === 'neg' && dimNodesEqual(a.operand, b.operand);
    case 'binary':
      return (
        b.kind === 'binary' &&
        a.op === b.op &&
        dimNodesEqual(a.lhs, b.lhs) &&
        dimNodesEqual(a.rhs, b.rhs)
      );
  }
}

// =============================================================================
// TensorDim
// =============================================================================

/**
 * Handle for a dimension expression
 *
 * Arithmetic never mutates; every operation returns a new dimension.
 *
 * @example
 * const [N, K] = g.dims(2);
 * const out = N.sub(K.sub(1)); // valid convolution extent
 * const half = N.add(1).div(2);
 */
export class TensorDim {
  constructor(readonly node: DimNode) {}

  static of(dim: DimLike): TensorDim {
    return typeof dim === 'number' ? new TensorDim(constDim(dim)) : dim;
  }

  add(other: DimLike): TensorDim {
    return new TensorDim(binaryDim('add', this.node, toDimNode(other)));
  }

  sub(other: DimLike): TensorDim {
    return new TensorDim(binaryDim('sub', this.node, toDimNode(other)));
  }

  mul(other: DimLike): TensorDim {
    return new TensorDim(binaryDim('mul', this.node, toDimNode(other)));
  }

  /**
   * Floor division; a literal divisor must be positive
   */
  div(other: DimLike): TensorDim {
    return new TensorDim(binaryDim('div', this.node, toDimNode(other)));
  }

  neg(): TensorDim {
    if (this.node.kind === 'const') {
      return new TensorDim(constDim(-this.node.value));
    }
    return new TensorDim({ kind: 'neg', operand: this.node });
  }

  toString(): string {
    return formatDim(this.node);
  }
}

// =============================================================================
// Symbolic Environment
// =============================================================================

/**
 * Equality between two dimensions that could not be checked when recorded
 */
interface DimConstraint {
  readonly lhs: DimNode;
  readonly rhs: DimNode;
  readonly description: string;
}

/**
 * Binding table for the symbols of one trace
 *
 * @example
 * const env = new SymbolicEnvironment();
 * const N = env.define('N');
 * env.unify(N, constDim(3), 'A'); // N := 3
 * env.unify(N, constDim(3), 'B'); // consistent, no-op
 * env.unify(N, constDim(4), 'C'); // ShapeError
 */
export class SymbolicEnvironment {
  private nextId = 0;
  private readonly bindings = new Map<number, DimNode>();
  private readonly constraints: DimConstraint[] = [];

  /**
   * Define a fresh, unbound symbol
   */
  define(name?: string): TensorDim {
    const id = this.nextId++;
    return new TensorDim({ kind: 'symbol', id, name });
  }

  isBound(dim: TensorDim): boolean {
    return dim.node.kind !== 'symbol' || this.bindings.has(dim.node.id);
  }

  /**
   * Evaluate a dimension, or return undefined while any symbol it mentions
   * is unbound
   */
  evaluate(dim: DimLike | DimNode): number | undefined {
    const node = typeof dim === 'number' || dim instanceof TensorDim ? toDimNode(dim) : dim;
    switch (node.kind) {
      case 'const':
        return node.value;
      case 'symbol': {
        const bound = this.bindings.get(node.id);
        return bound === undefined ? undefined : this.evaluate(bound);
      }
      case 'neg': {
        const value = this.evaluate(node.operand);
        return value === undefined ? undefined : -value;
      }
      case 'binary': {
        const lhs = this.evaluate(node.lhs);
        const rhs = this.evaluate(node.rhs);
        if (lhs === undefined || rhs === undefined) {
          return undefined;
        }
        return applyBinary(node.op, lhs, rhs);
      }
    }
  }

  /**
   * Evaluate a dimension that must be known by now
   */
  require(dim: DimLike | DimNode, what: string): number {
    const value = this.evaluate(dim);
    if (value === undefined) {
      const node = typeof dim === 'number' || dim instanceof TensorDim ? toDimNode(dim) : dim;
      throw new AssemblyError(`${what} depends on unbound dimension ${formatDim(node)}`, {
        unbound: this.unboundSymbols(node),
      });
    }
    return value;
  }

  /**
   * Unify a formal dimension slot with an actual dimension
   *
   * An unbound symbol is bound to the actual dimension. Anything else must
   * evaluate equal to it; when either side is still unknown the equality is
   * recorded and checked later by {@link checkConstraints}.
   */
  unify(slot: DimLike, actual: DimNode, description: string): void {
    const slotNode = toDimNode(slot);
    if (slotNode.kind === 'symbol' && !this.bindings.has(slotNode.id)) {
      const value = this.evaluate(actual);
      const target = value === undefined ? actual : constDim(value);
      if (this.occurs(slotNode.id, target)) {
        if (dimNodesEqual(slotNode, target)) {
          return;
        }
        throw new ShapeError(
          `Cannot bind ${formatDim(slotNode)} to ${formatDim(target)}: the expression refers to itself`,
          { description },
        );
      }
      this.bindings.set(slotNode.id, target);
      return;
    }

    const expected = this.evaluate(slotNode);
    const got = this.evaluate(actual);
    if (expected !== undefined && got !== undefined) {
      if (expected !== got) {
        throw new ShapeError(
          `Shape mismatch in ${description}: ${formatDim(slotNode)} is ${expected} but the tensor has ${got}`,
          { expected, actual: got },
        );
      }
      return;
    }
    this.constraints.push({ lhs: slotNode, rhs: actual, description });
  }

  /**
   * Check every recorded equality whose sides have become known
   *
   * @returns the number of equalities that are still undecided
   */
  checkConstraints(): number {
    let pending = 0;
    for (const constraint of this.constraints) {
      const lhs = this.evaluate(constraint.lhs);
      const rhs = this.evaluate(constraint.rhs);
      if (lhs === undefined || rhs === undefined) {
        pending++;
        continue;
      }
      if (lhs !== rhs) {
        throw new ShapeError(
          `Shape mismatch in ${constraint.description}: ${formatDim(constraint.lhs)} = ${lhs} but ${formatDim(constraint.rhs)} = ${rhs}`,
          { expected: lhs, actual: rhs },
        );
      }
    }
    return pending;
  }

  /**
   * Names of the unbound symbols a dimension depends on
   */
  unboundSymbols(node: DimNode): string[] {
    switch (node.kind) {
      case 'const':
        return [];
      case 'symbol': {
        const bound = this.bindings.get(node.id);
        return bound === undefined ? [formatDim(node)] : this.unboundSymbols(bound);
      }
      case 'neg':
        return this.unboundSymbols(node.operand);
      case 'binary':
        return [...new Set([...this.unboundSymbols(node.lhs), ...this.unboundSymbols(node.rhs)])];
    }
  }

  private occurs(id: number, node: DimNode): boolean {
    switch (node.kind) {
      case 'const':
        return false;
      case 'symbol': {
        if (node.id === id) {
          return true;
        }
        const bound = this.bindings.get(node.id);
        return bound !== undefined && this.occurs(id, bound);
      }
      case 'neg':
        return this.occurs(id, node.operand);
      case 'binary':
        return this.occurs(id, node.lhs) || this.occurs(id, node.rhs);
    }
  }
}
