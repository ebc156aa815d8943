/**
 * Index variables and affine index expressions
 *
 * Contraction accesses are written with {@link TensorIndex} variables and
 * {@link IndexExpr} arithmetic over them. Coefficients and offsets may be
 * dimension expressions (`BO * x + k`), so they stay symbolic until the
 * contraction is resolved into numeric {@link AffineExpr}s.
 */

import { IndexExpressionError, ShapeError } from '../errors';
import { TensorDim, constDim, formatDim, type DimLike, type DimNode } from '../shape';

// =============================================================================
// Index Variables
// =============================================================================

export type IndexLike = TensorIndex | IndexExpr | DimLike;

/**
 * A contraction index variable
 *
 * Identity is by object: two indexes with the same name are different
 * variables.
 *
 * @example
 * const [i, j, k] = g.indexes('i', 'j', 'k');
 * A.at(i, k.add(1));
 */
export class TensorIndex {
  constructor(readonly name?: string) {}

  add(other: IndexLike): IndexExpr {
    return IndexExpr.of(this).add(other);
  }

  sub(other: IndexLike): IndexExpr {
    return IndexExpr.of(this).sub(other);
  }

  mul(other: IndexLike): IndexExpr {
    return IndexExpr.of(this).mul(other);
  }

  div(divisor: DimLike): IndexExpr {
    return IndexExpr.of(this).div(divisor);
  }

  neg(): IndexExpr {
    return IndexExpr.of(this).neg();
  }

  lt(bound: IndexLike): Constraint {
    return IndexExpr.of(this).lt(bound);
  }

  le(bound: IndexLike): Constraint {
    return IndexExpr.of(this).le(bound);
  }

  gt(bound: IndexLike): Constraint {
    return IndexExpr.of(this).gt(bound);
  }

  ge(bound: IndexLike): Constraint {
    return IndexExpr.of(this).ge(bound);
  }

  toString(): string {
    return this.name ?? 'idx';
  }
}

// =============================================================================
// Symbolic Index Expressions
// =============================================================================

function dimOp(op: 'add' | 'sub' | 'mul', lhs: DimNode, rhs: DimNode): DimNode {
  const left = new TensorDim(lhs);
  const right = new TensorDim(rhs);
  switch (op) {
    case 'add':
      return left.add(right).node;
    case 'sub':
      return left.sub(right).node;
    case 'mul':
      return left.mul(right).node;
  }
}

const ZERO = constDim(0);
const ONE = constDim(1);

/**
 * `(Σ coeffᵢ · indexᵢ + offset) floordiv divisor`, with the division optional
 */
export class IndexExpr {
  private constructor(
    readonly terms: ReadonlyMap<TensorIndex, DimNode>,
    readonly offset: DimNode,
    readonly divisor: DimNode | undefined,
  ) {}

  static of(value: IndexLike): IndexExpr {
    if (value instanceof IndexExpr) {
      return value;
    }
    if (value instanceof TensorIndex) {
      return new IndexExpr(new Map([[value, ONE]]), ZERO, undefined);
    }
    return new IndexExpr(new Map(), TensorDim.of(value).node, undefined);
  }

  /**
   * Index variables in order of first appearance
   */
  get indices(): TensorIndex[] {
    return [...this.terms.keys()];
  }

  get isConstant(): boolean {
    return this.terms.size === 0 && this.divisor === undefined;
  }

  add(other: IndexLike): IndexExpr {
    return this.combine(IndexExpr.of(other), 'add');
  }

  sub(other: IndexLike): IndexExpr {
    return this.combine(IndexExpr.of(other), 'sub');
  }

  /**
   * Scale by a dimension; the product of two index expressions is rejected
   */
  mul(other: IndexLike): IndexExpr {
    const rhs = IndexExpr.of(other);
    if (this.divisor !== undefined || rhs.divisor !== undefined) {
      throw new IndexExpressionError('Cannot multiply a floor division', {
        expression: `${this.toString()} * ${rhs.toString()}`,
      });
    }
    if (this.terms.size > 0 && rhs.terms.size > 0) {
      throw new IndexExpressionError('Product of two index expressions is not affine', {
        expression: `${this.toString()} * ${rhs.toString()}`,
      });
    }
    const [scaled, factor] = rhs.terms.size > 0 ? [rhs, this.offset] : [this, rhs.offset];
    const terms = new Map<TensorIndex, DimNode>();
    for (const [index, coeff] of scaled.terms) {
      terms.set(index, dimOp('mul', coeff, factor));
    }
    return new IndexExpr(terms, dimOp('mul', scaled.offset, factor), undefined);
  }

  /**
   * Floor division by a positive dimension; at most one per expression
   */
  div(divisor: DimLike): IndexExpr {
    if (this.divisor !== undefined) {
      throw new IndexExpressionError('Index expressions allow a single floor division', {
        expression: this.toString(),
      });
    }
    const node = TensorDim.of(divisor).node;
    if (node.kind === 'const' && node.value <= 0) {
      throw new ShapeError(`Index division by non-positive value ${node.value}`, {
        divisor: node.value,
      });
    }
    if (node.kind === 'const' && node.value === 1) {
      return this;
    }
    return new IndexExpr(this.terms, this.offset, node);
  }

  neg(): IndexExpr {
    return this.mul(-1);
  }

  /**
   * `0 <= this < bound`
   */
  lt(bound: IndexLike): Constraint {
    const upper = IndexExpr.of(bound).sub(1).sub(this);
    return new Constraint([this, upper]);
  }

  /**
   * `this <= bound`
   */
  le(bound: IndexLike): Constraint {
    return new Constraint([IndexExpr.of(bound).sub(this)]);
  }

  /**
   * `this > bound`
   */
  gt(bound: IndexLike): Constraint {
    return new Constraint([this.sub(bound).sub(1)]);
  }

  /**
   * `this >= bound`
   */
  ge(bound: IndexLike): Constraint {
    return new Constraint([this.sub(bound)]);
  }

  /**
   * Resolve coefficients to numbers
   *
   * @param positions column of each index variable in the contraction
   * @param evaluate dimension evaluator; undefined means "not yet known"
   * @returns undefined while any coefficient is unknown
   */
  resolve(
    positions: ReadonlyMap<TensorIndex, number>,
    evaluate: (node: DimNode) => number | undefined,
  ): AffineExpr | undefined {
    const coeffs = new Array<number>(positions.size).fill(0);
    for (const [index, coeffNode] of this.terms) {
      const position = positions.get(index);
      if (position === undefined) {
        throw new IndexExpressionError(`Index ${index.toString()} is not part of this contraction`);
      }
      const coeff = evaluate(coeffNode);
      if (coeff === undefined) {
        return undefined;
      }
      coeffs[position] = (coeffs[position] ?? 0) + coeff;
    }
    const constant = evaluate(this.offset);
    if (constant === undefined) {
      return undefined;
    }
    let divisor = 1;
    if (this.divisor !== undefined) {
      const value = evaluate(this.divisor);
      if (value === undefined) {
        return undefined;
      }
      if (value <= 0) {
        throw new ShapeError(`Index division by non-positive value ${value}`, { divisor: value });
      }
      divisor = value;
    }
    return new AffineExpr(coeffs, constant, divisor);
  }

  toString(): string {
    const parts: string[] = [];
    for (const [index, coeff] of this.terms) {
      parts.push(
        coeff.kind === 'const' && coeff.value === 1
          ? index.toString()
          : `${index.toString()} * ${formatDim(coeff)}`,
      );
    }
    if (!(this.offset.kind === 'const' && this.offset.value === 0) || parts.length === 0) {
      parts.push(formatDim(this.offset));
    }
    const sum = parts.join(' + ');
    return this.divisor === undefined ? sum : `(${sum}) / ${formatDim(this.divisor)}`;
  }

  private combine(other: IndexExpr, op: 'add' | 'sub'): IndexExpr {
    if (this.divisor !== undefined || other.divisor !== undefined) {
      throw new IndexExpressionError('Floor division must be the outermost index operation', {
        expression: `${this.toString()} ${op === 'add' ? '+' : '-'} ${other.toString()}`,
      });
    }
    const terms = new Map(this.terms);
    for (const [index, coeff] of other.terms) {
      const existing = terms.get(index);
      terms.set(
        index,
        existing === undefined
          ? op === 'add'
            ? coeff
            : dimOp('mul', coeff, constDim(-1))
          : dimOp(op, existing, coeff),
      );
    }
    return new IndexExpr(terms, dimOp(op, this.offset, other.offset), undefined);
  }
}

// =============================================================================
// Constraints
// =============================================================================

/**
 * One or more inequalities, each meaning `expression >= 0`
 */
export class Constraint {
  constructor(readonly inequalities: readonly IndexExpr[]) {
    for (const inequality of inequalities) {
      if (inequality.divisor !== undefined) {
        throw new IndexExpressionError('Constraints cannot contain floor division', {
          expression: inequality.toString(),
        });
      }
    }
  }

  toString(): string {
    return this.inequalities.map((e) => `${e.toString()} >= 0`).join(', ');
  }
}

// =============================================================================
// Resolved Affine Expressions
// =============================================================================

/**
 * Numeric affine map over the index columns of one contraction:
 * `floor((Σ coeffs[i] · x[i] + constant) / divisor)`
 */
export class AffineExpr {
  constructor(
    readonly coeffs: readonly number[],
    readonly constant: number,
    readonly divisor = 1,
  ) {}

  /**
   * The expression before floor division
   */
  numerator(point: ArrayLike<number>): number {
    let sum = this.constant;
    for (let i = 0; i < this.coeffs.length; i++) {
      const coeff = this.coeffs[i] ?? 0;
      if (coeff !== 0) {
        sum += coeff * (point[i] ?? 0);
      }
    }
    return sum;
  }

  evaluate(point: ArrayLike<number>): number {
    const sum = this.numerator(point);
    return this.divisor === 1 ? sum : Math.floor(sum / this.divisor);
  }

  /**
   * Structural equality; equal iff both denote the same function
   */
  equals(other: AffineExpr): boolean {
    const length = Math.max(this.coeffs.length, other.coeffs.length);
    for (let i = 0; i < length; i++) {
      if ((this.coeffs[i] ?? 0) !== (other.coeffs[i] ?? 0)) {
        return false;
      }
    }
    return this.constant === other.constant && this.divisor === other.divisor;
  }

  /**
   * @example
   * new AffineExpr([0, 3, 1], 0).toString(); // 'd1 * 3 + d2'
   * new AffineExpr([0, -1], 2).toString(); // '-d1 + 2'
   * new AffineExpr([0, 1, 0, 0, 1], -1, 2).toString(); // '(d1 + d4 - 1) floordiv 2'
   */
  toString(): string {
    let text = '';
    this.coeffs.forEach((coeff, i) => {
      if (coeff === 0) {
        return;
      }
      const magnitude = Math.abs(coeff);
      const term = magnitude === 1 ? `d${i}` : `d${i} * ${magnitude}`;
      if (text === '') {
        text = coeff < 0 ? `-${term}` : term;
      } else {
        text += coeff < 0 ? ` - ${term}` : ` + ${term}`;
      }
    });
    if (text === '') {
      text = String(this.constant);
    } else if (this.constant !== 0) {
      text += this.constant < 0 ? ` - ${-this.constant}` : ` + ${this.constant}`;
    }
    return this.divisor === 1 ? text : `(${text}) floordiv ${this.divisor}`;
  }
}
