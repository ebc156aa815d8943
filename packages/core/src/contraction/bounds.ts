/**
 * Index range inference
 *
 * Every access position `0 <= e < dim` and every explicit constraint is
 * turned into linear inequalities `Σ c·x + k >= 0`. Interval bounds for the
 * index variables are then tightened against each inequality in turn until
 * nothing changes. The resulting box over-approximates the iteration domain;
 * points inside the box are still checked against every inequality when the
 * contraction is evaluated.
 */

import type { AffineExpr } from './affine';

/**
 * `Σ coeffs[i] · x[i] + constant >= 0`
 */
export interface Inequality {
  readonly coeffs: readonly number[];
  readonly constant: number;
}

/**
 * Inclusive integer range; infinite while unknown
 */
export interface IndexRange {
  readonly lower: number;
  readonly upper: number;
}

export function fromAffine(expr: AffineExpr): Inequality {
  return { coeffs: expr.coeffs, constant: expr.constant };
}

/**
 * Inequalities keeping an access position inside `[0, dim)`
 *
 * With floor division by `d` the bound applies to the numerator:
 * `0 <= n <= d·dim - 1`.
 */
export function accessInequalities(expr: AffineExpr, dim: number): Inequality[] {
  return [
    { coeffs: expr.coeffs, constant: expr.constant },
    {
      coeffs: expr.coeffs.map(negate),
      constant: expr.divisor * dim - 1 - expr.constant,
    },
  ];
}

function negate(value: number): number {
  return value === 0 ? 0 : -value;
}

export function satisfies(inequality: Inequality, point: ArrayLike<number>): boolean {
  let sum = inequality.constant;
  for (let i = 0; i < inequality.coeffs.length; i++) {
    const coeff = inequality.coeffs[i] ?? 0;
    if (coeff !== 0) {
      sum += coeff * (point[i] ?? 0);
    }
  }
  return sum >= 0;
}

/**
 * Tighten index ranges against the inequalities
 *
 * @example
 * // i in [0, 10) from O[i]; k in [0, 10) from I[k]; i - k >= 0
 * deriveIndexRanges(2, inequalities, 64); // [{ lower: 0, upper: 9 }, { lower: 0, upper: 9 }]
 */
export function deriveIndexRanges(
  count: number,
  inequalities: readonly Inequality[],
  maxRounds: number,
): IndexRange[] {
  const lower = new Array<number>(count).fill(Number.NEGATIVE_INFINITY);
  const upper = new Array<number>(count).fill(Number.POSITIVE_INFINITY);

  for (let round = 0; round < maxRounds; round++) {
    let changed = false;
    for (const { coeffs, constant } of inequalities) {
      for (let j = 0; j < count; j++) {
        const cj = coeffs[j] ?? 0;
        if (cj === 0) {
          continue;
        }
        // cj·xj >= -constant - max(Σ other terms)
        let maxOthers = 0;
        for (let i = 0; i < count; i++) {
          const ci = coeffs[i] ?? 0;
          if (i === j || ci === 0) {
            continue;
          }
          maxOthers += ci > 0 ? ci * (upper[i] ?? Infinity) : ci * (lower[i] ?? -Infinity);
        }
        if (!Number.isFinite(maxOthers)) {
          continue;
        }
        const rhs = 0 - constant - maxOthers;
        if (cj > 0) {
          const bound = Math.ceil(rhs / cj) + 0; // + 0 turns -0 into 0
          if (bound > (lower[j] ?? -Infinity)) {
            lower[j] = bound;
            changed = true;
          }
        } else {
          const bound = Math.floor(rhs / cj) + 0;
          if (bound < (upper[j] ?? Infinity)) {
            upper[j] = bound;
            changed = true;
          }
        }
      }
    }
    if (!changed) {
      break;
    }
  }

  return lower.map((lo, i) => ({ lower: lo, upper: upper[i] ?? Infinity }));
}

/**
 * Number of integer points in the bounding box
 */
export function boxVolume(ranges: readonly IndexRange[]): number {
  return ranges.reduce((acc, { lower, upper }) => acc * Math.max(0, upper - lower + 1), 1);
}

/**
 * Visit every integer point of the box that satisfies all inequalities, in
 * row-major order (last index fastest)
 *
 * The point array is reused between calls; copy it to keep it.
 */
export function forEachPoint(
  ranges: readonly IndexRange[],
  inequalities: readonly Inequality[],
  visit: (point: readonly number[]) => void,
): void {
  if (ranges.some(({ lower, upper }) => upper < lower)) {
    return;
  }
  const point = ranges.map(({ lower }) => lower);
  for (;;) {
    if (inequalities.every((inequality) => satisfies(inequality, point))) {
      visit(point);
    }
    let axis = ranges.length - 1;
    while (axis >= 0) {
      const range = ranges[axis];
      const current = point[axis];
      if (range !== undefined && current !== undefined && current < range.upper) {
        point[axis] = current + 1;
        break;
      }
      point[axis] = range?.lower ?? 0;
      axis--;
    }
    if (axis < 0) {
      return;
    }
  }
}
