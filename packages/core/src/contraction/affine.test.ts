import { describe, it, expect } from 'vitest';
import { AffineExpr, Constraint, TensorIndex } from './affine';
import { SymbolicEnvironment, constDim, type DimNode } from '../shape';
import { IndexExpressionError, ShapeError } from '../errors';

function positionsOf(...indexes: TensorIndex[]): Map<TensorIndex, number> {
  return new Map(indexes.map((index, i) => [index, i]));
}

const evaluateConst = (node: DimNode): number | undefined =>
  node.kind === 'const' ? node.value : undefined;

describe('IndexExpr', () => {
  it('should resolve sums of indices and constants', () => {
    const i = new TensorIndex('i');
    const k = new TensorIndex('k');
    const expr = i.add(k).sub(1).resolve(positionsOf(i, k), evaluateConst);
    expect(expr?.coeffs).toEqual([1, 1]);
    expect(expr?.constant).toBe(-1);
    expect(expr?.toString()).toBe('d0 + d1 - 1');
  });

  it('should scale by constants', () => {
    const n0 = new TensorIndex('n0');
    const n1 = new TensorIndex('n1');
    const k = new TensorIndex('k');
    const expr = n1.mul(3).add(k).resolve(positionsOf(n0, n1, k), evaluateConst);
    expect(expr?.coeffs).toEqual([0, 3, 1]);
    expect(expr?.toString()).toBe('d1 * 3 + d2');
  });

  it('should merge repeated indices', () => {
    const i = new TensorIndex('i');
    const expr = i.add(i).sub(i.mul(3)).resolve(positionsOf(i), evaluateConst);
    expect(expr?.coeffs).toEqual([-1]);
    expect(expr?.toString()).toBe('-d0');
  });

  it('should use symbolic coefficients once they are bound', () => {
    const env = new SymbolicEnvironment();
    const N = env.define('N');
    const i = new TensorIndex('i');
    const j = new TensorIndex('j');
    const expr = i.mul(N).add(j);
    const evaluate = (node: DimNode) => env.evaluate(node);

    expect(expr.resolve(positionsOf(i, j), evaluate)).toBeUndefined();
    env.unify(N, constDim(4), 'test');
    expect(expr.resolve(positionsOf(i, j), evaluate)?.coeffs).toEqual([4, 1]);
  });

  it('should reject the product of two index expressions', () => {
    const i = new TensorIndex('i');
    const j = new TensorIndex('j');
    expect(() => i.mul(j)).toThrow(IndexExpressionError);
  });

  it('should only allow floor division as the outermost operation', () => {
    const i = new TensorIndex('i');
    expect(() => i.div(2).add(1)).toThrow(IndexExpressionError);
    expect(() => i.div(2).div(2)).toThrow(IndexExpressionError);
    expect(() => i.div(2).mul(3)).toThrow(IndexExpressionError);
  });

  it('should reject a non-positive divisor', () => {
    const i = new TensorIndex('i');
    expect(() => i.div(0)).toThrow(ShapeError);
    expect(i.div(1).divisor).toBeUndefined();
  });

  it('should floor towards negative infinity', () => {
    const x = new TensorIndex('x');
    const k = new TensorIndex('k');
    const expr = x.add(k).sub(1).div(2).resolve(positionsOf(x, k), evaluateConst);
    expect(expr?.divisor).toBe(2);
    expect(expr?.evaluate([3, 2])).toBe(2);
    expect(expr?.evaluate([0, 0])).toBe(-1);
  });

  it('should reject indices outside the contraction', () => {
    const i = new TensorIndex('i');
    const j = new TensorIndex('j');
    expect(() => i.add(j).resolve(positionsOf(i), evaluateConst)).toThrow(IndexExpressionError);
  });
});

describe('Constraint', () => {
  it('should turn lt into a two-sided range', () => {
    const k = new TensorIndex('k');
    const constraint = k.lt(3);
    const resolved = constraint.inequalities.map((e) => e.resolve(positionsOf(k), evaluateConst));
    expect(resolved.map((e) => e?.toString())).toEqual(['d0', '-d0 + 2']);
  });

  it('should express one-sided bounds', () => {
    const i = new TensorIndex('i');
    const k = new TensorIndex('k');
    const positions = positionsOf(i, k);
    const [ge] = i.sub(k).ge(0).inequalities;
    const [gt] = i.gt(k).inequalities;
    const [le] = i.le(5).inequalities;
    expect(ge?.resolve(positions, evaluateConst)?.toString()).toBe('d0 - d1');
    expect(gt?.resolve(positions, evaluateConst)?.toString()).toBe('d0 - d1 - 1');
    expect(le?.resolve(positions, evaluateConst)?.toString()).toBe('-d0 + 5');
  });

  it('should reject floor division', () => {
    const i = new TensorIndex('i');
    expect(() => new Constraint([i.div(2)])).toThrow(IndexExpressionError);
  });
});

describe('AffineExpr', () => {
  it('should print like a dimension map', () => {
    expect(new AffineExpr([0, 3, 1], 0).toString()).toBe('d1 * 3 + d2');
    expect(new AffineExpr([0, -1], 2).toString()).toBe('-d1 + 2');
    expect(new AffineExpr([0, 1, 0, 0, 1], -1, 2).toString()).toBe('(d1 + d4 - 1) floordiv 2');
    expect(new AffineExpr([0, 0], 0).toString()).toBe('0');
  });

  it('should compare structurally', () => {
    expect(new AffineExpr([1, 0], 2).equals(new AffineExpr([1], 2))).toBe(true);
    expect(new AffineExpr([1, 0], 2).equals(new AffineExpr([1, 0], 2, 3))).toBe(false);
  });
});
