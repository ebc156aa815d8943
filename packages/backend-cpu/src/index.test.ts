/**
 * End-to-end tests: trace, assemble and interpret programs
 */

import { describe, it, expect } from 'vitest';
import { Program, TensorGraph, cond, float, index, prng, select, shape } from '@einsum-ir/core';
import type { Tensor } from '@einsum-ir/core';
import { ExecutionError, cpu } from './index';

function dot(X: Tensor, Y: Tensor): Tensor {
  const g = X.graph;
  const [I, J, K] = g.dims('I', 'J', 'K');
  const [i, j, k] = g.indexes('i', 'j', 'k');
  X.bindDims(I, K);
  Y.bindDims(K, J);
  return g.output(I, J).sum([i, j], X.at(i, k).mul(Y.at(k, j))).build();
}

function range(n: number, start = 0): number[] {
  return Array.from({ length: n }, (_, i) => start + i);
}

describe('CPU interpreter', () => {
  describe('device', () => {
    it('should provide device metadata', () => {
      expect(cpu.type).toBe('cpu');
      expect(cpu.id).toBe('cpu:0');
    });
  });

  describe('contractions', () => {
    it('should multiply matrices', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('float32', [3, 3], 'A');
      const exe = cpu.compile(new Program('dot', [dot(A, A)]));
      exe.input(A).copyFrom(range(9, 1));
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([30, 36, 42, 66, 81, 96, 102, 126, 150]);
      expect(exe.output(0).dims).toEqual([3, 3]);
    });

    it('should compute a prefix sum through constraints', async () => {
      const g = new TensorGraph();
      const I = g.placeholder('float32', [10], 'I');
      const [N] = g.dims('N');
      const [i, k] = g.indexes('i', 'k');
      I.bindDims(N);
      const O = g.output(N).sum([i], I.at(k)).constrain(i.sub(k).lt(N)).build();
      const exe = cpu.compile(new Program('cumsum', [O]));
      exe.input('I').copyFrom(range(10, 1));
      await exe.run();
      expect(exe.output(O).toArray()).toEqual([1, 3, 6, 10, 15, 21, 28, 36, 45, 55]);
    });

    it('should find a global minimum by negating a max', async () => {
      const g = new TensorGraph();
      const I = g.placeholder('float32', [2, 3], 'I');
      const [i, j] = g.indexes('i', 'j');
      const O = g.output().max([], I.neg().at(i, j)).build().neg();
      const exe = cpu.compile(new Program('global_min', [O]));
      exe.input(I).copyFrom([3, -1, 4, 1, -5, 9]);
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([-5]);
    });

    it('should repeat elements with noReduce', async () => {
      const g = new TensorGraph();
      const I = g.placeholder('float32', [10, 10, 10]);
      const [N0, N1, N2] = g.dims('N0', 'N1', 'N2');
      const [n0, n1, n2, k] = g.indexes('n0', 'n1', 'n2', 'k');
      I.bindDims(N0, N1, N2);
      const O = g
        .output(N0, N1.mul(3), N2)
        .assign([n0, n1.mul(3).add(k), n2], I.at(n0, n1, n2))
        .constrain(k.lt(3))
        .noReduce()
        .build();
      const exe = cpu.compile(new Program('repeat_elts', [O]));
      exe.input(0).copyFrom(range(1000));
      await exe.run();

      const expected: number[] = [];
      for (let a = 0; a < 10; a++) {
        for (let b = 0; b < 30; b++) {
          for (let c = 0; c < 10; c++) {
            expected.push(a * 100 + Math.floor(b / 3) * 10 + c);
          }
        }
      }
      expect(exe.output(0).toArray()).toEqual(expected);
    });

    it('should keep default values outside the written slice', async () => {
      const g = new TensorGraph();
      const P = g.placeholder('float32', [1, 7, 10, 10], 'P');
      const I = g.placeholder('float32', [1, 10, 10], 'I');
      const [B, N1, N2] = g.dims('B', 'N1', 'N2');
      const [b, i1, i2] = g.indexes('b', 'i1', 'i2');
      I.bindDims(B, N1, N2);
      const O = g
        .output(B, 7, N1, N2)
        .assign([b, 3, i1, i2], I.at(b, i1, i2))
        .useDefault(P)
        .build();
      const exe = cpu.compile(new Program('use_default', [O]));
      exe.input('P').copyFrom(range(700));
      exe.input('I').copyFrom(range(100, 1000));
      await exe.run();

      const expected = range(700).map((p) => (Math.floor(p / 100) === 3 ? 1000 + (p % 100) : p));
      expect(exe.output(0).toArray()).toEqual(expected);
    });

    it('should let the last write win under noReduce', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('float32', [4, 3]);
      const [i, j] = g.indexes('i', 'j');
      const O = g.output(4).assign([i], A.at(i, j)).noReduce().build();
      const exe = cpu.compile(new Program('last', [O]));
      exe.input(0).copyFrom(range(12));
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([2, 5, 8, 11]);
    });

    it('should compute an arg max with cond', async () => {
      const g = new TensorGraph();
      const I = g.placeholder('float32', [1, 10, 10], 'I');
      const [X0, X1, X2] = g.dims('X0', 'X1', 'X2');
      const [x0, x1, x2] = g.indexes('x0', 'x1', 'x2');
      I.bindDims(X0, X1, X2);
      const Max = g.output(X0, X2).max([x0, x2], I.at(x0, x1, x2)).build();
      const IX = index(I, 1);
      const O = g
        .output(X0, X2)
        .max([x0, x2], cond(I.at(x0, x1, x2), Max.at(x0, x2), IX.at(x0, x1, x2)))
        .build();
      const program = new Program('arg_max', [O.cast('uint32')]);
      expect(program.outputs[0]?.shape.toTypeString()).toBe('tensor<1x10xu32>');

      const exe = cpu.compile(program);
      // column x2 peaks at row (7 + x2) mod 10
      exe.input(I).copyFrom(range(100).map((p) => (Math.floor(p / 10) * 7 + (p % 10) * 3) % 10));
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([7, 8, 9, 0, 1, 2, 3, 4, 5, 6]);
    });
  });

  describe('elementwise', () => {
    it('should divide a float literal by a tensor', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('float32', [6], 'A');
      const exe = cpu.compile(new Program('reciprocal', [g.constant(float(1)).div(A)]));
      exe.input(A).copyFrom([1, 2, 4, 5, 8, 10]);
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([1, 0.5, 0.25, 0.2, 0.125, 0.1].map(Math.fround));
    });

    it('should add in either operand order', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('int8', [2, 1], 'A');
      const B = g.placeholder('float32', [3], 'B');
      const exe = cpu.compile(new Program('commute', [A.add(B), B.add(A)]));
      exe.input(A).copyFrom([1, -2]);
      exe.input(B).copyFrom([0.5, 1.5, 2.5]);
      await exe.run();
      const expected = [1.5, 2.5, 3.5, -1.5, -0.5, 0.5];
      expect(exe.output(0).toArray()).toEqual(expected);
      expect(exe.output(1).toArray()).toEqual(expected);
      expect(exe.program.outputs.map((out) => out.shape.toTypeString())).toEqual([
        'tensor<2x3xf32>',
        'tensor<2x3xf32>',
      ]);
    });

    it('should wrap unsigned 64-bit addition', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('uint64', [3], 'A');
      const B = g.placeholder('uint64', [3], 'B');
      const exe = cpu.compile(new Program('u64_add', [A.add(B)]));
      exe.input(A).copyFrom([2n ** 64n - 1n, 5n, 2n ** 63n]);
      exe.input(B).copyFrom([1n, 7n, 2n ** 63n]);
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([0n, 12n, 0n]);
    });

    it('should wrap through chained casts', async () => {
      const g = new TensorGraph();
      const X = g.placeholder('uint64', [2], 'X');
      const Y = X.add(X).cast('uint32').cast('int64');
      const exe = cpu.compile(new Program('casts', [Y]));
      exe.input(X).copyFrom([2n ** 64n - 1n, 2n ** 32n + 5n]);
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([4294967294n, 10n]);
    });

    it('should wrap narrow integers', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('int8', [2], 'A');
      const exe = cpu.compile(new Program('i8_add', [A.add(100)]));
      exe.input(A).copyFrom([100, -100]);
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([-56, 0]);
    });

    it('should truncate integer division toward zero', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('int32', [3], 'A');
      const B = g.placeholder('int32', [3], 'B');
      const exe = cpu.compile(new Program('idiv', [A.div(B)]));
      exe.input(A).copyFrom([7, -7, 5]);
      exe.input(B).copyFrom([2, 2, 0]);
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([3, -3, 0]);
    });

    it('should truncate floats cast to integers', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('float32', [3], 'A');
      const exe = cpu.compile(new Program('to_i8', [A.cast('int8')]));
      exe.input(A).copyFrom([1.7, -1.7, 300.5]);
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([1, -1, 44]);
    });

    it('should apply bitwise operations', async () => {
      const g = new TensorGraph();
      const U = g.placeholder('uint32', [3], 'U');
      const V = g.placeholder('uint8', [2], 'V');
      const W = g.placeholder('int8', [1], 'W');
      const exe = cpu.compile(
        new Program('bits', [U.bitAnd(0xff), U.shr(9), V.bitNot(), W.shl(1)]),
      );
      exe.input(U).copyFrom([0xff00ff00, 12, 1]);
      exe.input(V).copyFrom([0, 5]);
      exe.input(W).copyFrom([64]);
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([0, 12, 1]);
      expect(exe.output(1).toArray()).toEqual([8355967, 0, 0]);
      expect(exe.output(2).toArray()).toEqual([255, 250]);
      expect(exe.output(3).toArray()).toEqual([-128]);
    });

    it('should broadcast comparisons', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('uint64', [3, 4], 'A');
      const B = g.placeholder('uint64', [3, 1], 'B');
      const exe = cpu.compile(new Program('broadcast_cmp', [A.ge(B)]));
      exe.input(A).copyFrom(range(12).map(BigInt));
      exe.input(B).copyFrom([0n, 6n, 12n]);
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([1, 1, 1, 1, 0, 0, 1, 1, 0, 0, 0, 0]);
    });

    it('should compare mixed signedness in the promoted dtype', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('int32', [2], 'A');
      const B = g.placeholder('uint32', [2], 'B');
      const exe = cpu.compile(new Program('mixed_cmp', [A.add(B), A.eq(B), A.lt(B)]));
      exe.input(A).copyFrom([-1, 3]);
      exe.input(B).copyFrom([4294967295, 2]);
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([4294967294, 5]);
      expect(exe.output(1).toArray()).toEqual([1, 0]);
      expect(exe.output(2).toArray()).toEqual([0, 0]);
    });

    it('should match cond operands in the promoted dtype', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('int32', [2], 'A');
      const B = g.placeholder('uint32', [2], 'B');
      const C = g.placeholder('float32', [2], 'C');
      const [i] = g.indexes('i');
      const O = g.output(2).sum([i], cond(A.at(i), B.at(i), C.at(i))).build();
      const exe = cpu.compile(new Program('mixed_cond', [O]));
      exe.input(A).copyFrom([-1, 3]);
      exe.input(B).copyFrom([4294967295, 2]);
      exe.input(C).copyFrom([10, 20]);
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([10, 0]);
    });

    it('should select with a literal branch', async () => {
      const g = new TensorGraph();
      const I = g.placeholder('float32', [2, 3], 'I');
      const exe = cpu.compile(new Program('relu', [select(I.lt(0), 0, I)]));
      exe.input(I).copyFrom([-1, 2, -3, 4, 0, -0.5]);
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([0, 2, 0, 4, 0, 0]);
    });

    it('should widen an output', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('float32', [2], 'A');
      const exe = cpu.compile(new Program('widen', [{ tensor: A.neg(), dtype: 'float64' }]));
      exe.input(A).copyFrom([1.5, -2]);
      await exe.run();
      expect(exe.output(0).dtype.name).toBe('float64');
      expect(exe.output(0).toArray()).toEqual([-1.5, 2]);
    });
  });

  describe('structural operations', () => {
    it('should report shapes', async () => {
      const g = new TensorGraph();
      const I = g.placeholder('float32', [10, 20]);
      const exe = cpu.compile(new Program('shape', [shape(I)]));
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([10, 20]);
    });

    it('should fill coordinates along an axis', async () => {
      const g = new TensorGraph();
      const T = g.placeholder('float32', [2, 3]);
      const exe = cpu.compile(new Program('index', [index(T, 1), index(T, 0)]));
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([0, 1, 2, 0, 1, 2]);
      expect(exe.output(1).toArray()).toEqual([0, 0, 0, 1, 1, 1]);
    });

    it('should keep row-major order on reshape', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('int32', [2, 3], 'A');
      const exe = cpu.compile(new Program('reshape', [A.reshape(3, 2)]));
      exe.input(A).copyFrom(range(6));
      await exe.run();
      expect(exe.output(0).dims).toEqual([3, 2]);
      expect(exe.output(0).toArray()).toEqual(range(6));
    });

    it('should generate reproducible uniform values', async () => {
      const g = new TensorGraph();
      const S = g.placeholder('uint32', [2], 'S');
      const { values, state } = prng(S, [4]);
      const exe = cpu.compile(new Program('prng', [values, state]));
      exe.input(S).copyFrom([1, 2]);
      await exe.run();
      const first = exe.output(values).toArray();
      const next = exe.output(state).toArray();
      expect(first).toHaveLength(4);
      for (const value of first) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
      expect(next).not.toEqual([1, 2]);

      await exe.run();
      expect(exe.output(values).toArray()).toEqual(first);

      exe.input(S).copyFrom(next);
      await exe.run();
      expect(exe.output(values).toArray()).not.toEqual(first);
    });
  });

  describe('buffers', () => {
    it('should share one computation between repeated outputs', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('float32', [2], 'A');
      const R = A.mul(2);
      const exe = cpu.compile(new Program('dup', [R, R]));
      exe.input(A).copyFrom([1, 2]);
      await exe.run();
      expect(exe.output(0).toArray()).toEqual([2, 4]);
      expect(exe.output(1).toArray()).toEqual([2, 4]);
      expect(exe.output(R).toArray()).toEqual([2, 4]);
    });

    it('should recompute results on every run', async () => {
      const g = new TensorGraph();
      const A = g.placeholder('float32', [2], 'A');
      const exe = cpu.compile(new Program('twice', [A.add(1)]));
      const result = exe.output(0);
      exe.input(A).copyFrom([1, 2]);
      await exe.run();
      expect(result.toArray()).toEqual([2, 3]);
      exe.input(A).copyFrom([10, 20]);
      await exe.run();
      expect(result.toArray()).toEqual([11, 21]);
    });

    it('should reject unknown or mismatched buffers', () => {
      const g = new TensorGraph();
      const A = g.placeholder('float32', [2], 'A');
      const B = g.placeholder('float32', [2], 'B');
      const exe = cpu.compile(new Program('neg', [A.neg()]));
      expect(() => exe.input('missing')).toThrow(ExecutionError);
      expect(() => exe.input(B)).toThrow(ExecutionError);
      expect(() => exe.output(1)).toThrow(ExecutionError);
      expect(() => exe.input(A).copyFrom([1, 2, 3])).toThrow(ExecutionError);
      expect(() => exe.output(0).copyFrom([1, 2])).toThrow(ExecutionError);
    });
  });
});
