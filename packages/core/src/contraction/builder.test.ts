import { describe, it, expect } from 'vitest';
import { TensorGraph } from '../tensor/graph';
import type { Tensor } from '../tensor/tensor';
import { cond } from './builder';
import {
  BroadcastError,
  ContractionError,
  RankError,
  ShapeError,
  UnboundIndexError,
} from '../errors';

function dot(X: Tensor, Y: Tensor): Tensor {
  const g = X.graph;
  const [I, J, K] = g.dims('I', 'J', 'K');
  const [i, j, k] = g.indexes('i', 'j', 'k');
  X.bindDims(I, K);
  Y.bindDims(K, J);
  return g.output(I, J).sum([i, j], X.at(i, k).mul(Y.at(k, j))).build();
}

describe('ContractionBuilder', () => {
  it('should infer the shape of a matrix product', () => {
    const g = new TensorGraph();
    const A = g.placeholder('float32', [3, 4]);
    const B = g.placeholder('float32', [4, 5]);
    expect(dot(A, B).computeShape().toTypeString()).toBe('tensor<3x5xf32>');
  });

  it('should reject mismatched inner dimensions', () => {
    const g = new TensorGraph();
    const A = g.placeholder('float32', [3, 4]);
    const B = g.placeholder('float32', [5, 5]);
    expect(() => dot(A, B)).toThrow(ShapeError);
  });

  it('should join operand dtypes for products', () => {
    const g = new TensorGraph();
    const A = g.placeholder('int8', [2, 2]);
    const B = g.placeholder('int16', [2, 2]);
    expect(dot(A, B).computeShape().dtype.name).toBe('int16');
  });

  it('should record index variables in order of first appearance', () => {
    const g = new TensorGraph();
    const A = g.placeholder('float32', [2, 2]);
    const B = g.placeholder('float32', [2, 2]);
    const C = dot(A, B);
    const node = C.node;
    expect(node.kind).toBe('contraction');
    if (node.kind === 'contraction') {
      expect(node.indexes.map((index) => index.name)).toEqual(['i', 'j', 'k']);
      expect(node.operands).toEqual([A.id, B.id]);
    }
  });

  it('should require exactly one aggregation', () => {
    const g = new TensorGraph();
    const A = g.placeholder('float32', [4]);
    const [i] = g.indexes('i');
    const base = g.output(4);
    expect(() => base.build()).toThrow(ContractionError);
    const summed = base.sum([i], A.at(i));
    expect(() => summed.max([i], A.at(i))).toThrow(ContractionError);
    // builders are immutable
    expect(() => base.build()).toThrow(ContractionError);
    expect(summed.build().computeShape().dims).toEqual([4]);
  });

  it('should check sink and access ranks', () => {
    const g = new TensorGraph();
    const A = g.placeholder('float32', [4, 4]);
    const [i, j] = g.indexes('i', 'j');
    expect(() => g.output(4).sum([i, j], A.at(i, j))).toThrow(RankError);
    expect(() => A.at(i)).toThrow(RankError);
  });

  it('should reduce to a scalar with an empty sink', () => {
    const g = new TensorGraph();
    const I = g.placeholder('float32', [10, 10, 10]);
    const [i, j, k] = g.indexes('i', 'j', 'k');
    const O = g.output().max([], I.at(i, j, k)).build();
    expect(O.computeShape().toTypeString()).toBe('tensor<f32>');
  });

  it('should reject an index without a range', () => {
    const g = new TensorGraph();
    const A = g.placeholder('float32', [5]);
    const [i, j] = g.indexes('i', 'j');
    const builder = g.output(5).sum([i], A.at(i)).constrain(j.ge(0));
    expect(() => builder.build()).toThrow(UnboundIndexError);
  });

  it('should bound offsets with constraints', () => {
    const g = new TensorGraph();
    const I = g.placeholder('float32', [10]);
    const [N] = g.dims('N');
    const [i, k] = g.indexes('i', 'k');
    I.bindDims(N);
    const O = g.output(N).sum([i], I.at(k)).constrain(i.sub(k).lt(N)).build();
    const resolution = g.resolve(O.id);
    expect(resolution.status).toBe('resolved');
    if (resolution.status === 'resolved') {
      expect(resolution.node.contraction?.constraints.map(String)).toEqual([
        'd0 - d1',
        '-d0 + d1 + 9',
      ]);
      expect(resolution.node.contraction?.ranges).toEqual([
        { lower: 0, upper: 9 },
        { lower: 0, upper: 9 },
      ]);
    }
  });

  it('should take the dtype of the selected value for cond', () => {
    const g = new TensorGraph();
    const I = g.placeholder('float32', [2, 3]);
    const IX = g.placeholder('int32', [3]);
    const [X0, X1] = g.dims('X0', 'X1');
    const [x0, x1] = g.indexes('x0', 'x1');
    I.bindDims(X0, X1);
    const Max = g.output(X0).max([x0], I.at(x0, x1)).build();
    const O = g.output(X0).max([x0], cond(I.at(x0, x1), Max.at(x0), IX.at(x1))).build();
    expect(O.computeShape().toTypeString()).toBe('tensor<2xi32>');
  });

  it('should join the default into the result', () => {
    const g = new TensorGraph();
    const I = g.placeholder('int32', [4]);
    const P = g.placeholder('float32', [4]);
    const [i] = g.indexes('i');
    const O = g.output(4).assign([i], I.at(i)).useDefault(P).build();
    expect(O.computeShape().dtype.name).toBe('float32');
    expect(O.node.operands).toEqual([P.id, I.id]);
  });

  it('should require the default to broadcast to the output', () => {
    const g = new TensorGraph();
    const I = g.placeholder('float32', [4]);
    const P = g.placeholder('float32', [5]);
    const [i] = g.indexes('i');
    expect(() => g.output(4).assign([i], I.at(i)).useDefault(P).build()).toThrow(
      BroadcastError,
    );
  });
});
