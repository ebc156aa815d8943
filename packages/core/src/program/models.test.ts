import { describe, it, expect } from 'vitest';
import { Program } from './program';
import { TensorGraph } from '../tensor/graph';
import { select } from '../tensor/ops';
import type { Tensor } from '../tensor/tensor';
import { ShapeError } from '../errors';

function dot(X: Tensor, Y: Tensor): Tensor {
  const g = X.graph;
  const [I, J, K] = g.dims('I', 'J', 'K');
  const [i, j, k] = g.indexes('i', 'j', 'k');
  X.bindDims(I, K);
  Y.bindDims(K, J);
  return g.output(I, J).sum([i, j], X.at(i, k).mul(Y.at(k, j))).build();
}

function relu(X: Tensor): Tensor {
  return select(X.lt(0), 0, X);
}

function softmax(X: Tensor): Tensor {
  const g = X.graph;
  const [I, J] = g.dims('I', 'J');
  const [i, j] = g.indexes('i', 'j');
  X.bindDims(I, J);
  const M = g.output(I, 1).max([i, 0], X.at(i, j)).build();
  const E = X.sub(M).exp();
  const N = g.output(I, 1).sum([i, 0], E.at(i, j)).build();
  return E.div(N);
}

function conv2d(X: Tensor, K: Tensor): Tensor {
  const g = X.graph;
  const [N, X0, X1, K0, K1, CI, CO] = g.dims('N', 'X0', 'X1', 'K0', 'K1', 'CI', 'CO');
  const [n, x0, x1, co, k0, k1, ci] = g.indexes('n', 'x0', 'x1', 'co', 'k0', 'k1', 'ci');
  X.bindDims(N, X0, X1, CI);
  K.bindDims(K0, K1, CI, CO);
  return g
    .output(N, X0.sub(K0.sub(1)), X1.sub(K1.sub(1)), CO)
    .sum(
      [n, x0, x1, co],
      X.at(n, x0.add(k0).sub(K0.div(2)), x1.add(k1).sub(K1.div(2)), ci).mul(K.at(k0, k1, ci, co)),
    )
    .build();
}

function maxPool2(X: Tensor): Tensor {
  const g = X.graph;
  const [N, X0, X1, C] = g.dims('N', 'X0', 'X1', 'C');
  const [n, x0, x1, c, i, j] = g.indexes('n', 'x0', 'x1', 'c', 'i', 'j');
  X.bindDims(N, X0, X1, C);
  return g
    .output(N, X0.add(1).div(2), X1.add(1).div(2), C)
    .max([n, x0, x1, c], X.at(n, x0.mul(2).add(i), x1.mul(2).add(j), c))
    .constrain(i.lt(2), j.lt(2))
    .build();
}

function flatten(X: Tensor): Tensor {
  const [, ...rest] = X.computeShape().dims;
  return X.reshape(1, rest.reduce((product, dim) => product * dim, 1));
}

describe('model programs', () => {
  it('should order the arguments of a multilayer perceptron', () => {
    const g = new TensorGraph();
    const input = g.placeholder('float32', [1, 8], 'input');
    const kernel1 = g.placeholder('float32', [8, 6], 'kernel1');
    const bias1 = g.placeholder('float32', [6], 'bias1');
    const kernel2 = g.placeholder('float32', [6, 6], 'kernel2');
    const bias2 = g.placeholder('float32', [6], 'bias2');
    const kernel3 = g.placeholder('float32', [6, 4], 'kernel3');
    const bias3 = g.placeholder('float32', [4], 'bias3');
    const dense1 = relu(dot(input, kernel1).add(bias1));
    const dense2 = relu(dot(dense1, kernel2).add(bias2));
    const dense3 = softmax(dot(dense2, kernel3).add(bias3));

    const program = new Program('mlp', [dense3]);
    expect(program.inputs.map((arg) => arg.name)).toEqual([
      'bias3',
      'kernel3',
      'bias2',
      'kernel2',
      'bias1',
      'kernel1',
      'input',
    ]);
    expect(program.outputs[0]?.shape.toTypeString()).toBe('tensor<1x4xf32>');
    expect(program.ops.filter((op) => op.node.kind === 'contraction')).toHaveLength(5);
  });

  it('should infer the shapes of a convolutional network', () => {
    const g = new TensorGraph();
    const input = g.placeholder('float32', [1, 12, 12, 1], 'input');
    const kernel1 = g.placeholder('float32', [3, 3, 1, 4], 'kernel1');
    const bias1 = g.placeholder('float32', [4], 'bias1');
    const kernel2 = g.placeholder('float32', [3, 3, 4, 8], 'kernel2');
    const bias2 = g.placeholder('float32', [8], 'bias2');
    const kernel3 = g.placeholder('float32', [128, 16], 'kernel3');
    const bias3 = g.placeholder('float32', [16], 'bias3');
    const kernel4 = g.placeholder('float32', [16, 10], 'kernel4');
    const bias4 = g.placeholder('float32', [10], 'bias4');

    const conv1 = relu(conv2d(input, kernel1).add(bias1));
    const conv2 = relu(conv2d(conv1, kernel2).add(bias2));
    const pool = maxPool2(conv2);
    const flat = flatten(pool);
    const dense1 = relu(dot(flat, kernel3).add(bias3));
    const dense2 = softmax(dot(dense1, kernel4).add(bias4));

    expect(conv1.computeShape().dims).toEqual([1, 10, 10, 4]);
    expect(conv2.computeShape().dims).toEqual([1, 8, 8, 8]);
    expect(pool.computeShape().dims).toEqual([1, 4, 4, 8]);
    expect(flat.computeShape().dims).toEqual([1, 128]);

    const program = new Program('cnn', [dense2]);
    expect(program.inputs.map((arg) => arg.name)).toEqual([
      'bias4',
      'kernel4',
      'bias3',
      'kernel3',
      'bias2',
      'kernel2',
      'bias1',
      'kernel1',
      'input',
    ]);
    expect(program.toString().split('\n')[1]).toBe(
      '  %0 = contraction add, mul %arg8, %arg7 {idxs = [n, x0, x1, co, k0, k1, ci], sink = (d0, d1, d2, d3), srcs = [(d0, d1 + d4 - 1, d2 + d5 - 1, d6), (d4, d5, d6, d3)]} : tensor<1x10x10x4xf32>',
    );
    expect(program.outputs[0]?.shape.toTypeString()).toBe('tensor<1x10xf32>');
  });

  it('should reject a flatten that changes the element count', () => {
    const g = new TensorGraph();
    const X = g.placeholder('float32', [1, 4, 4, 8]);
    expect(() => new Program('bad_flatten', [X.reshape(1, 16)])).toThrow(ShapeError);
  });

  it('should return the updated weights and velocity of an optimizer step', () => {
    const g = new TensorGraph();
    const X = g.placeholder('float32', [4, 3], 'X');
    const Grad = g.placeholder('float32', [4, 3], 'Grad');
    const Veloc = g.placeholder('float32', [4, 3], 'Veloc');
    const LR = g.placeholder('float32', [], 'LR');
    const NewVeloc = Veloc.mul(0.125).add(Grad.mul(LR));
    const NewX = X.sub(NewVeloc);

    const program = new Program('momentum', [NewX, NewVeloc]);
    expect(program.inputs.map((arg) => arg.name)).toEqual(['LR', 'Grad', 'Veloc', 'X']);
    expect(program.ops.map((op) => op.node.kind)).toEqual([
      'constant',
      'binary',
      'binary',
      'binary',
      'binary',
    ]);
    expect(program.outputs.map((out) => out.ref)).toEqual(['%4', '%3']);
  });
});
