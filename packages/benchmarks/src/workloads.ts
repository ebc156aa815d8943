/**
 * Programs measured by the benchmarks
 *
 * A workload traces a fresh graph on every `build()`, so timing `build()`
 * covers tracing, shape inference and assembly together.
 */

import { Program, TensorGraph, select, type Tensor } from '@einsum-ir/core';
import type { CPUExecutable } from '@einsum-ir/backend-cpu';
import type { BenchmarkSize } from './utils/sizes';
import { generateConstantData, generateRandomData } from './utils/data';

export interface Workload {
  readonly name: string;
  build(): Program;
}

export function dot(X: Tensor, Y: Tensor): Tensor {
  const g = X.graph;
  const [I, J, K] = g.dims('I', 'J', 'K');
  const [i, j, k] = g.indexes('i', 'j', 'k');
  X.bindDims(I, K);
  Y.bindDims(K, J);
  return g.output(I, J).sum([i, j], X.at(i, k).mul(Y.at(k, j))).build();
}

export function relu(X: Tensor): Tensor {
  return select(X.lt(0), 0, X);
}

/**
 * Row-wise softmax of a matrix, shifted by the row maximum
 */
export function softmax(X: Tensor): Tensor {
  const g = X.graph;
  const [I, J] = g.dims('I', 'J');
  const [i, j] = g.indexes('i', 'j');
  X.bindDims(I, J);
  const M = g.output(I, 1).max([i, 0], X.at(i, j)).build();
  const E = X.sub(M).exp();
  const N = g.output(I, 1).sum([i, 0], E.at(i, j)).build();
  return E.div(N);
}

export function matmulWorkload(size: BenchmarkSize): Workload {
  const [rows = 1, cols = 1] = size.shape;
  return {
    name: `matmul ${size.name} ${size.shape.join('x')}`,
    build() {
      const g = new TensorGraph();
      const A = g.placeholder('float32', [rows, cols], 'A');
      const B = g.placeholder('float32', [cols, rows], 'B');
      return new Program('matmul', [dot(A, B)]);
    },
  };
}

/**
 * A perceptron over a batch of one: relu on every hidden layer and softmax
 * on the last
 */
export function mlpWorkload(size: BenchmarkSize): Workload {
  return {
    name: `mlp ${size.name} ${size.shape.join('x')}`,
    build() {
      const g = new TensorGraph();
      const [width = 1, ...layers] = size.shape;
      let X = g.placeholder('float32', [1, width], 'input');
      let fanIn = width;
      layers.forEach((fanOut, layer) => {
        const kernel = g.placeholder('float32', [fanIn, fanOut], `kernel${layer + 1}`);
        const bias = g.placeholder('float32', [fanOut], `bias${layer + 1}`);
        const dense = dot(X, kernel).add(bias);
        X = layer === layers.length - 1 ? softmax(dense) : relu(dense);
        fanIn = fanOut;
      });
      return new Program('mlp', [X]);
    },
  };
}

/**
 * Fill every argument: biases with a small constant, everything else with
 * uniform noise
 */
export function feedInputs(executable: CPUExecutable): void {
  executable.program.inputs.forEach((arg, position) => {
    const dims = arg.shape.dims;
    const data = arg.name?.startsWith('bias')
      ? generateConstantData(dims, 0.01)
      : generateRandomData(dims);
    executable.input(position).copyFrom(data);
  });
}
