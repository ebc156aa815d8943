/**
 * Matrix product and prefix sum written as contractions
 */

import { Program, TensorGraph } from '@einsum-ir/core';

const g = new TensorGraph();
const A = g.placeholder('float32', [3, 4], 'A');
const B = g.placeholder('float32', [4, 5], 'B');

const [I, J, K] = g.dims('I', 'J', 'K');
const [i, j, k] = g.indexes('i', 'j', 'k');
A.bindDims(I, K);
B.bindDims(K, J);

// C(i, j) += A(i, k) * B(k, j)
const C = g.output(I, J).sum([i, j], A.at(i, k).mul(B.at(k, j))).build();
console.log(new Program('matmul', [C]).toString());

// S(i) += X(k) for every k <= i
const X = g.placeholder('float32', [8], 'X');
const [N] = g.dims('N');
X.bindDims(N);
const S = g.output(N).sum([i], X.at(k)).constrain(i.sub(k).lt(N)).build();
console.log(new Program('cumsum', [S]).toString());
