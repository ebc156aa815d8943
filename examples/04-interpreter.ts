/**
 * Assemble a program and run it on the reference interpreter
 */

import { Program, TensorGraph, select } from '@einsum-ir/core';
import { cpu } from '@einsum-ir/backend-cpu';

const g = new TensorGraph();
const X = g.placeholder('float32', [2, 3], 'X');
const W = g.placeholder('float32', [3, 2], 'W');

const [I, J, K] = g.dims('I', 'J', 'K');
const [i, j, k] = g.indexes('i', 'j', 'k');
X.bindDims(I, K);
W.bindDims(K, J);
const Y = g.output(I, J).sum([i, j], X.at(i, k).mul(W.at(k, j))).build();
const relu = select(Y.lt(0), 0, Y);

const executable = cpu.compile(new Program('dense', [relu]));
executable.input('X').copyFrom([1, 2, 3, 4, 5, 6]);
executable.input(W).copyFrom([1, -1, 0, 1, -1, 0]);
await executable.run();

console.log(executable.output(0).toArray()); // [ 0, 1, 0, 1 ]
