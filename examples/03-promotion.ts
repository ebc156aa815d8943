/**
 * Literals adapt to the tensors they meet; typed tensors promote by rank
 */

import { Program, TensorGraph, float } from '@einsum-ir/core';

const g = new TensorGraph();
const bytes = g.placeholder('uint8', [4], 'bytes');
const halfs = g.placeholder('int16', [4], 'halfs');
const floats = g.placeholder('float32', [4], 'floats');

// An integer literal keeps uint8; a float literal lifts to float32
console.log(bytes.add(1).computeShape().toTypeString());
console.log(bytes.add(float(1)).computeShape().toTypeString());

// uint8 + int16 is int16, anything + float32 is float32
console.log(bytes.add(halfs).computeShape().toTypeString());
console.log(halfs.mul(floats).computeShape().toTypeString());

// Comparisons give bool
console.log(floats.lt(halfs).computeShape().toTypeString());

// Assembly can place literals at a wider precision
const program = new Program('wide', [floats.add(float(0.5))], { floatType: 'float64' });
console.log(program.toString());
