/**
 * Contraction evaluation for the CPU interpreter
 *
 * The index box derived at assembly is walked in row-major order; points
 * failing any access bound or constraint are skipped. Each remaining point
 * combines its source elements and aggregates the result into the sink cell.
 */

import type {
  AffineExpr,
  ContractionNode,
  LogicalShape,
  ResolvedContraction,
  RuntimeDType,
} from '@einsum-ir/core';
import { RuntimeShape, assertExhaustiveSwitch, forEachPoint, joinDTypes } from '@einsum-ir/core';
import { HostBuffer } from '../data';
import { ExecutionError } from '../errors';
import { broadcastIndices, compareScalars, convertScalar, type Scalar } from '../utils';
import { applyArithmetic } from './elementwise';

function offsetOf(
  exprs: readonly AffineExpr[],
  strides: readonly number[],
  point: readonly number[],
): number {
  let offset = 0;
  exprs.forEach((expr, axis) => {
    offset += expr.evaluate(point) * (strides[axis] ?? 0);
  });
  return offset;
}

function pick(value: Scalar, from: RuntimeDType, to: RuntimeDType): Scalar {
  return from === to ? value : convertScalar(value, to);
}

/**
 * Evaluate a contraction
 *
 * Cells start from the broadcast default, or 0 without one. `add` sums
 * onto the start value. `max` and `min` compare against it when a default
 * is given, else the first contribution replaces it. `assign` overwrites,
 * so with `noReduce` the last contribution in iteration order wins.
 */
export function executeContractionOp(
  node: ContractionNode,
  resolved: ResolvedContraction,
  operands: readonly HostBuffer[],
  shape: LogicalShape,
): HostBuffer {
  const output = new HostBuffer(shape);
  const dtype = shape.dtype;
  const fallback = node.defaultOperand === undefined ? undefined : operands[0];
  const sources = fallback === undefined ? operands : operands.slice(1);
  if (sources.length !== resolved.sources.length) {
    throw new ExecutionError(
      `Contraction expects ${resolved.sources.length} source buffer(s), got ${sources.length}`,
    );
  }

  if (fallback !== undefined) {
    for (const { outputIndex, inputOffsets } of broadcastIndices(shape.dims, [fallback.shape.dims])) {
      output.store(outputIndex, fallback.get(inputOffsets[0] ?? 0), fallback.dtype);
    }
  }

  const sinkStrides = RuntimeShape.computeStrides(shape.dims);
  const sourceStrides = sources.map((source) => RuntimeShape.computeStrides(source.shape.dims));
  const element = (position: number, point: readonly number[]): [Scalar, RuntimeDType] => {
    const source = sources[position];
    const access = resolved.sources[position];
    if (source === undefined || access === undefined) {
      throw new ExecutionError(`Contraction has no source ${position}`);
    }
    return [source.get(offsetOf(access, sourceStrides[position] ?? [], point)), source.dtype];
  };

  const combine = (point: readonly number[]): Scalar | undefined => {
    switch (node.combine) {
      case 'none': {
        const [value, from] = element(0, point);
        return pick(value, from, dtype);
      }
      case 'mul': {
        const [a, fromA] = element(0, point);
        const [b, fromB] = element(1, point);
        return applyArithmetic('mul', pick(a, fromA, dtype), pick(b, fromB, dtype), dtype);
      }
      case 'cond': {
        const [a, fromA] = element(0, point);
        const [b, fromB] = element(1, point);
        const joined = joinDTypes(fromA, fromB);
        if (compareScalars(pick(a, fromA, joined), pick(b, fromB, joined)) !== 0) {
          return undefined;
        }
        const [value, from] = element(2, point);
        return pick(value, from, dtype);
      }
      default:
        return assertExhaustiveSwitch(node.combine);
    }
  };

  const written = new Uint8Array(shape.size);
  forEachPoint(resolved.ranges, resolved.inequalities, (point) => {
    const value = combine(point);
    if (value === undefined) {
      return;
    }
    const cell = offsetOf(resolved.sink, sinkStrides, point);
    const started = written[cell] === 1 || fallback !== undefined;
    switch (node.aggregation) {
      case 'add':
        output.set(cell, applyArithmetic('add', output.get(cell), value, dtype));
        break;
      case 'max': {
        const order = compareScalars(value, output.get(cell));
        if (!started || (order !== undefined && order > 0)) {
          output.set(cell, value);
        }
        break;
      }
      case 'min': {
        const order = compareScalars(value, output.get(cell));
        if (!started || (order !== undefined && order < 0)) {
          output.set(cell, value);
        }
        break;
      }
      case 'assign':
        output.set(cell, value);
        break;
      default:
        assertExhaustiveSwitch(node.aggregation);
    }
    written[cell] = 1;
  });
  return output;
}
