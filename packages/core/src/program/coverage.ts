/**
 * Write-pattern checks for `assign` contractions
 *
 * An assignment does not reduce, so each output cell must receive at most
 * one contribution (unless the contraction opts into `noReduce`), and every
 * cell must be written unless a default supplies it.
 */

import { AssemblyError } from '../errors';
import { makeLogger } from '../logger';
import { RuntimeShape, type LogicalShape } from '../shape';
import { boxVolume, forEachPoint } from '../contraction/bounds';
import type { ContractionNode } from '../tensor/nodes';
import type { ResolvedContraction } from './resolver';

const logger = makeLogger('coverage');

export function checkAssignCoverage(
  node: ContractionNode,
  resolved: ResolvedContraction,
  shape: LogicalShape,
  limit: number,
): void {
  const volume = boxVolume(resolved.ranges);
  if (volume > limit) {
    logger.debug(`skipping enumeration of ${volume} points (limit ${limit})`);
    const sinkIndices = new Set(node.sink.flatMap((expr) => expr.indices));
    const reduced = node.indexes.filter((index) => !sinkIndices.has(index));
    if (reduced.length > 0 && !node.noReduce) {
      throw new AssemblyError(
        `assign contraction reduces over ${reduced.map((i) => i.toString()).join(', ')}; ` +
          'use noReduce() or an aggregation',
        { indexes: reduced.map((i) => i.toString()) },
      );
    }
    return;
  }

  const strides = RuntimeShape.computeStrides(shape.dims);
  const counts = new Uint32Array(shape.size);
  let collisions = 0;
  forEachPoint(resolved.ranges, resolved.inequalities, (point) => {
    let offset = 0;
    resolved.sink.forEach((expr, axis) => {
      offset += expr.evaluate(point) * (strides[axis] ?? 0);
    });
    const count = (counts[offset] ?? 0) + 1;
    counts[offset] = count;
    if (count === 2) {
      collisions++;
    }
  });

  if (collisions > 0 && !node.noReduce) {
    throw new AssemblyError(
      `assign contraction writes ${collisions} output cell(s) more than once; use noReduce() or an aggregation`,
      { collisions },
    );
  }

  const written = counts.reduce((acc, count) => acc + (count > 0 ? 1 : 0), 0);
  if (written < shape.size && node.defaultOperand === undefined) {
    throw new AssemblyError(
      `assign contraction leaves ${shape.size - written} of ${shape.size} output cells unwritten; ` +
        'add a default with useDefault()',
      { written, size: shape.size },
    );
  }
}
