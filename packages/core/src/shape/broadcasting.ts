/**
 * Broadcasting rules for elementwise operations
 *
 * Shapes are aligned at their trailing dimensions. Each aligned pair must be
 * equal or contain a 1; the result takes the non-1 extent. Missing leading
 * dimensions behave as 1.
 */

import { BroadcastError } from '../errors';

// eslint-disable-next-line @typescript-eslint/no-extraneous-class
export class BroadcastManager {
  /**
   * Check if two shapes can be broadcast together
   */
  static canBroadcast(shape1: readonly number[], shape2: readonly number[]): boolean {
    const rank = Math.max(shape1.length, shape2.length);
    const padded1 = this.padLeft(shape1, rank);
    const padded2 = this.padLeft(shape2, rank);
    return padded1.every((d1, i) => {
      const d2 = padded2[i] ?? 1;
      return d1 === d2 || d1 === 1 || d2 === 1;
    });
  }

  /**
   * Compute the broadcast result of any number of shapes
   *
   * @example
   * BroadcastManager.broadcastShapes([[3, 4], [3, 1]]); // [3, 4]
   * BroadcastManager.broadcastShapes([[5, 1, 2], [4, 1]]); // [5, 4, 2]
   */
  static broadcastShapes(shapes: readonly (readonly number[])[]): number[] {
    const rank = Math.max(0, ...shapes.map((shape) => shape.length));
    const result = new Array<number>(rank).fill(1);
    for (const shape of shapes) {
      const padded = this.padLeft(shape, rank);
      for (let i = 0; i < rank; i++) {
        const current = result[i] ?? 1;
        const dim = padded[i] ?? 1;
        if (dim === current || dim === 1) {
          continue;
        }
        if (current !== 1) {
          throw new BroadcastError(
            `Cannot broadcast shapes ${shapes.map((s) => `[${s.join(', ')}]`).join(' and ')}: ` +
              `dimension ${i} has extents ${current} and ${dim}`,
            shapes,
          );
        }
        result[i] = dim;
      }
    }
    return result;
  }

  /**
   * Map a coordinate of the broadcast result back to a linear offset into
   * an operand with the given dims and strides
   */
  static sourceOffset(
    outCoords: readonly number[],
    dims: readonly number[],
    strides: readonly number[],
  ): number {
    const shift = outCoords.length - dims.length;
    let offset = 0;
    for (let i = 0; i < dims.length; i++) {
      if (dims[i] === 1) {
        continue;
      }
      offset += (outCoords[i + shift] ?? 0) * (strides[i] ?? 0);
    }
    return offset;
  }

  /**
   * Pad a shape with 1s on the left to reach target length
   * @internal
   */
  static padLeft(shape: readonly number[], targetLength: number): number[] {
    return [...new Array<number>(Math.max(0, targetLength - shape.length)).fill(1), ...shape];
  }
}

export function canBroadcast(...shapes: (readonly number[])[]): boolean {
  try {
    BroadcastManager.broadcastShapes(shapes);
    return true;
  } catch (error) {
    if (error instanceof BroadcastError) {
      return false;
    }
    throw error;
  }
}

export function broadcastShapes(...shapes: (readonly number[])[]): number[] {
  return BroadcastManager.broadcastShapes(shapes);
}
