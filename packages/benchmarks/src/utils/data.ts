/**
 * Data generation utilities for benchmarks
 *
 * Argument buffers take flat row-major data, so every generator returns a
 * flat array.
 */

function elementCount(shape: readonly number[]): number {
  return shape.reduce((a, b) => a * b, 1);
}

/**
 * Uniform values in `[-1, 1)`
 */
export function generateRandomData(shape: readonly number[]): number[] {
  const totalElements = elementCount(shape);
  const flatData = new Array<number>(totalElements);
  for (let i = 0; i < totalElements; i++) {
    flatData[i] = Math.random() * 2 - 1;
  }
  return flatData;
}

/**
 * Generate sequential data for a given shape
 */
export function generateSequentialData(
  shape: readonly number[],
  start = 0,
): { data: number[]; nextValue: number } {
  const totalElements = elementCount(shape);
  const data = Array.from({ length: totalElements }, (_, i) => start + i);
  return { data, nextValue: start + totalElements };
}

/**
 * Generate data filled with a constant value
 */
export function generateConstantData(shape: readonly number[], value: number): number[] {
  return new Array<number>(elementCount(shape)).fill(value);
}
