/**
 * Problem sizes for benchmarking
 */

export interface BenchmarkSize {
  name: string;
  shape: readonly number[];
  elements: number;
}

/**
 * Square matrix products; the interpreter visits `n^3` points for each
 */
export const MATRIX_SIZES: BenchmarkSize[] = [
  { name: 'tiny', shape: [8, 8], elements: 64 },
  { name: 'small', shape: [16, 16], elements: 256 },
  { name: 'medium', shape: [32, 32], elements: 1024 },
];

/**
 * Layer widths of a perceptron, input first
 */
export const MLP_SIZES: BenchmarkSize[] = [
  { name: 'tiny', shape: [16, 32, 32, 10], elements: 16 * 32 + 32 * 32 + 32 * 10 },
  { name: 'small', shape: [64, 128, 128, 10], elements: 64 * 128 + 128 * 128 + 128 * 10 },
];

export function formatSize(size: BenchmarkSize): string {
  return `${size.name} ${size.shape.join('x')} (${size.elements.toLocaleString()} elements)`;
}
