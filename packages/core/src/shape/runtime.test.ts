import { describe, it, expect } from 'vitest';
import { LogicalShape, RuntimeShape } from './runtime';
import { getDType } from '../dtype';
import { ShapeError } from '../errors';

describe('RuntimeShape', () => {
  it('should compute size and row-major strides', () => {
    const shape = new RuntimeShape([2, 3, 4]);
    expect(shape.rank).toBe(3);
    expect(shape.size).toBe(24);
    expect(shape.strides).toEqual([12, 4, 1]);
  });

  it('should convert between linear indices and coordinates', () => {
    const shape = new RuntimeShape([2, 3, 4]);
    expect(shape.unravel(17)).toEqual([1, 1, 1]);
    expect(shape.ravel([1, 2, 3])).toBe(23);
  });

  it('should treat rank 0 as a single element', () => {
    const shape = new RuntimeShape([]);
    expect(shape.size).toBe(1);
    expect(shape.isScalar).toBe(true);
  });

  it('should reject negative or fractional dimensions', () => {
    expect(() => new RuntimeShape([2, -1])).toThrow(ShapeError);
    expect(() => new RuntimeShape([1.5])).toThrow(ShapeError);
  });
});

describe('LogicalShape', () => {
  it('should compare dtype and dimensions', () => {
    const a = new LogicalShape(getDType('float32'), [1, 10]);
    expect(a.equals(new LogicalShape(getDType('float32'), [1, 10]))).toBe(true);
    expect(a.equals(new LogicalShape(getDType('uint32'), [1, 10]))).toBe(false);
    expect(a.equals(new LogicalShape(getDType('float32'), [10]))).toBe(false);
  });

  it('should render for diagnostics and dumps', () => {
    const shape = new LogicalShape(getDType('uint32'), [1, 10]);
    expect(shape.toString()).toBe('LogicalShape(uint32, [1, 10])');
    expect(shape.toTypeString()).toBe('tensor<1x10xu32>');
    expect(new LogicalShape(getDType('float32'), []).toTypeString()).toBe('tensor<f32>');
  });
});
