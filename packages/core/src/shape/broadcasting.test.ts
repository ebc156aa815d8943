import { describe, it, expect } from 'vitest';
import { BroadcastManager, broadcastShapes, canBroadcast } from './broadcasting';
import { BroadcastError } from '../errors';

describe('Broadcasting', () => {
  it('should align trailing dimensions', () => {
    expect(broadcastShapes([3, 4], [3, 1])).toEqual([3, 4]);
    expect(broadcastShapes([5, 1, 2], [4, 1])).toEqual([5, 4, 2]);
    expect(broadcastShapes([1, 222, 222, 32], [32])).toEqual([1, 222, 222, 32]);
  });

  it('should treat scalars as broadcastable to anything', () => {
    expect(broadcastShapes([], [2, 3])).toEqual([2, 3]);
    expect(broadcastShapes([], [])).toEqual([]);
  });

  it('should broadcast three shapes together', () => {
    expect(broadcastShapes([3, 1], [1, 4], [])).toEqual([3, 4]);
  });

  it('should reject incompatible extents', () => {
    expect(() => broadcastShapes([3, 4], [3, 5])).toThrow(BroadcastError);
    expect(() => broadcastShapes([2], [3])).toThrow(
      'Cannot broadcast shapes [2] and [3]: dimension 0 has extents 2 and 3',
    );
    expect(canBroadcast([2, 3], [3])).toBe(true);
    expect(canBroadcast([2, 3], [2])).toBe(false);
  });

  it('should map result coordinates to operand offsets', () => {
    // operand [3, 1] with strides [1, 1]
    expect(BroadcastManager.sourceOffset([2, 3], [3, 1], [1, 1])).toBe(2);
    // operand [4] against result [3, 4]
    expect(BroadcastManager.sourceOffset([2, 3], [4], [1])).toBe(3);
    // scalar operand
    expect(BroadcastManager.sourceOffset([2, 3], [], [])).toBe(0);
  });
});
