import { describe, it, expect } from 'vitest';
import { spiralOrder } from '../spiralOrder';

describe('spiralOrder', () => {
  it('starts at the active frame and alternates outward', () => {
    expect(spiralOrder(4, 10)).toEqual([4, 5, 3, 6, 2, 7, 1, 8, 0, 9]);
  });

  it('drains the forward side once the start is reached', () => {
    expect(spiralOrder(1, 5)).toEqual([1, 2, 0, 3, 4]);
  });

  it('drains the backward side once the end is reached', () => {
    expect(spiralOrder(3, 5)).toEqual([3, 4, 2, 1, 0]);
  });

  it('visits every frame exactly once', () => {
    const order = spiralOrder(7, 13);
    expect([...order].sort((a, b) => a - b)).toEqual(Array.from({ length: 13 }, (_, i) => i));
  });

  it('handles empty and single-frame sequences', () => {
    expect(spiralOrder(0, 0)).toEqual([]);
    expect(spiralOrder(0, 1)).toEqual([0]);
  });

  it('clamps an out-of-range start', () => {
    expect(spiralOrder(10, 3)).toEqual([2, 1, 0]);
  });
});
