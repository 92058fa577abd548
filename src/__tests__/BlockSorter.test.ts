import { describe, it, expect } from 'vitest';
import { insertionSortRange, sortBlocks, correctivePass } from '../engine/blocksort';
import { partition } from '../engine/partition';

describe('insertionSortRange', () => {
  it('should sort only the given range', () => {
    const arr = [9, 5, 3, 4, 1, 0];
    insertionSortRange(arr, 1, 5);
    expect(arr).toEqual([9, 1, 3, 4, 5, 0]);
  });

  it('should count one shift per displaced element', () => {
    expect(insertionSortRange([3, 2, 1], 0, 3)).toBe(3);
    expect(insertionSortRange([1, 3, 2], 0, 3)).toBe(1);
  });

  it('should perform no shifts on a sorted range', () => {
    const arr = [1, 2, 2, 3, 8];
    expect(insertionSortRange(arr, 0, arr.length)).toBe(0);
    expect(arr).toEqual([1, 2, 2, 3, 8]);
  });

  it('should leave empty and single-element ranges alone', () => {
    const arr = [2, 1];
    expect(insertionSortRange(arr, 1, 1)).toBe(0);
    expect(insertionSortRange(arr, 0, 1)).toBe(0);
    expect(arr).toEqual([2, 1]);
  });

  it('should work on typed arrays', () => {
    const arr = new Int32Array([4, -2, 7, 0]);
    insertionSortRange(arr, 0, arr.length);
    expect(Array.from(arr)).toEqual([-2, 0, 4, 7]);
  });
});

describe('sortBlocks', () => {
  it('should sort each block independently', () => {
    const arr = [4, 3, 2, 1, 8, 7, 6, 5, 10, 9];
    const shifts = sortBlocks(arr, partition(arr.length, 4));
    expect(arr).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(shifts).toBe(13);
  });

  it('should not move elements across block boundaries', () => {
    const arr = [5, 6, 7, 8, 1, 2, 3, 4];
    expect(sortBlocks(arr, partition(arr.length, 4))).toBe(0);
    expect(arr).toEqual([5, 6, 7, 8, 1, 2, 3, 4]);
  });
});

describe('correctivePass', () => {
  it('should scan a sorted sequence without shifting', () => {
    const arr = [0, 1, 2, 3, 4, 5];
    expect(correctivePass(arr)).toBe(0);
    expect(arr).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('should repair residual disorder', () => {
    const arr = [1, 2, 5, 3, 4, 0];
    correctivePass(arr);
    expect(arr).toEqual([0, 1, 2, 3, 4, 5]);
  });
});
