import { describe, it, expect } from 'vitest';
import { createRandom, randomInt, generateInput, isSorted } from '../bench/InputGenerator';
import { InputType } from '../bench/BenchmarkTypes';

describe('createRandom', () => {
  it('should repeat the same sequence for the same seed', () => {
    const a = createRandom(123);
    const b = createRandom(123);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it('should stay within [0, 1)', () => {
    const random = createRandom(5);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('randomInt', () => {
  it('should include both bounds', () => {
    expect(randomInt(() => 0, 3, 8)).toBe(3);
    expect(randomInt(() => 0.9999, 3, 8)).toBe(8);
  });
});

describe('generateInput', () => {
  const random = createRandom(77);

  it('should count down for reverse_sorted', () => {
    expect(generateInput(5, InputType.REVERSE_SORTED, random)).toEqual([5, 4, 3, 2, 1]);
  });

  it('should draw random values in [0, n]', () => {
    const values = generateInput(200, InputType.RANDOM, random);
    expect(values).toHaveLength(200);
    expect(values.every(v => Number.isInteger(v) && v >= 0 && v <= 200)).toBe(true);
  });

  it('should limit duplicates to [0, 100]', () => {
    const values = generateInput(500, InputType.DUPLICATES, random);
    expect(values).toHaveLength(500);
    expect(values.every(v => v >= 0 && v <= 100)).toBe(true);
  });

  it('should keep nearly_sorted values within [0, n]', () => {
    const values = generateInput(300, InputType.NEARLY_SORTED, random);
    expect(values).toHaveLength(300);
    expect(values.every(v => v >= 0 && v <= 300)).toBe(true);
  });

  it('should return empty inputs for size zero', () => {
    for (const type of Object.values(InputType)) {
      expect(generateInput(0, type, random)).toEqual([]);
    }
  });
});

describe('isSorted', () => {
  it('should accept non-decreasing sequences', () => {
    expect(isSorted([])).toBe(true);
    expect(isSorted([1])).toBe(true);
    expect(isSorted([1, 1, 2])).toBe(true);
    expect(isSorted(['a', 'b'])).toBe(true);
  });

  it('should reject a descending pair', () => {
    expect(isSorted([1, 3, 2])).toBe(false);
  });
});
