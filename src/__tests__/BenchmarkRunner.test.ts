import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BenchmarkRunner } from '../bench/BenchmarkRunner';
import { BenchmarkAlgorithm, InputType, resolveBenchmarkConfig } from '../bench/BenchmarkTypes';
import { builtinSort } from '../bench/Baselines';
import { InvalidConfigError } from '../common/Errors';

describe('BenchmarkRunner', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should measure every algorithm for every size and input type', () => {
    const runner = new BenchmarkRunner({
      sizes: [50],
      inputTypes: [InputType.RANDOM, InputType.REVERSE_SORTED],
      runs: 1,
    });

    const results = runner.run();

    expect(results).toHaveLength(10);
    expect(results.every(r => r.correct)).toBe(true);
    expect(results.every(r => r.size === 50)).toBe(true);
    expect(results.map(r => r.algorithm).slice(0, 5)).toEqual([
      'AdaptiveBlockSort',
      'BuiltinSort',
      'QuickSort',
      'MergeSort',
      'InsertionSort',
    ]);
    expect(results.every(r => r.avgTimeMs >= 0 && r.avgMemoryMb >= 0)).toBe(true);
  });

  it('should flag an algorithm that leaves the input unsorted', () => {
    const noop: BenchmarkAlgorithm = { name: 'Noop', inPlace: true, sort: () => undefined };
    const runner = new BenchmarkRunner(
      { sizes: [20], inputTypes: [InputType.REVERSE_SORTED], runs: 2 },
      [noop]
    );

    const [result] = runner.run();

    expect(result).toMatchObject({
      size: 20,
      inputType: InputType.REVERSE_SORTED,
      algorithm: 'Noop',
      correct: false,
    });
  });

  it('should log a failing algorithm and carry on', () => {
    const broken: BenchmarkAlgorithm = {
      name: 'Broken',
      inPlace: true,
      sort: () => {
        throw new Error('boom');
      },
    };
    const builtin: BenchmarkAlgorithm = { name: 'Builtin', inPlace: false, sort: builtinSort };
    const runner = new BenchmarkRunner(
      { sizes: [10], inputTypes: [InputType.DUPLICATES], runs: 1 },
      [broken, builtin]
    );

    const results = runner.run();

    expect(results.map(r => r.algorithm)).toEqual(['Builtin']);
    expect(console.error).toHaveBeenCalledWith('BenchmarkRunner: Broken failed: boom');
  });

  it('should reject an invalid configuration', () => {
    expect(() => new BenchmarkRunner({ runs: 0 })).toThrow(InvalidConfigError);
    expect(() => resolveBenchmarkConfig({ sizes: [-1] })).toThrow(
      'Invalid sizes: must be non-negative integers, got -1'
    );
  });
});
