import { describe, it, expect } from 'vitest';
import { CLIParser } from '../cli/CLIParser';
import { DEFAULT_BENCHMARK_CONFIG, InputType } from '../bench/BenchmarkTypes';
import { InvalidConfigError } from '../common/Errors';

describe('CLIParser', () => {
  it('should detect the help flag', () => {
    expect(new CLIParser(['-h']).parse().help).toBe(true);
    expect(new CLIParser(['--runs=2', '--help']).parse().help).toBe(true);
  });

  it('should use defaults without arguments', () => {
    const options = new CLIParser([]).parse();
    expect(options.help).toBe(false);
    expect(options.config).toEqual(DEFAULT_BENCHMARK_CONFIG);
  });

  it('should parse inline and separate flag values', () => {
    const options = new CLIParser([
      '--sizes=100,200',
      '--types=random,nearly-sorted',
      '--runs',
      '3',
      '--seed=7',
      '--out=/tmp/results.csv',
      '--element-size=4',
    ]).parse();

    expect(options.config).toEqual({
      sizes: [100, 200],
      inputTypes: [InputType.RANDOM, InputType.NEARLY_SORTED],
      runs: 3,
      seed: 7,
      outputPath: '/tmp/results.csv',
      sortConfig: { cacheLineBytes: 64, elementSize: 4, minBlockSize: 16 },
    });
  });

  it('should accept underscores in numbers', () => {
    expect(new CLIParser(['--sizes=1_000']).parse().config.sizes).toEqual([1000]);
  });

  it('should reject unknown input types', () => {
    expect(() => new CLIParser(['--types=bogus']).parse()).toThrow(
      'Invalid input type: bogus. Must be one of random, nearly_sorted, reverse_sorted, duplicates'
    );
  });

  it('should reject non-numeric values', () => {
    expect(() => new CLIParser(['--runs=abc']).parse()).toThrow('Invalid number for --runs: abc');
  });

  it('should validate the sort tuning', () => {
    expect(() => new CLIParser(['--element-size=100']).parse()).toThrow(InvalidConfigError);
  });
});
