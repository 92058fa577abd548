import { SortConfig, DEFAULT_SORT_CONFIG } from '../common/Config';
import { InvalidConfigError } from '../common/Errors';

export enum InputType {
  RANDOM = 'random',
  NEARLY_SORTED = 'nearly_sorted',
  REVERSE_SORTED = 'reverse_sorted',
  DUPLICATES = 'duplicates',
}

export const ALL_INPUT_TYPES: readonly InputType[] = [
  InputType.RANDOM,
  InputType.NEARLY_SORTED,
  InputType.REVERSE_SORTED,
  InputType.DUPLICATES,
];

export type BenchmarkAlgorithm =
  | { readonly name: string; readonly inPlace: true; readonly sort: (values: number[]) => void }
  | { readonly name: string; readonly inPlace: false; readonly sort: (values: number[]) => number[] };

export interface BenchmarkConfig {
  sizes: number[];
  inputTypes: InputType[];
  runs: number;
  seed: number;
  outputPath: string;
  sortConfig: SortConfig;
}

export const DEFAULT_BENCHMARK_CONFIG: BenchmarkConfig = {
  sizes: [1_000, 10_000],
  inputTypes: [...ALL_INPUT_TYPES],
  runs: 5,
  seed: 42,
  outputPath: './sorting_benchmark_results.csv',
  sortConfig: { ...DEFAULT_SORT_CONFIG },
};

export interface BenchmarkResult {
  readonly size: number;
  readonly inputType: InputType;
  readonly algorithm: string;
  readonly avgTimeMs: number;
  readonly avgMemoryMb: number;
  readonly correct: boolean;
}

export function resolveBenchmarkConfig(config?: Partial<BenchmarkConfig>): BenchmarkConfig {
  const resolved = { ...DEFAULT_BENCHMARK_CONFIG, ...config };

  for (const size of resolved.sizes) {
    if (!Number.isInteger(size) || size < 0) {
      throw new InvalidConfigError('sizes', `must be non-negative integers, got ${size}`);
    }
  }
  if (!Number.isInteger(resolved.runs) || resolved.runs < 1) {
    throw new InvalidConfigError('runs', `must be a positive integer, got ${resolved.runs}`);
  }

  return resolved;
}
