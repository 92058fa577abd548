export type { BenchmarkAlgorithm, BenchmarkConfig, BenchmarkResult } from './BenchmarkTypes';
export {
  InputType,
  ALL_INPUT_TYPES,
  DEFAULT_BENCHMARK_CONFIG,
  resolveBenchmarkConfig,
} from './BenchmarkTypes';

export type { RandomSource } from './InputGenerator';
export { createRandom, randomInt, generateInput, isSorted } from './InputGenerator';

export {
  builtinSort,
  quickSort,
  mergeSort,
  insertionSort,
  createAlgorithms,
  applyAlgorithm,
} from './Baselines';

export { BenchmarkRunner } from './BenchmarkRunner';
export { formatTable, toCsv, writeCsv } from './Report';
