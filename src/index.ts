export type { Orderable, MutableSequence, Block, Comparator } from './common/Types';
export { blockEnd } from './common/Types';
export type { SortConfig } from './common/Config';
export { DEFAULT_SORT_CONFIG, resolveSortConfig } from './common/Config';
export { SortError, InvalidConfigError, HeapCapacityError } from './common/Errors';
export { MinHeap } from './common/MinHeap';

export { computeBlockLength, partition } from './engine/partition';
export { insertionSortRange, sortBlocks, correctivePass } from './engine/blocksort';
export { detectOrderedBoundaries, orderedPrefixLength, coalesceRuns } from './engine/runs';
export type { HeapEntry, MergeStats, IBlockMerger } from './engine/merge';
export { BlockMerger, compareHeapEntries, rotate } from './engine/merge';
export type { SortStats, IAdaptiveBlockSorter } from './engine/pipeline';
export { PipelineStage, advanceStage, AdaptiveBlockSorter, adaptiveBlockSort } from './engine/pipeline';

export type { BenchmarkAlgorithm, BenchmarkConfig, BenchmarkResult, RandomSource } from './bench';
export {
  InputType,
  ALL_INPUT_TYPES,
  DEFAULT_BENCHMARK_CONFIG,
  resolveBenchmarkConfig,
  createRandom,
  generateInput,
  isSorted,
  BenchmarkRunner,
  formatTable,
  toCsv,
  writeCsv,
} from './bench';
