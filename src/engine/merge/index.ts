export type { HeapEntry, MergeStats } from './MergeTypes';
export { EMPTY_MERGE_STATS } from './MergeTypes';

export type { IBlockMerger } from './IBlockMerger';

export { BlockMerger, compareHeapEntries } from './BlockMerger';
export { rotate, reverseRange } from './Rotation';
