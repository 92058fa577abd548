export { PipelineStage, advanceStage } from './PipelineTypes';
export type { SortStats } from './PipelineTypes';

export type { IAdaptiveBlockSorter } from './IAdaptiveBlockSorter';

export { AdaptiveBlockSorter, adaptiveBlockSort } from './AdaptiveBlockSorter';
