import { SortConfig, resolveSortConfig } from '../../common/Config';
import { MutableSequence, Orderable } from '../../common/Types';
import { computeBlockLength, partition } from '../partition';
import { sortBlocks, correctivePass } from '../blocksort';
import { detectOrderedBoundaries, orderedPrefixLength, coalesceRuns } from '../runs';
import { BlockMerger } from '../merge';
import { IAdaptiveBlockSorter } from './IAdaptiveBlockSorter';
import { PipelineStage, SortStats, advanceStage } from './PipelineTypes';

export class AdaptiveBlockSorter implements IAdaptiveBlockSorter {
  private readonly config: SortConfig;

  constructor(config?: Partial<SortConfig>) {
    this.config = resolveSortConfig(config);
  }

  public getConfig(): Readonly<SortConfig> {
    return this.config;
  }

  public sort<T extends Orderable>(seq: MutableSequence<T>): SortStats {
    const length = seq.length;
    let stage = PipelineStage.UNPARTITIONED;

    if (length <= 1) {
      stage = advanceStage(stage, PipelineStage.DONE);
      return {
        length,
        blockLength: 0,
        blockCount: length,
        orderedBoundaries: 0,
        orderedPrefixBlocks: length,
        sourceCount: length,
        blockShifts: 0,
        heapExtractions: 0,
        elementsRotated: 0,
        correctiveShifts: 0,
        stage,
      };
    }

    const blockLength = computeBlockLength(length, this.config);
    const blocks = partition(length, blockLength);
    stage = advanceStage(stage, PipelineStage.PARTITIONED);

    const blockShifts = sortBlocks(seq, blocks);
    stage = advanceStage(stage, PipelineStage.BLOCKS_SORTED);

    const markers = detectOrderedBoundaries(seq, blocks);
    stage = advanceStage(stage, PipelineStage.RUNS_MARKED);

    const sources = coalesceRuns(blocks, markers);
    const mergeStats = new BlockMerger(seq, sources).merge();
    stage = advanceStage(stage, PipelineStage.MERGED);

    const correctiveShifts = correctivePass(seq);
    stage = advanceStage(stage, PipelineStage.DONE);

    return {
      length,
      blockLength,
      blockCount: blocks.length,
      orderedBoundaries: markers.filter(Boolean).length,
      orderedPrefixBlocks: orderedPrefixLength(markers),
      sourceCount: sources.length,
      blockShifts,
      heapExtractions: mergeStats.heapExtractions,
      elementsRotated: mergeStats.elementsRotated,
      correctiveShifts,
      stage,
    };
  }
}

/**
 * Sort `seq` in place in non-decreasing order. Equal elements may end up in
 * any relative order.
 */
export function adaptiveBlockSort<T extends Orderable>(
  seq: MutableSequence<T>,
  config?: Partial<SortConfig>
): void {
  new AdaptiveBlockSorter(config).sort(seq);
}
