import { SortError } from '../../common/Errors';

export enum PipelineStage {
  UNPARTITIONED = 'unpartitioned',
  PARTITIONED = 'partitioned',
  BLOCKS_SORTED = 'blocks_sorted',
  RUNS_MARKED = 'runs_marked',
  MERGED = 'merged',
  DONE = 'done',
}

const STAGE_ORDER: readonly PipelineStage[] = [
  PipelineStage.UNPARTITIONED,
  PipelineStage.PARTITIONED,
  PipelineStage.BLOCKS_SORTED,
  PipelineStage.RUNS_MARKED,
  PipelineStage.MERGED,
  PipelineStage.DONE,
];

/**
 * One-way transition to `to`. Only the immediate successor is accepted,
 * except that a trivial sequence may jump straight to DONE.
 */
export function advanceStage(from: PipelineStage, to: PipelineStage): PipelineStage {
  const fromIndex = STAGE_ORDER.indexOf(from);
  const toIndex = STAGE_ORDER.indexOf(to);
  const isSuccessor = toIndex === fromIndex + 1;
  const isShortcut = from === PipelineStage.UNPARTITIONED && to === PipelineStage.DONE;

  if (!isSuccessor && !isShortcut) {
    throw new SortError(`Illegal pipeline transition: ${from} -> ${to}`);
  }

  return to;
}

export interface SortStats {
  readonly length: number;
  readonly blockLength: number;
  readonly blockCount: number;
  readonly orderedBoundaries: number;
  readonly orderedPrefixBlocks: number;
  readonly sourceCount: number;
  readonly blockShifts: number;
  readonly heapExtractions: number;
  readonly elementsRotated: number;
  readonly correctiveShifts: number;
  readonly stage: PipelineStage;
}
