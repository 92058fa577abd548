import { MutableSequence, Orderable } from '../../common/Types';
import { SortStats } from './PipelineTypes';

/**
 * Sorts a sequence in place.
 *
 * Stages, in order:
 * 1. Partition into cache-sized blocks
 * 2. Insertion sort each block
 * 3. Mark block boundaries that are already ordered
 * 4. Heap merge of the resulting runs
 * 5. Corrective insertion sort over the whole sequence
 */
export interface IAdaptiveBlockSorter {
  sort<T extends Orderable>(seq: MutableSequence<T>): SortStats;
}
