import { MutableSequence, Orderable } from '../../common/Types';
import { insertionSortRange } from './BlockSorter';

/**
 * Final insertion sort over the whole sequence. Runs after every merge,
 * whether or not the merge left anything out of place; on sorted input it
 * is one linear scan with no shifts.
 *
 * @returns Number of element shifts needed to repair the sequence
 */
export function correctivePass<T extends Orderable>(seq: MutableSequence<T>): number {
  return insertionSortRange(seq, 0, seq.length);
}
