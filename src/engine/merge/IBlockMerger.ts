import { MergeStats } from './MergeTypes';

export interface IBlockMerger {
  /**
   * Merge all sorted sources into one non-decreasing sequence, in place.
   * Sources must tile the sequence in index order.
   *
   * Equal heads are taken from the lower source id first.
   */
  merge(): MergeStats;
}
