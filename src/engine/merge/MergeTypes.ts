import { Orderable } from '../../common/Types';

export interface HeapEntry<T extends Orderable> {
  readonly value: T;
  readonly sourceId: number;
}

export interface MergeStats {
  readonly heapExtractions: number;
  readonly elementsRotated: number;
}

export const EMPTY_MERGE_STATS: MergeStats = {
  heapExtractions: 0,
  elementsRotated: 0,
};
