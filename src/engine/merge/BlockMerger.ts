import { MinHeap } from '../../common/MinHeap';
import { Block, MutableSequence, Orderable, blockEnd } from '../../common/Types';
import { IBlockMerger } from './IBlockMerger';
import { HeapEntry, MergeStats, EMPTY_MERGE_STATS } from './MergeTypes';
import { rotate } from './Rotation';

export function compareHeapEntries<T extends Orderable>(a: HeapEntry<T>, b: HeapEntry<T>): number {
  if (a.value < b.value) {
    return -1;
  }
  if (b.value < a.value) {
    return 1;
  }
  return a.sourceId - b.sourceId;
}

/**
 * K-way merge of sorted sources without an n-sized buffer.
 *
 * The unconsumed parts of the live sources always tile [write, n) in source
 * order. Each step takes the minimum head from the heap, extends it with the
 * following elements of the same source that still precede the next heap
 * minimum, and rotates that chunk down to `write`. Sources in front of the
 * chunk slide up by the chunk length.
 *
 * Extra space is the heap plus two cursor arrays, all of length k.
 */
export class BlockMerger<T extends Orderable> implements IBlockMerger {
  private readonly seq: MutableSequence<T>;
  private readonly cursors: number[];
  private readonly ends: number[];
  private readonly heap: MinHeap<HeapEntry<T>>;

  constructor(seq: MutableSequence<T>, sources: readonly Block[]) {
    this.seq = seq;
    this.cursors = sources.map(source => source.start);
    this.ends = sources.map(source => blockEnd(source));
    this.heap = new MinHeap<HeapEntry<T>>(compareHeapEntries, sources.length);
  }

  public merge(): MergeStats {
    if (this.cursors.length < 2) {
      return EMPTY_MERGE_STATS;
    }

    this.initializeHeap();

    let write = this.cursors[0];
    let heapExtractions = 0;
    let elementsRotated = 0;

    let entry = this.heap.extractMin();
    while (entry !== undefined) {
      heapExtractions++;

      const sourceId = entry.sourceId;
      const chunkStart = this.cursors[sourceId];
      const chunkEnd = this.gallop(sourceId, chunkStart + 1);
      const chunkLength = chunkEnd - chunkStart;

      if (chunkStart > write) {
        rotate(this.seq, write, chunkStart, chunkEnd);
        elementsRotated += chunkEnd - write;
        this.shiftSourcesBefore(sourceId, chunkLength);
      }

      this.cursors[sourceId] = chunkEnd;
      write += chunkLength;

      if (chunkEnd < this.ends[sourceId]) {
        this.heap.insert({ value: this.seq[chunkEnd], sourceId });
      }

      entry = this.heap.extractMin();
    }

    return { heapExtractions, elementsRotated };
  }

  private initializeHeap(): void {
    for (let sourceId = 0; sourceId < this.cursors.length; sourceId++) {
      const cursor = this.cursors[sourceId];
      if (cursor < this.ends[sourceId]) {
        this.heap.insert({ value: this.seq[cursor], sourceId });
      }
    }
  }

  /**
   * End of the chunk of `sourceId` that can be emitted before the next heap minimum.
   */
  private gallop(sourceId: number, from: number): number {
    const next = this.heap.peek();
    const end = this.ends[sourceId];
    let position = from;

    while (position < end && (next === undefined || this.precedes(this.seq[position], sourceId, next))) {
      position++;
    }

    return position;
  }

  private precedes(value: T, sourceId: number, other: HeapEntry<T>): boolean {
    return compareHeapEntries({ value, sourceId }, other) < 0;
  }

  private shiftSourcesBefore(sourceId: number, offset: number): void {
    for (let i = 0; i < sourceId; i++) {
      if (this.cursors[i] < this.ends[i]) {
        this.cursors[i] += offset;
        this.ends[i] += offset;
      }
    }
  }
}
