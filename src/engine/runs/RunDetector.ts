import { Block, MutableSequence, Orderable, blockEnd } from '../../common/Types';

/**
 * Marker `i` is true when the last element of block i is <= the first
 * element of block i + 1. Expects every block to be sorted already.
 */
export function detectOrderedBoundaries<T extends Orderable>(
  seq: MutableSequence<T>,
  blocks: readonly Block[]
): boolean[] {
  const markers: boolean[] = [];

  for (let i = 0; i + 1 < blocks.length; i++) {
    markers.push(seq[blockEnd(blocks[i]) - 1] <= seq[blocks[i + 1].start]);
  }

  return markers;
}

/**
 * Number of leading blocks joined by ordered boundaries (at least 1).
 */
export function orderedPrefixLength(markers: readonly boolean[]): number {
  let length = 1;
  while (length - 1 < markers.length && markers[length - 1]) {
    length++;
  }
  return length;
}

/**
 * Fold every maximal run of ordered boundaries into a single span. The
 * resulting spans are the merge sources; each one is sorted.
 */
export function coalesceRuns(blocks: readonly Block[], markers: readonly boolean[]): Block[] {
  if (blocks.length === 0) {
    return [];
  }

  const sources: Block[] = [];
  let runStart = blocks[0].start;

  for (let i = 0; i < blocks.length; i++) {
    if (i < markers.length && markers[i]) {
      continue;
    }
    sources.push({ start: runStart, length: blockEnd(blocks[i]) - runStart });
    if (i + 1 < blocks.length) {
      runStart = blocks[i + 1].start;
    }
  }

  return sources;
}
