import { Block, MutableSequence, Orderable, blockEnd } from '../../common/Types';

/**
 * Insertion sort over [start, end). Never reads or writes outside the range.
 *
 * @returns Number of element shifts performed
 */
export function insertionSortRange<T extends Orderable>(
  seq: MutableSequence<T>,
  start: number,
  end: number
): number {
  let shifts = 0;

  for (let i = start + 1; i < end; i++) {
    const key = seq[i];
    let j = i - 1;

    while (j >= start && seq[j] > key) {
      seq[j + 1] = seq[j];
      j--;
      shifts++;
    }

    if (j + 1 !== i) {
      seq[j + 1] = key;
    }
  }

  return shifts;
}

export function sortBlocks<T extends Orderable>(
  seq: MutableSequence<T>,
  blocks: readonly Block[]
): number {
  let shifts = 0;
  for (const block of blocks) {
    shifts += insertionSortRange(seq, block.start, blockEnd(block));
  }
  return shifts;
}
