import { MutableSequence } from '../../common/Types';

export function reverseRange<T>(seq: MutableSequence<T>, start: number, end: number): void {
  for (let i = start, j = end - 1; i < j; i++, j--) {
    const temp = seq[i];
    seq[i] = seq[j];
    seq[j] = temp;
  }
}

/**
 * Swap the adjacent spans [start, middle) and [middle, end) in place.
 */
export function rotate<T>(seq: MutableSequence<T>, start: number, middle: number, end: number): void {
  if (start >= middle || middle >= end) {
    return;
  }
  reverseRange(seq, start, middle);
  reverseRange(seq, middle, end);
  reverseRange(seq, start, end);
}
