/**
 * Common type definitions for the sort pipeline.
 * These types are shared by every stage and by the benchmark harness.
 */

/** Values the pipeline can order with the built-in relational operators. */
export type Orderable = number | string | bigint;

/**
 * Any writable random-access collection: plain arrays and typed arrays both fit.
 */
export interface MutableSequence<T> {
  readonly length: number;
  [index: number]: T;
}

export type Comparator<T> = (a: T, b: T) => number;

/**
 * Contiguous, non-owning view over a span of the sequence.
 */
export interface Block {
  readonly start: number;
  readonly length: number;
}

export function blockEnd(block: Block): number {
  return block.start + block.length;
}
