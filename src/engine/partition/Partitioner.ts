import { Block } from '../../common/Types';
import { SortConfig } from '../../common/Config';

/**
 * Block length for a sequence of `n` elements.
 *
 * Aims for floor(sqrt(n) / 2) elements, rounded up to a whole number of
 * cache lines (cacheLineBytes / elementSize elements each), and never below
 * `minBlockSize`.
 */
export function computeBlockLength(n: number, config: SortConfig): number {
  const elementsPerLine = Math.max(1, Math.floor(config.cacheLineBytes / config.elementSize));
  const target = Math.floor(Math.sqrt(n) / 2);
  const aligned = Math.ceil(target / elementsPerLine) * elementsPerLine;
  return Math.max(config.minBlockSize, aligned);
}

/**
 * Split [0, n) into consecutive blocks of `blockLength`; the last block
 * holds the remainder.
 */
export function partition(n: number, blockLength: number): Block[] {
  const blocks: Block[] = [];

  for (let start = 0; start < n; start += blockLength) {
    blocks.push({ start, length: Math.min(blockLength, n - start) });
  }

  return blocks;
}
