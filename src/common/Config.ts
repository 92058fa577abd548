import { InvalidConfigError } from './Errors';

export interface SortConfig {
  /** Byte budget of one cache line. */
  cacheLineBytes: number;
  /** Assumed size of one element in bytes. */
  elementSize: number;
  /** Floor for the block length. */
  minBlockSize: number;
}

export const DEFAULT_SORT_CONFIG: Readonly<SortConfig> = {
  cacheLineBytes: 64,
  elementSize: 8,
  minBlockSize: 16,
};

function requirePositiveInteger(field: keyof SortConfig, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidConfigError(field, `must be a positive integer, got ${value}`);
  }
}

export function resolveSortConfig(config?: Partial<SortConfig>): SortConfig {
  const resolved = { ...DEFAULT_SORT_CONFIG, ...config };

  requirePositiveInteger('cacheLineBytes', resolved.cacheLineBytes);
  requirePositiveInteger('elementSize', resolved.elementSize);
  requirePositiveInteger('minBlockSize', resolved.minBlockSize);

  if (resolved.elementSize > resolved.cacheLineBytes) {
    throw new InvalidConfigError(
      'elementSize',
      `must not exceed cacheLineBytes (${resolved.elementSize} > ${resolved.cacheLineBytes})`
    );
  }

  return resolved;
}
