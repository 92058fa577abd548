import { MutableSequence, Orderable } from '../common/Types';
import { InputType } from './BenchmarkTypes';

export type RandomSource = () => number;

/**
 * Seeded generator (mulberry32) returning floats in [0, 1).
 */
export function createRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function generateInput(n: number, type: InputType, random: RandomSource): number[] {
  switch (type) {
    case InputType.RANDOM:
      return Array.from({ length: n }, () => randomInt(random, 0, n));

    case InputType.NEARLY_SORTED: {
      const values = Array.from({ length: n }, () => randomInt(random, 0, n)).sort((a, b) => a - b);
      const swaps = Math.floor(n / 10);
      for (let s = 0; s < swaps; s++) {
        const i = randomInt(random, 0, n - 1);
        const j = randomInt(random, 0, n - 1);
        const temp = values[i];
        values[i] = values[j];
        values[j] = temp;
      }
      return values;
    }

    case InputType.REVERSE_SORTED:
      return Array.from({ length: n }, (_, i) => n - i);

    case InputType.DUPLICATES:
      return Array.from({ length: n }, () => randomInt(random, 0, 100));

    default:
      throw new Error(`Unknown input type: ${String(type)}`);
  }
}

export function isSorted<T extends Orderable>(seq: MutableSequence<T>): boolean {
  for (let i = 0; i + 1 < seq.length; i++) {
    if (seq[i] > seq[i + 1]) {
      return false;
    }
  }
  return true;
}
