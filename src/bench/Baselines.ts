import { adaptiveBlockSort } from '../engine/pipeline';
import { insertionSortRange } from '../engine/blocksort';
import { SortConfig } from '../common/Config';
import { BenchmarkAlgorithm } from './BenchmarkTypes';

export function builtinSort(values: number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Three-way quicksort returning a new array.
 */
export function quickSort(values: number[]): number[] {
  if (values.length <= 1) {
    return values;
  }

  const pivot = values[Math.floor(values.length / 2)];
  const left = values.filter(v => v < pivot);
  const middle = values.filter(v => v === pivot);
  const right = values.filter(v => v > pivot);

  return [...quickSort(left), ...middle, ...quickSort(right)];
}

export function mergeSort(values: number[]): number[] {
  if (values.length <= 1) {
    return values;
  }

  const mid = Math.floor(values.length / 2);
  return mergeSorted(mergeSort(values.slice(0, mid)), mergeSort(values.slice(mid)));
}

function mergeSorted(left: number[], right: number[]): number[] {
  const result: number[] = [];
  let i = 0;
  let j = 0;

  while (i < left.length && j < right.length) {
    if (left[i] <= right[j]) {
      result.push(left[i++]);
    } else {
      result.push(right[j++]);
    }
  }

  return result.concat(left.slice(i), right.slice(j));
}

export function insertionSort(values: number[]): void {
  insertionSortRange(values, 0, values.length);
}

export function createAlgorithms(sortConfig: SortConfig): BenchmarkAlgorithm[] {
  return [
    { name: 'AdaptiveBlockSort', inPlace: true, sort: values => adaptiveBlockSort(values, sortConfig) },
    { name: 'BuiltinSort', inPlace: false, sort: builtinSort },
    { name: 'QuickSort', inPlace: false, sort: quickSort },
    { name: 'MergeSort', inPlace: false, sort: mergeSort },
    { name: 'InsertionSort', inPlace: true, sort: insertionSort },
  ];
}

/**
 * Run `algorithm` on `values` and return the sorted output. In-place
 * algorithms sort `values` itself.
 */
export function applyAlgorithm(algorithm: BenchmarkAlgorithm, values: number[]): number[] {
  if (algorithm.inPlace) {
    algorithm.sort(values);
    return values;
  }
  return algorithm.sort(values);
}
