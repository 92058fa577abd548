import * as fs from 'fs/promises';
import * as path from 'path';
import { BenchmarkResult } from './BenchmarkTypes';

const TABLE_HEADERS = ['Size', 'Input Type', 'Algorithm', 'Avg Time (ms)', 'Avg Memory (MB)', 'Correct'];
const CSV_HEADERS = ['size', 'input_type', 'algorithm', 'avg_time_ms', 'avg_memory_mb', 'correct'];

/**
 * Right-aligned plain-text table, columns separated by two spaces.
 */
export function formatTable(results: readonly BenchmarkResult[]): string {
  const rows = results.map(result => [
    String(result.size),
    result.inputType,
    result.algorithm,
    result.avgTimeMs.toFixed(3),
    result.avgMemoryMb.toFixed(2),
    result.correct ? 'Yes' : 'No',
  ]);

  const widths = TABLE_HEADERS.map((header, column) =>
    Math.max(header.length, ...rows.map(row => row[column].length))
  );

  return [TABLE_HEADERS, ...rows]
    .map(cells => cells.map((cell, column) => cell.padStart(widths[column])).join('  '))
    .join('\n');
}

export function toCsv(results: readonly BenchmarkResult[]): string {
  const lines = results.map(result => [
    result.size,
    result.inputType,
    result.algorithm,
    result.avgTimeMs.toFixed(4),
    result.avgMemoryMb.toFixed(4),
    result.correct ? 'yes' : 'no',
  ].join(','));

  return [CSV_HEADERS.join(','), ...lines].join('\n') + '\n';
}

export async function writeCsv(filePath: string, results: readonly BenchmarkResult[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, toCsv(results), 'utf8');
}
