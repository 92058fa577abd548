import {
  BenchmarkAlgorithm,
  BenchmarkConfig,
  BenchmarkResult,
  InputType,
  resolveBenchmarkConfig,
} from './BenchmarkTypes';
import { createRandom, generateInput, isSorted } from './InputGenerator';
import { applyAlgorithm, createAlgorithms } from './Baselines';

const BYTES_PER_MB = 1024 * 1024;

interface TrialMeasurement {
  readonly avgTimeMs: number;
  readonly avgMemoryMb: number;
}

export class BenchmarkRunner {
  private readonly config: BenchmarkConfig;
  private readonly algorithms: BenchmarkAlgorithm[];

  constructor(config?: Partial<BenchmarkConfig>, algorithms?: BenchmarkAlgorithm[]) {
    this.config = resolveBenchmarkConfig(config);
    this.algorithms = algorithms ?? createAlgorithms(this.config.sortConfig);
  }

  public run(): BenchmarkResult[] {
    const random = createRandom(this.config.seed);
    const results: BenchmarkResult[] = [];
    const totalTasks = this.config.sizes.length * this.config.inputTypes.length * this.algorithms.length;
    let completed = 0;

    for (const size of this.config.sizes) {
      for (const inputType of this.config.inputTypes) {
        console.log(`BenchmarkRunner: size=${size}, input=${inputType}`);
        const input = generateInput(size, inputType, random);

        for (const algorithm of this.algorithms) {
          try {
            results.push(this.runAlgorithm(algorithm, input, size, inputType));
          } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.error(`BenchmarkRunner: ${algorithm.name} failed: ${message}`);
          } finally {
            completed++;
          }
        }

        console.log(`BenchmarkRunner: ${completed}/${totalTasks} tasks done`);
      }
    }

    return results;
  }

  private runAlgorithm(
    algorithm: BenchmarkAlgorithm,
    input: readonly number[],
    size: number,
    inputType: InputType
  ): BenchmarkResult {
    const measurement = this.measure(algorithm, input);
    const correct = isSorted(applyAlgorithm(algorithm, [...input]));

    console.log(
      `BenchmarkRunner: ${algorithm.name}: ${measurement.avgTimeMs.toFixed(3)} ms, ` +
      `${measurement.avgMemoryMb.toFixed(2)} MB, correct=${correct}`
    );

    return {
      size,
      inputType,
      algorithm: algorithm.name,
      avgTimeMs: measurement.avgTimeMs,
      avgMemoryMb: measurement.avgMemoryMb,
      correct,
    };
  }

  private measure(algorithm: BenchmarkAlgorithm, input: readonly number[]): TrialMeasurement {
    let totalTimeMs = 0;
    let totalMemoryMb = 0;

    for (let run = 0; run < this.config.runs; run++) {
      const values = [...input];
      const heapBefore = process.memoryUsage().heapUsed;
      const start = performance.now();

      applyAlgorithm(algorithm, values);

      totalTimeMs += performance.now() - start;
      totalMemoryMb += Math.max(0, process.memoryUsage().heapUsed - heapBefore) / BYTES_PER_MB;
    }

    return {
      avgTimeMs: totalTimeMs / this.config.runs,
      avgMemoryMb: totalMemoryMb / this.config.runs,
    };
  }
}
