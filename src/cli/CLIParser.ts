import { resolveSortConfig } from '../common/Config';
import {
  BenchmarkConfig,
  DEFAULT_BENCHMARK_CONFIG,
  InputType,
  ALL_INPUT_TYPES,
  resolveBenchmarkConfig,
} from '../bench/BenchmarkTypes';

export interface CLIOptions {
  readonly config: BenchmarkConfig;
  readonly help: boolean;
}

export class CLIParser {
  private readonly args: string[];

  constructor(args: string[] = process.argv.slice(2)) {
    this.args = args;
  }

  public parse(): CLIOptions {
    if (this.hasFlag('--help') || this.hasFlag('-h')) {
      return { config: DEFAULT_BENCHMARK_CONFIG, help: true };
    }

    const defaults = DEFAULT_BENCHMARK_CONFIG.sortConfig;
    const sortConfig = resolveSortConfig({
      cacheLineBytes: this.getNumber('--cache-line-bytes') ?? defaults.cacheLineBytes,
      elementSize: this.getNumber('--element-size') ?? defaults.elementSize,
      minBlockSize: this.getNumber('--min-block-size') ?? defaults.minBlockSize,
    });

    const config = resolveBenchmarkConfig({
      sizes: this.getNumberList('--sizes') ?? DEFAULT_BENCHMARK_CONFIG.sizes,
      inputTypes: this.parseInputTypes() ?? DEFAULT_BENCHMARK_CONFIG.inputTypes,
      runs: this.getNumber('--runs') ?? DEFAULT_BENCHMARK_CONFIG.runs,
      seed: this.getNumber('--seed') ?? DEFAULT_BENCHMARK_CONFIG.seed,
      outputPath: this.getString('--out') ?? DEFAULT_BENCHMARK_CONFIG.outputPath,
      sortConfig,
    });

    return { config, help: false };
  }

  private parseInputTypes(): InputType[] | undefined {
    const value = this.getString('--types');
    if (!value) return undefined;

    return value.split(',').map(item => this.parseInputType(item.trim()));
  }

  private parseInputType(value: string): InputType {
    const normalized = value.toLowerCase().replace(/-/g, '_');
    const match = ALL_INPUT_TYPES.find(type => type === normalized);
    if (!match) {
      throw new Error(`Invalid input type: ${value}. Must be one of ${ALL_INPUT_TYPES.join(', ')}`);
    }
    return match;
  }

  private getString(flag: string): string | undefined {
    const prefix = `${flag}=`;
    const inline = this.args.find(arg => arg.startsWith(prefix));
    if (inline !== undefined) {
      return inline.slice(prefix.length);
    }

    const flagIndex = this.args.indexOf(flag);
    if (flagIndex !== -1 && flagIndex + 1 < this.args.length) {
      return this.args[flagIndex + 1];
    }

    return undefined;
  }

  private getNumber(flag: string): number | undefined {
    const str = this.getString(flag);
    if (!str) return undefined;

    return this.toNumber(flag, str);
  }

  private getNumberList(flag: string): number[] | undefined {
    const str = this.getString(flag);
    if (!str) return undefined;

    return str.split(',').map(item => this.toNumber(flag, item.trim()));
  }

  private toNumber(flag: string, str: string): number {
    const num = parseInt(str.replace(/_/g, ''), 10);
    if (isNaN(num)) {
      throw new Error(`Invalid number for ${flag}: ${str}`);
    }
    return num;
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  public static printHelp(): void {
    console.log(`
Adaptive Block Sort Benchmark

Usage: node dist/cli.js [options]

Options:
  --help, -h                Show this help message

Benchmark Options:
  --sizes=N[,N...]          Input sizes (default: 1000,10000)
  --types=TYPE[,TYPE...]    Input types: random, nearly_sorted, reverse_sorted, duplicates
                            (default: all)
  --runs=N                  Timed runs per algorithm (default: 5)
  --seed=N                  Seed for input generation (default: 42)
  --out=PATH                CSV output path (default: ./sorting_benchmark_results.csv)

Sort Tuning:
  --cache-line-bytes=N      Cache line size in bytes (default: 64)
  --element-size=N          Element size in bytes (default: 8)
  --min-block-size=N        Minimum block length (default: 16)

Examples:
  # Default run
  node dist/cli.js

  # Larger nearly-sorted inputs only
  node dist/cli.js --sizes=100000 --types=nearly_sorted --runs=3
`);
  }
}
