#!/usr/bin/env node
import { CLIParser } from './cli/CLIParser';
import { BenchmarkRunner } from './bench/BenchmarkRunner';
import { formatTable, writeCsv } from './bench/Report';

async function main(): Promise<void> {
  const parser = new CLIParser();
  const options = parser.parse();

  if (options.help) {
    CLIParser.printHelp();
    return;
  }

  const { config } = options;
  console.log(`Benchmarking sizes=[${config.sizes.join(', ')}], runs=${config.runs}, seed=${config.seed}`);

  const runner = new BenchmarkRunner(config);
  const results = runner.run();

  console.log('\nBenchmark Results Summary:');
  console.log(formatTable(results));

  await writeCsv(config.outputPath, results);
  console.log(`\nResults saved to ${config.outputPath}`);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
