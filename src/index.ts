#!/usr/bin/env node
import { buildRunOptions, createProgram, summarizeResults } from './cli';
import type { CliOptions } from './cli';
import { describeError } from './errors';
import { BenchmarkOrchestratorService } from './services/benchmark-orchestrator';
import { createDefaultRegistry } from './services/model-client-registry';
import { XlsxTabularStore } from './services/tabular-store';
import { banner, consoleLogger, separator } from './utils/logger';

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  program.parse(argv);
  const runOptions = buildRunOptions(program.opts<CliOptions>());

  banner();
  const orchestrator = new BenchmarkOrchestratorService({
    store: new XlsxTabularStore(),
    registry: createDefaultRegistry(),
    logger: consoleLogger,
  });
  const { reportPath, results } = await orchestrator.run(runOptions);

  separator();
  for (const tally of summarizeResults(results)) {
    consoleLogger.info(`${tally.platformId}: ${tally.succeeded} succeeded, ${tally.failed} failed`);
  }
  consoleLogger.success(`Report: ${reportPath}`);
}

if (require.main === module) {
  main().catch((err) => {
    consoleLogger.error(`Fatal error: ${describeError(err)}`);
    process.exit(1);
  });
}
