import { Command } from 'commander';
import { DEFAULT_DATASET, loadEnvFile, parsePlatformList, resolveDatasetConfig } from './config';
import type { RunOptions } from './services/benchmark-orchestrator';
import type { StepResult } from './types';

export type CliOptions = {
  setting: string;
  env: string;
  platform?: string;
  excludePlatform?: string;
  scenarioStart?: string;
  scenarioEnd?: string;
  reportsDir: string;
};

export function createProgram(): Command {
  return new Command()
    .name('retail-bench')
    .description('Run shopping scenarios against AI platforms and score every step.')
    .option('--setting <name>', 'Dataset setting name (maps to predefined input locations)', DEFAULT_DATASET)
    .option('--env <path>', 'Path to the env file with platform credentials', '.env')
    .option('--platform <ids>', 'Platform id(s) to run, comma-separated (e.g. GEMINI,CLAUDE)')
    .option('--exclude-platform <ids>', 'Platform id(s) to skip, comma-separated')
    .option('--scenario-start <id>', 'First scenario_id to run (inclusive)')
    .option('--scenario-end <id>', 'Last scenario_id to run (inclusive)')
    .option('--reports-dir <dir>', 'Directory for the XLSX report', 'reports');
}

export function buildRunOptions(cli: CliOptions): RunOptions {
  const dataset = resolveDatasetConfig(cli.setting);
  return {
    testsPath: dataset.testsPath,
    env: loadEnvFile(cli.env),
    includePlatforms: parsePlatformList(cli.platform),
    excludePlatforms: parsePlatformList(cli.excludePlatform),
    scenarioStart: cli.scenarioStart,
    scenarioEnd: cli.scenarioEnd,
    groundTruthPath: dataset.groundTruthPath,
    scoringPromptPath: dataset.scoringPromptPath,
    reportsDir: cli.reportsDir,
  };
}

export interface PlatformTally {
  platformId: string;
  succeeded: number;
  failed: number;
}

export function summarizeResults(results: StepResult[]): PlatformTally[] {
  const tallies = new Map<string, PlatformTally>();
  for (const result of results) {
    const tally = tallies.get(result.platformId) ?? { platformId: result.platformId, succeeded: 0, failed: 0 };
    tally[result.outcome] += 1;
    tallies.set(result.platformId, tally);
  }
  return [...tallies.values()].sort((a, b) => a.platformId.localeCompare(b.platformId));
}
