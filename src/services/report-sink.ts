import path from 'path';
import { Mutex } from 'async-mutex';
import { OUTPUT_FIELDS, ReportTable, StepResult, TableRow } from '../types';
import type { TabularStore } from './tabular-store';

type IdentitySource = Pick<TableRow, 'run_id' | 'scenario_id' | 'platform_id' | 'step_id' | 'step_index' | 'step_type'>;

/** Identity of a row for matching results back to the input sheet. */
export function resultKey(row: Partial<IdentitySource>): string {
  return JSON.stringify([
    row.run_id ?? '',
    row.scenario_id ?? '',
    row.platform_id ?? '',
    row.step_id ?? '',
    row.step_index ?? '',
    row.step_type ?? '',
  ]);
}

export function formatScenario(row: Partial<IdentitySource>): string {
  return [row.run_id, row.scenario_id, row.platform_id, row.step_id, row.step_index, row.step_type]
    .map((part) => part ?? '')
    .join('|');
}

/** Flatten a result into report columns. Score columns only exist once scoring ran. */
export function toReportRecord(result: StepResult): TableRow {
  return {
    scenario_id: result.scenarioId,
    platform_id: result.platformId,
    step_id: result.stepId,
    step_index: result.stepIndex,
    user_prompt: result.userPrompt,
    model_response: result.modelResponse,
    full_model_response: result.fullModelResponse,
    text_model_response: result.textModelResponse,
    comments: result.comments,
    run_id: result.runId,
    step_type: result.stepType,
    ...(result.scores ?? {}),
  };
}

function appendMissingFields(fieldnames: string[], records: TableRow[]): void {
  for (const field of OUTPUT_FIELDS) {
    if (fieldnames.includes(field)) continue;
    if (records.some((record) => field in record)) {
      fieldnames.push(field);
    }
  }
}

export function extractFieldnames(inputRows: TableRow[], records: TableRow[]): string[] {
  if (inputRows.length > 0) {
    const fieldnames = Object.keys(inputRows[0]);
    appendMissingFields(fieldnames, records);
    return fieldnames;
  }
  if (records.length > 0) {
    const fieldnames = ['scenario', 'user_prompt', ...OUTPUT_FIELDS];
    appendMissingFields(fieldnames, records);
    return fieldnames;
  }
  return [];
}

/**
 * Merge results into the input rows. When two results share an identity key
 * the later one wins; input rows without a result keep blank output fields.
 */
export function buildReportTable(results: StepResult[], inputRows: TableRow[]): ReportTable {
  const records = results.map(toReportRecord);
  const columns = extractFieldnames(inputRows, records);

  if (inputRows.length === 0) {
    const rows = records.map((record) => {
      const row: TableRow = { scenario: formatScenario(record), user_prompt: record.user_prompt ?? '' };
      for (const field of OUTPUT_FIELDS) {
        row[field] = record[field] ?? '';
      }
      return row;
    });
    return { columns, rows };
  }

  const recordsByKey = new Map<string, TableRow>();
  for (const record of records) {
    recordsByKey.set(resultKey(record), record);
  }

  const rows = inputRows.map((inputRow) => {
    const row: TableRow = { ...inputRow };
    const record = recordsByKey.get(resultKey(inputRow));
    if (record) {
      for (const field of OUTPUT_FIELDS) {
        if (field in row || field in record) {
          row[field] = record[field] ?? '';
        }
      }
    }
    return row;
  });
  return { columns, rows };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function buildReportPath(reportsDir = 'reports', now: Date = new Date()): string {
  const timestamp =
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `_${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return path.join(reportsDir, `test_report_${timestamp}.xlsx`);
}

/**
 * Owns the shared result list. Each append rewrites the whole report inside
 * the same critical section, so the file on disk always covers every
 * recorded step. Every write carries the run's timestamp, so the same
 * results always produce the same file.
 */
export class ReportSink {
  private results: StepResult[] = [];
  private mutex = new Mutex();

  constructor(
    private store: TabularStore,
    readonly reportPath: string,
    private inputRows: TableRow[],
    readonly timestamp: Date = new Date()
  ) {}

  async initialize(): Promise<void> {
    await this.mutex.runExclusive(() => this.flush());
  }

  async record(result: StepResult): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.results.push(result);
      await this.flush();
    });
  }

  getResults(): StepResult[] {
    return [...this.results];
  }

  private async flush(): Promise<void> {
    const { columns, rows } = buildReportTable(this.results, this.inputRows);
    await this.store.write(this.reportPath, columns, rows, { timestamp: this.timestamp });
  }
}
