import fs from 'fs';
import type { GroundTruthTable, TableRow, TestStep } from '../types';
import type { TabularStore } from './tabular-store';

export function toTestStep(row: TableRow): TestStep {
  return {
    scenarioId: row.scenario_id ?? '',
    platformId: row.platform_id ?? '',
    stepId: row.step_id ?? '',
    stepIndex: row.step_index ?? '',
    stepType: row.step_type ?? '',
    userPrompt: row.user_prompt ?? '',
    skuId: row.sku_id ?? '',
    runId: row.run_id ?? '',
    row: Object.freeze({ ...row }),
  };
}

export async function loadTestSteps(store: TabularStore, filePath: string): Promise<TestStep[]> {
  const rows = await store.load(filePath);
  return rows.map(toTestStep);
}

/**
 * Key ground-truth rows by sku_id; the remaining non-empty cells are joined
 * in column order.
 */
export function buildGroundTruthTable(rows: TableRow[]): Map<string, string> {
  const table = new Map<string, string>();
  for (const row of rows) {
    const skuId = (row.sku_id ?? '').trim();
    if (!skuId) continue;
    const values = Object.entries(row)
      .filter(([key]) => key !== 'sku_id')
      .map(([, value]) => value.trim())
      .filter((value) => value.length > 0);
    table.set(skuId, values.join(', '));
  }
  return table;
}

export async function loadGroundTruth(store: TabularStore, filePath: string): Promise<GroundTruthTable> {
  return buildGroundTruthTable(await store.load(filePath));
}

export async function loadScoringPromptTemplate(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}
