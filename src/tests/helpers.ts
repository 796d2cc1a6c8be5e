import type { ModelClient } from '../services/model-client';
import { toTestStep } from '../services/input-loader';
import type { TabularStore, WriteOptions } from '../services/tabular-store';
import type { ModelResponse, PlatformConfig, TableRow, TestStep } from '../types';

export interface RecordedWrite {
  path: string;
  columns: string[];
  rows: TableRow[];
  timestamp?: Date;
}

/** Tabular store backed by a map of path → rows; every write is kept. */
export class MemoryTabularStore implements TabularStore {
  readonly writes: RecordedWrite[] = [];
  private files: Map<string, TableRow[]>;

  constructor(files: Record<string, TableRow[]> = {}) {
    this.files = new Map(Object.entries(files));
  }

  async load(filePath: string): Promise<TableRow[]> {
    const rows = this.files.get(filePath);
    if (!rows) {
      throw new Error(`ENOENT: no such file '${filePath}'`);
    }
    return rows.map((row) => ({ ...row }));
  }

  async write(filePath: string, columns: string[], rows: TableRow[], options: WriteOptions = {}): Promise<void> {
    this.writes.push({
      path: filePath,
      columns: [...columns],
      rows: rows.map((row) => ({ ...row })),
      timestamp: options.timestamp,
    });
  }

  lastWrite(): RecordedWrite | undefined {
    return this.writes[this.writes.length - 1];
  }
}

export type ScriptedHandler = (prompt: string, call: number) => ModelResponse | Promise<ModelResponse>;

/** Model client that answers from a callback and remembers every prompt. */
export class ScriptedModelClient implements ModelClient {
  readonly prompts: string[] = [];
  readonly configs: PlatformConfig[] = [];

  constructor(private handler: ScriptedHandler) {}

  async send(prompt: string, config: PlatformConfig): Promise<ModelResponse> {
    this.prompts.push(prompt);
    this.configs.push(config);
    return this.handler(prompt, this.prompts.length);
  }
}

export function textResponse(text: string): ModelResponse {
  return { raw: JSON.stringify({ text }), text };
}

export function makeRow(overrides: TableRow = {}): TableRow {
  return {
    run_id: 'R1',
    scenario_id: 'S1',
    platform_id: 'CHATGPT',
    step_id: 'st1',
    step_index: '1',
    step_type: 'search',
    user_prompt: 'find a red lipstick',
    sku_id: 'SKU1',
    ...overrides,
  };
}

export function makeStep(overrides: TableRow = {}): TestStep {
  return toTestStep(makeRow(overrides));
}

export const testConfig: PlatformConfig = {
  apiKey: 'test-key',
  model: 'test-model',
  timeoutMs: 1000,
};

export function recordingSleep(): { sleeps: number[]; sleepFn: (ms: number) => Promise<void> } {
  const sleeps: number[] = [];
  return {
    sleeps,
    sleepFn: async (ms: number) => {
      sleeps.push(ms);
    },
  };
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
