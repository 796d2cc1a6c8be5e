// Core domain types for the benchmark runner

export type TableRow = Record<string, string>;

export interface TestStep {
  scenarioId: string;
  platformId: string;
  stepId: string;
  stepIndex: string;
  stepType: string;
  userPrompt: string;
  skuId: string;
  runId: string;
  /** Untouched input row, carried through to the report. */
  row: Readonly<TableRow>;
}

/** scenario id → platform id → steps ordered by step index */
export type ScenarioGroup = Map<string, Map<string, TestStep[]>>;

export interface ScenarioWork {
  scenarioId: string;
  steps: TestStep[];
}

/** platform id → scenarios in sorted order */
export type PlatformSequences = Map<string, ScenarioWork[]>;

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export const SCORING_FIELDS = [
  'identity_accuracy_score',
  'attribute_completeness_score',
  'attribute_correctness_score',
  'regulatory_correctness_score',
  'transactional_reliability_score',
  'step_outcome',
  'failure_modes',
  'instant_checkout_feasibility_score',
  'checkout_failure_modes',
  'efficiency_score',
  'query_to_product_match_score',
  'agent_failure_modes',
] as const;

export type ScoringField = (typeof SCORING_FIELDS)[number];

export type ScoreValues = Record<ScoringField, string>;

export const OUTPUT_FIELDS = [
  'model_response',
  'full_model_response',
  'text_model_response',
  'comments',
  ...SCORING_FIELDS,
] as const;

export interface ScoreOutcome {
  /** Absent when scoring did not run for this step. */
  scores?: ScoreValues;
  comment: string;
}

export interface StepResult {
  scenarioId: string;
  platformId: string;
  stepId: string;
  stepIndex: string;
  stepType: string;
  runId: string;
  userPrompt: string;
  modelResponse: string;
  fullModelResponse: string;
  textModelResponse: string;
  comments: string;
  scores?: ScoreValues;
  outcome: 'succeeded' | 'failed';
}

export interface PlatformConfig {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  timeoutMs: number;
}

export interface ModelResponse {
  /** Raw payload as returned by the platform (JSON text for every built-in client). */
  raw: string;
  /** Best-effort plain text pulled out of the payload. */
  text: string;
}

export type GroundTruthTable = ReadonlyMap<string, string>;

export interface ReportTable {
  columns: string[];
  rows: TableRow[];
}
