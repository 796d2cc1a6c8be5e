import { describeError, PreconditionError } from '../errors';
import {
  GroundTruthTable,
  PlatformConfig,
  ScoreOutcome,
  ScoreValues,
  SCORING_FIELDS,
  TestStep,
} from '../types';
import { fields, Logger, silentLogger } from '../utils/logger';
import { ModelClientRegistry } from './model-client-registry';

/**
 * Fill `{name}` placeholders; `{{` and `}}` stand for literal braces.
 * Unknown placeholders are an error.
 */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (match: string, name: string | undefined) => {
    if (match === '{{') return '{';
    if (match === '}}') return '}';
    if (name === undefined || !Object.prototype.hasOwnProperty.call(vars, name)) {
      throw new Error(`Unknown placeholder '${match}' in scoring prompt`);
    }
    return vars[name];
  });
}

export function buildScoringPrompt(
  template: string,
  step: TestStep,
  modelResponse: string,
  groundTruth: GroundTruthTable
): string {
  return fillTemplate(template, {
    step_type: step.stepType,
    user_prompt: step.userPrompt,
    model_response: modelResponse,
    ground_truth: groundTruth.get(step.skuId) ?? '',
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

/**
 * Parse the judge's reply as a JSON object, falling back to the span between
 * the first `{` and the last `}`. Anything unparseable is an empty object.
 */
export function parseScoringResponse(text: string): Record<string, unknown> {
  const direct = tryParseObject(text);
  if (direct) return direct;

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) return {};
  return tryParseObject(text.slice(start, end + 1)) ?? {};
}

export function normalizeScoreValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return value.map(normalizeScoreValue).join(', ');
  return JSON.stringify(value);
}

export function emptyScores(): ScoreValues {
  return {
    identity_accuracy_score: '',
    attribute_completeness_score: '',
    attribute_correctness_score: '',
    regulatory_correctness_score: '',
    transactional_reliability_score: '',
    step_outcome: '',
    failure_modes: '',
    instant_checkout_feasibility_score: '',
    checkout_failure_modes: '',
    efficiency_score: '',
    query_to_product_match_score: '',
    agent_failure_modes: '',
  };
}

export function joinComment(comment: string, extra: string): string {
  if (!comment) return extra;
  if (!extra) return comment;
  return `${comment} | ${extra}`;
}

export interface ScorerOptions {
  /** Judge platform id; scoring is off without one. */
  platformId?: string;
  config: PlatformConfig | null;
  template: string;
  groundTruth: GroundTruthTable;
  logger?: Logger;
}

export class ScorerService {
  private logger: Logger;

  constructor(
    private registry: ModelClientRegistry,
    private options: ScorerOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get enabled(): boolean {
    return Boolean(this.options.platformId && this.options.config);
  }

  /**
   * Score a completed step. Never throws: failures come back as empty scores
   * with an explanatory comment.
   */
  async scoreStep(step: TestStep, modelResponse: string): Promise<ScoreOutcome> {
    const { platformId, config, template, groundTruth } = this.options;
    if (!platformId || !config) {
      return { comment: '' };
    }
    if (!template) {
      return { scores: emptyScores(), comment: 'Scoring prompt missing.' };
    }
    if (!modelResponse) {
      return { scores: emptyScores(), comment: '' };
    }

    try {
      const client = this.registry.get(platformId);
      if (!client) {
        throw new PreconditionError(`Unknown scoring platform_id=${platformId}`);
      }
      const prompt = buildScoringPrompt(template, step, modelResponse, groundTruth);
      const response = await client.send(prompt, config);
      const parsed = parseScoringResponse(response.text);

      const scores = emptyScores();
      for (const field of SCORING_FIELDS) {
        scores[field] = normalizeScoreValue(parsed[field]);
      }
      return { scores, comment: normalizeScoreValue(parsed.comments) };
    } catch (err) {
      this.logger.error(
        `Unexpected error while scoring step ${fields({
          scenario_id: step.scenarioId,
          platform_id: step.platformId,
          step_id: step.stepId,
          step_index: step.stepIndex,
        })}: ${describeError(err)}`
      );
      return { scores: emptyScores(), comment: `Scoring error: ${describeError(err)}` };
    }
  }
}
