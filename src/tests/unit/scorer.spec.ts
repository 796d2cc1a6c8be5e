import { describe, expect, it } from 'vitest';

import { ModelClientRegistry } from '../../services/model-client-registry';
import {
  emptyScores,
  fillTemplate,
  joinComment,
  normalizeScoreValue,
  parseScoringResponse,
  ScorerService,
} from '../../services/scorer';
import { makeStep, ScriptedModelClient, testConfig, textResponse } from '../helpers';

describe('fillTemplate', () => {
  it('substitutes names and unescapes doubled braces', () => {
    expect(fillTemplate('Type {step_type} {{"a": 1}}', { step_type: 'search' })).toBe('Type search {"a": 1}');
  });

  it('rejects unknown placeholders', () => {
    expect(() => fillTemplate('{missing}', {})).toThrow("Unknown placeholder '{missing}' in scoring prompt");
  });
});

describe('parseScoringResponse', () => {
  it('parses a bare JSON object', () => {
    expect(parseScoringResponse('{"efficiency_score": 3}')).toEqual({ efficiency_score: 3 });
  });

  it('falls back to the outermost braces inside prose', () => {
    expect(parseScoringResponse('Here is the result: {"efficiency_score": 4} Thanks')).toEqual({
      efficiency_score: 4,
    });
  });

  it('returns an empty object for anything unparseable', () => {
    expect(parseScoringResponse('{"a": 1')).toEqual({});
    expect(parseScoringResponse('no json here')).toEqual({});
    expect(parseScoringResponse('} backwards {')).toEqual({});
    expect(parseScoringResponse('[1, 2]')).toEqual({});
  });
});

describe('normalizeScoreValue', () => {
  it('renders judge values as cell text', () => {
    expect(normalizeScoreValue(null)).toBe('');
    expect(normalizeScoreValue(undefined)).toBe('');
    expect(normalizeScoreValue(4.5)).toBe('4.5');
    expect(normalizeScoreValue(false)).toBe('false');
    expect(normalizeScoreValue(['slow', 'vague'])).toBe('slow, vague');
    expect(normalizeScoreValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe('joinComment', () => {
  it('joins non-empty parts with a pipe', () => {
    expect(joinComment('', 'b')).toBe('b');
    expect(joinComment('a', '')).toBe('a');
    expect(joinComment('a', 'b')).toBe('a | b');
  });
});

describe('ScorerService', () => {
  const template = 'GT={ground_truth};R={model_response};T={step_type};U={user_prompt}';
  const groundTruth = new Map([['SKU1', 'red, 10ml']]);
  const step = makeStep({ step_type: 'search', user_prompt: 'find lipstick', sku_id: 'SKU1' });

  function scorerWith(client: ScriptedModelClient, overrides: { template?: string; platformId?: string } = {}) {
    const registry = new ModelClientRegistry().register('JUDGE', client);
    return new ScorerService(registry, {
      platformId: 'platformId' in overrides ? overrides.platformId : 'JUDGE',
      config: testConfig,
      template: overrides.template ?? template,
      groundTruth,
    });
  }

  it('fills the prompt and maps judge fields onto score columns', async () => {
    const judge = new ScriptedModelClient(() =>
      textResponse(
        'Sure: {"efficiency_score": 4, "failure_modes": ["slow", "vague"], "step_outcome": null, "comments": "ok"}'
      )
    );

    const outcome = await scorerWith(judge).scoreStep(step, 'hello');

    expect(judge.prompts).toEqual(['GT=red, 10ml;R=hello;T=search;U=find lipstick']);
    expect(outcome.comment).toBe('ok');
    expect(outcome.scores).toEqual({
      ...emptyScores(),
      efficiency_score: '4',
      failure_modes: 'slow, vague',
    });
  });

  it('uses an empty ground truth for unknown SKUs', async () => {
    const judge = new ScriptedModelClient(() => textResponse('{}'));

    await scorerWith(judge).scoreStep(makeStep({ sku_id: 'NOPE', step_type: 's', user_prompt: 'u' }), 'r');

    expect(judge.prompts).toEqual(['GT=;R=r;T=s;U=u']);
  });

  it('is a no-op without a judge platform', async () => {
    const judge = new ScriptedModelClient(() => textResponse('{}'));
    const scorer = scorerWith(judge, { platformId: undefined });

    expect(scorer.enabled).toBe(false);
    await expect(scorer.scoreStep(step, 'hello')).resolves.toEqual({ comment: '' });
    expect(judge.prompts).toEqual([]);
  });

  it('blanks scores when the prompt template is missing', async () => {
    const judge = new ScriptedModelClient(() => textResponse('{}'));

    const outcome = await scorerWith(judge, { template: '' }).scoreStep(step, 'hello');

    expect(outcome).toEqual({ scores: emptyScores(), comment: 'Scoring prompt missing.' });
    expect(judge.prompts).toEqual([]);
  });

  it('blanks scores for an empty model response', async () => {
    const judge = new ScriptedModelClient(() => textResponse('{}'));

    const outcome = await scorerWith(judge).scoreStep(step, '');

    expect(outcome).toEqual({ scores: emptyScores(), comment: '' });
    expect(judge.prompts).toEqual([]);
  });

  it('turns judge failures into a comment', async () => {
    const judge = new ScriptedModelClient(() => {
      throw new Error('judge down');
    });

    const outcome = await scorerWith(judge).scoreStep(step, 'hello');

    expect(outcome).toEqual({ scores: emptyScores(), comment: 'Scoring error: Error: judge down' });
  });

  it('blanks every field when the judge reply has no JSON', async () => {
    const judge = new ScriptedModelClient(() => textResponse('I cannot score this.'));

    const outcome = await scorerWith(judge).scoreStep(step, 'hello');

    expect(outcome).toEqual({ scores: emptyScores(), comment: '' });
  });
});
