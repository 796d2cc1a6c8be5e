import { EnvMap, loadPlatformConfig, loadRunnerSettings, RunnerSettings } from '../config';
import { describeError, PreconditionError } from '../errors';
import type { ConversationTurn, PlatformConfig, ScenarioWork, StepResult, TestStep } from '../types';
import { consoleLogger, fields, Logger } from '../utils/logger';
import { sleep, SleepFn } from '../utils/retry';
import { StepStatus, transitionStepStatus } from '../utils/state-machine';
import { loadGroundTruth, loadScoringPromptTemplate, loadTestSteps } from './input-loader';
import { ModelClientRegistry } from './model-client-registry';
import { buildPlatformSequences } from './platform-sequencer';
import { buildReportPath, ReportSink } from './report-sink';
import { filterByPlatform, flattenScenarios, groupByScenario } from './scenario-grouper';
import { joinComment, ScorerService } from './scorer';
import { appendConversationTurn, buildConversationPrompt, StepExecutorService } from './step-executor';
import type { TabularStore } from './tabular-store';

export interface RunOptions {
  testsPath: string;
  env: EnvMap;
  includePlatforms?: ReadonlySet<string>;
  excludePlatforms?: ReadonlySet<string>;
  scenarioStart?: string;
  scenarioEnd?: string;
  groundTruthPath?: string;
  scoringPromptPath?: string;
  /** Overrides SCORING_PLATFORM_ID from the env. */
  scoringPlatformId?: string;
  reportsDir?: string;
}

export interface BenchmarkEvent {
  type: 'platform_start' | 'scenario_start' | 'step_recorded' | 'platform_error' | 'finished';
  platformId?: string;
  scenarioId?: string;
  stepId?: string;
  stepIndex?: string;
  status?: StepStatus;
  outcome?: StepResult['outcome'];
  message?: string;
}

export type BenchmarkEventListener = (event: BenchmarkEvent) => void;

export interface OrchestratorDeps {
  store: TabularStore;
  registry: ModelClientRegistry;
  logger?: Logger;
  sleepFn?: SleepFn;
  now?: () => Date;
  onEvent?: BenchmarkEventListener;
}

interface RunContext {
  env: EnvMap;
  settings: RunnerSettings;
  executor: StepExecutorService;
  scorer: ScorerService;
  sink: ReportSink;
}

export interface RunSummary {
  reportPath: string;
  results: StepResult[];
}

export class BenchmarkOrchestratorService {
  private logger: Logger;

  constructor(private deps: OrchestratorDeps) {
    this.logger = deps.logger ?? consoleLogger;
  }

  /**
   * Load the workload, then run one task per platform. Scenarios and steps
   * inside a task run strictly in order; platforms run side by side.
   */
  async run(options: RunOptions): Promise<RunSummary> {
    const settings = loadRunnerSettings(options.env);

    this.logger.info(`Loading test rows from ${options.testsPath}`);
    let steps = await loadTestSteps(this.deps.store, options.testsPath);
    const include = options.includePlatforms ?? new Set<string>();
    const exclude = options.excludePlatforms ?? new Set<string>();
    if (include.size > 0 || exclude.size > 0) {
      steps = filterByPlatform(steps, include, exclude);
      this.logger.info(
        `Filtered rows by platform include=[${[...include].sort().join(',')}] ` +
          `exclude=[${[...exclude].sort().join(',')}]: ${steps.length} rows`
      );
    }

    const scenarios = groupByScenario(steps, options.scenarioStart, options.scenarioEnd);
    const filteredSteps = flattenScenarios(scenarios);
    this.logger.info(`Loaded ${filteredSteps.length} rows across ${scenarios.size} scenarios`);

    const sequences = buildPlatformSequences(scenarios);
    this.checkPlatforms([...sequences.keys()], options.env, settings);

    const scorer = await this.prepareScorer(options, settings);
    const executor = new StepExecutorService(this.deps.registry, {
      retryCount: settings.retryCount,
      backoffSeconds: settings.backoffSeconds,
      throttleSeconds: settings.throttleSeconds,
      sleepFn: this.deps.sleepFn ?? sleep,
      logger: this.logger,
    });

    const startedAt = (this.deps.now ?? (() => new Date()))();
    const reportPath = buildReportPath(options.reportsDir, startedAt);
    const sink = new ReportSink(
      this.deps.store,
      reportPath,
      filteredSteps.map((step) => step.row),
      startedAt
    );
    await sink.initialize();
    this.logger.info(`Initialized report at ${reportPath}`);

    const context: RunContext = { env: options.env, settings, executor, scorer, sink };
    const platformIds = [...sequences.keys()];
    const outcomes = await Promise.allSettled(
      platformIds.map((platformId) => this.runPlatformSequence(platformId, sequences.get(platformId) ?? [], context))
    );

    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        const platformId = platformIds[index];
        const message = describeError(outcome.reason);
        this.logger.error(`Unexpected error while running platform ${fields({ platform_id: platformId })}: ${message}`);
        this.emit({ type: 'platform_error', platformId, message });
      }
    });

    const results = sink.getResults();
    this.logger.success(`Wrote report for ${results.length} steps`);
    this.emit({ type: 'finished' });
    return { reportPath, results };
  }

  private checkPlatforms(platformIds: string[], env: EnvMap, settings: RunnerSettings): void {
    const unknown = platformIds.filter((platformId) => !this.deps.registry.has(platformId));
    if (unknown.length > 0) {
      throw new PreconditionError(
        `Unknown platform_id(s): ${unknown.join(', ')}. Known platforms: ${this.deps.registry.platformIds().join(', ')}`
      );
    }
    for (const platformId of platformIds) {
      if (!loadPlatformConfig(platformId, env, settings.requestTimeoutMs)) {
        this.logger.warn(`Missing config for platform_id=${platformId}; its steps will be recorded as failures.`);
      }
    }
  }

  private async prepareScorer(options: RunOptions, settings: RunnerSettings): Promise<ScorerService> {
    let platformId: string | undefined = (options.scoringPlatformId ?? settings.scoringPlatformId).toUpperCase();
    let config: PlatformConfig | null = loadPlatformConfig(platformId, options.env, settings.requestTimeoutMs);
    if (!config) {
      this.logger.warn(`Missing scoring config for platform_id=${platformId}; skipping scoring.`);
      platformId = undefined;
    } else if (!this.deps.registry.has(platformId)) {
      this.logger.warn(`No client registered for scoring platform_id=${platformId}; skipping scoring.`);
      platformId = undefined;
      config = null;
    }

    const { scoringPromptPath, groundTruthPath } = options;
    const template = scoringPromptPath
      ? await this.loadOptional('scoring prompt', () => loadScoringPromptTemplate(scoringPromptPath))
      : undefined;
    if (!template) {
      this.logger.warn('Scoring prompt missing; skipping scoring.');
      platformId = undefined;
    }

    const groundTruth = groundTruthPath
      ? await this.loadOptional('ground truth', () => loadGroundTruth(this.deps.store, groundTruthPath))
      : undefined;
    if (!groundTruth) {
      this.logger.warn('Ground truth missing; skipping scoring.');
      platformId = undefined;
    }

    return new ScorerService(this.deps.registry, {
      platformId,
      config,
      template: template ?? '',
      groundTruth: groundTruth ?? new Map(),
      logger: this.logger,
    });
  }

  /** Optional inputs only switch scoring off when they cannot be read. */
  private async loadOptional<T>(label: string, load: () => Promise<T>): Promise<T | undefined> {
    try {
      return await load();
    } catch (err) {
      this.logger.warn(`Failed to load ${label}: ${describeError(err)}`);
      return undefined;
    }
  }

  private async runPlatformSequence(platformId: string, scenarios: ScenarioWork[], context: RunContext): Promise<void> {
    const config = loadPlatformConfig(platformId, context.env, context.settings.requestTimeoutMs);
    this.emit({ type: 'platform_start', platformId });

    for (const { scenarioId, steps } of scenarios) {
      this.logger.info(`Running ${fields({ scenario_id: scenarioId, platform_id: platformId, steps: steps.length })}`);
      this.emit({ type: 'scenario_start', platformId, scenarioId });

      const history: ConversationTurn[] = [];
      for (const step of steps) {
        const { result, status } = await this.runStep(step, history, config, context);
        appendConversationTurn(history, step.userPrompt, result.textModelResponse);

        await context.sink.record(result);
        const recorded = transitionStepStatus(status, 'recorded');
        this.logger.info(`Updated report after step ${stepFields(step)}`);
        this.emit({
          type: 'step_recorded',
          platformId: step.platformId,
          scenarioId: step.scenarioId,
          stepId: step.stepId,
          stepIndex: step.stepIndex,
          status: recorded,
          outcome: result.outcome,
        });
      }
    }
  }

  private async runStep(
    step: TestStep,
    history: ConversationTurn[],
    config: PlatformConfig | null,
    context: RunContext
  ): Promise<{ result: StepResult; status: StepStatus }> {
    let status: StepStatus = 'pending';
    const prompt = buildConversationPrompt(history, step.userPrompt);
    this.logger.info(`Executing step ${stepFields(step)}`);

    let raw = '';
    let text = '';
    let comments = '';
    let scores: StepResult['scores'];

    status = transitionStepStatus(status, 'executing');
    try {
      const response = await context.executor.execute(step.platformId, prompt, config, {
        scenarioId: step.scenarioId,
        stepId: step.stepId,
        stepIndex: step.stepIndex,
      });
      raw = response.raw;
      text = response.text;
      status = transitionStepStatus(status, 'succeeded');
    } catch (err) {
      status = transitionStepStatus(status, 'failed');
      comments = `Unexpected error: ${describeError(err)}`;
      this.logger.error(`Unexpected error while executing step ${stepFields(step)}: ${describeError(err)}`);
    }

    if (status === 'succeeded' && context.scorer.enabled) {
      status = transitionStepStatus(status, 'scoring');
      const outcome = await context.scorer.scoreStep(step, text);
      scores = outcome.scores;
      comments = joinComment(comments, outcome.comment);
      status = transitionStepStatus(status, 'scored');
    }

    const result: StepResult = {
      scenarioId: step.scenarioId,
      platformId: step.platformId,
      stepId: step.stepId,
      stepIndex: step.stepIndex,
      stepType: step.stepType,
      runId: step.runId,
      userPrompt: step.userPrompt,
      modelResponse: text,
      fullModelResponse: raw,
      textModelResponse: text,
      comments,
      scores,
      outcome: status === 'failed' ? 'failed' : 'succeeded',
    };
    return { result, status };
  }

  private emit(event: BenchmarkEvent): void {
    this.deps.onEvent?.(event);
  }
}

function stepFields(step: TestStep): string {
  return fields({
    scenario_id: step.scenarioId,
    platform_id: step.platformId,
    step_id: step.stepId,
    step_index: step.stepIndex,
  });
}
