import { PreconditionError } from '../errors';
import type { ConversationTurn, ModelResponse, PlatformConfig } from '../types';
import { fields, Logger, silentLogger } from '../utils/logger';
import { retryWithLinearBackoff, sleep, SleepFn } from '../utils/retry';
import { ModelClientRegistry } from './model-client-registry';

export const DEFAULT_RETRY_COUNT = 2;
export const DEFAULT_BACKOFF_SECONDS = 5;
export const DEFAULT_THROTTLE_SECONDS: Readonly<Record<string, number>> = { CLAUDE: 10 };

/**
 * Render the conversation so far as a plain-text transcript, so stateless
 * request/response APIs still see earlier turns.
 */
export function buildConversationPrompt(history: ConversationTurn[], userPrompt: string): string {
  const parts: string[] = [];
  for (const turn of history) {
    if (!turn.content) continue;
    const label = turn.role === 'user' ? 'User' : 'Assistant';
    parts.push(`${label}: ${turn.content}`);
  }
  parts.push(`User: ${userPrompt}`);
  return parts.join('\n');
}

export function appendConversationTurn(history: ConversationTurn[], userPrompt: string, assistantResponse: string): void {
  history.push({ role: 'user', content: userPrompt });
  history.push({ role: 'assistant', content: assistantResponse });
}

export interface StepContext {
  scenarioId: string;
  stepId: string;
  stepIndex: string;
}

export interface StepExecutorOptions {
  retryCount?: number;
  backoffSeconds?: number;
  /** Fixed pause after every successful call, keyed by platform id. */
  throttleSeconds?: Record<string, number>;
  sleepFn?: SleepFn;
  logger?: Logger;
}

export class StepExecutorService {
  private retryCount: number;
  private backoffSeconds: number;
  private throttleSeconds: Record<string, number>;
  private sleepFn: SleepFn;
  private logger: Logger;

  constructor(
    private registry: ModelClientRegistry,
    options: StepExecutorOptions = {}
  ) {
    this.retryCount = options.retryCount ?? DEFAULT_RETRY_COUNT;
    this.backoffSeconds = options.backoffSeconds ?? DEFAULT_BACKOFF_SECONDS;
    this.throttleSeconds = {};
    for (const [platformId, seconds] of Object.entries(options.throttleSeconds ?? DEFAULT_THROTTLE_SECONDS)) {
      this.throttleSeconds[platformId.toUpperCase()] = seconds;
    }
    this.sleepFn = options.sleepFn ?? sleep;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Send one step's prompt, retrying failures with a linearly growing pause.
   * Throws PreconditionError straight away when the platform cannot be called
   * at all, and RetriesExhaustedError once every attempt has failed.
   */
  async execute(
    platformId: string,
    prompt: string,
    config: PlatformConfig | null,
    context: StepContext
  ): Promise<ModelResponse> {
    if (!config) {
      throw new PreconditionError(`Missing config for platform_id=${platformId}`);
    }
    const client = this.registry.get(platformId);
    if (!client) {
      throw new PreconditionError(`Unknown platform_id=${platformId}`);
    }

    const response = await retryWithLinearBackoff(() => client.send(prompt, config), {
      retryCount: this.retryCount,
      backoffMs: this.backoffSeconds * 1000,
      sleepFn: this.sleepFn,
      shouldRetry: (error) => !(error instanceof PreconditionError),
      onRetry: (attempt, totalAttempts, error) => {
        this.logger.warn(
          `Model call failed; retrying ${fields({
            attempt: `${attempt}/${totalAttempts}`,
            scenario_id: context.scenarioId,
            platform_id: platformId,
            step_id: context.stepId,
            step_index: context.stepIndex,
          })}: ${error.name}: ${error.message}`
        );
      },
    });

    await this.throttle(platformId);
    return response;
  }

  private async throttle(platformId: string): Promise<void> {
    const seconds = this.throttleSeconds[platformId.toUpperCase()];
    if (seconds !== undefined && seconds > 0) {
      await this.sleepFn(seconds * 1000);
    }
  }
}
