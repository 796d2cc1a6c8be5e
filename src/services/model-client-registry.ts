import {
  ClaudeMessagesClient,
  GeminiClient,
  ModelClient,
  OpenAIChatClient,
  OpenAIResponsesClient,
} from './model-client';

export const PERPLEXITY_BASE_URL = 'https://api.perplexity.ai';

/**
 * Model clients keyed by upper-cased platform id. New platforms are added by
 * registering another client.
 */
export class ModelClientRegistry {
  private clients = new Map<string, ModelClient>();

  register(platformId: string, client: ModelClient): this {
    this.clients.set(platformId.toUpperCase(), client);
    return this;
  }

  get(platformId: string): ModelClient | undefined {
    return this.clients.get(platformId.toUpperCase());
  }

  has(platformId: string): boolean {
    return this.clients.has(platformId.toUpperCase());
  }

  platformIds(): string[] {
    return [...this.clients.keys()].sort();
  }
}

export function createDefaultRegistry(): ModelClientRegistry {
  return new ModelClientRegistry()
    .register('CHATGPT', new OpenAIResponsesClient('CHATGPT'))
    .register('PERPLEX', new OpenAIChatClient('PERPLEX', PERPLEXITY_BASE_URL))
    .register('COPILOT', new OpenAIChatClient('COPILOT'))
    .register('CLAUDE', new ClaudeMessagesClient('CLAUDE'))
    .register('GEMINI', new GeminiClient('GEMINI'));
}
