import OpenAI from 'openai';
import axios from 'axios';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { PreconditionError } from '../errors';
import type { ModelResponse, PlatformConfig } from '../types';
import { extractResponseText } from './response-text';

// --- Model Client Interface ---

export interface ModelClient {
  send(prompt: string, config: PlatformConfig): Promise<ModelResponse>;
}

function requireModel(platformId: string, config: PlatformConfig): string {
  if (!config.model) {
    throw new PreconditionError(`Missing ${platformId}_MODEL`);
  }
  return config.model;
}

async function withTimeout<T>(timeoutMs: number, call: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await call(controller.signal);
  } finally {
    clearTimeout(timeoutId);
  }
}

function toModelResponse(payload: unknown): ModelResponse {
  const raw = JSON.stringify(payload);
  return { raw, text: extractResponseText(raw) };
}

// --- OpenAI Responses API (CHATGPT) ---

export class OpenAIResponsesClient implements ModelClient {
  constructor(private platformId: string) {}

  async send(prompt: string, config: PlatformConfig): Promise<ModelResponse> {
    const model = requireModel(this.platformId, config);
    const client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 });
    const response = await withTimeout(config.timeoutMs, (signal) =>
      client.responses.create({ model, input: prompt }, { signal })
    );
    return toModelResponse(response);
  }
}

// --- OpenAI-compatible Chat Completions (PERPLEX, COPILOT) ---

export class OpenAIChatClient implements ModelClient {
  constructor(
    private platformId: string,
    private defaultBaseUrl?: string
  ) {}

  async send(prompt: string, config: PlatformConfig): Promise<ModelResponse> {
    const model = requireModel(this.platformId, config);
    const baseURL = config.baseUrl ?? this.defaultBaseUrl;
    if (!baseURL) {
      throw new PreconditionError(`Missing ${this.platformId}_BASE_URL`);
    }
    const client = new OpenAI({ apiKey: config.apiKey, baseURL, maxRetries: 0 });
    const completion = await withTimeout(config.timeoutMs, (signal) =>
      client.chat.completions.create({ model, messages: [{ role: 'user', content: prompt }] }, { signal })
    );
    return toModelResponse(completion);
  }
}

// --- Anthropic Messages API (CLAUDE) ---

export const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages';
const ANTHROPIC_VERSION = '2023-06-01';
const CLAUDE_MAX_TOKENS = 1024;

export class ClaudeMessagesClient implements ModelClient {
  constructor(private platformId: string) {}

  async send(prompt: string, config: PlatformConfig): Promise<ModelResponse> {
    const model = requireModel(this.platformId, config);
    const url = config.baseUrl ?? ANTHROPIC_MESSAGES_URL;
    try {
      const response = await axios.post<string>(
        url,
        { model, max_tokens: CLAUDE_MAX_TOKENS, messages: [{ role: 'user', content: prompt }] },
        {
          headers: {
            'Content-Type': 'application/json',
            'x-api-key': config.apiKey,
            'anthropic-version': ANTHROPIC_VERSION,
          },
          timeout: config.timeoutMs,
          responseType: 'text',
          transformResponse: (data: string) => data,
        }
      );
      return { raw: response.data, text: extractResponseText(response.data) };
    } catch (err) {
      if (axios.isAxiosError(err) && err.response) {
        // Keep the API error body; it is usually the only useful detail.
        const body: unknown = err.response.data;
        const detail = typeof body === 'string' ? body : JSON.stringify(body);
        throw new Error(`HTTP ${err.response.status}: ${detail}`);
      }
      throw err;
    }
  }
}

// --- Google Generative AI SDK (GEMINI) ---

export class GeminiClient implements ModelClient {
  constructor(private platformId: string) {}

  async send(prompt: string, config: PlatformConfig): Promise<ModelResponse> {
    const modelName = requireModel(this.platformId, config);
    const genAI = new GoogleGenerativeAI(config.apiKey);
    const model = genAI.getGenerativeModel(
      { model: modelName },
      { timeout: config.timeoutMs, baseUrl: config.baseUrl }
    );

    try {
      const result = await model.generateContent(prompt);
      const response = result.response;
      const text = (response.candidates ?? [])
        .flatMap((candidate) => candidate.content?.parts ?? [])
        .map((part) => part.text ?? '')
        .join('');
      return { raw: JSON.stringify(response), text };
    } catch (err) {
      if (err instanceof Error && err.message.includes('API keys are not supported by this API')) {
        throw new Error(
          'Gemini API key rejected. Ensure you are using an AI Studio key, not one restricted to Vertex AI.'
        );
      }
      throw err;
    }
  }
}
