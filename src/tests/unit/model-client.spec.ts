import axios, { AxiosError, AxiosHeaders } from 'axios';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { PreconditionError } from '../../errors';
import {
  ANTHROPIC_MESSAGES_URL,
  ClaudeMessagesClient,
  OpenAIChatClient,
  OpenAIResponsesClient,
} from '../../services/model-client';
import { createDefaultRegistry, ModelClientRegistry } from '../../services/model-client-registry';
import { testConfig, textResponse } from '../helpers';

function axiosResponse(data: string, status = 200) {
  return { data, status, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('ModelClientRegistry', () => {
  it('looks clients up case-insensitively', () => {
    const client = { send: async () => textResponse('x') };
    const registry = new ModelClientRegistry().register('mistral', client);

    expect(registry.get('MISTRAL')).toBe(client);
    expect(registry.has('Mistral')).toBe(true);
    expect(registry.get('OTHER')).toBeUndefined();
  });

  it('registers the built-in platforms', () => {
    expect(createDefaultRegistry().platformIds()).toEqual(['CHATGPT', 'CLAUDE', 'COPILOT', 'GEMINI', 'PERPLEX']);
  });
});

describe('model clients', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('require a model before calling out', async () => {
    const config = { ...testConfig, model: undefined };

    await expect(new OpenAIResponsesClient('CHATGPT').send('p', config)).rejects.toThrow('Missing CHATGPT_MODEL');
    await expect(new ClaudeMessagesClient('CLAUDE').send('p', config)).rejects.toBeInstanceOf(PreconditionError);
  });

  it('require a base URL for chat platforms without a default', async () => {
    await expect(new OpenAIChatClient('COPILOT').send('p', testConfig)).rejects.toThrow('Missing COPILOT_BASE_URL');
  });

  it('posts a single user message to the messages endpoint', async () => {
    const body = JSON.stringify({ content: [{ type: 'text', text: 'Hello ' }, { type: 'text', text: 'shopper' }] });
    const post = vi.spyOn(axios, 'post').mockResolvedValue(axiosResponse(body));

    const response = await new ClaudeMessagesClient('CLAUDE').send('User: hi', testConfig);

    expect(response).toEqual({ raw: body, text: 'Hello shopper' });
    expect(post).toHaveBeenCalledWith(
      ANTHROPIC_MESSAGES_URL,
      { model: 'test-model', max_tokens: 1024, messages: [{ role: 'user', content: 'User: hi' }] },
      expect.objectContaining({
        headers: expect.objectContaining({ 'x-api-key': 'test-key', 'anthropic-version': '2023-06-01' }),
        timeout: 1000,
      })
    );
  });

  it('surfaces the status and body of HTTP errors', async () => {
    const response = axiosResponse('{"error":"overloaded"}', 529);
    vi.spyOn(axios, 'post').mockRejectedValue(
      new AxiosError('Request failed', 'ERR_BAD_RESPONSE', undefined, undefined, response)
    );

    await expect(new ClaudeMessagesClient('CLAUDE').send('p', testConfig)).rejects.toThrow(
      'HTTP 529: {"error":"overloaded"}'
    );
  });
});
