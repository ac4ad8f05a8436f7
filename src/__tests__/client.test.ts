import { describe, it, expect, beforeEach, vi } from 'vitest';
import type OpenAI from 'openai';
import { chatCompletion, createClient, describeError } from '../llm/client.js';
import type { ChatMessage } from '../llm/client.js';
import { failWith, fakeOpenAIState, resetFakeOpenAI, replyWith, TimeoutError } from './fixtures/fakeOpenAI.js';

vi.mock('openai', async () => {
  const { FakeOpenAI } = await import('./fixtures/fakeOpenAI.js');
  return { default: FakeOpenAI };
});

describe('LLM Client', () => {
  const messages: ChatMessage[] = [
    { role: 'system', content: 'You are a narrator.' },
    { role: 'user', content: 'Hello' },
  ];
  let client: OpenAI;

  beforeEach(() => {
    resetFakeOpenAI();
    client = createClient({ apiKey: 'test-key', baseURL: 'http://localhost:1234/v1' });
  });

  it('creates the SDK client with retries disabled', () => {
    expect(fakeOpenAIState.constructed).toEqual([
      { apiKey: 'test-key', baseURL: 'http://localhost:1234/v1', maxRetries: 0 },
    ]);
  });

  it('sends one non-streaming request with the sampler settings', async () => {
    fakeOpenAIState.respond = replyWith('Hi there');

    const text = await chatCompletion(client, {
      model: 'gpt-4o-mini',
      messages,
      sampler: { max_completion_tokens: 100, temperature: 0.8 },
    });

    expect(text).toBe('Hi there');
    expect(fakeOpenAIState.calls).toEqual([
      { model: 'gpt-4o-mini', messages, max_tokens: 100, temperature: 0.8 },
    ]);
  });

  it('returns an empty string when the choice has no content', async () => {
    fakeOpenAIState.respond = replyWith(null);

    expect(await chatCompletion(client, { model: 'gpt-4o-mini', messages, sampler: {} })).toBe('');
  });

  it('returns an empty string when there are no choices', async () => {
    fakeOpenAIState.respond = async () => ({ choices: [] });

    expect(await chatCompletion(client, { model: 'gpt-4o-mini', messages, sampler: {} })).toBe('');
  });

  it('rethrows API errors', async () => {
    fakeOpenAIState.respond = failWith(new TimeoutError());

    await expect(chatCompletion(client, { model: 'gpt-4o-mini', messages, sampler: {} })).rejects.toThrow('Request timed out.');
    expect(fakeOpenAIState.calls).toHaveLength(1);
  });

  describe('describeError', () => {
    it('keeps status and code when present', () => {
      const error = Object.assign(new Error('Rate limit reached'), { status: 429, code: 'rate_limit_exceeded' });
      expect(describeError(error)).toEqual({ error: 'Rate limit reached', status: 429, code: 'rate_limit_exceeded' });
    });

    it('reads the code from socket errors', () => {
      expect(describeError(new TimeoutError())).toEqual({ error: 'Request timed out.', status: undefined, code: 'ETIMEDOUT' });
    });

    it('stringifies non-errors', () => {
      expect(describeError('boom')).toEqual({ error: 'boom' });
    });
  });
});
