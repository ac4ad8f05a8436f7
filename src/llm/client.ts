import OpenAI from 'openai';
import type { SamplerSettings } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';

const log = createLogger(NAMESPACES.llm.client);

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ClientOptions {
  apiKey: string;
  baseURL?: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  sampler: SamplerSettings;
}

/**
 * One client per session. Retries are disabled so that every narration is a
 * single request.
 */
export function createClient(options: ClientOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    maxRetries: 0,
  });
}

export async function chatCompletion(client: OpenAI, request: CompletionRequest): Promise<string> {
  const { model, messages, sampler } = request;
  log('Making non-streaming call to %s (max_tokens=%d, temperature=%d)', model, sampler.max_completion_tokens, sampler.temperature);

  try {
    const response = await client.chat.completions.create({
      model,
      messages,
      max_tokens: sampler.max_completion_tokens,
      temperature: sampler.temperature,
    });
    return response.choices[0]?.message?.content ?? '';
  } catch (error: unknown) {
    log('API call failed: %o', { model, ...describeError(error) });
    throw error;
  }
}

/** Status and code are present on the SDK's API errors and on socket errors. */
export function describeError(error: unknown): { error: string; status?: unknown; code?: unknown } {
  if (error instanceof Error) {
    return {
      error: error.message,
      status: 'status' in error ? error.status : undefined,
      code: 'code' in error ? error.code : undefined,
    };
  }
  return { error: String(error) };
}
