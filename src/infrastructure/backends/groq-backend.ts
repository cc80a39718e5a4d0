import { z } from 'zod/v4';
import type { IBackend, GenerateResult } from '@domain/ports/backend.js';
import type { BackendParams } from '@domain/types/backend.js';
import { postForText, type FetchFn } from './http-backend.js';

export const GROQ_DEFAULTS = {
  model: 'llama-3.1-8b-instant',
  temperature: 0.2,
  maxTokens: 2000,
} as const;

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable().optional() }),
    }),
  ),
});

export interface GroqBackendOptions {
  apiKey: string;
  params?: BackendParams;
  baseUrl?: string;
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

/**
 * Groq backend over its OpenAI-compatible chat completions endpoint.
 */
export class GroqBackend implements IBackend {
  readonly name = 'groq';

  constructor(private readonly options: GroqBackendOptions) {}

  async generate(prompt: string, params?: BackendParams, signal?: AbortSignal): Promise<GenerateResult> {
    const merged = { ...GROQ_DEFAULTS, ...this.options.params, ...params };
    return postForText({
      backend: this.name,
      url: `${this.options.baseUrl ?? 'https://api.groq.com/openai/v1'}/chat/completions`,
      headers: { authorization: `Bearer ${this.options.apiKey}` },
      body: {
        model: merged.model,
        temperature: merged.temperature,
        max_tokens: merged.maxTokens,
        messages: [{ role: 'user', content: prompt }],
      },
      responseSchema: ChatCompletionSchema,
      extractText: (response) => response.choices[0]?.message.content ?? undefined,
      fetchFn: this.options.fetchFn,
      signal,
      timeoutMs: this.options.timeoutMs,
    });
  }
}
