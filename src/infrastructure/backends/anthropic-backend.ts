import { z } from 'zod/v4';
import type { IBackend, GenerateResult } from '@domain/ports/backend.js';
import type { BackendParams } from '@domain/types/backend.js';
import { postForText, type FetchFn } from './http-backend.js';

export const ANTHROPIC_DEFAULTS = {
  model: 'claude-3-7-sonnet-20250219',
  temperature: 0.2,
  maxTokens: 2000,
} as const;

const MessagesResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  ),
});

export interface AnthropicBackendOptions {
  apiKey: string;
  params?: BackendParams;
  baseUrl?: string;
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

/**
 * Anthropic Messages API backend.
 */
export class AnthropicBackend implements IBackend {
  readonly name = 'anthropic';

  constructor(private readonly options: AnthropicBackendOptions) {}

  async generate(prompt: string, params?: BackendParams, signal?: AbortSignal): Promise<GenerateResult> {
    const merged = { ...ANTHROPIC_DEFAULTS, ...this.options.params, ...params };
    return postForText({
      backend: this.name,
      url: `${this.options.baseUrl ?? 'https://api.anthropic.com/v1'}/messages`,
      headers: {
        'x-api-key': this.options.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: {
        model: merged.model,
        max_tokens: merged.maxTokens,
        temperature: merged.temperature,
        messages: [{ role: 'user', content: prompt }],
      },
      responseSchema: MessagesResponseSchema,
      extractText: (response) => {
        const parts = response.content.flatMap((block) =>
          block.type === 'text' && block.text !== undefined ? [block.text] : [],
        );
        return parts.length > 0 ? parts.join('') : undefined;
      },
      fetchFn: this.options.fetchFn,
      signal,
      timeoutMs: this.options.timeoutMs,
    });
  }
}
