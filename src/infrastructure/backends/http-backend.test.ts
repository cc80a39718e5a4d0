import { BackendTimeoutError, BackendUnavailableError } from '@shared/lib/errors.js';
import { AnthropicBackend } from './anthropic-backend.js';
import { GroqBackend } from './groq-backend.js';
import type { FetchFn } from './http-backend.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

describe('AnthropicBackend', () => {
  it('posts a Messages request and joins the text blocks', async () => {
    const fetchFn = vi.fn<FetchFn>(async () =>
      jsonResponse({ content: [{ type: 'text', text: '{"a":' }, { type: 'text', text: '1}' }] }),
    );
    const backend = new AnthropicBackend({ apiKey: 'test-secret', fetchFn });

    const result = await backend.generate('hello', { temperature: 0 });

    expect(result).toEqual({ ok: true, text: '{"a":1}', durationMs: expect.any(Number) });
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://api.anthropic.com/v1/messages');
    expect(init?.headers).toEqual({
      'content-type': 'application/json',
      'x-api-key': 'test-secret',
      'anthropic-version': '2023-06-01',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'claude-3-7-sonnet-20250219',
      max_tokens: 2000,
      temperature: 0,
      messages: [{ role: 'user', content: 'hello' }],
    });
  });

  it('reports HTTP errors as unavailable', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('overloaded', { status: 529 }));
    const result = await new AnthropicBackend({ apiKey: 'test-secret', fetchFn }).generate('x');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(BackendUnavailableError);
      expect(result.error.message).toBe('Backend "anthropic" unavailable: HTTP 529: overloaded');
    }
  });

  it('reports a response without text as unavailable', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ content: [] }));
    const result = await new AnthropicBackend({ apiKey: 'test-secret', fetchFn }).generate('x');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toContain('response contained no text');
  });
});

describe('GroqBackend', () => {
  it('posts a chat completion with a bearer token and configured model', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ choices: [{ message: { content: 'ok' } }] }));
    const backend = new GroqBackend({ apiKey: 'test-secret', params: { model: 'test-model' }, fetchFn });

    expect(await backend.generate('hi')).toEqual({ ok: true, text: 'ok', durationMs: expect.any(Number) });
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://api.groq.com/openai/v1/chat/completions');
    expect(init?.headers).toEqual({ 'content-type': 'application/json', authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toMatchObject({ model: 'test-model', max_tokens: 2000 });
  });

  it('reports a network failure as unavailable', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new TypeError('fetch failed');
    });
    const result = await new GroqBackend({ apiKey: 'test-secret', fetchFn }).generate('hi');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Backend "groq" unavailable: fetch failed');
  });

  it('reports an aborted call as a timeout', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new DOMException('aborted', 'AbortError');
    });
    const result = await new GroqBackend({ apiKey: 'test-secret', fetchFn, timeoutMs: 50 }).generate(
      'hi',
      undefined,
      controller.signal,
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(BackendTimeoutError);
      expect(result.error.message).toBe('Backend "groq" did not answer within 50ms');
    }
  });

  it('reports an unexpected body shape as unavailable', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ nope: true }));
    const result = await new GroqBackend({ apiKey: 'test-secret', fetchFn }).generate('hi');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Backend "groq" unavailable: unexpected response shape');
  });
});
