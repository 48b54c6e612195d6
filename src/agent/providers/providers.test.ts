import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { WireMessage } from '../../types/agent-types.js';
import type { FunctionSpec } from '../tools/types.js';
import { ConfigError, ModelTransportError } from '../errors.js';

const { createMock, MockAPIError } = vi.hoisted(() => {
  class MockAPIError extends Error {
    readonly status: number | undefined;
    constructor(status: number | undefined, message: string) {
      super(message);
      this.status = status;
    }
  }
  return { createMock: vi.fn(), MockAPIError };
});

vi.mock('@anthropic-ai/sdk', () => {
  class Anthropic {
    static APIError = MockAPIError;
    messages = { create: createMock };
  }
  return { default: Anthropic, APIError: MockAPIError };
});

import { AnthropicProvider, toAnthropicMessages } from './anthropic-provider.js';
import { OpenAICompatibleProvider } from './openai-compatible-provider.js';
import { createProvider, detectProviderType } from './provider-factory.js';

const calculatorSpec: FunctionSpec = {
  type: 'function',
  function: {
    name: 'calculator',
    description: 'Do math',
    parameters: { type: 'object', properties: { expression: { type: 'string' } }, required: ['expression'] },
  },
};

describe('OpenAICompatibleProvider', () => {
  const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response('{}'));

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function respondWith(body: unknown, status = 200): void {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
    );
  }

  it('posts the request to the chat completions endpoint', async () => {
    respondWith({ choices: [{ message: { content: 'hi' } }] });
    const provider = new OpenAICompatibleProvider({
      baseUrl: 'http://llm.test/v1/',
      apiKey: 'test-key',
      model: 'default-model',
    });
    const messages: WireMessage[] = [
      { role: 'system', content: 'S' },
      { role: 'user', content: 'hello' },
    ];

    await provider.chat(messages, { maxTokens: 256, temperature: 0.2, tools: [calculatorSpec] });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://llm.test/v1/chat/completions');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-key' });
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'default-model',
      messages,
      stream: false,
      max_tokens: 256,
      temperature: 0.2,
      tools: [calculatorSpec],
    });
  });

  it('omits optional fields and the auth header when unset', async () => {
    respondWith({ choices: [{ message: { content: 'hi' } }] });

    await new OpenAICompatibleProvider().chat([{ role: 'user', content: 'hello' }], { model: 'm', tools: [] });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:8000/v1/chat/completions');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json' });
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'm',
      messages: [{ role: 'user', content: 'hello' }],
      stream: false,
    });
  });

  it('maps content, tool calls and usage', async () => {
    respondWith({
      choices: [
        {
          message: {
            role: 'assistant',
            content: 'checking',
            tool_calls: [
              { id: 'c1', type: 'function', function: { name: 'calculator', arguments: '{"expression":"1+1"}' } },
            ],
          },
          finish_reason: 'tool_calls',
        },
      ],
      usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
    });

    const response = await new OpenAICompatibleProvider().chat([{ role: 'user', content: '1+1' }], {});

    expect(response).toEqual({
      content: 'checking',
      tool_calls: [{ id: 'c1', type: 'function', function: { name: 'calculator', arguments: '{"expression":"1+1"}' } }],
      usage: { inputTokens: 12, outputTokens: 3 },
    });
  });

  it('leaves out null content', async () => {
    respondWith({ choices: [{ message: { content: null } }] });
    expect(await new OpenAICompatibleProvider().chat([], {})).toEqual({});
  });

  it('throws a transport error with the HTTP status', async () => {
    fetchMock.mockResolvedValueOnce(new Response('overloaded', { status: 503 }));

    const error = await new OpenAICompatibleProvider().chat([], {}).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ModelTransportError);
    expect(error).toMatchObject({ status: 503, message: 'OpenAI-compatible API error (503): overloaded' });
  });

  it('throws a transport error for an unexpected body', async () => {
    respondWith({ choices: [] });
    await expect(new OpenAICompatibleProvider().chat([], {})).rejects.toThrow(
      /^Unexpected response from OpenAI-compatible API: /
    );
  });

  it('rejects a body that is not JSON', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>oops</html>', { status: 200 }));

    const error = await new OpenAICompatibleProvider().chat([], {}).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ModelTransportError);
    expect(error).toMatchObject({ status: 200 });
    expect(String(error)).toMatch(/Unexpected response from OpenAI-compatible API: /);
  });

  it('times out while the body is still arriving', async () => {
    fetchMock.mockImplementationOnce(async (_url: string, init: RequestInit) => {
      const stream = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"choices":'));
          init.signal?.addEventListener('abort', () => controller.error(new Error('aborted')));
        },
      });
      return new Response(stream, { status: 200 });
    });

    await expect(new OpenAICompatibleProvider({ timeoutMs: 50 }).chat([], {})).rejects.toThrow(
      'OpenAI-compatible request failed: timed out after 50ms'
    );
  });

  it('forwards caller cancellation while the body is still arriving', async () => {
    const caller = new AbortController();
    fetchMock.mockImplementationOnce(async (_url: string, init: RequestInit) => {
      const stream = new ReadableStream<Uint8Array>({
        start(controller) {
          init.signal?.addEventListener('abort', () => controller.error(new Error('body aborted')));
        },
      });
      setTimeout(() => caller.abort(), 10);
      return new Response(stream, { status: 200 });
    });

    await expect(
      new OpenAICompatibleProvider({ timeoutMs: 60000 }).chat([], { signal: caller.signal })
    ).rejects.toThrow('OpenAI-compatible request failed: body aborted');
  });

  it('wraps network failures', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    await expect(new OpenAICompatibleProvider().chat([], {})).rejects.toThrow(
      'OpenAI-compatible request failed: fetch failed'
    );
  });
});

describe('toAnthropicMessages', () => {
  it('moves system text out and converts tool traffic to blocks', () => {
    const { system, anthropicMessages } = toAnthropicMessages([
      { role: 'system', content: 'S1' },
      { role: 'system', content: 'S2' },
      { role: 'user', content: 'hi' },
      {
        role: 'assistant',
        content: 'calling',
        tool_calls: [{ id: 't1', type: 'function', function: { name: 'calculator', arguments: '{"expression":"1+1"}' } }],
      },
      { role: 'tool', content: '1+1 = 2', name: 'calculator', tool_call_id: 't1' },
      { role: 'user', content: 'thanks' },
    ]);

    expect(system).toBe('S1\n\nS2');
    expect(anthropicMessages).toEqual([
      { role: 'user', content: 'hi' },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'calling' },
          { type: 'tool_use', id: 't1', name: 'calculator', input: { expression: '1+1' } },
        ],
      },
      {
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 't1', content: '1+1 = 2' },
          { type: 'text', text: 'thanks' },
        ],
      },
    ]);
  });

  it('renders tool results without a call id as prefixed text', () => {
    const { anthropicMessages } = toAnthropicMessages([
      { role: 'assistant', content: 'Action: ...' },
      { role: 'tool', content: 'r', name: 'search' },
    ]);

    expect(anthropicMessages).toEqual([
      { role: 'assistant', content: 'Action: ...' },
      { role: 'user', content: '[Tool search result]\nr' },
    ]);
  });
});

describe('AnthropicProvider', () => {
  beforeEach(() => {
    createMock.mockReset();
  });

  it('sends the converted request and maps the reply', async () => {
    createMock.mockResolvedValueOnce({
      content: [
        { type: 'text', text: 'Let me check. ' },
        { type: 'tool_use', id: 'tu_1', name: 'search', input: { query: 'x' } },
      ],
      usage: { input_tokens: 7, output_tokens: 4 },
    });
    const provider = new AnthropicProvider({ apiKey: 'test-secret', model: 'claude-test', maxTokens: 512 });

    const response = await provider.chat(
      [
        { role: 'system', content: 'S' },
        { role: 'user', content: 'hi' },
      ],
      { temperature: 0.3, tools: [calculatorSpec] }
    );

    expect(response).toEqual({
      content: 'Let me check. ',
      tool_calls: [{ id: 'tu_1', name: 'search', arguments: { query: 'x' } }],
      usage: { inputTokens: 7, outputTokens: 4 },
    });
    expect(createMock).toHaveBeenCalledWith(
      {
        model: 'claude-test',
        max_tokens: 512,
        system: 'S',
        temperature: 0.3,
        messages: [{ role: 'user', content: 'hi' }],
        tools: [
          {
            name: 'calculator',
            description: 'Do math',
            input_schema: { type: 'object', properties: { expression: { type: 'string' } }, required: ['expression'] },
          },
        ],
      },
      { signal: undefined }
    );
  });

  it('wraps SDK errors with their status', async () => {
    createMock.mockRejectedValueOnce(new MockAPIError(529, 'overloaded'));

    const error = await new AnthropicProvider({ apiKey: 'test-secret' })
      .chat([{ role: 'user', content: 'hi' }], {})
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ModelTransportError);
    expect(error).toMatchObject({ status: 529, message: 'Anthropic request failed: overloaded' });
  });
});

describe('createProvider', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('builds the requested provider', () => {
    expect(createProvider({ type: 'openai-compatible' })).toBeInstanceOf(OpenAICompatibleProvider);
    expect(createProvider({ type: 'anthropic', anthropicApiKey: 'test-secret' })).toBeInstanceOf(AnthropicProvider);
  });

  it('requires an Anthropic key', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    expect(() => createProvider({ type: 'anthropic' })).toThrow(ConfigError);
  });

  it('detects the provider from the environment', () => {
    vi.stubEnv('ACTLOOP_LLM_PROVIDER', '');
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    expect(detectProviderType()).toBe('openai-compatible');

    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    expect(detectProviderType()).toBe('anthropic');

    vi.stubEnv('ACTLOOP_LLM_PROVIDER', 'openai-compatible');
    expect(detectProviderType()).toBe('openai-compatible');
  });

  it('rejects an unknown provider name', () => {
    vi.stubEnv('ACTLOOP_LLM_PROVIDER', 'bogus');
    expect(() => detectProviderType()).toThrow(ConfigError);
  });
});
