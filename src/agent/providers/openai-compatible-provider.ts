/**
 * OpenAI-Compatible LLM Provider
 *
 * Works with vLLM, Ollama, LM Studio, OpenAI, Groq, or any endpoint serving
 * `/chat/completions`. Uses raw fetch; the response is validated with zod
 * before it reaches the parser.
 */

import { z } from 'zod';
import type { ModelResponse, WireMessage } from '../../types/agent-types.js';
import type { ChatOptions, LLMProvider } from '../llm-provider.js';
import { ModelTransportError, errorMessageOf } from '../errors.js';

export interface OpenAICompatibleProviderConfig {
  /** Base URL including the API version (default: http://localhost:8000/v1) */
  baseUrl?: string;
  /** API key (optional, local servers usually need none) */
  apiKey?: string;
  /** Default model when the call does not name one */
  model?: string;
  /** Timeout covering the request and the response body (default: 120000) */
  timeoutMs?: number;
}

const OpenAIChatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string().optional(),
                type: z.string().optional(),
                function: z.object({
                  name: z.string().optional(),
                  arguments: z.unknown().optional(),
                }),
              })
            )
            .nullable()
            .optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

export class OpenAICompatibleProvider implements LLMProvider {
  private baseUrl: string;
  private apiKey?: string;
  private model: string;
  private timeoutMs: number;

  constructor(config?: OpenAICompatibleProviderConfig) {
    this.baseUrl = (config?.baseUrl ?? 'http://localhost:8000/v1').replace(/\/$/, '');
    this.apiKey = config?.apiKey;
    this.model = config?.model ?? 'Qwen3-8B';
    this.timeoutMs = config?.timeoutMs ?? 120000;
  }

  async chat(messages: WireMessage[], options: ChatOptions): Promise<ModelResponse> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers['Authorization'] = `Bearer ${this.apiKey}`;

    const body: Record<string, unknown> = {
      model: options.model ?? this.model,
      messages,
      stream: false,
    };
    if (options.maxTokens !== undefined) body.max_tokens = options.maxTokens;
    if (options.temperature !== undefined) body.temperature = options.temperature;
    // Only include tools if there are any
    if (options.tools && options.tools.length > 0) body.tools = options.tools;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener('abort', forwardAbort, { once: true });

    // The timer and the caller's signal stay linked until the body is read
    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      const reason = controller.signal.aborted && !options.signal?.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : errorMessageOf(error);
      throw new ModelTransportError(`OpenAI-compatible request failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', forwardAbort);
    }

    if (!ok) {
      throw new ModelTransportError(`OpenAI-compatible API error (${status}): ${text}`, { status });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new ModelTransportError(`Unexpected response from OpenAI-compatible API: ${errorMessageOf(error)}`, {
        status,
        cause: error,
      });
    }

    const parsed = OpenAIChatResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ModelTransportError(`Unexpected response from OpenAI-compatible API: ${parsed.error.message}`);
    }

    const data = parsed.data;
    const message = data.choices[0].message;
    const result: ModelResponse = {};
    if (typeof message.content === 'string') result.content = message.content;
    if (message.tool_calls && message.tool_calls.length > 0) result.tool_calls = message.tool_calls;
    if (data.usage) {
      result.usage = { inputTokens: data.usage.prompt_tokens, outputTokens: data.usage.completion_tokens };
    }
    return result;
  }
}
