/**
 * Anthropic LLM Provider
 *
 * Implements LLMProvider using the @anthropic-ai/sdk.
 * Converts wire messages to Anthropic native format at the boundary.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ModelResponse, RawToolCall, WireMessage } from '../../types/agent-types.js';
import type { ChatOptions, LLMProvider } from '../llm-provider.js';
import type { FunctionSpec } from '../tools/types.js';
import { compatToolPrefix } from '../conversation.js';
import { ModelTransportError, errorMessageOf } from '../errors.js';
import { isJsonObject, tryParseJson } from '../json-extract.js';

type MessageParam = Anthropic.MessageParam;
type ContentBlocks = Exclude<MessageParam['content'], string>;

export interface AnthropicProviderConfig {
  apiKey: string;
  model?: string;
  /** Used when the call does not set maxTokens (the API requires one) */
  maxTokens?: number;
}

export class AnthropicProvider implements LLMProvider {
  private client: Anthropic;
  private model: string;
  private maxTokens: number;

  constructor(config: AnthropicProviderConfig) {
    this.client = new Anthropic({ apiKey: config.apiKey });
    this.model = config.model ?? 'claude-3-5-sonnet-latest';
    this.maxTokens = config.maxTokens ?? 1024;
  }

  async chat(messages: WireMessage[], options: ChatOptions): Promise<ModelResponse> {
    const { system, anthropicMessages } = toAnthropicMessages(messages);

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: options.model ?? this.model,
          max_tokens: options.maxTokens ?? this.maxTokens,
          messages: anthropicMessages,
          ...(system ? { system } : {}),
          ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
          ...(options.tools && options.tools.length > 0 ? { tools: options.tools.map(toAnthropicTool) } : {}),
        },
        { signal: options.signal }
      );
    } catch (error) {
      throw new ModelTransportError(`Anthropic request failed: ${errorMessageOf(error)}`, {
        status: error instanceof Anthropic.APIError ? error.status : undefined,
        cause: error,
      });
    }

    const text: string[] = [];
    const toolCalls: RawToolCall[] = [];
    for (const block of response.content) {
      if (block.type === 'text') {
        text.push(block.text);
      } else if (block.type === 'tool_use') {
        toolCalls.push({ id: block.id, name: block.name, arguments: block.input });
      }
    }

    const result: ModelResponse = {
      content: text.join(''),
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
    if (toolCalls.length > 0) result.tool_calls = toolCalls;
    return result;
  }
}

/**
 * System messages move to the `system` parameter; tool results become
 * `tool_result` blocks on a user message (or prefixed text when they carry no
 * call id); consecutive messages of the same role are merged, as the API
 * requires alternating roles.
 */
export function toAnthropicMessages(messages: WireMessage[]): { system: string; anthropicMessages: MessageParam[] } {
  const systemParts: string[] = [];
  const anthropicMessages: MessageParam[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      if (message.content) systemParts.push(message.content);
      continue;
    }

    const converted = toAnthropicMessage(message);
    const previous = anthropicMessages[anthropicMessages.length - 1];
    if (previous && previous.role === converted.role) {
      previous.content = [...toBlocks(previous.content), ...toBlocks(converted.content)];
    } else {
      anthropicMessages.push(converted);
    }
  }

  return { system: systemParts.join('\n\n'), anthropicMessages };
}

function toAnthropicMessage(message: WireMessage): MessageParam {
  const text = message.content ?? '';

  if (message.role === 'tool') {
    if (message.tool_call_id) {
      return {
        role: 'user',
        content: [{ type: 'tool_result', tool_use_id: message.tool_call_id, content: text }],
      };
    }
    return { role: 'user', content: `${compatToolPrefix(message.name ?? 'unknown')}\n${text}` };
  }

  if (message.role === 'assistant') {
    if (!message.tool_calls || message.tool_calls.length === 0) {
      return { role: 'assistant', content: text };
    }
    const blocks: ContentBlocks = text ? [{ type: 'text', text }] : [];
    for (const call of message.tool_calls) {
      const input = tryParseJson(call.function.arguments);
      blocks.push({
        type: 'tool_use',
        id: call.id,
        name: call.function.name,
        input: input.ok && isJsonObject(input.value) ? input.value : {},
      });
    }
    return { role: 'assistant', content: blocks };
  }

  return { role: 'user', content: text };
}

function toBlocks(content: MessageParam['content']): ContentBlocks {
  return typeof content === 'string' ? [{ type: 'text', text: content }] : content;
}

function toAnthropicTool(spec: FunctionSpec): Anthropic.Tool {
  return {
    name: spec.function.name,
    description: spec.function.description,
    input_schema: { ...spec.function.parameters, type: 'object' },
  };
}
