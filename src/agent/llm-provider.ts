/**
 * LLM Provider Interface
 *
 * Provider-neutral model call boundary. The loop hands over the rendered
 * turns and gets back content and/or structured tool calls; each provider
 * converts to its backend's wire format on its own side.
 */

import type { ModelResponse, WireMessage } from '../types/agent-types.js';
import type { FunctionSpec } from './tools/types.js';

export interface ChatOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Present only when native tool calling is enabled */
  tools?: FunctionSpec[];
  signal?: AbortSignal;
}

export interface LLMProvider {
  /**
   * Send the turns to the model. Failures reject; retries and timeouts are
   * the provider's business, the loop never retries.
   */
  chat(messages: WireMessage[], options: ChatOptions): Promise<ModelResponse>;
}
