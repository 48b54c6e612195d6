/**
 * Agent Module
 *
 * Round loop, tool-call parser, capability registry and dispatcher, plus the
 * model clients behind the provider boundary.
 */

export {
  AgentLoop,
  containsFinalAnswer,
  nextState,
  DEFAULT_FINAL_ANSWER_MARKERS,
  DEFAULT_MAX_ROUNDS,
  EXHAUSTED_MESSAGE,
  type AgentLoopConfig,
  type LoopEvent,
  type RunOptions,
} from './agent-loop.js';
export { Conversation, compatToolPrefix } from './conversation.js';
export { ToolRegistry } from './tool-registry.js';
export { ToolDispatcher, cancelledObservation, type DispatchOptions } from './dispatcher.js';
export {
  ToolCallParser,
  parseToolCalls,
  DEFAULT_ANCHOR,
  type ParseOutcome,
  type ParseStrategyName,
  type ToolCallParserOptions,
} from './tool-call-parser.js';
export { extractBalancedObject, tryParseJson } from './json-extract.js';
export {
  parseTaggedCall,
  findTaggedSpan,
  DEFAULT_POSITIONAL_PARAMETERS,
  DEFAULT_TAG_OPEN,
  DEFAULT_TAG_CLOSE,
} from './tagged-call.js';
export {
  PromptBuilder,
  DEFAULT_SYSTEM_PROMPT,
  formatToolList,
  renderTemplate,
  type PromptBuilderConfig,
} from './prompt-builder.js';
export { RunEventEmitter, type RunEvent, type RunEventListener, type CompletionOutcome } from './run-events.js';
export type { ChatOptions, LLMProvider } from './llm-provider.js';
export * from './errors.js';
export * from './providers/index.js';
export * from './tools/index.js';
