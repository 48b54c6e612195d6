/**
 * Agent Core Types
 *
 * Type definitions shared by the conversation model, the tool-call parser,
 * the capability registry and the agent loop.
 */

// ============================================================================
// JSON Values
// ============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Arguments of a parsed tool call, validated against the tool schema at dispatch time */
export type ToolArguments = JsonObject;

// ============================================================================
// Tool Call Types
// ============================================================================

/**
 * A parsed request to call one named tool.
 */
export interface Invocation {
  name: string;
  arguments: ToolArguments;
  /** Correlation id, only present when the model returned structured tool calls */
  id?: string;
}

/**
 * A tool call as a backend returns it. Accepts both the flat shape and the
 * nested OpenAI `function` shape.
 */
export interface RawToolCall {
  id?: string;
  type?: string;
  name?: string;
  arguments?: unknown;
  function?: {
    name?: string;
    arguments?: unknown;
  };
}

// ============================================================================
// Conversation Types
// ============================================================================

export type Role = 'system' | 'user' | 'assistant' | 'tool';

export interface SystemTurn {
  role: 'system';
  content: string;
}

export interface UserTurn {
  role: 'user';
  content: string;
}

export interface AssistantTurn {
  role: 'assistant';
  content?: string;
  toolCalls: Invocation[];
}

export interface ToolTurn {
  role: 'tool';
  toolName: string;
  content: string;
  toolCallId?: string;
}

export type Turn = SystemTurn | UserTurn | AssistantTurn | ToolTurn;

/** System turns are rendered per round and never kept in the log */
export type StoredTurn = Exclude<Turn, SystemTurn>;

/**
 * OpenAI-style tool call attached to an assistant wire message
 */
export interface WireToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

/**
 * A turn rendered to the chat-completion wire shape.
 */
export interface WireMessage {
  role: Role;
  content: string | null;
  tool_calls?: WireToolCall[];
  tool_call_id?: string;
  name?: string;
}

// ============================================================================
// Model Boundary Types
// ============================================================================

export interface ModelUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * One model response. Either field may be absent.
 */
export interface ModelResponse {
  content?: string;
  tool_calls?: RawToolCall[];
  usage?: ModelUsage;
}

// ============================================================================
// Dispatch Types
// ============================================================================

export type ObservationErrorKind = 'not_found' | 'invalid_arguments' | 'execution_failed' | 'cancelled';

/**
 * Outcome of dispatching one invocation. Always becomes exactly one tool turn.
 */
export interface Observation {
  toolName: string;
  content: string;
  isError: boolean;
  errorKind?: ObservationErrorKind;
  toolCallId?: string;
}

// ============================================================================
// Agent Loop Types
// ============================================================================

export type LoopState = 'THINKING' | 'ACTING' | 'DONE' | 'EXHAUSTED';

/**
 * A tool call made during the agent loop
 */
export interface AgentToolCall {
  round: number;
  invocation: Invocation;
  observation: Observation;
}

/**
 * Usage statistics for the agent loop
 */
export interface AgentUsageStats {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of running the agent loop
 */
export interface AgentRunResult {
  outcome: 'done' | 'exhausted';
  response: string;
  rounds: number;
  toolCalls: AgentToolCall[];
  usage: AgentUsageStats;
}
