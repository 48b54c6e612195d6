/**
 * Conversation
 *
 * Append-only log of role-tagged turns owned by one agent loop.
 * Rendering to the wire format is a read-only projection; turns are never
 * rewritten in place.
 */

import type {
  AssistantTurn,
  Invocation,
  StoredTurn,
  ToolTurn,
  UserTurn,
  WireMessage,
  WireToolCall,
} from '../types/agent-types.js';

/** Prefix used when a tool result has to travel as a user message */
export function compatToolPrefix(toolName: string): string {
  return `[Tool ${toolName} result]`;
}

export class Conversation {
  private log: StoredTurn[] = [];

  append(turn: StoredTurn): void {
    // Copy so later changes to the caller's object cannot reach the log
    this.log.push(freeze(turn));
  }

  appendUser(content: string): UserTurn {
    const turn: UserTurn = { role: 'user', content };
    this.append(turn);
    return turn;
  }

  appendAssistant(content?: string, toolCalls: Invocation[] = []): AssistantTurn {
    const turn: AssistantTurn = { role: 'assistant', toolCalls };
    if (content !== undefined) turn.content = content;
    this.append(turn);
    return turn;
  }

  appendToolResult(toolName: string, content: string, toolCallId?: string): ToolTurn {
    const turn: ToolTurn = { role: 'tool', toolName, content };
    if (toolCallId !== undefined) turn.toolCallId = toolCallId;
    this.append(turn);
    return turn;
  }

  /**
   * Render every turn to the wire shape.
   *
   * In compatibility mode tool turns become user turns prefixed with the tool
   * name, and assistant turns lose their `tool_calls`, for backends that reject
   * the `tool` role or the tool-call fields.
   */
  toWireList(compatMode: boolean): WireMessage[] {
    return this.log.map((turn) => (compatMode ? toCompatMessage(turn) : toNativeMessage(turn)));
  }

  turns(): readonly StoredTurn[] {
    return this.log.slice();
  }

  last(): StoredTurn | undefined {
    return this.log[this.log.length - 1];
  }

  clear(): void {
    this.log = [];
  }

  get length(): number {
    return this.log.length;
  }
}

// =============================================================================
// Rendering
// =============================================================================

function toCompatMessage(turn: StoredTurn): WireMessage {
  switch (turn.role) {
    case 'tool':
      return { role: 'user', content: `${compatToolPrefix(turn.toolName)}\n${turn.content}` };
    case 'assistant':
      return { role: 'assistant', content: turn.content ?? '' };
    case 'user':
      return { role: 'user', content: turn.content };
  }
}

function toNativeMessage(turn: StoredTurn): WireMessage {
  switch (turn.role) {
    case 'tool': {
      const message: WireMessage = { role: 'tool', content: turn.content, name: turn.toolName };
      if (turn.toolCallId !== undefined) message.tool_call_id = turn.toolCallId;
      return message;
    }
    case 'assistant': {
      const message: WireMessage = { role: 'assistant', content: turn.content ?? null };
      const toolCalls = turn.toolCalls.flatMap(toWireToolCall);
      if (toolCalls.length > 0) message.tool_calls = toolCalls;
      return message;
    }
    case 'user':
      return { role: 'user', content: turn.content };
  }
}

function toWireToolCall(invocation: Invocation): WireToolCall[] {
  // Calls recovered from text have no id and cannot be correlated natively
  if (invocation.id === undefined) return [];
  return [
    {
      id: invocation.id,
      type: 'function',
      function: { name: invocation.name, arguments: JSON.stringify(invocation.arguments) },
    },
  ];
}

function freeze(turn: StoredTurn): StoredTurn {
  switch (turn.role) {
    case 'assistant':
      return Object.freeze({
        ...turn,
        toolCalls: turn.toolCalls.map((call) => ({ ...call, arguments: structuredClone(call.arguments) })),
      });
    default:
      return Object.freeze({ ...turn });
  }
}
