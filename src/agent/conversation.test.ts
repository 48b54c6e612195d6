import { describe, it, expect } from 'vitest';
import { Conversation, compatToolPrefix } from './conversation.js';
import type { Invocation } from '../types/agent-types.js';

describe('Conversation', () => {
  it('renders tool turns as prefixed user messages in compatibility mode', () => {
    const conversation = new Conversation();
    conversation.appendUser('hi');
    conversation.appendAssistant('Action: {"name":"calculator"}', [
      { name: 'calculator', arguments: { expression: '1+1' }, id: 'call_1' },
    ]);
    conversation.appendToolResult('calculator', '1+1 = 2', 'call_1');

    expect(conversation.toWireList(true)).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Action: {"name":"calculator"}' },
      { role: 'user', content: '[Tool calculator result]\n1+1 = 2' },
    ]);
  });

  it('keeps roles and tool-call fields in native mode', () => {
    const conversation = new Conversation();
    conversation.appendAssistant(undefined, [{ name: 'search', arguments: { query: 'q' }, id: 'call_1' }]);
    conversation.appendToolResult('search', 'result', 'call_1');

    expect(conversation.toWireList(false)).toEqual([
      {
        role: 'assistant',
        content: null,
        tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'search', arguments: '{"query":"q"}' } }],
      },
      { role: 'tool', content: 'result', name: 'search', tool_call_id: 'call_1' },
    ]);
  });

  it('omits tool_calls for invocations recovered from text', () => {
    const conversation = new Conversation();
    conversation.appendAssistant('Action: ...', [{ name: 'search', arguments: {} }]);
    conversation.appendToolResult('search', 'nothing');

    expect(conversation.toWireList(false)).toEqual([
      { role: 'assistant', content: 'Action: ...' },
      { role: 'tool', content: 'nothing', name: 'search' },
    ]);
  });

  it('renders an empty assistant turn as an empty string in compatibility mode', () => {
    const conversation = new Conversation();
    conversation.appendAssistant();
    expect(conversation.toWireList(true)).toEqual([{ role: 'assistant', content: '' }]);
  });

  it('keeps turns in insertion order', () => {
    const conversation = new Conversation();
    conversation.appendUser('one');
    conversation.appendAssistant('two');
    conversation.appendToolResult('t', 'three');

    expect(conversation.turns().map((turn) => turn.role)).toEqual(['user', 'assistant', 'tool']);
    expect(conversation.length).toBe(3);
    expect(conversation.last()).toEqual({ role: 'tool', toolName: 't', content: 'three' });
  });

  it('is not affected by later changes to appended values', () => {
    const conversation = new Conversation();
    const toolCalls: Invocation[] = [{ name: 'a', arguments: {} }];
    conversation.appendAssistant('x', toolCalls);
    toolCalls.push({ name: 'b', arguments: {} });

    const turns = conversation.turns();
    const first = turns[0];
    expect(first.role === 'assistant' && first.toolCalls.map((call) => call.name)).toEqual(['a']);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('copies invocation arguments into the log', () => {
    const conversation = new Conversation();
    const call: Invocation = { name: 'calculator', arguments: { expression: '1+1', options: { exact: true } }, id: 'c1' };
    conversation.appendAssistant(undefined, [call]);
    call.arguments.expression = '9*9';
    call.arguments.options = null;

    expect(conversation.toWireList(false)).toEqual([
      {
        role: 'assistant',
        content: null,
        tool_calls: [
          {
            id: 'c1',
            type: 'function',
            function: { name: 'calculator', arguments: '{"expression":"1+1","options":{"exact":true}}' },
          },
        ],
      },
    ]);
  });

  it('clears all turns', () => {
    const conversation = new Conversation();
    conversation.appendUser('hi');
    conversation.clear();
    expect(conversation.length).toBe(0);
    expect(conversation.toWireList(true)).toEqual([]);
  });
});

describe('compatToolPrefix', () => {
  it('names the tool', () => {
    expect(compatToolPrefix('search')).toBe('[Tool search result]');
  });
});
