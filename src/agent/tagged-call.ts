/**
 * Tagged Function-Call Syntax
 *
 * Legacy format some prompts still produce:
 *
 *   <action>calculator(expression="3*7+2")</action>
 *   <action>addFile("notes.txt", "hello")</action>
 *
 * Deprecated: positional arguments are mapped through a fixed per-tool table
 * and anything the table does not cover becomes `arg0`, `arg1`, ... New tools
 * should be called through JSON or structured tool calls instead of being
 * added here.
 */

import type { Invocation, JsonValue, ToolArguments } from '../types/agent-types.js';
import { tryParseJson } from './json-extract.js';

export const DEFAULT_TAG_OPEN = '<action>';
export const DEFAULT_TAG_CLOSE = '</action>';

export const DEFAULT_POSITIONAL_PARAMETERS: Readonly<Record<string, readonly string[]>> = {
  calculator: ['expression'],
  search: ['query'],
  addFile: ['filename', 'content'],
  read_file: ['filename'],
};

/** Name given to a tagged span that holds no function syntax */
export const UNKNOWN_TOOL_NAME = 'unknown';

/**
 * Return the text between the first open tag and the next close tag, or null.
 */
export function findTaggedSpan(content: string, tagOpen = DEFAULT_TAG_OPEN, tagClose = DEFAULT_TAG_CLOSE): string | null {
  const open = content.indexOf(tagOpen);
  if (open === -1) return null;
  const bodyStart = open + tagOpen.length;
  const close = content.indexOf(tagClose, bodyStart);
  if (close === -1) return null;
  return content.slice(bodyStart, close);
}

/**
 * Parse `name(arg, key=value, ...)`. A span without that shape becomes a
 * single `unknown` invocation carrying the raw text.
 */
export function parseTaggedCall(
  span: string,
  positionalParameters: Readonly<Record<string, readonly string[]>> = DEFAULT_POSITIONAL_PARAMETERS
): Invocation {
  const text = span.trim();
  const head = /^([A-Za-z_][\w.-]*)\s*\(/.exec(text);
  if (!head) return unknownCall(text);

  const openIndex = head[0].length - 1;
  const closeIndex = findMatchingParen(text, openIndex);
  if (closeIndex === -1) return unknownCall(text);

  const name = head[1];
  const names = positionalParameters[name] ?? [];
  const args: ToolArguments = {};
  let position = 0;

  for (const token of splitTopLevel(text.slice(openIndex + 1, closeIndex))) {
    const keyword = /^([A-Za-z_]\w*)\s*=(?!=)([\s\S]*)$/.exec(token);
    if (keyword) {
      args[keyword[1]] = parseValue(keyword[2]);
    } else {
      args[names[position] ?? `arg${position}`] = parseValue(token);
      position++;
    }
  }

  return { name, arguments: args };
}

function unknownCall(text: string): Invocation {
  return { name: UNKNOWN_TOOL_NAME, arguments: { raw: text } };
}

/**
 * Index of the `)` closing the `(` at `openIndex`, skipping quoted text.
 */
function findMatchingParen(text: string, openIndex: number): number {
  let depth = 0;
  let quote: string | null = null;
  let escaped = false;

  for (let i = openIndex; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === '(') depth++;
    else if (ch === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Split on commas outside quotes and brackets. Empty tokens are dropped.
 */
function splitTopLevel(text: string): string[] {
  const tokens: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let escaped = false;
  let current = '';

  for (const ch of text) {
    if (quote) {
      current += ch;
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '(' || ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ')' || ch === ']' || ch === '}') {
      depth--;
    } else if (ch === ',' && depth === 0) {
      tokens.push(current.trim());
      current = '';
      continue;
    }
    current += ch;
  }
  tokens.push(current.trim());

  return tokens.filter((token) => token.length > 0);
}

function parseValue(raw: string): JsonValue {
  const text = raw.trim();
  const first = text[0];
  if (text.length >= 2 && (first === '"' || first === "'") && text[text.length - 1] === first) {
    return unquote(text.slice(1, -1));
  }
  const parsed = tryParseJson(text);
  return parsed.ok ? parsed.value : text;
}

function unquote(body: string): string {
  return body.replace(/\\(.)/g, (_, ch: string) => {
    switch (ch) {
      case 'n':
        return '\n';
      case 't':
        return '\t';
      default:
        return ch;
    }
  });
}
