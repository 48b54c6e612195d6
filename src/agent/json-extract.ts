/**
 * JSON extraction helpers for tool calls embedded in model text.
 */

import type { JsonObject, JsonValue } from '../types/agent-types.js';

/**
 * Return the substring holding the JSON object that opens at `start`.
 *
 * Counts `{`/`}` depth, ignoring braces inside quoted strings; a backslash
 * inside a string escapes the next character, so `\"` does not end the string.
 * Returns null when `start` is not a `{` or depth never returns to zero.
 */
export function extractBalancedObject(text: string, start = 0): string | null {
  if (text[start] !== '{') return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return null;
}

export type JsonParseResult =
  | { ok: true; value: JsonValue }
  | { ok: false; error: string };

export function tryParseJson(text: string): JsonParseResult {
  try {
    const value: unknown = JSON.parse(text);
    if (!isJsonValue(value)) return { ok: false, error: 'not a JSON value' };
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(isJsonValue);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      return Array.isArray(value) ? value.every(isJsonValue) : isJsonObject(value);
    default:
      return false;
  }
}

/**
 * Shorten text for log lines.
 */
export function preview(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
