import { describe, it, expect } from 'vitest';
import { extractBalancedObject, isJsonObject, isJsonValue, preview, tryParseJson } from './json-extract.js';

describe('extractBalancedObject', () => {
  it('returns the object that opens at the start index', () => {
    const text = 'x {"a": {"b": 1}} tail }';
    expect(extractBalancedObject(text, 2)).toBe('{"a": {"b": 1}}');
  });

  it('ignores braces inside strings', () => {
    expect(extractBalancedObject('{"a": "}{"} rest')).toBe('{"a": "}{"}');
  });

  it('treats an escaped quote as part of the string', () => {
    const text = '{"a": "say \\"}\\" ok"} rest';
    expect(extractBalancedObject(text)).toBe('{"a": "say \\"}\\" ok"}');
  });

  it('returns null for an unterminated object', () => {
    expect(extractBalancedObject('{"a": {"b": 1}')).toBeNull();
  });

  it('returns null when the start index is not an opening brace', () => {
    expect(extractBalancedObject('abc {"a": 1}', 0)).toBeNull();
  });
});

describe('tryParseJson', () => {
  it('parses valid JSON', () => {
    expect(tryParseJson('{"a": [1, "two", null]}')).toEqual({ ok: true, value: { a: [1, 'two', null] } });
  });

  it('reports invalid JSON without throwing', () => {
    const result = tryParseJson('{bad');
    expect(result.ok).toBe(false);
  });
});

describe('JSON guards', () => {
  it('accepts plain objects only', () => {
    expect(isJsonObject({ a: 1 })).toBe(true);
    expect(isJsonObject([1])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
  });

  it('rejects non-finite numbers', () => {
    expect(isJsonValue(Number.NaN)).toBe(false);
    expect(isJsonValue({ a: Infinity })).toBe(false);
    expect(isJsonValue({ a: [true, 'x', 1.5] })).toBe(true);
  });
});

describe('preview', () => {
  it('truncates long text', () => {
    expect(preview('abcdef', 3)).toBe('abc...');
    expect(preview('abc', 3)).toBe('abc');
  });
});
