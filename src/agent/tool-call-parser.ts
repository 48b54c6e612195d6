/**
 * Tool Call Parser
 *
 * Recovers `{ name, arguments }` invocations from one model response. Backends
 * disagree on the wire format, so several strategies are tried in a fixed
 * order and the first one that yields invocations wins:
 *
 *   1. structured  - the response's `tool_calls` field
 *   2. anchored    - `Action: {...}` in the content
 *   3. bare        - the first `{"name": ...}` object anywhere in the content
 *   4. tagged      - legacy `<action>tool(arg="v")</action>` syntax
 *
 * Results are never merged across strategies. The parser does not throw;
 * decode problems are collected as diagnostics and logged.
 */

import type { Invocation, JsonObject, ModelResponse, RawToolCall } from '../types/agent-types.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { extractBalancedObject, isJsonObject, preview, tryParseJson } from './json-extract.js';
import {
  DEFAULT_POSITIONAL_PARAMETERS,
  DEFAULT_TAG_CLOSE,
  DEFAULT_TAG_OPEN,
  findTaggedSpan,
  parseTaggedCall,
} from './tagged-call.js';

export const DEFAULT_ANCHOR = 'Action:';

export type ParseStrategyName = 'structured' | 'anchored' | 'bare' | 'tagged';

export interface ParseOutcome {
  invocations: Invocation[] | null;
  strategy: ParseStrategyName | null;
  diagnostics: string[];
}

export interface ToolCallParserOptions {
  /** Marker that precedes a JSON tool call in the content (default `Action:`) */
  anchor?: string;
  tagOpen?: string;
  tagClose?: string;
  /** Positional parameter names per tool for the tagged syntax */
  positionalParameters?: Readonly<Record<string, readonly string[]>>;
  logger?: Logger;
}

interface StrategyContext {
  response: ModelResponse;
  diagnostics: string[];
  /** Set by the anchored strategy; the bare strategy only runs without an anchor */
  anchorFound: boolean;
}

interface ParseStrategy {
  name: ParseStrategyName;
  run(ctx: StrategyContext): Invocation[];
}

export class ToolCallParser {
  private readonly anchorPattern: RegExp;
  private readonly tagOpen: string;
  private readonly tagClose: string;
  private readonly positionalParameters: Readonly<Record<string, readonly string[]>>;
  private readonly logger: Logger;
  private readonly strategies: ParseStrategy[];

  constructor(options: ToolCallParserOptions = {}) {
    this.anchorPattern = new RegExp(`${escapeRegExp(options.anchor ?? DEFAULT_ANCHOR)}\\s*\\{`);
    this.tagOpen = options.tagOpen ?? DEFAULT_TAG_OPEN;
    this.tagClose = options.tagClose ?? DEFAULT_TAG_CLOSE;
    this.positionalParameters = options.positionalParameters ?? DEFAULT_POSITIONAL_PARAMETERS;
    this.logger = options.logger ?? createLogger('ToolCallParser');
    this.strategies = [
      { name: 'structured', run: (ctx) => this.parseStructured(ctx) },
      { name: 'anchored', run: (ctx) => this.parseAnchored(ctx) },
      { name: 'bare', run: (ctx) => this.parseBare(ctx) },
      { name: 'tagged', run: (ctx) => this.parseTagged(ctx) },
    ];
  }

  parse(response: ModelResponse): ParseOutcome {
    const ctx: StrategyContext = { response, diagnostics: [], anchorFound: false };

    for (const strategy of this.strategies) {
      const invocations = strategy.run(ctx);
      if (invocations.length > 0) {
        this.report(ctx.diagnostics);
        this.logger.debug(`${strategy.name} strategy found ${invocations.length} call(s): ${invocations.map((c) => c.name).join(', ')}`);
        return { invocations, strategy: strategy.name, diagnostics: ctx.diagnostics };
      }
    }

    this.report(ctx.diagnostics);
    return { invocations: null, strategy: null, diagnostics: ctx.diagnostics };
  }

  // ---------------------------------------------------------------------------
  // Strategies
  // ---------------------------------------------------------------------------

  private parseStructured(ctx: StrategyContext): Invocation[] {
    const entries = ctx.response.tool_calls;
    if (!Array.isArray(entries) || entries.length === 0) return [];

    const invocations: Invocation[] = [];
    entries.forEach((entry, index) => {
      const invocation = decodeStructuredEntry(entry, index, ctx.diagnostics);
      if (invocation) invocations.push(invocation);
    });
    return invocations;
  }

  private parseAnchored(ctx: StrategyContext): Invocation[] {
    const content = ctx.response.content;
    if (!content) return [];

    const match = this.anchorPattern.exec(content);
    if (!match) return [];
    ctx.anchorFound = true;

    const start = match.index + match[0].length - 1;
    return decodeEmbeddedObject(content, start, 'anchored', ctx.diagnostics);
  }

  private parseBare(ctx: StrategyContext): Invocation[] {
    const content = ctx.response.content;
    if (!content || ctx.anchorFound) return [];

    const match = /\{\s*"name"\s*:/.exec(content);
    if (!match) return [];

    return decodeEmbeddedObject(content, match.index, 'bare', ctx.diagnostics);
  }

  private parseTagged(ctx: StrategyContext): Invocation[] {
    const content = ctx.response.content;
    if (!content) return [];

    const span = findTaggedSpan(content, this.tagOpen, this.tagClose);
    if (span === null) return [];

    return [parseTaggedCall(span, this.positionalParameters)];
  }

  private report(diagnostics: string[]): void {
    for (const diagnostic of diagnostics) {
      this.logger.warn(diagnostic);
    }
  }
}

const defaultParser = new ToolCallParser();

/**
 * Parse with default options. Returns null when no strategy found a call.
 */
export function parseToolCalls(response: ModelResponse): Invocation[] | null {
  return defaultParser.parse(response).invocations;
}

// =============================================================================
// Decoding
// =============================================================================

function decodeStructuredEntry(entry: RawToolCall, index: number, diagnostics: string[]): Invocation | null {
  if (typeof entry !== 'object' || entry === null) {
    diagnostics.push(`structured: tool_calls[${index}] is not an object`);
    return null;
  }

  const name = entry.function ? entry.function.name : entry.name;
  if (typeof name !== 'string' || name.trim() === '') {
    diagnostics.push(`structured: tool_calls[${index}] has no name`);
    return null;
  }

  const rawArgs = entry.function ? entry.function.arguments : entry.arguments;
  const args = decodeArguments(rawArgs);
  if (!args.ok) {
    diagnostics.push(`structured: tool_calls[${index}] (${name}) arguments not decodable: ${args.error}`);
    return null;
  }

  const invocation: Invocation = { name: name.trim(), arguments: args.value };
  if (typeof entry.id === 'string' && entry.id !== '') invocation.id = entry.id;
  return invocation;
}

function decodeEmbeddedObject(
  content: string,
  start: number,
  source: ParseStrategyName,
  diagnostics: string[]
): Invocation[] {
  const json = extractBalancedObject(content, start);
  if (json === null) {
    diagnostics.push(`${source}: unterminated JSON object: ${preview(content.slice(start))}`);
    return [];
  }

  const parsed = tryParseJson(json);
  if (!parsed.ok) {
    diagnostics.push(`${source}: invalid JSON (${parsed.error}): ${preview(json)}`);
    return [];
  }
  if (!isJsonObject(parsed.value)) {
    diagnostics.push(`${source}: tool call is not a JSON object`);
    return [];
  }

  const name = parsed.value.name;
  if (typeof name !== 'string' || name.trim() === '') {
    diagnostics.push(`${source}: tool call has no "name"`);
    return [];
  }

  const args = decodeArguments(parsed.value.arguments);
  if (!args.ok) {
    diagnostics.push(`${source}: arguments of ${name} not decodable: ${args.error}`);
    return [];
  }

  return [{ name: name.trim(), arguments: args.value }];
}

type DecodedArguments = { ok: true; value: JsonObject } | { ok: false; error: string };

/**
 * Arguments arrive as a mapping, a JSON-encoded mapping, or not at all.
 */
function decodeArguments(raw: unknown): DecodedArguments {
  if (raw === undefined || raw === null) return { ok: true, value: {} };

  if (typeof raw === 'string') {
    if (raw.trim() === '') return { ok: true, value: {} };
    const parsed = tryParseJson(raw);
    if (!parsed.ok) return { ok: false, error: parsed.error };
    if (!isJsonObject(parsed.value)) return { ok: false, error: 'arguments JSON is not an object' };
    return { ok: true, value: parsed.value };
  }

  if (isJsonObject(raw)) return { ok: true, value: raw };
  return { ok: false, error: `expected an object, got ${Array.isArray(raw) ? 'array' : typeof raw}` };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
