/**
 * Rendering for the CLI: run results, progress events, the tool catalog and
 * errors. Functions return strings; the commands decide where they go.
 */

import type { AgentRunResult } from '../../types/agent-types.js';
import type { CapabilitySpec } from '../../agent/tools/types.js';
import type { RunEvent } from '../../agent/run-events.js';
import { ConfigError, errorMessageOf } from '../../agent/errors.js';
import { formatToolList } from '../../agent/prompt-builder.js';

const STYLES = {
  bold: [1, 22],
  dim: [2, 22],
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  magenta: [35, 39],
} as const;

export type Style = keyof typeof STYLES;

let colorEnabled = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined;

export function setColorEnabled(enabled: boolean): void {
  colorEnabled = enabled;
}

export function paint(text: string, ...styles: Style[]): string {
  if (!colorEnabled) return text;
  return styles.reduce((out, style) => `\x1b[${STYLES[style][0]}m${out}\x1b[${STYLES[style][1]}m`, text);
}

export function renderSummary(result: AgentRunResult): string {
  return `${result.rounds} round(s) · ${result.toolCalls.length} tool call(s) · ${result.usage.totalTokens} tokens`;
}

export function renderResult(result: AgentRunResult): string {
  const heading =
    result.outcome === 'done'
      ? paint('Answer', 'magenta', 'bold')
      : paint('No final answer (round budget used up)', 'yellow', 'bold');
  return [heading, result.response, paint(renderSummary(result), 'dim')].join('\n');
}

/**
 * One status line per progress event; thinking and completion are left to the
 * caller's prompt and result output.
 */
export function renderRunEvent(event: RunEvent): string | null {
  switch (event.eventType) {
    case 'tool_start':
      return paint(`  → ${event.toolName}`, 'dim');
    case 'tool_result':
      return event.status === 'completed'
        ? paint(`  ✓ ${event.toolName}`, 'dim')
        : paint(`  ✗ ${event.toolName} (${event.errorKind ?? 'error'})`, 'yellow');
    default:
      return null;
  }
}

export function renderToolCatalog(specs: CapabilitySpec[]): string {
  const title = `Available tools (${specs.length})`;
  return [paint(title, 'bold'), paint('─'.repeat(title.length), 'dim'), formatToolList(specs)].join('\n');
}

export function renderError(err: unknown): string {
  if (err instanceof ConfigError) {
    return paint(['Configuration problems:', ...err.errors.map((line) => `  - ${line}`)].join('\n'), 'red');
  }
  return paint(`Error: ${errorMessageOf(err)}`, 'red');
}

export function renderInfo(message: string): string {
  return paint(message, 'cyan');
}
