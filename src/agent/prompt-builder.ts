/**
 * Prompt Builder
 *
 * Renders the per-round system prompt: the live tool catalog, the host OS
 * family and a short listing of the working directory, substituted into a
 * template. A template file, when configured, is cached with mtime-based
 * invalidation.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigError, errorMessageOf } from './errors.js';
import type { CapabilitySpec } from './tools/types.js';

export interface PromptBuilderConfig {
  workingDirectory: string;
  /** Template text; overrides the built-in template */
  template?: string;
  /** Template file, re-read when its mtime changes */
  templatePath?: string;
  /** Maximum number of file names listed (default: 10) */
  maxFiles?: number;
  /** Defaults to process.platform */
  platform?: NodeJS.Platform;
}

export interface PromptValues {
  tool_list: string;
  operating_system: string;
  file_list: string;
}

export const DEFAULT_SYSTEM_PROMPT = `You are an AI assistant that can call tools. To solve the user's problem, follow the loop "think -> act -> observe -> final answer".

## Available tools
\${tool_list}

## Output format

### When you need a tool
<think>
Plan the steps here.
</think>
Action: {"name": "tool name", "arguments": {"parameter": "value"}}

### When you can answer
<think>
Work out the answer from the tool results.
</think>
final_answer: the reply for the user

## Rules
1. Never put Action and final_answer in the same reply.
2. After a "[Tool xxx result]" message, decide whether to call another tool or answer.
3. Prefer calling tools over asking questions; use reasonable defaults for missing details.
4. Do not call the same tool again for a result you already have.

## Environment
- OS: \${operating_system}
- Files: \${file_list}`;

const OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  darwin: 'macOS',
  win32: 'Windows',
  linux: 'Linux',
};

export class PromptBuilder {
  private config: PromptBuilderConfig;
  private cache: { content: string; mtimeMs: number } | null = null;

  /**
   * @throws ConfigError when `templatePath` does not name a readable file
   */
  constructor(config: PromptBuilderConfig) {
    this.config = config;
    if (config.template === undefined && config.templatePath) {
      this.getTemplate();
    }
  }

  buildSystemPrompt(specs: CapabilitySpec[]): string {
    return renderTemplate(this.getTemplate(), {
      tool_list: formatToolList(specs),
      operating_system: this.getOsName(),
      file_list: this.getFileList(),
    });
  }

  getOsName(): string {
    return OS_NAMES[this.config.platform ?? process.platform] ?? 'Unknown';
  }

  getFileList(): string {
    const maxFiles = this.config.maxFiles ?? 10;
    try {
      const files = fs
        .readdirSync(this.config.workingDirectory, { withFileTypes: true })
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .sort()
        .slice(0, maxFiles);
      return files.length > 0 ? files.join(', ') : 'no files';
    } catch {
      return 'unavailable';
    }
  }

  private getTemplate(): string {
    if (this.config.template !== undefined) return this.config.template;
    if (!this.config.templatePath) return DEFAULT_SYSTEM_PROMPT;

    const filePath = path.resolve(this.config.workingDirectory, this.config.templatePath);
    try {
      const mtimeMs = fs.statSync(filePath).mtimeMs;
      if (this.cache && this.cache.mtimeMs === mtimeMs) {
        return this.cache.content;
      }

      const content = fs.readFileSync(filePath, 'utf8');
      this.cache = { content, mtimeMs };
      return content;
    } catch (error) {
      throw new ConfigError([`Prompt template ${filePath} could not be read: ${errorMessageOf(error)}`]);
    }
  }
}

/**
 * Replace `${tool_list}`, `${operating_system}` and `${file_list}`. Other
 * `${...}` sequences are left untouched.
 */
export function renderTemplate(template: string, values: PromptValues): string {
  return template.replace(/\$\{(tool_list|operating_system|file_list)\}/g, (_, key: keyof PromptValues) => values[key]);
}

export function formatToolList(specs: CapabilitySpec[]): string {
  if (specs.length === 0) return 'No tools available';

  return specs
    .map((spec) => {
      const params = Object.entries(propertiesOf(spec.parameters))
        .map(([name, schema]) => `${name}: ${descriptionOf(schema)}`)
        .join(', ');
      return `- ${spec.name}: ${spec.description}\n  Parameters: ${params || 'none'}`;
    })
    .join('\n');
}

function propertiesOf(schema: Record<string, unknown>): Record<string, unknown> {
  const properties = schema.properties;
  return typeof properties === 'object' && properties !== null && !Array.isArray(properties)
    ? { ...properties }
    : {};
}

function descriptionOf(schema: unknown): string {
  if (typeof schema === 'object' && schema !== null && 'description' in schema) {
    return typeof schema.description === 'string' ? schema.description : '';
  }
  return '';
}
