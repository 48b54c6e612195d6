/**
 * Wires an AgentLoop from the environment configuration.
 */

import type { ActloopEnvConfig } from '../config/index.js';
import { AgentLoop } from '../agent/agent-loop.js';
import type { RunEventListener } from '../agent/run-events.js';
import { PromptBuilder } from '../agent/prompt-builder.js';
import { ToolRegistry } from '../agent/tool-registry.js';
import { createBuiltinTools } from '../agent/tools/index.js';
import { createProvider } from '../agent/providers/provider-factory.js';

export interface AgentOverrides {
  maxRounds?: number;
  nativeToolCalling?: boolean;
  onEvent?: RunEventListener;
}

export function createAgent(config: ActloopEnvConfig, overrides: AgentOverrides = {}): AgentLoop {
  const provider = createProvider({
    type: config.provider,
    anthropicApiKey: config.anthropicApiKey,
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    model: config.model,
    maxTokens: config.maxTokens,
  });

  const nativeToolCalling = overrides.nativeToolCalling ?? config.nativeToolCalling;

  return new AgentLoop({
    provider,
    registry: new ToolRegistry(createBuiltinTools()),
    promptBuilder: new PromptBuilder({
      workingDirectory: config.workingDirectory,
      templatePath: config.promptTemplatePath,
    }),
    maxRounds: overrides.maxRounds ?? config.maxRounds,
    // Native tool calls need the tool role on the wire
    compatMode: nativeToolCalling ? false : config.compatMode,
    nativeToolCalling,
    parallelDispatch: config.parallelDispatch,
    model: config.model,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    workingDirectory: config.workingDirectory,
    onEvent: overrides.onEvent,
  });
}
