/**
 * actloop Configuration
 *
 * Centralized configuration loading from environment variables.
 * Use this module to access configuration throughout the application.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { PROVIDER_TYPES, type ProviderType } from '../agent/providers/provider-factory.js';
import { isLogLevel, type LogLevel } from '../shared/logger.js';

const ProviderTypeSchema = z.enum(PROVIDER_TYPES);

/**
 * Environment configuration interface
 */
export interface ActloopEnvConfig {
  // Model
  provider: ProviderType;
  baseUrl: string;
  apiKey?: string;
  anthropicApiKey?: string;
  model: string;
  maxTokens: number;
  temperature: number;

  // Loop
  maxRounds: number;
  compatMode: boolean;
  nativeToolCalling: boolean;
  parallelDispatch: boolean;

  // Environment
  workingDirectory: string;
  promptTemplatePath?: string;
  logLevel: LogLevel;
}

/**
 * Parse a boolean from environment variable
 */
function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse an integer from environment variable
 */
function parseInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a float from environment variable
 */
function parseFloat(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function parseLogLevel(value: string | undefined, defaultValue: LogLevel): LogLevel {
  const level = value?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : defaultValue;
}

function parseEnum<T extends string>(schema: z.ZodType<T>, value: string | undefined, defaultValue: T): T {
  if (value === undefined || value === '') return defaultValue;
  const result = schema.safeParse(value.toLowerCase());
  return result.success ? result.data : defaultValue;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ActloopEnvConfig {
  const anthropicApiKey = env.ANTHROPIC_API_KEY || undefined;
  const detectedProvider: ProviderType = anthropicApiKey ? 'anthropic' : 'openai-compatible';

  return {
    // Model
    provider: parseEnum(ProviderTypeSchema, env.ACTLOOP_LLM_PROVIDER, detectedProvider),
    baseUrl: env.ACTLOOP_LLM_BASE_URL || 'http://localhost:8000/v1',
    apiKey: env.ACTLOOP_LLM_API_KEY || undefined,
    anthropicApiKey,
    model: env.ACTLOOP_MODEL || 'Qwen3-8B',
    maxTokens: parseInt(env.ACTLOOP_MAX_TOKENS, 1024),
    temperature: parseFloat(env.ACTLOOP_TEMPERATURE, 0.7),

    // Loop
    maxRounds: parseInt(env.ACTLOOP_MAX_ROUNDS, 5),
    compatMode: parseBool(env.ACTLOOP_COMPAT_MODE, true),
    nativeToolCalling: parseBool(env.ACTLOOP_NATIVE_TOOLS, false),
    parallelDispatch: parseBool(env.ACTLOOP_PARALLEL_DISPATCH, false),

    // Environment
    workingDirectory: env.ACTLOOP_WORKING_DIR || process.cwd(),
    promptTemplatePath: env.ACTLOOP_PROMPT_TEMPLATE || undefined,
    logLevel: parseLogLevel(env.ACTLOOP_LOG_LEVEL, 'info'),
  };
}

/**
 * Cached configuration instance
 */
let cachedConfig: ActloopEnvConfig | null = null;

/**
 * Get configuration (loads once and caches)
 */
export function getConfig(): ActloopEnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset cached configuration (useful for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Validate required configuration
 */
export function validateConfig(config: ActloopEnvConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.provider === 'anthropic' && !config.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required when ACTLOOP_LLM_PROVIDER is anthropic');
  }

  if (config.provider === 'openai-compatible' && !/^https?:\/\//.test(config.baseUrl)) {
    errors.push('ACTLOOP_LLM_BASE_URL must be an http(s) URL');
  }

  if (config.promptTemplatePath) {
    const templatePath = path.resolve(config.workingDirectory, config.promptTemplatePath);
    if (!fs.existsSync(templatePath)) {
      errors.push(`ACTLOOP_PROMPT_TEMPLATE not found: ${templatePath}`);
    }
  }

  if (config.maxRounds < 1) {
    errors.push('ACTLOOP_MAX_ROUNDS must be at least 1');
  }

  if (config.maxTokens < 1) {
    errors.push('ACTLOOP_MAX_TOKENS must be at least 1');
  }

  if (config.temperature < 0 || config.temperature > 2) {
    errors.push('ACTLOOP_TEMPERATURE must be between 0 and 2');
  }

  return { valid: errors.length === 0, errors };
}
