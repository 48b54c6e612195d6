/**
 * actloop
 *
 * Execution core of a tool-using conversational agent:
 * - bounded think/act/observe round loop
 * - tool-call parser for structured, JSON-in-text and tagged formats
 * - capability registry and dispatcher with schema-checked arguments
 * - OpenAI-compatible and Anthropic model clients
 *
 * @module actloop
 */

// Core types
export * from './types/agent-types.js';

// Agent
export * from './agent/index.js';

// Configuration
export { getConfig, loadConfig, resetConfig, validateConfig } from './config/index.js';
export type { ActloopEnvConfig } from './config/index.js';

// Logging
export { createLogger, setLogLevel, isLogLevel, silentLogger } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';
