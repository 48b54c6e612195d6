/**
 * Capability Types
 *
 * Declarative tool definition format: a name, a description, a TypeBox
 * parameter schema and an execute function.
 */

import type { Static, TObject } from '@sinclair/typebox';
import type { Logger } from '../../shared/logger.js';

export interface CapabilityContext {
  /** Directory file tools resolve relative paths against */
  workingDirectory: string;
  logger: Logger;
  signal?: AbortSignal;
}

export interface Capability<TParams extends TObject = TObject> {
  name: string;
  description: string;
  parameters: TParams;
  execute(args: Static<TParams>, ctx: CapabilityContext): string | Promise<string>;
}

/**
 * Capability description in the shape prompts and function-calling fields expect.
 */
export interface CapabilitySpec {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

/** OpenAI `tools` entry */
export interface FunctionSpec {
  type: 'function';
  function: CapabilitySpec;
}

/**
 * Define a capability with its argument type inferred from the schema.
 */
export function defineCapability<TParams extends TObject>(capability: Capability<TParams>): Capability {
  return capability;
}
