/**
 * Tool Dispatcher
 *
 * Turns each invocation into exactly one observation. Missing tools, bad
 * arguments and thrown errors are reported back to the model as text; nothing
 * here throws.
 */

import { Value } from '@sinclair/typebox/value';
import type { Invocation, Observation } from '../types/agent-types.js';
import type { Capability, CapabilityContext } from './tools/types.js';
import type { ToolRegistry } from './tool-registry.js';
import { InvalidArgumentsError, errorMessageOf, errorTypeOf } from './errors.js';
import { preview } from './json-extract.js';

/** Validation issues listed per observation */
const MAX_REPORTED_ISSUES = 5;

export interface DispatchOptions {
  /** Run the batch concurrently; observations keep invocation order either way */
  parallel?: boolean;
}

export class ToolDispatcher {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly context: CapabilityContext
  ) {}

  async dispatch(invocation: Invocation): Promise<Observation> {
    const capability = this.registry.get(invocation.name);
    if (!capability) {
      return this.failure(invocation, 'not_found', notFoundMessage(invocation.name, this.registry.names()));
    }

    const args = invocation.arguments;
    if (!Value.Check(capability.parameters, args)) {
      const issues = [...Value.Errors(capability.parameters, args)]
        .slice(0, MAX_REPORTED_ISSUES)
        .map((issue) => `${issue.path || '/'} ${issue.message}`);
      return this.failure(invocation, 'invalid_arguments', invalidArgumentsMessage(capability, issues));
    }

    this.context.logger.info(`Executing tool: ${invocation.name}`);
    try {
      const content = await capability.execute(args, this.context);
      this.context.logger.info(`${invocation.name} completed`);
      return withCallId({ toolName: invocation.name, content, isError: false }, invocation);
    } catch (error) {
      if (error instanceof InvalidArgumentsError) {
        return this.failure(invocation, 'invalid_arguments', invalidArgumentsMessage(capability, [error.message]));
      }
      return this.failure(
        invocation,
        'execution_failed',
        `Error: tool "${invocation.name}" failed (${errorTypeOf(error)}): ${errorMessageOf(error)}`
      );
    }
  }

  /**
   * Dispatch a round's invocations. The returned array is in invocation order.
   */
  async dispatchAll(invocations: Invocation[], options: DispatchOptions = {}): Promise<Observation[]> {
    if (options.parallel) {
      return Promise.all(invocations.map((invocation) => this.dispatch(invocation)));
    }

    const observations: Observation[] = [];
    for (const invocation of invocations) {
      observations.push(await this.dispatch(invocation));
    }
    return observations;
  }

  private failure(invocation: Invocation, errorKind: Observation['errorKind'], content: string): Observation {
    this.context.logger.warn(`${invocation.name} FAILED: ${preview(content, 300)}`);
    return withCallId({ toolName: invocation.name, content, isError: true, errorKind }, invocation);
  }
}

/**
 * Observation for an invocation that was never run because the run was cancelled.
 */
export function cancelledObservation(invocation: Invocation): Observation {
  return withCallId(
    {
      toolName: invocation.name,
      content: `Error: tool "${invocation.name}" was not run because the run was cancelled`,
      isError: true,
      errorKind: 'cancelled',
    },
    invocation
  );
}

function notFoundMessage(name: string, available: string[]): string {
  const list = available.length > 0 ? available.join(', ') : 'none';
  return `Error: tool "${name}" not found. Available tools: ${list}`;
}

function invalidArgumentsMessage(capability: Capability, issues: string[]): string {
  const schema = JSON.stringify(capability.parameters);
  return `Error: invalid arguments for tool "${capability.name}": ${issues.join('; ')}. Expected parameters: ${schema}`;
}

function withCallId(observation: Observation, invocation: Invocation): Observation {
  return invocation.id !== undefined ? { ...observation, toolCallId: invocation.id } : observation;
}
