/**
 * Tool Registry
 *
 * Name-keyed map of capabilities. Filled at construction time and read-only
 * while a loop runs, so one registry can back several loops.
 */

import type { Capability, CapabilitySpec, FunctionSpec } from './tools/types.js';
import { DuplicateCapabilityError } from './errors.js';

export class ToolRegistry {
  private tools = new Map<string, Capability>();

  constructor(capabilities: Iterable<Capability> = []) {
    this.registerMany(capabilities);
  }

  /**
   * @throws DuplicateCapabilityError when the name is already taken
   */
  register(capability: Capability): void {
    if (this.tools.has(capability.name)) {
      throw new DuplicateCapabilityError(capability.name);
    }
    this.tools.set(capability.name, capability);
  }

  registerMany(capabilities: Iterable<Capability>): void {
    for (const capability of capabilities) {
      this.register(capability);
    }
  }

  get(name: string): Capability | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  all(): Capability[] {
    return Array.from(this.tools.values());
  }

  get size(): number {
    return this.tools.size;
  }

  specs(): CapabilitySpec[] {
    return this.all().map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: toPlainSchema(tool.parameters),
    }));
  }

  functionSpecs(): FunctionSpec[] {
    return this.specs().map((spec) => ({ type: 'function', function: spec }));
  }
}

/**
 * TypeBox schemas carry symbol-keyed metadata; a JSON round trip leaves the
 * plain JSON Schema document.
 */
function toPlainSchema(schema: object): Record<string, unknown> {
  const plain: unknown = JSON.parse(JSON.stringify(schema));
  return isRecord(plain) ? plain : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
