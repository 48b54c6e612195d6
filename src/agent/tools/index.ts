/**
 * Tool Index
 *
 * Built-in capabilities registered by the CLI.
 */

export type { Capability, CapabilityContext, CapabilitySpec, FunctionSpec } from './types.js';
export { defineCapability } from './types.js';
export { calculatorTool, evaluate } from './calculator.js';
export { searchTool } from './search.js';
export { addFileTool, readFileTool, fileTools, resolveInWorkingDirectory } from './file-ops.js';

import type { Capability } from './types.js';
import { calculatorTool } from './calculator.js';
import { searchTool } from './search.js';
import { fileTools } from './file-ops.js';

export function createBuiltinTools(): Capability[] {
  return [calculatorTool, searchTool, ...fileTools()];
}
