/**
 * Tools command - print the capability catalog
 */

import { ToolRegistry } from '../../agent/tool-registry.js';
import { createBuiltinTools } from '../../agent/tools/index.js';
import { renderToolCatalog } from '../repl/display.js';

export function toolsCommand(): void {
  const registry = new ToolRegistry(createBuiltinTools());
  console.log(renderToolCatalog(registry.specs()));
}
