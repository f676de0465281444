import { NotFoundError } from './errors.js';
import type { CatalogIndex, ToolDescriptor } from './types.js';

/**
 * Full descriptor for one tool. Schemas are expanded when the index is
 * built, so this never re-walks the reference graph.
 */
export function resolve(index: CatalogIndex, toolName: string): ToolDescriptor {
  const tool = index.tools.get(toolName);
  if (!tool) throw new NotFoundError(toolName);
  return tool;
}
