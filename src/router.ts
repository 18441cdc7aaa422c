/**
 * Tool routing table, built once at startup
 */

import { errorResponse } from './format.js';
import type { ToolArguments, ToolHandler, ToolResult } from './types.js';

export type ToolRouter = ReadonlyMap<string, ToolHandler>;

/**
 * Build a frozen name -> handler table
 *
 * @throws Error when a tool name is registered twice
 */
export function createToolRouter(routes: Iterable<[string, ToolHandler]>): ToolRouter {
  const table = new Map<string, ToolHandler>();
  for (const [name, handler] of routes) {
    if (table.has(name)) {
      throw new Error(`Tool registered twice: ${name}`);
    }
    table.set(name, handler);
  }
  return table;
}

export async function routeToolCall(
  router: ToolRouter,
  name: string,
  args: ToolArguments = {}
): Promise<ToolResult> {
  const handler = router.get(name);
  if (!handler) {
    return {
      content: [{ type: 'text', text: `Unknown tool: ${name}` }],
      isError: true,
    };
  }

  try {
    return await handler(args);
  } catch (error) {
    console.error(`❌ Tool ${name} failed:`, error);
    return errorResponse(
      `Internal error in ${name}`,
      error instanceof Error ? error.message : String(error)
    );
  }
}
