import { describe, it, expect, afterEach, vi } from 'vitest';
import { DEFAULT_CONFIG } from '../src/config.js';
import { createToolRouter, routeToolCall } from '../src/router.js';
import { RULE_TOOLS } from '../src/schema.js';
import { RulesServer } from '../src/server.js';
import type { ToolHandler } from '../src/types.js';

const echo: ToolHandler = async (args) => ({
  content: [{ type: 'text', text: JSON.stringify(args) }],
});

describe('createToolRouter', () => {
  it('should reject duplicate tool names', () => {
    expect(() =>
      createToolRouter([
        ['checkmk_echo', echo],
        ['checkmk_echo', echo],
      ])
    ).toThrow('Tool registered twice: checkmk_echo');
  });

  it('should serve every advertised tool', () => {
    const router = createToolRouter(new RulesServer(DEFAULT_CONFIG).routes());

    expect([...router.keys()].sort()).toEqual(RULE_TOOLS.map((tool) => tool.name).sort());
  });
});

describe('routeToolCall', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should dispatch arguments to the handler', async () => {
    const router = createToolRouter([['checkmk_echo', echo]]);

    const result = await routeToolCall(router, 'checkmk_echo', { a: 1 });

    expect(result).toEqual({ content: [{ type: 'text', text: '{"a":1}' }] });
  });

  it('should default missing arguments to an empty object', async () => {
    const router = createToolRouter([['checkmk_echo', echo]]);

    const result = await routeToolCall(router, 'checkmk_echo');

    expect(result.content[0].text).toBe('{}');
  });

  it('should report unknown tools', async () => {
    const router = createToolRouter([['checkmk_echo', echo]]);

    const result = await routeToolCall(router, 'checkmk_nope', {});

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Unknown tool: checkmk_nope' }],
      isError: true,
    });
  });

  it('should turn handler failures into error results', async () => {
    const log = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const router = createToolRouter([
      [
        'checkmk_broken',
        async () => {
          throw new Error('boom');
        },
      ],
    ]);

    const result = await routeToolCall(router, 'checkmk_broken', {});

    expect(result).toEqual({
      content: [{ type: 'text', text: '❌ **Internal error in checkmk_broken**\n\nboom' }],
      isError: true,
    });
    expect(log).toHaveBeenCalledTimes(1);
  });
});
