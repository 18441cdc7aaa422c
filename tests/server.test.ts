import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CheckMKError } from '../src/client.js';
import { DEFAULT_CONFIG } from '../src/config.js';
import { ACTIVATE_REMINDER, ENDPOINTS } from '../src/constants.js';
import { decodeValue, resolveValueRaw, RulesServer, toApiFolder } from '../src/server.js';
import type { ApiResponse, CheckMKApi, ToolResult } from '../src/types.js';

function fakeApi() {
  return {
    get: vi.fn<CheckMKApi['get']>(),
    post: vi.fn<CheckMKApi['post']>(),
    put: vi.fn<CheckMKApi['put']>(),
    delete: vi.fn<CheckMKApi['delete']>(),
  } satisfies CheckMKApi;
}

function ok(data: unknown, etag?: string): ApiResponse {
  return { status: 200, data, etag };
}

function textOf(result: ToolResult): string {
  return result.content.map((block) => block.text).join('\n');
}

function backupEntries(result: ToolResult): unknown {
  const [, json] = textOf(result).split('```json\n');
  return JSON.parse(json.split('\n```')[0]);
}

describe('toApiFolder', () => {
  it('should convert folder paths to tilde form', () => {
    expect(toApiFolder('/')).toBe('~');
    expect(toApiFolder('/hosts/linux')).toBe('~hosts~linux');
    expect(toApiFolder('hosts')).toBe('~hosts');
    expect(toApiFolder('~hosts~linux')).toBe('~hosts~linux');
    expect(toApiFolder('/linux/')).toBe('~linux');
  });
});

describe('resolveValueRaw', () => {
  it('should prefer value_raw over rule_config', () => {
    expect(resolveValueRaw("{'a': 1}", { b: 2 })).toBe("{'a': 1}");
  });

  it('should encode rule_config when value_raw is empty', () => {
    expect(resolveValueRaw('', [1])).toBe('(1,)');
    expect(resolveValueRaw(undefined, false)).toBe('False');
  });

  it('should treat a null rule_config as missing', () => {
    expect(resolveValueRaw(undefined, null)).toBeUndefined();
    expect(resolveValueRaw(undefined, undefined)).toBeUndefined();
  });
});

describe('decodeValue', () => {
  it('should decode valid literals and report broken ones', () => {
    expect(decodeValue("{'on': True}")).toEqual({ value: { on: true } });
    expect(decodeValue('(1, 2')).toEqual({
      value_error:
        "Unterminated tuple opened at offset 0: expected ',' or ')' but found end of input at offset 5",
    });
    expect(decodeValue(undefined)).toEqual({});
  });
});

describe('RulesServer', () => {
  let api: ReturnType<typeof fakeApi>;
  let server: RulesServer;

  beforeEach(() => {
    api = fakeApi();
    server = new RulesServer(DEFAULT_CONFIG, api);
  });

  describe('getRulesets', () => {
    it('should list rulesets with title and help', async () => {
      api.get.mockResolvedValueOnce(
        ok({
          value: [
            { id: 'memory_linux', extensions: { title: 'Memory', help: 'Levels for memory' } },
          ],
        })
      );

      const result = await server.getRulesets({});

      expect(api.get).toHaveBeenCalledWith(ENDPOINTS.RULESETS, { params: { search: undefined } });
      expect(result.isError).toBeUndefined();
      expect(textOf(result)).toBe(
        '📋 **Available Rulesets** (1 total):\n\n' +
          '📋 **memory_linux**\n   Title: Memory\n   Help: Levels for memory...'
      );
    });

    it('should pass the search term', async () => {
      api.get.mockResolvedValueOnce(ok({ value: [] }));

      const result = await server.getRulesets({ search: 'mem' });

      expect(api.get).toHaveBeenCalledWith(ENDPOINTS.RULESETS, { params: { search: 'mem' } });
      expect(textOf(result)).toBe(
        '📋 **No Rulesets Found**\n\nNo rulesets are available or match the search criteria.'
      );
    });

    it('should cap the listing', async () => {
      const value = Array.from({ length: 25 }, (_, i) => ({ id: `ruleset_${i}` }));
      api.get.mockResolvedValueOnce(ok({ value }));

      const text = textOf(await server.getRulesets({}));

      expect(text).toContain('(25 total)');
      expect(text).toContain('📋 **ruleset_19**');
      expect(text).not.toContain('📋 **ruleset_20**');
      expect(text.endsWith('... and 5 more rulesets')).toBe(true);
    });

    it('should report an unexpected response body', async () => {
      api.get.mockResolvedValueOnce(ok('oops'));

      const result = await server.getRulesets({});

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe(
        '❌ **CheckMK API Error (200)**\n\n' +
          '**Unexpected ruleset list response**\nExpected object, received string'
      );
    });
  });

  describe('getRuleset', () => {
    it('should show rule details', async () => {
      api.get.mockResolvedValueOnce(
        ok({
          value: [
            {
              id: 'r1',
              extensions: {
                value_raw: "{'a': 1}",
                folder: '/linux',
                conditions: {
                  host_name: { match_on: ['web01', 'web02'], operator: 'one_of' },
                  host_tags: [{}],
                },
                properties: { comment: 'web', disabled: true },
              },
            },
          ],
        })
      );

      const result = await server.getRuleset({ ruleset_name: 'memory' });

      expect(api.get).toHaveBeenCalledWith(ENDPOINTS.RULES, {
        params: { ruleset_name: 'memory' },
      });
      expect(textOf(result)).toBe(
        '📋 **Ruleset: memory**\n\nRules (1 total):\n\n' +
          '🔧 **Rule 1** (ID: r1)\n' +
          '   Status: 🔒 Disabled\n' +
          "   Value: {'a': 1}\n" +
          '   Folder: /linux\n' +
          '   Conditions: Hosts: web01, web02 (one_of), Tags: 1 conditions\n' +
          '   Comment: web'
      );
    });

    it('should say when a ruleset has no rules', async () => {
      api.get.mockResolvedValueOnce(ok({ value: [] }));

      const text = textOf(await server.getRuleset({ ruleset_name: 'memory' }));

      expect(text).toBe(
        '📋 **Ruleset: memory**\n\nRules (0 total):\n\nNo rules configured in this ruleset'
      );
    });

    it('should require ruleset_name', async () => {
      const result = await server.getRuleset({});

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe('❌ **Invalid arguments**\n\n- ruleset_name: Required');
      expect(api.get).not.toHaveBeenCalled();
    });
  });

  describe('createRule', () => {
    it('should convert rule_config and the folder', async () => {
      api.post.mockResolvedValueOnce(ok({ id: 'abc-123' }));

      const result = await server.createRule({
        ruleset_name: 'checkgroup_parameters:memory_linux',
        rule_config: { levels: ['perc_used', [80.5, 90.5]] },
        folder: '/linux/prod',
        comment: 'memory',
      });

      expect(api.post).toHaveBeenCalledWith(ENDPOINTS.RULES, {
        properties: { disabled: false, comment: 'memory' },
        value_raw: "{'levels': ('perc_used', (80.5, 90.5))}",
        conditions: {},
        ruleset: 'checkgroup_parameters:memory_linux',
        folder: '~linux~prod',
      });
      expect(textOf(result)).toBe(
        '✅ **Rule Created Successfully**\n\n' +
          'Ruleset: checkgroup_parameters:memory_linux\n' +
          'Rule ID: abc-123\n' +
          'Folder: /linux/prod\n' +
          "Value (raw): `{'levels': ('perc_used', (80.5, 90.5))}`\n" +
          'Comment: memory\n\n' +
          ACTIVATE_REMINDER
      );
    });

    it('should send value_raw unchanged and default to the root folder', async () => {
      api.post.mockResolvedValueOnce(ok({ id: 'r9' }));

      await server.createRule({
        ruleset_name: 'host_groups',
        value_raw: "'linux'",
        rule_config: 'ignored',
        conditions: { host_tags: [] },
      });

      expect(api.post).toHaveBeenCalledWith(ENDPOINTS.RULES, {
        properties: { disabled: false },
        value_raw: "'linux'",
        conditions: { host_tags: [] },
        ruleset: 'host_groups',
        folder: '~',
      });
    });

    it('should require a value', async () => {
      const result = await server.createRule({ ruleset_name: 'host_groups' });

      expect(result.isError).toBe(true);
      expect(textOf(result).startsWith('❌ **Missing parameter**\n\nEither `value_raw` or `rule_config`')).toBe(true);
      expect(api.post).not.toHaveBeenCalled();
    });

    it('should format API errors with field details', async () => {
      api.post.mockRejectedValueOnce(
        new CheckMKError('Bad Request', 400, {
          title: 'Bad Request',
          detail: 'These fields have problems: value_raw',
          fields: { value_raw: ['Invalid literal'] },
        })
      );

      const result = await server.createRule({ ruleset_name: 'host_groups', rule_config: 'linux' });

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe(
        '❌ **CheckMK API Error (400)**\n\n' +
          '**Bad Request**\n' +
          'These fields have problems: value_raw\n' +
          '- `value_raw`: Invalid literal'
      );
    });
  });

  describe('updateRule', () => {
    it('should send only the given fields with If-Match', async () => {
      api.put.mockResolvedValueOnce(ok({ id: 'r1' }));

      const result = await server.updateRule({ rule_id: 'r1', comment: 'new', disabled: true });

      expect(api.put).toHaveBeenCalledWith(
        'objects/rule/r1',
        { properties: { comment: 'new', disabled: true } },
        { headers: { 'If-Match': '*' } }
      );
      expect(textOf(result)).toBe(
        '✅ **Rule Updated Successfully**\n\nRule ID: r1\nUpdated fields: properties\n\n' +
          ACTIVATE_REMINDER
      );
    });

    it('should encode a new value', async () => {
      api.put.mockResolvedValueOnce(ok(null));

      await server.updateRule({ rule_id: 'r1', rule_config: [80.5, 90.5] });

      expect(api.put).toHaveBeenCalledWith(
        'objects/rule/r1',
        { value_raw: '(80.5, 90.5)' },
        { headers: { 'If-Match': '*' } }
      );
    });

    it('should refuse an empty update', async () => {
      const result = await server.updateRule({ rule_id: 'r1', conditions: {} });

      expect(textOf(result)).toBe(
        '❌ **No data to update**\n\nAt least one field must be provided'
      );
      expect(api.put).not.toHaveBeenCalled();
    });
  });

  describe('deleteRule', () => {
    it('should delete by rule ID', async () => {
      api.delete.mockResolvedValueOnce({ status: 204, data: null });

      const result = await server.deleteRule({ rule_id: 'r1' });

      expect(api.delete).toHaveBeenCalledWith('objects/rule/r1');
      expect(textOf(result)).toContain('Rule ID: r1');
      expect(result.isError).toBeUndefined();
    });
  });

  describe('moveRule', () => {
    it('should need a target for relative positions', async () => {
      const result = await server.moveRule({ rule_id: 'r1', position: 'before' });

      expect(textOf(result)).toBe(
        '❌ **Missing parameter**\n\ntarget_rule_id is required for before/after positioning'
      );
      expect(api.post).not.toHaveBeenCalled();
    });

    it('should move relative to a target rule', async () => {
      api.post.mockResolvedValueOnce(ok(null));

      const result = await server.moveRule({ rule_id: 'r1', position: 'after', target_rule_id: 'r2' });

      expect(api.post).toHaveBeenCalledWith('objects/rule/r1/actions/move/invoke', {
        position: 'after',
        target_rule: 'r2',
      });
      expect(textOf(result)).toBe(
        '✅ **Rule Moved Successfully**\n\nRule ID: r1\nNew Position: after\nTarget Rule: r2\n\n' +
          ACTIVATE_REMINDER
      );
    });

    it('should default to the top and reject unknown positions', async () => {
      api.post.mockResolvedValueOnce(ok(null));

      await server.moveRule({ rule_id: 'r1' });
      expect(api.post).toHaveBeenCalledWith('objects/rule/r1/actions/move/invoke', {
        position: 'top',
      });

      const result = await server.moveRule({ rule_id: 'r1', position: 'middle' });
      expect(result.isError).toBe(true);
      expect(textOf(result).startsWith('❌ **Invalid arguments**\n\n- position: ')).toBe(true);
    });
  });

  describe('backupRuleset', () => {
    it('should include decoded values next to value_raw', async () => {
      api.get.mockResolvedValueOnce(
        ok({
          value: [
            {
              id: 'r1',
              extensions: {
                ruleset: 'memory',
                folder: '/',
                value_raw: "{'levels': (80.0, 90.0)}",
                conditions: {},
                properties: { disabled: false },
              },
            },
            { id: 'r2', extensions: { value_raw: "{'broken': (" } },
          ],
        })
      );

      const result = await server.backupRuleset({ ruleset_name: 'memory' });
      const text = textOf(result);

      expect(text.startsWith('📋 **Ruleset Backup: memory**\n\nRules: 2\n\n⚠️ 1 value(s)')).toBe(true);
      expect(backupEntries(result)).toEqual([
        {
          rule_id: 'r1',
          value_raw: "{'levels': (80.0, 90.0)}",
          value: { levels: [80, 90] },
          conditions: {},
          properties: { disabled: false },
          folder: '/',
          ruleset: 'memory',
        },
        {
          rule_id: 'r2',
          value_raw: "{'broken': (",
          value_error:
            "Unterminated tuple opened at offset 11: expected a value or ')' but found end of input at offset 12",
          conditions: {},
          properties: {},
          folder: '/',
          ruleset: 'memory',
        },
      ]);
    });

    it('should say when there is nothing to back up', async () => {
      api.get.mockResolvedValueOnce(ok({ value: [] }));

      const text = textOf(await server.backupRuleset({ ruleset_name: 'memory' }));

      expect(text).toBe('📋 **Ruleset Backup: memory**\n\nNo rules found in this ruleset.');
    });
  });

  describe('restoreRuleset', () => {
    it('should recreate rules in order and report each entry', async () => {
      let created = 0;
      api.post.mockImplementation(async (path) => {
        if (path === ENDPOINTS.RULES) {
          created++;
          return ok({ id: `new-${created}` });
        }
        return { status: 204, data: null };
      });

      const result = await server.restoreRuleset({
        rules: [
          {
            rule_id: 'r1',
            value_raw: "{'a': 1}",
            ruleset: 'memory',
            folder: '/linux',
            properties: { comment: 'c' },
          },
          { rule_id: 'r2', value: { b: [1] }, ruleset: 'memory' },
          { rule_id: 'r3', ruleset: 'memory' },
        ],
      });

      expect(api.post).toHaveBeenNthCalledWith(1, ENDPOINTS.RULES, {
        properties: { disabled: false, comment: 'c' },
        value_raw: "{'a': 1}",
        conditions: {},
        ruleset: 'memory',
        folder: '~linux',
      });
      expect(api.post).toHaveBeenNthCalledWith(2, 'objects/rule/new-1/actions/move/invoke', {
        position: 'bottom',
      });
      expect(api.post).toHaveBeenNthCalledWith(3, ENDPOINTS.RULES, {
        properties: { disabled: false },
        value_raw: "{'b': (1,)}",
        conditions: {},
        ruleset: 'memory',
        folder: '~',
      });
      expect(api.post).toHaveBeenCalledTimes(4);
      expect(result.isError).toBeUndefined();
      expect(textOf(result)).toBe(
        '♻️ **Ruleset Restore**\n\n' +
          'Restored: 2 of 3\n\n' +
          '✅ r1 → new-1\n' +
          '✅ r2 → new-2\n' +
          '❌ r3: entry has neither value_raw nor value\n\n' +
          ACTIVATE_REMINDER
      );
    });

    it('should apply ruleset and folder overrides', async () => {
      api.post.mockResolvedValueOnce(ok({ id: 'n1' })).mockResolvedValueOnce(ok(null));

      await server.restoreRuleset({
        rules: [{ value_raw: 'True', ruleset: 'old', folder: '/old' }],
        ruleset_name: 'new',
        folder: '/new',
      });

      expect(api.post).toHaveBeenNthCalledWith(1, ENDPOINTS.RULES, {
        properties: { disabled: false },
        value_raw: 'True',
        conditions: {},
        ruleset: 'new',
        folder: '~new',
      });
    });

    it('should count a created rule that could not be moved', async () => {
      api.post
        .mockResolvedValueOnce(ok({ id: 'new-1' }))
        .mockRejectedValueOnce(
          new CheckMKError('Conflict', 409, { title: 'Conflict', detail: 'Folder is locked' })
        );

      const result = await server.restoreRuleset({
        rules: [{ rule_id: 'r1', value_raw: 'True', ruleset: 'memory' }],
      });

      expect(api.post).toHaveBeenCalledTimes(2);
      expect(result.isError).toBeUndefined();
      expect(textOf(result)).toBe(
        '♻️ **Ruleset Restore**\n\n' +
          'Restored: 1 of 1\n\n' +
          '⚠️ r1 → new-1 (not moved: **Conflict** Folder is locked)\n\n' +
          ACTIVATE_REMINDER
      );
    });

    it('should keep going after API errors and flag total failure', async () => {
      api.post.mockRejectedValue(
        new CheckMKError('Not Found', 404, { title: 'Not Found', detail: 'Unknown ruleset' })
      );

      const result = await server.restoreRuleset({
        rules: [
          { rule_id: 'r1', value_raw: '1', ruleset: 'nope' },
          { rule_id: 'r2', value_raw: '2', ruleset: 'nope' },
        ],
      });

      expect(result.isError).toBe(true);
      expect(textOf(result)).toContain('Restored: 0 of 2');
      expect(textOf(result)).toContain('❌ r1: **Not Found** Unknown ruleset');
      expect(textOf(result)).toContain('❌ r2: **Not Found** Unknown ruleset');
    });

    it('should require at least one entry', async () => {
      const result = await server.restoreRuleset({ rules: [] });

      expect(textOf(result)).toBe(
        '❌ **Invalid arguments**\n\n- rules: rules must contain at least one entry'
      );
    });
  });

  describe('convertRuleValue', () => {
    it('should work without a connection', async () => {
      const offline = new RulesServer(DEFAULT_CONFIG);

      const result = await offline.convertRuleValue({ rule_config: ['perc_used', [80.5, 90.5]] });

      expect(textOf(result)).toBe(
        "🔁 **JSON → Literal**\n\nvalue_raw: `('perc_used', (80.5, 90.5))`"
      );
    });

    it('should decode value_raw', async () => {
      const result = await server.convertRuleValue({ value_raw: '(90.0, 95.0)' });

      expect(textOf(result)).toBe(
        '🔁 **Literal → JSON**\n\nNormalized: `(90.0, 95.0)`\n\n```json\n[\n  90,\n  95\n]\n```'
      );
    });

    it('should report parse errors', async () => {
      const result = await server.convertRuleValue({ value_raw: "{'a': (1, 2" });

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe(
        '❌ **Invalid literal**\n\n' +
          "Unterminated tuple opened at offset 6: expected ',' or ')' but found end of input at offset 11"
      );
    });

    it('should need exactly one input', async () => {
      const both = await server.convertRuleValue({ rule_config: 1, value_raw: '1' });
      const neither = await server.convertRuleValue({});

      expect(textOf(both)).toBe(
        '❌ **Invalid arguments**\n\nProvide exactly one of `rule_config` or `value_raw`'
      );
      expect(textOf(neither)).toBe(textOf(both));
    });
  });

  describe('change activation', () => {
    it('should list pending changes', async () => {
      api.get.mockResolvedValueOnce(
        ok({
          value: [
            {
              id: 'c1',
              extensions: { text: 'Created rule', user_id: 'automation', time: '2026-01-01T00:00:00Z' },
            },
          ],
        })
      );

      const text = textOf(await server.getPendingChanges({}));

      expect(api.get).toHaveBeenCalledWith(ENDPOINTS.PENDING_CHANGES);
      expect(text).toBe(
        '📋 **Pending Changes** (1):\n\n• Created rule by automation at 2026-01-01T00:00:00Z'
      );
    });

    it('should activate with the pending changes ETag', async () => {
      api.get.mockResolvedValueOnce(ok({ value: [] }, '"abc"'));
      api.post.mockResolvedValueOnce(ok({ id: 'act-1', extensions: { sites: ['main'] } }));

      const result = await server.activateChanges({});

      expect(api.post).toHaveBeenCalledWith(
        ENDPOINTS.ACTIVATE_CHANGES,
        { redirect: false, sites: [], force_foreign_changes: false },
        { headers: { 'If-Match': '"abc"' } }
      );
      expect(textOf(result)).toBe(
        '🔄 **Changes Activation Started**\n\nActivation ID: act-1\nSites: main'
      );
    });
  });

  describe('configuration', () => {
    it('should report missing settings on the first API call', async () => {
      const unconfigured = new RulesServer(DEFAULT_CONFIG);

      const result = await unconfigured.getRulesets({});

      expect(result.isError).toBe(true);
      const text = textOf(result);
      expect(text.startsWith('❌ **CheckMK Configuration Error**\n\n- CHECKMK_SERVER_URL is not set')).toBe(true);
      expect(text).toContain('Please set the required environment variables:\n- CHECKMK_SERVER_URL');
    });
  });

  describe('routes', () => {
    it('should route every tool to a handler', async () => {
      const routes = new Map(server.routes());
      const convert = routes.get('checkmk_convert_rule_value');

      expect(routes.size).toBe(11);
      expect(convert).toBeDefined();
      const result = await convert?.({ rule_config: true });
      expect(result && textOf(result)).toBe('🔁 **JSON → Literal**\n\nvalue_raw: `True`');
    });
  });
});
