/**
 * MCP Tool schema definitions for the rule management tools
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { MOVE_POSITIONS, TOOL_NAMES } from './constants.js';

const RULE_CONFIG_DESCRIPTION = `Rule value as JSON. Converted to CheckMK's literal syntax:
- objects become dicts with quoted keys
- arrays become tuples ([1] -> (1,))
- ["tag", [a, b]] becomes ('tag', (a, b))
- true/false/null become True/False/None
- strings that are complete literals, such as "(1, 2)" or "None", are sent unquoted
Whole-number values are sent as integers; use value_raw when a rule needs 90.0.`;

const VALUE_RAW_DESCRIPTION =
  'Rule value in CheckMK literal syntax, passed to the API unchanged. Takes priority over rule_config. ' +
  "Example: \"{'levels': ('perc_used', (90.0, 95.0))}\"";

const RULE_VALUE_TYPES = ['object', 'array', 'string', 'number', 'boolean'];

export const GET_RULESETS_TOOL: Tool = {
  name: TOOL_NAMES.GET_RULESETS,
  description: '📋 List rulesets - Show available rulesets',
  inputSchema: {
    type: 'object',
    properties: {
      search: { type: 'string', description: 'Search term to filter rulesets' },
    },
  },
};

export const GET_RULESET_TOOL: Tool = {
  name: TOOL_NAMES.GET_RULESET,
  description: '📋 Get ruleset - Show the rules configured in a ruleset',
  inputSchema: {
    type: 'object',
    properties: {
      ruleset_name: { type: 'string', description: 'Ruleset name' },
    },
    required: ['ruleset_name'],
  },
};

export const CREATE_RULE_TOOL: Tool = {
  name: TOOL_NAMES.CREATE_RULE,
  description:
    '➕ Create rule - Add a new monitoring rule. Use value_raw for complex literal values (checkgroup_parameters etc.)',
  inputSchema: {
    type: 'object',
    properties: {
      ruleset_name: { type: 'string', description: 'Ruleset name' },
      rule_config: { type: RULE_VALUE_TYPES, description: RULE_CONFIG_DESCRIPTION },
      value_raw: { type: 'string', description: VALUE_RAW_DESCRIPTION },
      conditions: { type: 'object', description: 'Rule conditions' },
      comment: { type: 'string', description: 'Rule comment' },
      folder: { type: 'string', description: 'Target folder', default: '/' },
    },
    required: ['ruleset_name'],
  },
};

export const UPDATE_RULE_TOOL: Tool = {
  name: TOOL_NAMES.UPDATE_RULE,
  description:
    '📝 Update rule - Modify an existing monitoring rule. Use value_raw for complex literal values.',
  inputSchema: {
    type: 'object',
    properties: {
      rule_id: { type: 'string', description: 'Rule ID' },
      rule_config: { type: RULE_VALUE_TYPES, description: RULE_CONFIG_DESCRIPTION },
      value_raw: { type: 'string', description: VALUE_RAW_DESCRIPTION },
      conditions: { type: 'object', description: 'Rule conditions' },
      comment: { type: 'string', description: 'Rule comment' },
      disabled: { type: 'boolean', description: 'Disable rule' },
    },
    required: ['rule_id'],
  },
};

export const DELETE_RULE_TOOL: Tool = {
  name: TOOL_NAMES.DELETE_RULE,
  description: '🗑️ Delete rule - Remove a monitoring rule',
  inputSchema: {
    type: 'object',
    properties: {
      rule_id: { type: 'string', description: 'Rule ID to delete' },
    },
    required: ['rule_id'],
  },
};

export const MOVE_RULE_TOOL: Tool = {
  name: TOOL_NAMES.MOVE_RULE,
  description: '🔄 Move rule - Change rule position in its ruleset',
  inputSchema: {
    type: 'object',
    properties: {
      rule_id: { type: 'string', description: 'Rule ID' },
      position: {
        type: 'string',
        enum: [...MOVE_POSITIONS],
        description: 'Position: top, bottom, before, after',
        default: 'top',
      },
      target_rule_id: {
        type: 'string',
        description: 'Target rule ID for before/after positioning',
      },
    },
    required: ['rule_id'],
  },
};

export const BACKUP_RULESET_TOOL: Tool = {
  name: TOOL_NAMES.BACKUP_RULESET,
  description:
    '💾 Backup ruleset - Export all rules of a ruleset as JSON, with value_raw and its decoded value',
  inputSchema: {
    type: 'object',
    properties: {
      ruleset_name: {
        type: 'string',
        description: 'Ruleset name to backup (e.g. checkgroup_parameters:memory_linux)',
      },
    },
    required: ['ruleset_name'],
  },
};

export const RESTORE_RULESET_TOOL: Tool = {
  name: TOOL_NAMES.RESTORE_RULESET,
  description:
    '♻️ Restore ruleset - Recreate rules from entries produced by the backup tool, keeping their order',
  inputSchema: {
    type: 'object',
    properties: {
      rules: {
        type: 'array',
        description:
          'Backup entries. value_raw is sent unchanged; entries without it are encoded from value.',
        items: {
          type: 'object',
          properties: {
            rule_id: { type: 'string' },
            value_raw: { type: 'string' },
            value: { description: 'Decoded rule value, used when value_raw is missing' },
            conditions: { type: 'object' },
            properties: { type: 'object' },
            folder: { type: 'string' },
            ruleset: { type: 'string' },
          },
        },
        minItems: 1,
      },
      ruleset_name: {
        type: 'string',
        description: 'Restore into this ruleset instead of the one in each entry',
      },
      folder: {
        type: 'string',
        description: 'Restore into this folder instead of the one in each entry',
      },
    },
    required: ['rules'],
  },
};

export const CONVERT_RULE_VALUE_TOOL: Tool = {
  name: TOOL_NAMES.CONVERT_RULE_VALUE,
  description:
    '🔁 Convert rule value - Preview the value_raw for a JSON rule_config, or decode a value_raw into JSON. ' +
    'Note: a two-number tuple and a plain two-number array look the same once encoded.',
  inputSchema: {
    type: 'object',
    properties: {
      rule_config: { type: RULE_VALUE_TYPES, description: 'JSON value to encode' },
      value_raw: { type: 'string', description: 'Literal text to decode' },
    },
  },
};

export const GET_PENDING_CHANGES_TOOL: Tool = {
  name: TOOL_NAMES.GET_PENDING_CHANGES,
  description: '📋 Get pending changes - Show configuration changes not yet activated',
  inputSchema: { type: 'object', properties: {} },
};

export const ACTIVATE_CHANGES_TOOL: Tool = {
  name: TOOL_NAMES.ACTIVATE_CHANGES,
  description: '🔄 Activate changes - Deploy pending configuration changes',
  inputSchema: {
    type: 'object',
    properties: {
      sites: {
        type: 'array',
        items: { type: 'string' },
        description: 'Sites to activate; all sites when omitted',
      },
      force_foreign_changes: {
        type: 'boolean',
        description: 'Also activate changes made by other users',
      },
    },
  },
};

export const RULE_TOOLS: Tool[] = [
  GET_RULESETS_TOOL,
  GET_RULESET_TOOL,
  CREATE_RULE_TOOL,
  UPDATE_RULE_TOOL,
  DELETE_RULE_TOOL,
  MOVE_RULE_TOOL,
  BACKUP_RULESET_TOOL,
  RESTORE_RULESET_TOOL,
  CONVERT_RULE_VALUE_TOOL,
  GET_PENDING_CHANGES_TOOL,
  ACTIVATE_CHANGES_TOOL,
];
