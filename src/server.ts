/**
 * RulesServer - CheckMK rule management tools
 */

import type { z } from 'zod';

import { CheckMKClient, CheckMKError } from './client.js';
import { assertValidConfig, ConfigError } from './config.js';
import {
  ACTIVATE_REMINDER,
  API,
  DISPLAY,
  ENDPOINTS,
  REQUIRED_ENV_VARS,
  TOOL_NAMES,
} from './constants.js';
import {
  describeApiError,
  errorResponse,
  formatApiError,
  jsonBlock,
  summarizeConditions,
  textResult,
} from './format.js';
import {
  formatLiteral,
  fromLiteral,
  LiteralEncodeError,
  LiteralParseError,
  parseLiteral,
  toJson,
  toLiteral,
} from './literal.js';
import type {
  ApiResponse,
  CheckMKApi,
  JsonValue,
  RuleBackupEntry,
  RulesConfig,
  ToolArguments,
  ToolHandler,
  ToolResult,
} from './types.js';
import {
  ActivateChangesArgsSchema,
  ActivationSchema,
  ArgumentError,
  ConvertValueArgsSchema,
  CreateRuleArgsSchema,
  DeleteRuleArgsSchema,
  EmptyArgsSchema,
  formatIssues,
  GetRulesetsArgsSchema,
  MoveRuleArgsSchema,
  parseArguments,
  PendingChangesSchema,
  RestoreRulesetArgsSchema,
  RuleCollectionSchema,
  RuleObjectSchema,
  RulesetArgsSchema,
  RulesetCollectionSchema,
  UpdateRuleArgsSchema,
  type BackupEntryInput,
  type RuleProperties,
} from './validation.js';

/**
 * Convert a folder path to the API's tilde form: "/" -> "~",
 * "/hosts/linux" -> "~hosts~linux". Tilde and backslash separators are
 * accepted as well.
 */
export function toApiFolder(folder: string): string {
  return `~${folder.split(/[/~\\]/).filter(Boolean).join('~')}`;
}

/**
 * Pick the literal to send: an explicit value_raw wins over rule_config
 */
export function resolveValueRaw(
  valueRaw: string | null | undefined,
  ruleConfig: JsonValue | undefined
): string | undefined {
  if (valueRaw) {
    return valueRaw;
  }
  if (ruleConfig === undefined || ruleConfig === null) {
    return undefined;
  }
  return toLiteral(ruleConfig);
}

function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  response: ApiResponse,
  what: string
): z.output<T> {
  const result = schema.safeParse(response.data);
  if (!result.success) {
    throw new CheckMKError(`Unexpected ${what} response`, response.status, {
      title: `Unexpected ${what} response`,
      detail: formatIssues(result.error).join('; '),
    });
  }
  return result.data;
}

type RestoreOutcome =
  | { ok: true; ruleId: string; moveError?: string }
  | { ok: false; reason: string };

function oneLine(error: CheckMKError): string {
  return describeApiError(error).replace(/\n/g, ' ');
}

export class RulesServer {
  private readonly config: RulesConfig;
  private client: CheckMKApi | undefined;

  constructor(config: RulesConfig, client?: CheckMKApi) {
    this.config = config;
    this.client = client;
  }

  /**
   * Tool name to handler pairs served by this instance
   */
  public routes(): Array<[string, ToolHandler]> {
    return [
      [TOOL_NAMES.GET_RULESETS, (args) => this.getRulesets(args)],
      [TOOL_NAMES.GET_RULESET, (args) => this.getRuleset(args)],
      [TOOL_NAMES.CREATE_RULE, (args) => this.createRule(args)],
      [TOOL_NAMES.UPDATE_RULE, (args) => this.updateRule(args)],
      [TOOL_NAMES.DELETE_RULE, (args) => this.deleteRule(args)],
      [TOOL_NAMES.MOVE_RULE, (args) => this.moveRule(args)],
      [TOOL_NAMES.BACKUP_RULESET, (args) => this.backupRuleset(args)],
      [TOOL_NAMES.RESTORE_RULESET, (args) => this.restoreRuleset(args)],
      [TOOL_NAMES.CONVERT_RULE_VALUE, (args) => this.convertRuleValue(args)],
      [TOOL_NAMES.GET_PENDING_CHANGES, (args) => this.getPendingChanges(args)],
      [TOOL_NAMES.ACTIVATE_CHANGES, (args) => this.activateChanges(args)],
    ];
  }

  // ==========================================================================
  // Rules
  // ==========================================================================

  public getRulesets(args: ToolArguments): Promise<ToolResult> {
    return this.execute(TOOL_NAMES.GET_RULESETS, async () => {
      const { search } = parseArguments(GetRulesetsArgsSchema, args);
      const response = await this.api().get(ENDPOINTS.RULESETS, {
        params: { search: search || undefined },
      });
      const { value: rulesets } = parseResponse(RulesetCollectionSchema, response, 'ruleset list');

      if (rulesets.length === 0) {
        return textResult(
          '📋 **No Rulesets Found**\n\nNo rulesets are available or match the search criteria.'
        );
      }

      const lines = rulesets.slice(0, DISPLAY.MAX_RULESETS).map((ruleset) => {
        const name = ruleset.id ?? 'Unknown';
        const title = ruleset.extensions?.title ?? name;
        const help = ruleset.extensions?.help ?? 'No description';
        return `📋 **${name}**\n   Title: ${title}\n   Help: ${help.slice(0, DISPLAY.HELP_PREVIEW_CHARS)}...`;
      });

      let text = `📋 **Available Rulesets** (${rulesets.length} total):\n\n${lines.join('\n\n')}`;
      if (rulesets.length > DISPLAY.MAX_RULESETS) {
        text += `\n\n... and ${rulesets.length - DISPLAY.MAX_RULESETS} more rulesets`;
      }
      return textResult(text);
    });
  }

  public getRuleset(args: ToolArguments): Promise<ToolResult> {
    return this.execute(TOOL_NAMES.GET_RULESET, async () => {
      const { ruleset_name } = parseArguments(RulesetArgsSchema, args);
      const rules = await this.fetchRules(ruleset_name);

      const lines = rules.slice(0, DISPLAY.MAX_RULES).map((rule, i) => {
        const extensions = rule.extensions ?? {};
        const properties = extensions.properties ?? {};
        const status = properties.disabled ? '🔒 Disabled' : '✅ Active';
        return [
          `🔧 **Rule ${i + 1}** (ID: ${rule.id ?? `Rule ${i + 1}`})`,
          `   Status: ${status}`,
          `   Value: ${extensions.value_raw ?? 'No value'}`,
          `   Folder: ${extensions.folder ?? '/'}`,
          `   Conditions: ${summarizeConditions(extensions.conditions)}`,
          `   Comment: ${properties.comment || 'No comment'}`,
        ].join('\n');
      });

      let text =
        `📋 **Ruleset: ${ruleset_name}**\n\nRules (${rules.length} total):\n\n` +
        (lines.length > 0 ? lines.join('\n\n') : 'No rules configured in this ruleset');
      if (rules.length > DISPLAY.MAX_RULES) {
        text += `\n\n... and ${rules.length - DISPLAY.MAX_RULES} more rules`;
      }
      return textResult(text);
    });
  }

  public createRule(args: ToolArguments): Promise<ToolResult> {
    return this.execute(TOOL_NAMES.CREATE_RULE, async () => {
      const input = parseArguments(CreateRuleArgsSchema, args);
      const valueRaw = resolveValueRaw(input.value_raw, input.rule_config);

      if (valueRaw === undefined) {
        return errorResponse(
          'Missing parameter',
          'Either `value_raw` or `rule_config` is required.\n\n' +
            'Use `value_raw` for complex literal values (checkgroup_parameters, etc.).\n' +
            'Use `rule_config` for JSON values; they are converted automatically.'
        );
      }

      const properties: RuleProperties = { disabled: false };
      if (input.comment) {
        properties.comment = input.comment;
      }

      const response = await this.api().post(ENDPOINTS.RULES, {
        properties,
        value_raw: valueRaw,
        conditions: input.conditions ?? {},
        ruleset: input.ruleset_name,
        folder: toApiFolder(input.folder),
      });
      const created = parseResponse(RuleObjectSchema, response, 'rule');

      return textResult(
        `✅ **Rule Created Successfully**\n\n` +
          `Ruleset: ${input.ruleset_name}\n` +
          `Rule ID: ${created.id ?? 'unknown'}\n` +
          `Folder: ${input.folder}\n` +
          `Value (raw): \`${valueRaw}\`\n` +
          `Comment: ${input.comment ?? ''}\n\n` +
          ACTIVATE_REMINDER
      );
    });
  }

  public updateRule(args: ToolArguments): Promise<ToolResult> {
    return this.execute(TOOL_NAMES.UPDATE_RULE, async () => {
      const input = parseArguments(UpdateRuleArgsSchema, args);
      const data: Record<string, unknown> = {};

      const valueRaw = resolveValueRaw(input.value_raw, input.rule_config);
      if (valueRaw !== undefined) {
        data.value_raw = valueRaw;
      }
      if (input.conditions && Object.keys(input.conditions).length > 0) {
        data.conditions = input.conditions;
      }

      const properties: RuleProperties = {};
      if (input.comment !== undefined) {
        properties.comment = input.comment;
      }
      if (input.disabled !== undefined) {
        properties.disabled = input.disabled;
      }
      if (Object.keys(properties).length > 0) {
        data.properties = properties;
      }

      if (Object.keys(data).length === 0) {
        return errorResponse('No data to update', 'At least one field must be provided');
      }

      await this.api().put(ENDPOINTS.rule(input.rule_id), data, {
        headers: { 'If-Match': API.IF_MATCH_ANY },
      });

      return textResult(
        `✅ **Rule Updated Successfully**\n\n` +
          `Rule ID: ${input.rule_id}\n` +
          `Updated fields: ${Object.keys(data).join(', ')}\n\n` +
          ACTIVATE_REMINDER
      );
    });
  }

  public deleteRule(args: ToolArguments): Promise<ToolResult> {
    return this.execute(TOOL_NAMES.DELETE_RULE, async () => {
      const { rule_id } = parseArguments(DeleteRuleArgsSchema, args);
      await this.api().delete(ENDPOINTS.rule(rule_id));

      return textResult(
        `✅ **Rule Deleted Successfully**\n\n` +
          `Rule ID: ${rule_id}\n\n` +
          `💡 **Important:** The rule is only marked for deletion until you activate changes!\n` +
          ACTIVATE_REMINDER
      );
    });
  }

  public moveRule(args: ToolArguments): Promise<ToolResult> {
    return this.execute(TOOL_NAMES.MOVE_RULE, async () => {
      const { rule_id, position, target_rule_id } = parseArguments(MoveRuleArgsSchema, args);

      if ((position === 'before' || position === 'after') && !target_rule_id) {
        return errorResponse(
          'Missing parameter',
          'target_rule_id is required for before/after positioning'
        );
      }

      const data: Record<string, string> = { position };
      if (target_rule_id) {
        data.target_rule = target_rule_id;
      }
      await this.api().post(ENDPOINTS.moveRule(rule_id), data);

      return textResult(
        `✅ **Rule Moved Successfully**\n\n` +
          `Rule ID: ${rule_id}\n` +
          `New Position: ${position}\n` +
          (target_rule_id ? `Target Rule: ${target_rule_id}\n` : '') +
          `\n${ACTIVATE_REMINDER}`
      );
    });
  }

  // ==========================================================================
  // Backup and restore
  // ==========================================================================

  public backupRuleset(args: ToolArguments): Promise<ToolResult> {
    return this.execute(TOOL_NAMES.BACKUP_RULESET, async () => {
      const { ruleset_name } = parseArguments(RulesetArgsSchema, args);
      const rules = await this.fetchRules(ruleset_name);

      if (rules.length === 0) {
        return textResult(
          `📋 **Ruleset Backup: ${ruleset_name}**\n\nNo rules found in this ruleset.`
        );
      }

      const entries = rules.map((rule) => {
        const extensions = rule.extensions ?? {};
        const entry: RuleBackupEntry = {
          rule_id: rule.id ?? 'unknown',
          value_raw: extensions.value_raw ?? null,
          ...decodeValue(extensions.value_raw),
          conditions: extensions.conditions ?? {},
          properties: extensions.properties ?? {},
          folder: extensions.folder ?? '/',
          ruleset: extensions.ruleset ?? ruleset_name,
        };
        return entry;
      });

      const undecoded = entries.filter((entry) => entry.value_error !== undefined).length;
      const warning =
        undecoded > 0
          ? `⚠️ ${undecoded} value(s) could not be decoded; their value_raw is kept as-is.\n\n`
          : '';

      return textResult(
        `📋 **Ruleset Backup: ${ruleset_name}**\n\n` +
          `Rules: ${rules.length}\n\n` +
          warning +
          jsonBlock(entries)
      );
    });
  }

  /**
   * Recreate rules from backup entries, in backup order. Each new rule is
   * moved to the bottom of its folder, after the rules restored before it.
   */
  public restoreRuleset(args: ToolArguments): Promise<ToolResult> {
    return this.execute(TOOL_NAMES.RESTORE_RULESET, async () => {
      const input = parseArguments(RestoreRulesetArgsSchema, args);
      const lines: string[] = [];
      let restored = 0;

      for (const [i, entry] of input.rules.entries()) {
        const label = entry.rule_id ?? `#${i + 1}`;
        const outcome = await this.restoreEntry(entry, input.ruleset_name, input.folder);
        if (outcome.ok) {
          restored++;
          lines.push(
            outcome.moveError === undefined
              ? `✅ ${label} → ${outcome.ruleId}`
              : `⚠️ ${label} → ${outcome.ruleId} (not moved: ${outcome.moveError})`
          );
        } else {
          lines.push(`❌ ${label}: ${outcome.reason}`);
        }
      }

      const result = textResult(
        `♻️ **Ruleset Restore**\n\n` +
          `Restored: ${restored} of ${input.rules.length}\n\n` +
          `${lines.join('\n')}\n\n` +
          ACTIVATE_REMINDER
      );
      return restored === 0 ? { ...result, isError: true } : result;
    });
  }

  private async restoreEntry(
    entry: BackupEntryInput,
    rulesetOverride: string | undefined,
    folderOverride: string | undefined
  ): Promise<RestoreOutcome> {
    const ruleset = rulesetOverride ?? entry.ruleset;
    if (!ruleset) {
      return { ok: false, reason: 'no ruleset given' };
    }
    const valueRaw = entry.value_raw || (entry.value !== undefined ? toLiteral(entry.value) : undefined);
    if (valueRaw === undefined) {
      return { ok: false, reason: 'entry has neither value_raw nor value' };
    }

    let ruleId: string | undefined;
    try {
      const response = await this.api().post(ENDPOINTS.RULES, {
        properties: { disabled: false, ...entry.properties },
        value_raw: valueRaw,
        conditions: entry.conditions ?? {},
        ruleset,
        folder: toApiFolder(folderOverride ?? entry.folder ?? '/'),
      });
      ruleId = parseResponse(RuleObjectSchema, response, 'rule').id;
    } catch (error) {
      if (error instanceof CheckMKError) {
        return { ok: false, reason: oneLine(error) };
      }
      throw error;
    }
    if (!ruleId) {
      return { ok: false, reason: 'created rule has no ID' };
    }

    // The rule exists from here on, even if the move fails
    try {
      await this.api().post(ENDPOINTS.moveRule(ruleId), { position: 'bottom' });
      return { ok: true, ruleId };
    } catch (error) {
      if (error instanceof CheckMKError) {
        return { ok: true, ruleId, moveError: oneLine(error) };
      }
      throw error;
    }
  }

  // ==========================================================================
  // Value conversion
  // ==========================================================================

  public convertRuleValue(args: ToolArguments): Promise<ToolResult> {
    return this.execute(TOOL_NAMES.CONVERT_RULE_VALUE, async () => {
      const { rule_config, value_raw } = parseArguments(ConvertValueArgsSchema, args);

      if (value_raw !== undefined && rule_config === undefined) {
        const node = parseLiteral(value_raw);
        return textResult(
          `🔁 **Literal → JSON**\n\n` +
            `Normalized: \`${formatLiteral(node)}\`\n\n` +
            jsonBlock(toJson(node))
        );
      }

      if (rule_config !== undefined && value_raw === undefined) {
        return textResult(`🔁 **JSON → Literal**\n\nvalue_raw: \`${toLiteral(rule_config)}\``);
      }

      return errorResponse('Invalid arguments', 'Provide exactly one of `rule_config` or `value_raw`');
    });
  }

  // ==========================================================================
  // Change activation
  // ==========================================================================

  public getPendingChanges(args: ToolArguments): Promise<ToolResult> {
    return this.execute(TOOL_NAMES.GET_PENDING_CHANGES, async () => {
      parseArguments(EmptyArgsSchema, args);
      const response = await this.api().get(ENDPOINTS.PENDING_CHANGES);
      const { value: changes } = parseResponse(PendingChangesSchema, response, 'pending changes');

      if (changes.length === 0) {
        return textResult('✅ **No Pending Changes**\n\nThe configuration is fully activated.');
      }

      const lines = changes.map((change) => {
        const ext = change.extensions ?? {};
        const who = ext.user_id ? ` by ${ext.user_id}` : '';
        const when = ext.time ? ` at ${ext.time}` : '';
        return `• ${ext.text ?? change.title ?? change.id ?? 'Unknown change'}${who}${when}`;
      });

      return textResult(
        `📋 **Pending Changes** (${changes.length}):\n\n${lines.join('\n')}`
      );
    });
  }

  public activateChanges(args: ToolArguments): Promise<ToolResult> {
    return this.execute(TOOL_NAMES.ACTIVATE_CHANGES, async () => {
      const { sites, force_foreign_changes } = parseArguments(ActivateChangesArgsSchema, args);

      // Activation requires the ETag of the current pending changes
      const pending = await this.api().get(ENDPOINTS.PENDING_CHANGES);
      const response = await this.api().post(
        ENDPOINTS.ACTIVATE_CHANGES,
        {
          redirect: false,
          sites: sites ?? [],
          force_foreign_changes: force_foreign_changes ?? false,
        },
        { headers: { 'If-Match': pending.etag ?? API.IF_MATCH_ANY } }
      );
      const activation = parseResponse(ActivationSchema, response, 'activation');
      const activatedSites = activation.extensions?.sites ?? sites ?? [];

      return textResult(
        `🔄 **Changes Activation Started**\n\n` +
          `Activation ID: ${activation.id ?? 'unknown'}\n` +
          `Sites: ${activatedSites.length > 0 ? activatedSites.join(', ') : 'all'}`
      );
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async fetchRules(rulesetName: string) {
    const response = await this.api().get(ENDPOINTS.RULES, {
      params: { ruleset_name: rulesetName },
    });
    return parseResponse(RuleCollectionSchema, response, 'rule list').value;
  }

  /**
   * Client for the configured site, created on first use
   */
  private api(): CheckMKApi {
    if (!this.client) {
      assertValidConfig(this.config);
      const { serverUrl, site, username } = this.config.connection;
      this.client = new CheckMKClient(this.config.connection);
      console.error(`🔌 CheckMK client ready: ${serverUrl} site=${site} user=${username}`);
    }
    return this.client;
  }

  private async execute(
    toolName: string,
    action: () => Promise<ToolResult>
  ): Promise<ToolResult> {
    try {
      return await action();
    } catch (error) {
      return this.formatError(toolName, error);
    }
  }

  private formatError(toolName: string, error: unknown): ToolResult {
    if (error instanceof ArgumentError) {
      return errorResponse(
        'Invalid arguments',
        error.issues.map((issue) => `- ${issue}`).join('\n')
      );
    }
    if (error instanceof ConfigError) {
      return errorResponse(
        'CheckMK Configuration Error',
        `${error.problems.map((problem) => `- ${problem}`).join('\n')}\n\n` +
          `Please set the required environment variables:\n` +
          REQUIRED_ENV_VARS.map((name) => `- ${name}`).join('\n')
      );
    }
    if (error instanceof CheckMKError) {
      return formatApiError(error);
    }
    if (error instanceof LiteralParseError) {
      return errorResponse('Invalid literal', error.message);
    }
    if (error instanceof LiteralEncodeError) {
      return errorResponse('Unsupported value', error.message);
    }

    console.error(`❌ Error in ${toolName}:`, error);
    return errorResponse(
      'Unexpected Error',
      error instanceof Error ? error.message : String(error)
    );
  }
}

/**
 * Decode a stored value_raw for a backup entry. A value that fails to parse
 * is reported rather than guessed at.
 */
export function decodeValue(
  valueRaw: string | undefined
): Pick<RuleBackupEntry, 'value' | 'value_error'> {
  if (valueRaw === undefined) {
    return {};
  }
  try {
    return { value: fromLiteral(valueRaw) };
  } catch (error) {
    if (error instanceof LiteralParseError) {
      return { value_error: error.message };
    }
    throw error;
  }
}
