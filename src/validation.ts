/**
 * Runtime validation for tool arguments and CheckMK API responses
 */

import { z } from 'zod';
import { MOVE_POSITIONS } from './constants.js';
import type { JsonValue } from './types.js';

/**
 * Raised when tool arguments do not match the tool's schema
 */
export class ArgumentError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid arguments: ${issues.join('; ')}`);
    this.name = 'ArgumentError';
    this.issues = issues;
  }
}

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

// ============================================================================
// API Responses
// CheckMK adds fields between releases, so objects pass unknown keys through
// ============================================================================

export const ApiErrorBodySchema = z
  .object({
    title: z.string().optional(),
    detail: z.string().optional(),
    status: z.number().optional(),
    fields: z.record(z.unknown()).optional(),
  })
  .passthrough();

const HostNameConditionSchema = z
  .object({
    match_on: z.array(z.string()).optional(),
    operator: z.string().optional(),
  })
  .passthrough();

export const RuleConditionsSchema = z
  .object({
    host_name: HostNameConditionSchema.optional(),
    host_tags: z.array(z.unknown()).optional(),
    host_label_groups: z.array(z.unknown()).optional(),
  })
  .passthrough();

export const RulePropertiesSchema = z
  .object({
    comment: z.string().optional(),
    description: z.string().optional(),
    disabled: z.boolean().optional(),
  })
  .passthrough();

const RuleExtensionsSchema = z
  .object({
    ruleset: z.string().optional(),
    folder: z.string().optional(),
    folder_index: z.number().optional(),
    properties: RulePropertiesSchema.optional(),
    value_raw: z.string().optional(),
    conditions: RuleConditionsSchema.optional(),
  })
  .passthrough();

const RulesetExtensionsSchema = z
  .object({
    name: z.string().optional(),
    title: z.string().nullish(),
    help: z.string().nullish(),
    folder: z.string().optional(),
    number_of_rules: z.number().optional(),
  })
  .passthrough();

function domainObject<T extends z.ZodTypeAny>(extensions: T) {
  return z
    .object({
      id: z.string().optional(),
      title: z.string().nullish(),
      extensions: extensions.optional(),
    })
    .passthrough();
}

function collectionOf<T extends z.ZodTypeAny>(extensions: T) {
  return z
    .object({ value: z.array(domainObject(extensions)).default([]) })
    .passthrough();
}

const PendingChangeExtensionsSchema = z
  .object({
    action_name: z.string().optional(),
    text: z.string().optional(),
    user_id: z.string().nullish(),
    time: z.string().optional(),
  })
  .passthrough();

const ActivationExtensionsSchema = z
  .object({
    sites: z.array(z.string()).optional(),
    is_running: z.boolean().optional(),
  })
  .passthrough();

export const RuleObjectSchema = domainObject(RuleExtensionsSchema);
export const RuleCollectionSchema = collectionOf(RuleExtensionsSchema);
export const RulesetCollectionSchema = collectionOf(RulesetExtensionsSchema);
export const PendingChangesSchema = collectionOf(PendingChangeExtensionsSchema);
export const ActivationSchema = domainObject(ActivationExtensionsSchema);

export type ApiErrorBody = z.infer<typeof ApiErrorBodySchema>;
export type RuleConditions = z.infer<typeof RuleConditionsSchema>;
export type RuleProperties = z.infer<typeof RulePropertiesSchema>;

// ============================================================================
// Tool Arguments
// ============================================================================

const RuleIdSchema = z.string().min(1, 'rule_id is required');
const RulesetNameSchema = z.string().min(1, 'ruleset_name is required');
const ConditionsSchema = z.record(z.unknown());

export const EmptyArgsSchema = z.object({});

export const GetRulesetsArgsSchema = z.object({
  search: z.string().optional(),
});

export const RulesetArgsSchema = z.object({
  ruleset_name: RulesetNameSchema,
});

export const CreateRuleArgsSchema = z.object({
  ruleset_name: RulesetNameSchema,
  rule_config: JsonValueSchema.optional(),
  value_raw: z.string().optional(),
  conditions: ConditionsSchema.optional(),
  comment: z.string().optional(),
  folder: z.string().default('/'),
});

export const UpdateRuleArgsSchema = z.object({
  rule_id: RuleIdSchema,
  rule_config: JsonValueSchema.optional(),
  value_raw: z.string().optional(),
  conditions: ConditionsSchema.optional(),
  comment: z.string().optional(),
  disabled: z.boolean().optional(),
});

export const DeleteRuleArgsSchema = z.object({
  rule_id: RuleIdSchema,
});

export const MoveRuleArgsSchema = z.object({
  rule_id: RuleIdSchema,
  position: z.enum(MOVE_POSITIONS).default('top'),
  target_rule_id: z.string().min(1).optional(),
});

export const BackupEntrySchema = z
  .object({
    rule_id: z.string().optional(),
    value_raw: z.string().nullish(),
    value: JsonValueSchema.optional(),
    conditions: RuleConditionsSchema.optional(),
    properties: RulePropertiesSchema.optional(),
    folder: z.string().optional(),
    ruleset: z.string().optional(),
  })
  .passthrough();

export const RestoreRulesetArgsSchema = z.object({
  rules: z.array(BackupEntrySchema).min(1, 'rules must contain at least one entry'),
  ruleset_name: z.string().min(1).optional(),
  folder: z.string().min(1).optional(),
});

export const ConvertValueArgsSchema = z.object({
  rule_config: JsonValueSchema.optional(),
  value_raw: z.string().optional(),
});

export const ActivateChangesArgsSchema = z.object({
  sites: z.array(z.string().min(1)).optional(),
  force_foreign_changes: z.boolean().optional(),
});

export type BackupEntryInput = z.infer<typeof BackupEntrySchema>;

/**
 * Format zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate tool arguments against a schema
 *
 * @throws ArgumentError listing every issue found
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  args: unknown
): z.output<T> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    throw new ArgumentError(formatIssues(result.error));
  }
  return result.data;
}
