/**
 * Constants for the CheckMK rule tools
 */

// ============================================================================
// REST API
// CheckMK serves its REST API under /<site>/check_mk/api/1.0/
// ============================================================================

export const API = {
  /** Path below the site segment */
  BASE_PATH: 'check_mk/api/1.0',
  /** Default request timeout in seconds */
  DEFAULT_TIMEOUT_SECONDS: 30,
  /** Match any ETag on updates */
  IF_MATCH_ANY: '*',
} as const;

export const ENDPOINTS = {
  RULESETS: 'domain-types/ruleset/collections/all',
  RULES: 'domain-types/rule/collections/all',
  PENDING_CHANGES: 'domain-types/activation_run/collections/pending_changes',
  ACTIVATE_CHANGES: 'domain-types/activation_run/actions/activate-changes/invoke',
  rule: (ruleId: string) => `objects/rule/${encodeURIComponent(ruleId)}`,
  moveRule: (ruleId: string) =>
    `objects/rule/${encodeURIComponent(ruleId)}/actions/move/invoke`,
} as const;

// ============================================================================
// Display Limits
// ============================================================================

export const DISPLAY = {
  /** Rulesets shown by checkmk_get_rulesets */
  MAX_RULESETS: 20,
  /** Rules shown by checkmk_get_ruleset */
  MAX_RULES: 10,
  /** Characters of ruleset help text shown */
  HELP_PREVIEW_CHARS: 100,
} as const;

// ============================================================================
// Literal Syntax
// Constant spellings in CheckMK's value_raw
// ============================================================================

export const LITERAL = {
  TRUE: 'True',
  FALSE: 'False',
  NONE: 'None',
} as const;

export const MOVE_POSITIONS = ['top', 'bottom', 'before', 'after'] as const;

export const TOOL_PREFIX = 'checkmk_';

export const TOOL_NAMES = {
  GET_RULESETS: `${TOOL_PREFIX}get_rulesets`,
  GET_RULESET: `${TOOL_PREFIX}get_ruleset`,
  CREATE_RULE: `${TOOL_PREFIX}create_rule`,
  UPDATE_RULE: `${TOOL_PREFIX}update_rule`,
  DELETE_RULE: `${TOOL_PREFIX}delete_rule`,
  MOVE_RULE: `${TOOL_PREFIX}move_rule`,
  BACKUP_RULESET: `${TOOL_PREFIX}backup_ruleset`,
  RESTORE_RULESET: `${TOOL_PREFIX}restore_ruleset`,
  CONVERT_RULE_VALUE: `${TOOL_PREFIX}convert_rule_value`,
  GET_PENDING_CHANGES: `${TOOL_PREFIX}get_pending_changes`,
  ACTIVATE_CHANGES: `${TOOL_PREFIX}activate_changes`,
} as const;

export const REQUIRED_ENV_VARS = [
  'CHECKMK_SERVER_URL',
  'CHECKMK_SITE',
  'CHECKMK_USERNAME',
  'CHECKMK_PASSWORD',
] as const;

export const ACTIVATE_REMINDER = `⚠️ **Remember to activate changes!** Use ${TOOL_PREFIX}activate_changes to apply them.`;
