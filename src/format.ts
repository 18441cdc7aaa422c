/**
 * Text formatting for tool results
 */

import type { CheckMKError } from './client.js';
import type { ToolResult } from './types.js';
import type { RuleConditions } from './validation.js';

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResponse(title: string, message?: string): ToolResult {
  const text = message ? `❌ **${title}**\n\n${message}` : `❌ **${title}**`;
  return { content: [{ type: 'text', text }], isError: true };
}

/**
 * Lines describing an API error: bold title, detail, one line per field
 */
export function describeApiError(error: CheckMKError): string {
  const { title, detail, fields } = error.responseData;
  const parts = [`**${title ?? error.message}**`];

  if (detail) {
    parts.push(detail);
  }
  for (const [field, errors] of Object.entries(fields ?? {})) {
    const text = Array.isArray(errors) ? errors.map(String).join(', ') : String(errors);
    parts.push(`- \`${field}\`: ${text}`);
  }

  return parts.join('\n');
}

export function formatApiError(error: CheckMKError): ToolResult {
  const heading =
    error.statusCode !== undefined
      ? `CheckMK API Error (${error.statusCode})`
      : 'CheckMK API Error';
  return errorResponse(heading, describeApiError(error));
}

/**
 * One-line summary of a rule's match conditions
 */
export function summarizeConditions(conditions: RuleConditions = {}): string {
  const summary: string[] = [];

  if (conditions.host_name) {
    const matchOn = conditions.host_name.match_on ?? [];
    const operator = conditions.host_name.operator ?? 'unknown';
    summary.push(`Hosts: ${matchOn.join(', ')} (${operator})`);
  }
  if (conditions.host_tags && conditions.host_tags.length > 0) {
    summary.push(`Tags: ${conditions.host_tags.length} conditions`);
  }
  if (conditions.host_label_groups && conditions.host_label_groups.length > 0) {
    summary.push(`Labels: ${conditions.host_label_groups.length} conditions`);
  }

  return summary.length > 0 ? summary.join(', ') : 'All hosts';
}

export function jsonBlock(value: unknown): string {
  return `\`\`\`json\n${JSON.stringify(value, null, 2)}\n\`\`\``;
}
