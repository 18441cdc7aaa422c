/**
 * Core type definitions for checkmk-rules-mcp
 */

import type { RuleConditions, RuleProperties } from './validation.js';

// ============================================================================
// Value Types
// ============================================================================

/**
 * A JSON-compatible value as it arrives in tool arguments
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A value in CheckMK's rule literal syntax.
 * Keeps the distinctions JSON cannot express: tuple vs list, int vs float,
 * and pre-formatted text that must be emitted verbatim.
 */
export type LiteralValue =
  | { kind: 'mapping'; entries: Array<[string, LiteralValue]> }
  | { kind: 'tuple'; items: LiteralValue[] }
  | { kind: 'list'; items: LiteralValue[] }
  | { kind: 'string'; value: string }
  | { kind: 'raw'; text: string }
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'none' };

// ============================================================================
// Tool Result Types
// ============================================================================

export type TextContent = {
  type: 'text';
  text: string;
};

/**
 * Result returned from every tool handler. A type literal rather than an
 * interface so it stays assignable to the SDK's passthrough result types.
 */
export type ToolResult = {
  content: TextContent[];
  isError?: boolean;
};

/** Tool arguments as received from the MCP client */
export type ToolArguments = Record<string, unknown>;

export type ToolHandler = (args: ToolArguments) => Promise<ToolResult>;

// ============================================================================
// CheckMK API Types
// ============================================================================

/**
 * Successful API response. The body is unchecked until a caller validates it.
 */
export interface ApiResponse {
  status: number;
  data: unknown;
  /** ETag header, used for optimistic locking on updates */
  etag?: string;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
}

/**
 * Minimal surface of the CheckMK REST API used by the rule tools.
 * Paths are relative to the API root.
 */
export interface CheckMKApi {
  get(path: string, options?: RequestOptions): Promise<ApiResponse>;
  post(path: string, body: unknown, options?: RequestOptions): Promise<ApiResponse>;
  put(path: string, body: unknown, options?: RequestOptions): Promise<ApiResponse>;
  delete(path: string, options?: RequestOptions): Promise<ApiResponse>;
}

/**
 * One rule in a ruleset backup document
 */
export interface RuleBackupEntry {
  rule_id: string;
  value_raw: string | null;
  /** Decoded form of value_raw */
  value?: JsonValue;
  /** Why value_raw could not be decoded */
  value_error?: string;
  conditions: RuleConditions;
  properties: RuleProperties;
  folder: string;
  ruleset: string;
}

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Connection settings for the CheckMK site
 */
export interface ConnectionConfig {
  /** Base server URL, e.g. https://monitoring.example.com */
  serverUrl: string;
  /** Site name, the first path segment under the server URL */
  site: string;
  username: string;
  password: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Log every request to stderr */
  debug: boolean;
}

/**
 * Complete configuration for the rules server
 */
export interface RulesConfig {
  connection: ConnectionConfig;
}
