/**
 * Configuration management for checkmk-rules-mcp
 */

import { API, REQUIRED_ENV_VARS } from './constants.js';
import type { RulesConfig } from './types.js';

/**
 * Raised when the connection settings are incomplete
 */
export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid CheckMK configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: RulesConfig = {
  connection: {
    serverUrl: '',
    site: '',
    username: '',
    password: '',
    timeoutMs: API.DEFAULT_TIMEOUT_SECONDS * 1000,
    debug: false,
  },
};

/**
 * Load configuration from environment variables
 * Environment variables override default values
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RulesConfig {
  const config: RulesConfig = {
    connection: { ...DEFAULT_CONFIG.connection },
  };

  // CHECKMK_SERVER_URL - Base URL, trailing slashes dropped
  if (env.CHECKMK_SERVER_URL) {
    config.connection.serverUrl = env.CHECKMK_SERVER_URL.trim().replace(/\/+$/, '');
  }

  // CHECKMK_SITE - Site name, surrounding slashes dropped
  if (env.CHECKMK_SITE) {
    config.connection.site = env.CHECKMK_SITE.trim().replace(/^\/+|\/+$/g, '');
  }

  if (env.CHECKMK_USERNAME) {
    config.connection.username = env.CHECKMK_USERNAME;
  }

  if (env.CHECKMK_PASSWORD) {
    config.connection.password = env.CHECKMK_PASSWORD;
  }

  // CHECKMK_TIMEOUT - Request timeout in seconds
  if (env.CHECKMK_TIMEOUT) {
    const seconds = Number(env.CHECKMK_TIMEOUT);
    if (Number.isFinite(seconds) && seconds > 0) {
      config.connection.timeoutMs = seconds * 1000;
    }
  }

  // CHECKMK_DEBUG - Log every API request
  if (env.CHECKMK_DEBUG === 'true') {
    config.connection.debug = true;
  }

  return config;
}

/**
 * List what is missing or wrong in the connection settings
 */
export function validateConfig(config: RulesConfig): string[] {
  const { serverUrl, site, username, password } = config.connection;
  const values: Record<(typeof REQUIRED_ENV_VARS)[number], string> = {
    CHECKMK_SERVER_URL: serverUrl,
    CHECKMK_SITE: site,
    CHECKMK_USERNAME: username,
    CHECKMK_PASSWORD: password,
  };

  const problems = REQUIRED_ENV_VARS.filter((name) => !values[name]).map(
    (name) => `${name} is not set`
  );

  if (serverUrl && !/^https?:\/\//.test(serverUrl)) {
    problems.push('CHECKMK_SERVER_URL must start with http:// or https://');
  }

  return problems;
}

export function assertValidConfig(config: RulesConfig): void {
  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
}
