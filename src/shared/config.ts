/**
 * Configuration Loading
 *
 * Loads StackmeterConfig from stackmeter.yml.
 * Returns defaults when file is missing or corrupt.
 */

import * as fs from 'node:fs';
import * as yaml from 'js-yaml';
import { resolveConfigPath } from './paths.js';
import { ConfigError } from './errors.js';
import { type StackmeterConfig, type LogLevelName, DEFAULT_CONFIG, LOG_LEVEL_NAMES } from './types.js';

/**
 * Load Stackmeter configuration.
 * File values override defaults field by field. Missing or corrupt file → all defaults.
 */
export function loadConfig(configPath: string = resolveConfigPath()): StackmeterConfig {
  try {
    if (!fs.existsSync(configPath)) {
      return structuredClone(DEFAULT_CONFIG);
    }

    const raw = fs.readFileSync(configPath, 'utf-8');
    return parseConfig(raw);
  } catch {
    // Corrupt config file, use defaults silently
    return structuredClone(DEFAULT_CONFIG);
  }
}

/**
 * Parse a YAML document into a validated config.
 * An empty document yields defaults; a document that is not a mapping throws ConfigError.
 */
export function parseConfig(raw: string): StackmeterConfig {
  let data: unknown;
  try {
    data = yaml.load(raw, { schema: yaml.JSON_SCHEMA });
  } catch (err) {
    throw new ConfigError('stackmeter.yml is not valid YAML', err);
  }

  if (data === undefined || data === null) {
    return structuredClone(DEFAULT_CONFIG);
  }
  if (!isRecord(data)) {
    throw new ConfigError('stackmeter.yml must contain a mapping at the top level');
  }

  return validateConfig(data);
}

/**
 * Validate and normalize config values.
 * Invalid values fall back to defaults from DEFAULT_CONFIG.
 */
function validateConfig(source: Record<string, unknown>): StackmeterConfig {
  const defaults = DEFAULT_CONFIG;
  const tracerSource = source['transaction_tracer'];
  const tracer = isRecord(tracerSource) ? tracerSource : {};
  const logLevel = source['log_level'];

  return {
    agent_enabled: readBoolean(source, 'agent_enabled', defaults.agent_enabled),
    developer_mode: readBoolean(source, 'developer_mode', defaults.developer_mode),
    log_level: isLogLevel(logLevel) ? logLevel : defaults.log_level,
    transaction_tracer: {
      enabled: readBoolean(tracer, 'enabled', defaults.transaction_tracer.enabled),
    },
  };
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === 'boolean' ? value : fallback;
}

function isLogLevel(value: unknown): value is LogLevelName {
  return typeof value === 'string' && LOG_LEVEL_NAMES.some(level => level === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
