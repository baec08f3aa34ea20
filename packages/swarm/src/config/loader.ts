/**
 * Swarm Configuration Loader
 *
 * YAML configuration files with:
 * - Environment variable substitution (${VAR} and ${VAR:-default})
 * - Scalar conversion of substituted strings
 * - Schema validation and defaults
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import { SwarmConfigSchema, type SwarmConfig } from './schema.js';
import { ConfigLoadError, ConfigValidationError } from './errors.js';

/**
 * Validate a configuration object and apply defaults
 */
export function parseSwarmConfig(input: unknown): SwarmConfig {
  const result = SwarmConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      'Invalid swarm configuration',
      result.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}

/**
 * Read, substitute and validate a YAML configuration file
 */
export function loadSwarmConfig(path: string, env: NodeJS.ProcessEnv = process.env): SwarmConfig {
  if (!fs.existsSync(path)) {
    throw new ConfigLoadError(`Config file not found: ${path}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(path, 'utf8');
  } catch (e) {
    throw new ConfigLoadError(`Failed to read config file: ${path}`, toError(e));
  }

  const parsed = parseYaml(content);
  return parseSwarmConfig(convertScalars(substituteEnvVars(parsed, env)));
}

export function parseYaml(content: string): unknown {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (e) {
    throw new ConfigLoadError('Invalid YAML syntax', toError(e));
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigLoadError('Config file must contain a mapping at the top level');
  }
  return parsed;
}

export function substituteEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    // Match ${VAR} or ${VAR:-default}
    return value.replace(
      /\$\{(\w+)(?::-([^}]*))?\}/g,
      (_match: string, name: string, defaultVal: string | undefined) => {
        const resolved = env[name];

        // Empty counts as unset when a default is given
        if (resolved === '' && defaultVal !== undefined) {
          return defaultVal;
        }

        if (resolved === undefined && defaultVal === undefined) {
          throw new ConfigLoadError(`Required environment variable '${name}' not set`);
        }
        return resolved ?? defaultVal ?? '';
      }
    );
  }
  if (Array.isArray(value)) {
    return value.map(v => substituteEnvVars(v, env));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, substituteEnvVars(v, env)])
    );
  }
  return value;
}

/**
 * Turn numeric and boolean strings (as left by substitution) into scalars
 */
export function convertScalars(value: unknown): unknown {
  if (typeof value === 'string') {
    if (/^-?\d+(\.\d+)?$/.test(value)) {
      return Number(value);
    }
    if (value === 'true') {
      return true;
    }
    if (value === 'false') {
      return false;
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(convertScalars);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, convertScalars(v)])
    );
  }
  return value;
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
