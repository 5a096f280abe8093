/**
 * @fileoverview Configuration loading
 *
 * Resolution order, later wins:
 * 1. schema defaults
 * 2. YAML file (`configPath`, else `KGO_CONFIG`); a missing file means defaults
 * 3. `KGO_*` environment variables
 */

import * as fs from 'node:fs/promises';
import YAML from 'yaml';
import { ConfigurationError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { parseConfig, type OrchestratorConfig } from './schema.js';

type RawConfig = Record<string, unknown>;

export interface LoadConfigOptions {
  /** YAML file to read */
  configPath?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

type EnvKind = 'string' | 'int' | 'number' | 'boolean';

const ENV_OVERRIDES: ReadonlyArray<{ env: string; path: readonly string[]; kind: EnvKind }> = [
  { env: 'KGO_HOST', path: ['host'], kind: 'string' },
  { env: 'KGO_PORT', path: ['port'], kind: 'int' },
  { env: 'KGO_DYNAMIC_CONFIG', path: ['dynamicConfig'], kind: 'boolean' },
  { env: 'KGO_LOG_LEVEL', path: ['logging', 'level'], kind: 'string' },
  { env: 'KGO_METRICS_INTERVAL_SECONDS', path: ['metrics', 'collectionIntervalSeconds'], kind: 'number' },
  { env: 'KGO_HEALTH_INTERVAL_SECONDS', path: ['health', 'checkIntervalSeconds'], kind: 'number' },
  { env: 'KGO_PERF_INTERVAL_SECONDS', path: ['performance', 'optimizationIntervalSeconds'], kind: 'number' },
  { env: 'KGO_WORKERS', path: ['performance', 'workers'], kind: 'int' },
  { env: 'KGO_CACHE_ENABLED', path: ['cache', 'enabled'], kind: 'boolean' },
  { env: 'KGO_CACHE_TTL_SECONDS', path: ['cache', 'ttlSeconds'], kind: 'number' },
];

export async function loadConfig(options: LoadConfigOptions = {}): Promise<OrchestratorConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.KGO_CONFIG?.trim();

  const fromFile = configPath ? await readConfigFile(configPath) : {};
  const fromEnv = readEnvOverrides(env);
  return parseConfig(mergeConfig(fromFile, fromEnv));
}

export async function readConfigFile(configPath: string): Promise<RawConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      logDebug('[config] Config file not found, using defaults', { configPath });
      return {};
    }
    throw new ConfigurationError(configPath, `unable to read file: ${getErrorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (error) {
    throw new ConfigurationError(configPath, `invalid YAML: ${getErrorMessage(error)}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(configPath, 'top-level value must be a mapping');
  }
  return parsed;
}

export function readEnvOverrides(env: NodeJS.ProcessEnv): RawConfig {
  const overrides: RawConfig = {};
  for (const entry of ENV_OVERRIDES) {
    const raw = env[entry.env]?.trim();
    if (!raw) continue;
    setPath(overrides, entry.path, coerceEnv(entry.env, raw, entry.kind));
  }
  return overrides;
}

/**
 * Deep merge of plain objects. Arrays and scalars from `override` replace.
 */
export function mergeConfig(base: RawConfig, override: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = merged[key];
    merged[key] = isPlainObject(existing) && isPlainObject(value)
      ? mergeConfig(existing, value)
      : value;
  }
  return merged;
}

function coerceEnv(name: string, raw: string, kind: EnvKind): string | number | boolean {
  switch (kind) {
    case 'string':
      return raw;
    case 'boolean': {
      const lowered = raw.toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(lowered)) return true;
      if (['0', 'false', 'no', 'off'].includes(lowered)) return false;
      throw new ConfigurationError(name, `expected a boolean, got "${raw}"`);
    }
    case 'int':
    case 'number': {
      const value = Number(raw);
      if (!Number.isFinite(value) || (kind === 'int' && !Number.isInteger(value))) {
        throw new ConfigurationError(name, `expected ${kind === 'int' ? 'an integer' : 'a number'}, got "${raw}"`);
      }
      return value;
    }
  }
}

function setPath(target: RawConfig, path: readonly string[], value: unknown): void {
  let cursor = target;
  path.forEach((segment, index) => {
    if (index === path.length - 1) {
      cursor[segment] = value;
      return;
    }
    const next = cursor[segment];
    if (isPlainObject(next)) {
      cursor = next;
    } else {
      const created: RawConfig = {};
      cursor[segment] = created;
      cursor = created;
    }
  });
}

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
