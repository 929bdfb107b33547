/**
 * Fleetwire Runtime Host: Configuration Resolution
 *
 * Each setting is resolved with the following precedence:
 *
 *   1. Explicit override (e.g. from a CLI flag)
 *   2. Environment variable (FLEETWIRE_*)
 *   3. JSON config file: FLEETWIRE_CONFIG, or `<home>/config.json`
 *   4. Built-in default
 *
 * The home directory itself is resolved from steps 1, 2 and 4 only, since
 * the default config file lives inside it.
 *
 * The resolved object is handed to constructors (ModuleChannel,
 * InventoryResolver). Nothing below this module reads process.env for
 * settings.
 *
 * Layout under the home directory:
 *
 *   <home>/
 *     config.json
 *     logs/
 *       invocations.jsonl
 *       inventory.jsonl
 */

import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import {
  ConfigError,
  DEFAULT_ARGS_ENV_VAR,
  DEFAULT_ROOT_GROUP,
  isJsonObject,
  tryParseJson,
  type JsonObject,
} from '@fleetwire/kernel';
import { isNodeError } from './logging/log-io.js';

export interface FleetwireConfig {
  /** Environment variable carrying encoded module arguments. */
  readonly argsEnvVar: string;
  /** Name of the implicit top-level inventory group. */
  readonly rootGroup: string;
  /** Default per-invocation deadline. */
  readonly timeoutMs: number;
  /** Delay between SIGTERM and SIGKILL after a deadline. */
  readonly killGraceMs: number;
  /** Maximum concurrent module processes. */
  readonly forks: number;
  /** Directory holding config.json and logs/. */
  readonly home: string;
}

export const CONFIG_DEFAULTS: Omit<FleetwireConfig, 'home'> = {
  argsEnvVar: DEFAULT_ARGS_ENV_VAR,
  rootGroup: DEFAULT_ROOT_GROUP,
  timeoutMs: 60_000,
  killGraceMs: 2_000,
  forks: 5,
};

export const CONFIG_ENV_VARS = {
  argsEnvVar: 'FLEETWIRE_ARGS_VAR',
  rootGroup: 'FLEETWIRE_ROOT_GROUP',
  timeoutMs: 'FLEETWIRE_TIMEOUT_MS',
  killGraceMs: 'FLEETWIRE_KILL_GRACE_MS',
  forks: 'FLEETWIRE_FORKS',
  home: 'FLEETWIRE_HOME',
  configFile: 'FLEETWIRE_CONFIG',
} as const;

export interface ResolveConfigOptions {
  readonly overrides?: Partial<FleetwireConfig> | undefined;
  /** Explicit config file path. Must exist when given. */
  readonly configFile?: string | undefined;
  /** Environment to read FLEETWIRE_* from. Defaults to process.env. */
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
}

type StringKey = 'argsEnvVar' | 'rootGroup';
type NumberKey = 'timeoutMs' | 'killGraceMs' | 'forks';

/**
 * Resolve the effective configuration.
 *
 * @throws {ConfigError} On an unreadable explicit config file or an invalid value
 */
export function resolveFleetwireConfig(options: ResolveConfigOptions = {}): FleetwireConfig {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const home = resolve(
    overrides.home ?? nonEmpty(env[CONFIG_ENV_VARS.home]) ?? join(homedir(), '.fleetwire'),
  );

  const explicitFile = options.configFile ?? nonEmpty(env[CONFIG_ENV_VARS.configFile]);
  const file = readConfigFile(explicitFile ?? join(home, 'config.json'), explicitFile !== undefined);

  const str = (key: StringKey): string => {
    const value = overrides[key] ?? nonEmpty(env[CONFIG_ENV_VARS[key]]) ?? fileString(file, key);
    return value ?? CONFIG_DEFAULTS[key];
  };

  const num = (key: NumberKey, min: number): number => {
    const override = overrides[key];
    if (override !== undefined) return checkInteger(key, override, min);
    const fromEnv = nonEmpty(env[CONFIG_ENV_VARS[key]]);
    if (fromEnv !== undefined) return checkInteger(key, Number(fromEnv), min);
    const fromFile = file[key];
    if (fromFile !== undefined) {
      if (typeof fromFile !== 'number') throw new ConfigError(key, 'must be a number in the config file');
      return checkInteger(key, fromFile, min);
    }
    return CONFIG_DEFAULTS[key];
  };

  return {
    argsEnvVar: str('argsEnvVar'),
    rootGroup: str('rootGroup'),
    timeoutMs: num('timeoutMs', 1),
    killGraceMs: num('killGraceMs', 0),
    forks: num('forks', 1),
    home,
  };
}

/** `<home>/logs`, where the JSONL sink writes. */
export function logsDir(config: Pick<FleetwireConfig, 'home'>): string {
  return join(config.home, 'logs');
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function readConfigFile(path: string, required: boolean): JsonObject {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (!required && isNodeError(err, 'ENOENT')) return {};
    throw new ConfigError('configFile', `cannot read '${path}': ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = tryParseJson(raw);
  if (!isJsonObject(parsed)) {
    throw new ConfigError('configFile', `'${path}' must contain a JSON object`);
  }
  return parsed;
}

function fileString(file: JsonObject, key: StringKey): string | undefined {
  const value = file[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(key, 'must be a non-empty string in the config file');
  }
  return value;
}

function checkInteger(key: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(key, `must be an integer >= ${min}, got ${String(value)}`);
  }
  return value;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}
