/**
 * Configuration -- ~/.tunnelbot/config.json.
 *
 * The user file is deep-merged over getDefaultConfig(): objects merge key
 * by key, arrays and scalars replace. `${VAR}` references in string values
 * are then resolved from the environment (unset → empty string), the
 * result is validated, and the returned object is deep-frozen.
 *
 * TUNNELBOT_HOME moves the whole directory, mostly for tests and for
 * running several bots on one host.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import type { LogLevel, TunnelProfile, TunnelbotConfig } from '@tunnelbot/core';
import { ConfigError, errorMessage } from '@tunnelbot/core';
import { CANCEL_TOKEN } from '@tunnelbot/gateway';
import { parseProfiles } from '@tunnelbot/tunnels';

export class ConfigLoadError extends ConfigError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'ConfigLoadError';
  }
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function getTunnelbotDir(): string {
  const override = process.env['TUNNELBOT_HOME'];
  return override ? resolve(override) : resolve(homedir(), '.tunnelbot');
}

export function getConfigPath(): string {
  return join(getTunnelbotDir(), 'config.json');
}

export function configExists(): boolean {
  return existsSync(getConfigPath());
}

export function ensureConfigDir(): void {
  mkdirSync(getTunnelbotDir(), { recursive: true });
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function getDefaultConfig(): TunnelbotConfig {
  return {
    telegram: {
      token: '${TELEGRAM_BOT_TOKEN}',
      pollIntervalSeconds: 3,
    },
    operators: [],
    agent: {
      binaryPath: 'ngrok',
      statusUrl: 'http://127.0.0.1:4040',
      settleDelaySeconds: 5,
    },
    profiles: {},
    observability: {
      observers: ['console'],
      logLevel: 'info',
    },
    verbose: false,
  };
}

// ---------------------------------------------------------------------------
// Load / save
// ---------------------------------------------------------------------------

export function loadConfig(): TunnelbotConfig {
  const path = getConfigPath();
  let user: unknown = {};

  if (existsSync(path)) {
    let raw: string;
    try {
      raw = readFileSync(path, 'utf8');
    } catch (err) {
      throw new ConfigLoadError(`Cannot read ${path}: ${errorMessage(err)}`, { path });
    }
    try {
      user = JSON.parse(raw);
    } catch (err) {
      throw new ConfigLoadError(`Invalid JSON in ${path}: ${errorMessage(err)}`, { path });
    }
    if (!isPlainObject(user)) {
      throw new ConfigLoadError(`${path} must contain a JSON object`, { path });
    }
  }

  const merged = resolveEnvVars(deepMerge(getDefaultConfig(), user));
  return deepFreeze(validateConfig(merged));
}

/** Write the config as pretty-printed JSON, creating the directory first. */
export function saveConfig(config: TunnelbotConfig): void {
  ensureConfigDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2) + '\n', 'utf8');
}

/** Profiles in configuration order; `/cancel` cannot be used as a label. */
export function getProfiles(config: TunnelbotConfig): readonly TunnelProfile[] {
  return parseProfiles(config.profiles, { reservedLabels: [CANCEL_TOKEN] });
}

// ---------------------------------------------------------------------------
// Merge and env resolution
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!isPlainObject(base) || !isPlainObject(override)) return override;

  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    result[key] = deepMerge(base[key], value);
  }
  return result;
}

const ENV_REF = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REF, (_match, name: string) => process.env[name] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvVars);
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      result[key] = resolveEnvVars(child);
    }
    return result;
  }
  return value;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Check every field and build the typed config. All problems are reported
 * together, one per line.
 */
function validateConfig(value: unknown): TunnelbotConfig {
  const errors: string[] = [];
  const root = isPlainObject(value) ? value : {};
  const section = (name: string): Record<string, unknown> => {
    const child = root[name];
    if (isPlainObject(child)) return child;
    errors.push(`${name} must be an object`);
    return {};
  };

  // telegram
  const telegramRaw = section('telegram');
  const token = telegramRaw['token'];
  if (typeof token !== 'string' || token.trim() === '') {
    errors.push('telegram.token is required (set TELEGRAM_BOT_TOKEN or write the token into config.json)');
  }
  const pollIntervalSeconds = telegramRaw['pollIntervalSeconds'];
  if (typeof pollIntervalSeconds !== 'number' || !Number.isFinite(pollIntervalSeconds) || pollIntervalSeconds <= 0) {
    errors.push('telegram.pollIntervalSeconds must be a number greater than 0');
  }
  const apiBaseUrl = telegramRaw['apiBaseUrl'];
  if (apiBaseUrl !== undefined && (typeof apiBaseUrl !== 'string' || !isHttpUrl(apiBaseUrl))) {
    errors.push('telegram.apiBaseUrl must be an http(s) URL');
  }

  // operators
  const operators = root['operators'];
  if (!isStringArray(operators)) {
    errors.push('operators must be an array of Telegram usernames');
  }

  // agent
  const agentRaw = section('agent');
  const binaryPath = agentRaw['binaryPath'];
  if (typeof binaryPath !== 'string' || binaryPath.trim() === '') {
    errors.push('agent.binaryPath is required');
  }
  const statusUrl = agentRaw['statusUrl'];
  if (typeof statusUrl !== 'string' || !isHttpUrl(statusUrl)) {
    errors.push('agent.statusUrl must be an http(s) URL');
  }
  const settleDelaySeconds = agentRaw['settleDelaySeconds'];
  if (typeof settleDelaySeconds !== 'number' || !Number.isFinite(settleDelaySeconds) || settleDelaySeconds < 0) {
    errors.push('agent.settleDelaySeconds must be a number of at least 0');
  }

  // profiles
  const profilesRaw = root['profiles'];
  const profiles: Record<string, string> = {};
  if (!isPlainObject(profilesRaw)) {
    errors.push('profiles must be an object of label → launch arguments');
  } else {
    try {
      for (const profile of parseProfiles(profilesRaw, { reservedLabels: [CANCEL_TOKEN] })) {
        profiles[profile.label] = profile.args.join(' ');
      }
    } catch (err) {
      errors.push(errorMessage(err));
    }
  }

  // observability
  const observabilityRaw = section('observability');
  const observers = observabilityRaw['observers'];
  if (!isStringArray(observers)) {
    errors.push('observability.observers must be an array of observer names');
  }
  const logLevel = observabilityRaw['logLevel'];
  if (!isLogLevel(logLevel)) {
    errors.push(`observability.logLevel must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  const verbose = root['verbose'];
  if (typeof verbose !== 'boolean') {
    errors.push('verbose must be true or false');
  }

  if (
    errors.length > 0 ||
    typeof token !== 'string' ||
    typeof pollIntervalSeconds !== 'number' ||
    !isStringArray(operators) ||
    typeof binaryPath !== 'string' ||
    typeof statusUrl !== 'string' ||
    typeof settleDelaySeconds !== 'number' ||
    !isStringArray(observers) ||
    !isLogLevel(logLevel) ||
    typeof verbose !== 'boolean'
  ) {
    throw new ConfigLoadError(
      `Invalid configuration in ${getConfigPath()}:\n${errors.map((e) => `  - ${e}`).join('\n')}`,
      { errors },
    );
  }

  return {
    telegram: {
      token,
      pollIntervalSeconds,
      ...(typeof apiBaseUrl === 'string' ? { apiBaseUrl } : {}),
    },
    operators: [...operators],
    agent: { binaryPath, statusUrl, settleDelaySeconds },
    profiles,
    observability: { observers: [...observers], logLevel },
    verbose,
  };
}
