import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import {
  ConfigValidationError,
  RELAYWATCH_CONFIG_FILE,
  RELAYWATCH_HOME,
  errorMessage,
  relaywatchConfigSchema,
} from '@relaywatch/shared';
import type { RelayWatchConfig } from '@relaywatch/shared';

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: RelayWatchConfig;
  /** File the settings came from, or null when only defaults and environment applied. */
  source: string | null;
}

interface EnvOverride {
  variable: string;
  path: readonly string[];
  parse?: (value: string) => unknown;
}

const ENV_OVERRIDES: readonly EnvOverride[] = [
  { variable: 'RELAYWATCH_CONTROL_HOST', path: ['control', 'host'] },
  { variable: 'RELAYWATCH_CONTROL_PORT', path: ['control', 'port'] },
  { variable: 'RELAYWATCH_CONTROL_PASSWORD', path: ['control', 'password'] },
  { variable: 'RELAYWATCH_SMTP_HOST', path: ['smtp', 'host'] },
  { variable: 'RELAYWATCH_SMTP_PORT', path: ['smtp', 'port'] },
  { variable: 'RELAYWATCH_SMTP_USERNAME', path: ['smtp', 'username'] },
  { variable: 'RELAYWATCH_SMTP_PASSWORD', path: ['smtp', 'password'] },
  {
    variable: 'RELAYWATCH_SMTP_STARTTLS',
    path: ['smtp', 'starttls'],
    parse: (value) => value.toLowerCase() === 'true',
  },
  { variable: 'RELAYWATCH_EMAIL_FROM', path: ['email', 'from'] },
  { variable: 'RELAYWATCH_EMAIL_TO', path: ['email', 'to'] },
  { variable: 'RELAYWATCH_NICKNAME', path: ['relay', 'nickname'] },
  { variable: 'RELAYWATCH_LOG_LEVEL', path: ['logLevel'] },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
  let node = target;
  for (const key of path.slice(0, -1)) {
    const child = node[key];
    if (isRecord(child)) {
      node = child;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null) return;
  for (const child of Object.values(value)) deepFreeze(child);
  Object.freeze(value);
}

/**
 * Locate the config file: RELAYWATCH_CONFIG, then ./relaywatch.config.json,
 * then $RELAYWATCH_HOME/config.json.
 */
export function findConfigFile(options: LoadConfigOptions = {}): string | null {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const explicit = env.RELAYWATCH_CONFIG;
  if (explicit) {
    const path = resolve(cwd, explicit);
    if (!existsSync(path)) {
      throw new ConfigValidationError([`RELAYWATCH_CONFIG: file not found: ${path}`]);
    }
    return path;
  }

  const candidates = [
    join(cwd, RELAYWATCH_CONFIG_FILE),
    join(env.RELAYWATCH_HOME ?? RELAYWATCH_HOME, 'config.json'),
  ];
  return candidates.find((candidate) => existsSync(candidate)) ?? null;
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigValidationError([`${path}: ${errorMessage(err)}`]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigValidationError([`${path}: expected a JSON object`]);
  }
  return parsed;
}

/**
 * Load, override from the environment and validate the configuration.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const source = findConfigFile(options);
  const raw: Record<string, unknown> = source ? readConfigFile(source) : {};

  for (const override of ENV_OVERRIDES) {
    const value = env[override.variable];
    if (value === undefined || value === '') continue;
    setPath(raw, override.path, override.parse ? override.parse(value) : value);
  }

  const result = relaywatchConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    );
  }

  deepFreeze(result.data);
  return { config: result.data, source };
}
