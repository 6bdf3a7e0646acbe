/**
 * Relay configuration
 *
 * Settings are layered: built-in defaults, then an optional JSON file, then
 * OAUTH_RELAY_* environment variables, then CLI overrides. The merged result
 * is validated with Zod.
 */

import { readFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ErrorType, OAuthRelayError } from '../types/errors.js';
import { DEFAULT_CODE_KEYS } from '../relay/extractor.js';
import type { RelayEndpoint } from '../relay/types.js';

const MAX_PORT = 65535;

/** setTimeout refuses longer delays */
const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export const DEFAULT_SOCKET_PATH = join(tmpdir(), 'oauth-relay.sock');

/**
 * Relay configuration schema
 */
export const RelayConfigSchema = z.object({
  callbackPath: z
    .string()
    .startsWith('/', { message: 'callbackPath must start with "/"' })
    .default('/oauth/callback'),
  httpHost: z.string().min(1).default('127.0.0.1'),
  httpPort: z.number().int().min(0).max(MAX_PORT).default(8000),
  codeKeys: z.array(z.string().min(1)).min(1).default([...DEFAULT_CODE_KEYS]),
  socketPath: z.string().min(1).default(DEFAULT_SOCKET_PATH),
  tcpHost: z.string().min(1).default('127.0.0.1'),
  tcpPort: z.number().int().min(0).max(MAX_PORT).default(9999),
  useTcp: z.boolean().default(false),
  defaultTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(300000),
  logUnmatched: z.boolean().default(true),
  registrationTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(10000),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

/**
 * Unvalidated settings from a file, the environment or CLI flags
 */
export type RelayConfigInput = Partial<Record<keyof RelayConfig, unknown>>;

/**
 * Environment variable for each setting
 */
export const RELAY_ENV_VARS: Readonly<Record<keyof RelayConfig, string>> = {
  callbackPath: 'OAUTH_RELAY_CALLBACK_PATH',
  httpHost: 'OAUTH_RELAY_HTTP_HOST',
  httpPort: 'OAUTH_RELAY_HTTP_PORT',
  codeKeys: 'OAUTH_RELAY_CODE_KEYS',
  socketPath: 'OAUTH_RELAY_SOCKET_PATH',
  tcpHost: 'OAUTH_RELAY_TCP_HOST',
  tcpPort: 'OAUTH_RELAY_TCP_PORT',
  useTcp: 'OAUTH_RELAY_USE_TCP',
  defaultTimeoutMs: 'OAUTH_RELAY_DEFAULT_TIMEOUT_MS',
  logUnmatched: 'OAUTH_RELAY_LOG_UNMATCHED',
  registrationTimeoutMs: 'OAUTH_RELAY_REGISTRATION_TIMEOUT_MS',
};

export const CONFIG_PATH_ENV_VAR = 'OAUTH_RELAY_CONFIG_PATH';

const NUMERIC_KEYS: ReadonlySet<keyof RelayConfig> = new Set([
  'httpPort',
  'tcpPort',
  'defaultTimeoutMs',
  'registrationTimeoutMs',
]);

const BOOLEAN_KEYS: ReadonlySet<keyof RelayConfig> = new Set(['useTcp', 'logUnmatched']);

function isConfigKey(key: string): key is keyof RelayConfig {
  return Object.prototype.hasOwnProperty.call(RELAY_ENV_VARS, key);
}

/**
 * Parse a boolean environment value ('true', '1', 'yes' and their opposites)
 */
export function parseBooleanEnv(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return value;
}

function parseEnvValue(key: keyof RelayConfig, value: string): unknown {
  if (NUMERIC_KEYS.has(key)) {
    const parsed = Number(value);
    return value.trim() === '' || Number.isNaN(parsed) ? value : parsed;
  }
  if (BOOLEAN_KEYS.has(key)) {
    return parseBooleanEnv(value);
  }
  if (key === 'codeKeys') {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  return value;
}

/**
 * Read relay settings from environment variables
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): RelayConfigInput {
  const input: RelayConfigInput = {};
  for (const [key, name] of Object.entries(RELAY_ENV_VARS)) {
    const value = env[name];
    if (value !== undefined && isConfigKey(key)) {
      input[key] = parseEnvValue(key, value);
    }
  }
  return input;
}

/**
 * Read relay settings from a JSON file
 * @throws OAuthRelayError if the file is missing, unreadable or not a JSON object
 */
export async function readConfigFile(path: string): Promise<RelayConfigInput> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new OAuthRelayError(ErrorType.CONFIG_ERROR, 'CONFIG_NOT_FOUND', `Configuration file not found: ${path}`);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new OAuthRelayError(ErrorType.CONFIG_ERROR, 'CONFIG_INVALID_JSON', `Configuration file is not valid JSON: ${path}`, {
      cause: error,
      recoverable: false,
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new OAuthRelayError(ErrorType.CONFIG_ERROR, 'CONFIG_INVALID', `Configuration file must contain a JSON object: ${path}`, {
      recoverable: false,
    });
  }

  const input: RelayConfigInput = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (isConfigKey(key)) {
      input[key] = value;
    }
  }
  return input;
}

/**
 * Validate merged settings and fill in defaults
 * @throws OAuthRelayError listing every invalid field
 */
export function validateRelayConfig(input: RelayConfigInput): RelayConfig {
  const result = RelayConfigSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  throw new OAuthRelayError(
    ErrorType.CONFIG_ERROR,
    'CONFIG_INVALID',
    `Invalid relay configuration: ${issues.join('; ')}`,
    { details: issues, recoverable: false }
  );
}

/**
 * Options for loadRelayConfig
 */
export interface LoadRelayConfigOptions {
  /** JSON config file; defaults to OAUTH_RELAY_CONFIG_PATH when set */
  configPath?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence settings, typically from CLI flags */
  overrides?: RelayConfigInput;
}

/**
 * Load the relay configuration from every layer
 */
export async function loadRelayConfig(options?: LoadRelayConfigOptions): Promise<RelayConfig> {
  const env = options?.env ?? process.env;
  const configPath = options?.configPath ?? env[CONFIG_PATH_ENV_VAR];
  const fileConfig = configPath ? await readConfigFile(configPath) : {};

  const overrides: RelayConfigInput = {};
  for (const [key, value] of Object.entries(options?.overrides ?? {})) {
    if (value !== undefined && isConfigKey(key)) {
      overrides[key] = value;
    }
  }

  return validateRelayConfig({
    ...fileConfig,
    ...readEnvConfig(env),
    ...overrides,
  });
}

/**
 * Choose the coordinator's socket endpoint
 *
 * TCP loopback is used when forced by configuration, and always on Windows.
 */
export function resolveEndpoint(
  config: Pick<RelayConfig, 'socketPath' | 'tcpHost' | 'tcpPort' | 'useTcp'>,
  platform: NodeJS.Platform = process.platform
): RelayEndpoint {
  if (config.useTcp || platform === 'win32') {
    return { type: 'tcp', host: config.tcpHost, port: config.tcpPort };
  }
  return { type: 'unix', path: config.socketPath };
}
