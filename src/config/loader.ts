/**
 * Configuration loader for the catalog server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { getDefaultLogger, LOG_LEVELS, type Logger } from '../logging/logger.js';
import type {
  AppConfig,
  CatalogConfig,
  CorsConfig,
  GitHubCatalogConfig,
  ResultsConfig,
  ServerConfig,
} from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
  logger?: Logger;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

type RawSection = Record<string, unknown>;

/**
 * Section overrides as read from the file, before defaults are applied.
 */
export interface PartialAppConfig {
  catalog?: Partial<CatalogConfig>;
  results?: Partial<ResultsConfig>;
  server?: Partial<Omit<ServerConfig, 'cors'>> & { cors?: Partial<CorsConfig> };
  github?: GitHubCatalogConfig;
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string, logger: Logger): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    logger.warn({ variable: varName }, 'Environment variable is not set and has no default');
    return '';
  });
}

function isRecord(value: unknown): value is RawSection {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Recursively substitute environment variables in parsed YAML.
 */
export function substituteEnvVarsRecursive(value: unknown, logger: Logger = getDefaultLogger()): unknown {
  if (typeof value === 'string') {
    return substituteEnvVars(value, logger);
  }
  if (Array.isArray(value)) {
    return value.map(item => substituteEnvVarsRecursive(item, logger));
  }
  if (isRecord(value)) {
    const result: RawSection = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = substituteEnvVarsRecursive(item, logger);
    }
    return result;
  }
  return value;
}

function section(raw: RawSection, key: string): RawSection | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigValidationError('must be an object', key, value);
  }
  return value;
}

function readString(raw: RawSection, key: string, path: string, required = false): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    if (required) {
      throw new ConfigValidationError(`${key} is required`, `${path}.${key}`, value);
    }
    return undefined;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigValidationError(`${key} must be a non-empty string`, `${path}.${key}`, value);
  }
  return value;
}

/**
 * Integers may come as strings after env substitution ("${PORT:-3001}").
 */
function readInteger(raw: RawSection, key: string, path: string, min: number, max: number): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  const number = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
  if (typeof number !== 'number' || !Number.isInteger(number) || number < min || number > max) {
    throw new ConfigValidationError(`${key} must be an integer between ${min} and ${max}`, `${path}.${key}`, value);
  }
  return number;
}

function readBoolean(raw: RawSection, key: string, path: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true' || value === 'false') {
    return value === 'true';
  }
  throw new ConfigValidationError(`${key} must be a boolean`, `${path}.${key}`, value);
}

function readEnum<T extends string>(
  raw: RawSection,
  key: string,
  path: string,
  allowed: readonly T[]
): T | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  const member = allowed.find(candidate => candidate === value);
  if (member === undefined) {
    throw new ConfigValidationError(`${key} must be one of: ${allowed.join(', ')}`, `${path}.${key}`, value);
  }
  return member;
}

/**
 * Validate catalog configuration.
 */
function validateCatalogConfig(raw: RawSection, path = 'catalog'): Partial<CatalogConfig> {
  const catalogPath = readString(raw, 'path', path);
  const modelsDir = readString(raw, 'modelsDir', path);
  const limit = readInteger(raw, 'limit', path, 0, Number.MAX_SAFE_INTEGER);
  const onModelError = readEnum(raw, 'onModelError', path, ['fail', 'skip'] as const);

  return {
    ...(catalogPath !== undefined ? { path: catalogPath } : {}),
    ...(modelsDir !== undefined ? { modelsDir } : {}),
    ...(limit !== undefined ? { limit } : {}),
    ...(onModelError !== undefined ? { onModelError } : {}),
  };
}

/**
 * Validate results configuration.
 */
function validateResultsConfig(raw: RawSection, path = 'results'): Partial<ResultsConfig> {
  const dir = readString(raw, 'dir', path);
  const iriFormat = readEnum(raw, 'iriFormat', path, ['local-name', 'full'] as const);

  return {
    ...(dir !== undefined ? { dir } : {}),
    ...(iriFormat !== undefined ? { iriFormat } : {}),
  };
}

function validateCorsConfig(raw: RawSection, path: string): Partial<CorsConfig> {
  const enabled = readBoolean(raw, 'enabled', path);
  const origins = raw.origins;
  if (origins !== undefined && origins !== null) {
    if (!Array.isArray(origins) || !origins.every(origin => typeof origin === 'string')) {
      throw new ConfigValidationError('origins must be a list of strings', `${path}.origins`, origins);
    }
  }

  return {
    ...(enabled !== undefined ? { enabled } : {}),
    ...(Array.isArray(origins) ? { origins: origins.map(String) } : {}),
  };
}

/**
 * Validate server configuration.
 */
function validateServerConfig(raw: RawSection, path = 'server'): NonNullable<PartialAppConfig['server']> {
  const port = readInteger(raw, 'port', path, 1, 65535);
  const host = readString(raw, 'host', path);
  const logLevel = readEnum(raw, 'logLevel', path, LOG_LEVELS);
  const cors = section(raw, 'cors');

  return {
    ...(port !== undefined ? { port } : {}),
    ...(host !== undefined ? { host } : {}),
    ...(logLevel !== undefined ? { logLevel } : {}),
    ...(cors !== undefined ? { cors: validateCorsConfig(cors, `${path}.cors`) } : {}),
  };
}

/**
 * Validate GitHub configuration.
 */
function validateGitHubConfig(raw: RawSection, path = 'github'): GitHubCatalogConfig {
  const owner = readString(raw, 'owner', path, true) ?? '';
  const repo = readString(raw, 'repo', path, true) ?? '';
  const modelsPath = readString(raw, 'modelsPath', path) ?? DEFAULT_CONFIG.catalog.modelsDir;
  const ref = readString(raw, 'ref', path);
  // an unset ${GITHUB_TOKEN} substitutes to '' and means anonymous access
  const token = raw.token === '' ? undefined : readString(raw, 'token', path);

  return {
    owner,
    repo,
    modelsPath,
    ...(ref !== undefined ? { ref } : {}),
    ...(token !== undefined ? { token } : {}),
  };
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): PartialAppConfig {
  if (config === undefined || config === null) {
    return {};
  }
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  const catalog = section(config, 'catalog');
  const results = section(config, 'results');
  const server = section(config, 'server');
  const github = section(config, 'github');

  return {
    ...(catalog !== undefined ? { catalog: validateCatalogConfig(catalog) } : {}),
    ...(results !== undefined ? { results: validateResultsConfig(results) } : {}),
    ...(server !== undefined ? { server: validateServerConfig(server) } : {}),
    ...(github !== undefined ? { github: validateGitHubConfig(github) } : {}),
  };
}

/**
 * Apply defaults to validated overrides.
 */
export function applyDefaults(partial: PartialAppConfig): AppConfig {
  const { cors, ...server }: NonNullable<PartialAppConfig['server']> = partial.server ?? {};
  const config: AppConfig = {
    catalog: { ...DEFAULT_CONFIG.catalog, ...partial.catalog },
    results: { ...DEFAULT_CONFIG.results, ...partial.results },
    server: {
      ...DEFAULT_CONFIG.server,
      ...server,
      cors: { ...DEFAULT_CONFIG.server.cors, ...cors },
    },
  };

  if (partial.github !== undefined) {
    config.github = partial.github;
  }
  return config;
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const logger = options.logger ?? getDefaultLogger();
  const configPath = options.configPath
    ?? process.env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    logger.warn({ configPath: absolutePath }, 'Config file not found, using defaults');
    return applyDefaults({});
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigValidationError(
      `failed to parse config file: ${err instanceof Error ? err.message : String(err)}`,
      absolutePath,
      undefined
    );
  }

  const config = applyDefaults(validateConfig(substituteEnvVarsRecursive(parsed, logger)));
  logger.debug({ configPath: absolutePath }, 'Config loaded');
  return config;
}
