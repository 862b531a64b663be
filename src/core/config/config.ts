/**
 * Repository configuration builder.
 *
 * Resolution order per field: overrides, environment, config file, defaults.
 *
 * Environment variables:
 * - NEXUS_URL: Repository base URL (default: http://localhost:8081)
 * - NEXUS_USER: Basic-auth username (default: admin)
 * - NEXUS_PASS: Basic-auth password (default: admin)
 * - RAW_TRANSFER_MAX_CONCURRENT: Parallel downloads (default: 8)
 * - RAW_TRANSFER_CHUNK_SIZE: Streaming chunk size in bytes (default: 8192)
 * - RAW_TRANSFER_CONFIG: Path to a JSON config file
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigError, errorMessage } from '../errors.js';
import type {
  ConfigSourceOptions,
  RepositoryConfig,
  RepositoryConfigFile,
} from './types.js';
import { DEFAULT_REPOSITORY_CONFIG } from './types.js';

const MAX_CONCURRENT_DOWNLOADS = 64;
const MIN_CHUNK_SIZE = 512;
const MAX_CHUNK_SIZE = 1024 * 1024;

/** Empty strings count as unset, matching how shells export blank variables. */
function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  return raw === undefined || raw === '' ? undefined : raw;
}

function readEnvNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = readEnv(env, key);
  if (raw === undefined) return undefined;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Default config file location: RAW_TRANSFER_CONFIG, else ~/.raw-transfer/config.json.
 */
export function getConfigFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return readEnv(env, 'RAW_TRANSFER_CONFIG')
    ?? path.join(os.homedir(), '.raw-transfer', 'config.json');
}

/**
 * Read the optional JSON config file.
 * A missing file yields an empty object; an unreadable or malformed one
 * yields an empty object plus a warning.
 */
export function readConfigFile(
  filePath: string,
  onWarning?: (message: string) => void
): RepositoryConfigFile {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    onWarning?.(`Ignoring config file ${filePath}: ${errorMessage(err)}`);
    return {};
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    onWarning?.(`Ignoring config file ${filePath}: expected a JSON object`);
    return {};
  }

  const result: RepositoryConfigFile = {};
  for (const key of ['url', 'username', 'password'] as const) {
    const value: unknown = Reflect.get(parsed, key);
    if (typeof value === 'string' && value !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Build repository config from overrides, environment, config file and defaults.
 */
export function buildRepositoryConfig(
  overrides?: Partial<RepositoryConfig>,
  options: ConfigSourceOptions = {}
): RepositoryConfig {
  const env = options.env ?? process.env;
  const file = readConfigFile(options.configPath ?? getConfigFilePath(env), options.onWarning);

  const baseUrl =
    overrides?.baseUrl ??
    readEnv(env, 'NEXUS_URL') ??
    file.url ??
    DEFAULT_REPOSITORY_CONFIG.baseUrl;

  return {
    baseUrl: baseUrl.replace(/\/+$/, ''),
    username:
      overrides?.username ??
      readEnv(env, 'NEXUS_USER') ??
      file.username ??
      DEFAULT_REPOSITORY_CONFIG.username,
    password:
      overrides?.password ??
      readEnv(env, 'NEXUS_PASS') ??
      file.password ??
      DEFAULT_REPOSITORY_CONFIG.password,
    maxConcurrentDownloads:
      overrides?.maxConcurrentDownloads ??
      readEnvNumber(env, 'RAW_TRANSFER_MAX_CONCURRENT') ??
      DEFAULT_REPOSITORY_CONFIG.maxConcurrentDownloads,
    chunkSizeBytes:
      overrides?.chunkSizeBytes ??
      readEnvNumber(env, 'RAW_TRANSFER_CHUNK_SIZE') ??
      DEFAULT_REPOSITORY_CONFIG.chunkSizeBytes,
  };
}

/**
 * Validate a repository configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateRepositoryConfig(config: RepositoryConfig): string[] {
  const errors: string[] = [];

  if (!config.baseUrl) {
    errors.push('baseUrl is required');
  } else {
    let protocol: string | null = null;
    try {
      protocol = new URL(config.baseUrl).protocol;
    } catch {
      errors.push(`baseUrl is not a valid URL: ${config.baseUrl}`);
    }
    if (protocol !== null && protocol !== 'http:' && protocol !== 'https:') {
      errors.push('baseUrl must use http or https');
    }
  }

  if (!config.username) {
    errors.push('username is required');
  }

  if (!Number.isInteger(config.maxConcurrentDownloads) || config.maxConcurrentDownloads < 1) {
    errors.push('maxConcurrentDownloads must be at least 1');
  } else if (config.maxConcurrentDownloads > MAX_CONCURRENT_DOWNLOADS) {
    errors.push(`maxConcurrentDownloads must not exceed ${MAX_CONCURRENT_DOWNLOADS}`);
  }

  if (!Number.isInteger(config.chunkSizeBytes) || config.chunkSizeBytes < MIN_CHUNK_SIZE) {
    errors.push(`chunkSizeBytes must be at least ${MIN_CHUNK_SIZE}`);
  } else if (config.chunkSizeBytes > MAX_CHUNK_SIZE) {
    errors.push(`chunkSizeBytes must not exceed ${MAX_CHUNK_SIZE}`);
  }

  return errors;
}

/**
 * Build and validate in one step; throws ConfigError when invalid.
 */
export function loadRepositoryConfig(
  overrides?: Partial<RepositoryConfig>,
  options?: ConfigSourceOptions
): RepositoryConfig {
  const config = buildRepositoryConfig(overrides, options);
  const errors = validateRepositoryConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return config;
}
