import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import * as YAML from 'yaml';
import type { EncryptionConfig, StorageConfig, StorageType, TagenvConfig } from '../types';
import { STORAGE_TYPES } from '../types';
import { ConfigError, FormatError, IOError } from '../errors';
import { decodeKey, loadKeyFile } from './crypto';

export const CONFIG_FILE_NAME = '.tagenv.yml';
export const KEY_ENV_VAR = 'TAGENV_KEY';
const DEFAULT_ENV_FILE = '.env';

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(source: RawObject, field: string, path: string): string | undefined {
  const value = source[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new FormatError(`Invalid config: ${path}.${field} must be a string`);
  }
  return value;
}

function requiredString(source: RawObject, field: string, type: StorageType): string {
  const value = optionalString(source, field, 'storage');
  if (!value) {
    throw new ConfigError(`Invalid config: storage.${field} is required for ${type} storage`);
  }
  return value;
}

function isStorageType(value: string): value is StorageType {
  return STORAGE_TYPES.some(type => type === value);
}

function parseStorage(raw: unknown): StorageConfig {
  if (!isObject(raw)) {
    throw new ConfigError('Invalid config: storage section is required');
  }
  const type = optionalString(raw, 'type', 'storage');
  if (!type) {
    throw new ConfigError('Invalid config: storage.type is required');
  }
  if (!isStorageType(type)) {
    throw new ConfigError(`Invalid config: unsupported storage type "${type}" (expected one of ${STORAGE_TYPES.join(', ')})`);
  }

  const prefix = optionalString(raw, 'prefix', 'storage');
  switch (type) {
    case 's3':
      return {
        type,
        bucket: requiredString(raw, 'bucket', type),
        region: requiredString(raw, 'region', type),
        endpoint: optionalString(raw, 'endpoint', 'storage'),
        prefix
      };
    case 'azure':
      return {
        type,
        accountName: requiredString(raw, 'accountName', type),
        containerName: requiredString(raw, 'containerName', type),
        prefix
      };
    case 'gcs':
      return {
        type,
        projectId: requiredString(raw, 'projectId', type),
        bucketName: requiredString(raw, 'bucketName', type),
        prefix
      };
    case 'local':
      return {
        type,
        directory: requiredString(raw, 'directory', type),
        prefix
      };
  }
}

function parseEncryption(raw: unknown): EncryptionConfig {
  if (raw === undefined || raw === null) {
    return { enabled: false };
  }
  if (!isObject(raw)) {
    throw new FormatError('Invalid config: encryption must be a mapping');
  }
  const enabled = raw.enabled ?? false;
  if (typeof enabled !== 'boolean') {
    throw new FormatError('Invalid config: encryption.enabled must be true or false');
  }
  const allowPlaintext = raw.allowPlaintext ?? false;
  if (typeof allowPlaintext !== 'boolean') {
    throw new FormatError('Invalid config: encryption.allowPlaintext must be true or false');
  }
  return {
    enabled,
    key: optionalString(raw, 'key', 'encryption'),
    keyFile: optionalString(raw, 'keyFile', 'encryption'),
    allowPlaintext
  };
}

function parseEnvFiles(raw: RawObject): string[] {
  const envFiles = raw.envFiles;
  if (envFiles !== undefined && envFiles !== null) {
    if (!Array.isArray(envFiles) || !envFiles.every((file): file is string => typeof file === 'string' && file.length > 0)) {
      throw new FormatError('Invalid config: envFiles must be a list of file paths');
    }
    if (envFiles.length > 0) return envFiles;
  }
  const envFile = optionalString(raw, 'envFile', 'config');
  return [envFile || DEFAULT_ENV_FILE];
}

/**
 * Validates a parsed config document. Wrong value types are a `FormatError`;
 * missing required fields are a `ConfigError`.
 */
export function parseConfig(raw: unknown): TagenvConfig {
  if (!isObject(raw)) {
    throw new FormatError('Invalid config: expected a YAML mapping at the top level');
  }
  return {
    storage: parseStorage(raw.storage),
    encryption: parseEncryption(raw.encryption),
    envFiles: parseEnvFiles(raw)
  };
}

export function getConfigPath(searchDir: string = process.cwd()): string {
  return join(searchDir, CONFIG_FILE_NAME);
}

export async function loadConfigFile(configPath: string = getConfigPath()): Promise<TagenvConfig> {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Configuration file ${configPath} not found`, {
      hint: "Run 'tagenv init' first"
    });
  }

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    throw new IOError(`Failed to read config file ${configPath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error) {
    throw new FormatError(`Failed to parse config file ${configPath}`, { cause: error });
  }
  return parseConfig(raw);
}

export function serializeConfig(config: TagenvConfig): string {
  const document: RawObject = {
    storage: config.storage,
    encryption: config.encryption
  };
  if (config.envFiles.length === 1) {
    document.envFile = config.envFiles[0];
  } else {
    document.envFiles = config.envFiles;
  }
  return YAML.stringify(document);
}

export async function saveConfigFile(config: TagenvConfig, configPath: string = getConfigPath()): Promise<void> {
  try {
    await writeFile(configPath, serializeConfig(config), { encoding: 'utf-8', mode: 0o600 });
  } catch (error) {
    throw new IOError(`Failed to write config file ${configPath}`, { cause: error });
  }
}

export interface ConfigOverrides {
  envFile?: string[];
  prefix?: string;
}

export function mergeConfigWithOptions(config: TagenvConfig, options: ConfigOverrides): TagenvConfig {
  return {
    ...config,
    storage: options.prefix !== undefined ? { ...config.storage, prefix: options.prefix } : config.storage,
    envFiles: options.envFile && options.envFile.length > 0 ? options.envFile : config.envFiles
  };
}

export interface KeyResolutionOptions {
  /** Directory a relative `keyFile` is resolved against. */
  baseDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Finds the encryption key: `TAGENV_KEY`, then `encryption.key`, then
 * `encryption.keyFile`. Returns undefined when encryption is disabled.
 */
export async function resolveEncryptionKey(
  config: TagenvConfig,
  options: KeyResolutionOptions = {}
): Promise<Buffer | undefined> {
  if (!config.encryption.enabled) return undefined;

  const env = options.env ?? process.env;
  const fromEnv = env[KEY_ENV_VAR];
  if (fromEnv) {
    try {
      return decodeKey(fromEnv);
    } catch (error) {
      throw new FormatError(`Invalid ${KEY_ENV_VAR} environment variable`, { cause: error });
    }
  }

  if (config.encryption.key) {
    try {
      return decodeKey(config.encryption.key);
    } catch (error) {
      throw new FormatError('Invalid config: encryption.key', { cause: error });
    }
  }

  if (config.encryption.keyFile) {
    return loadKeyFile(resolve(options.baseDir ?? process.cwd(), config.encryption.keyFile));
  }

  throw new ConfigError('Encryption is enabled but no key is configured', {
    hint: `Set encryption.key or encryption.keyFile, or export ${KEY_ENV_VAR}`
  });
}

export function configDirectory(configPath: string): string {
  return dirname(resolve(configPath));
}
