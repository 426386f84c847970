import { existsSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import { resolve } from 'path';
import type { ConfirmFn, EnvDiff, EnvMap, Logger, ObjectStore } from '../types';
import { AuthenticationError, ConfigError, FormatError, IOError, NotFoundError } from '../errors';
import { createArchive, extractArchive, extractArchiveToFiles } from './archive';
import { decrypt, encrypt } from './crypto';
import { diffEnvMaps } from './diff';
import { parseEnvContent, parseEnvEntries } from './parse';

const LIST_HINT = "Run 'tagenv list' to see available versions";

export interface EncryptionSettings {
  enabled: boolean;
  key?: Buffer;
  /** Treat blobs that fail to decrypt as plaintext instead of failing. */
  allowPlaintext?: boolean;
}

export interface SyncContext {
  storage: ObjectStore;
  /** Target files, relative to `cwd`. More than one means the blob is an archive. */
  files: string[];
  encryption: EncryptionSettings;
  cwd?: string;
  logger?: Logger;
}

export interface PushResult {
  tag: string;
  files: string[];
  bytes: number;
  archived: boolean;
  encrypted: boolean;
  overwritten: boolean;
}

export interface PullOptions {
  /** Overwrite existing local files without asking. */
  force?: boolean;
  /** Asked before overwriting; a missing callback counts as "no". */
  confirm?: ConfirmFn;
}

export interface PullResult {
  tag: string;
  status: 'written' | 'cancelled';
  files: string[];
}

function loggerFor(context: SyncContext): Logger {
  return context.logger ?? console;
}

function requireKey(context: SyncContext): Buffer | undefined {
  if (!context.encryption.enabled) return undefined;
  if (!context.encryption.key) {
    throw new ConfigError('Encryption is enabled but no key is configured');
  }
  return context.encryption.key;
}

async function readPayload(context: SyncContext): Promise<Buffer> {
  const cwd = context.cwd ?? process.cwd();
  const { files } = context;
  if (files.length === 0) {
    throw new ConfigError('No environment files configured');
  }

  for (const file of files) {
    if (!existsSync(resolve(cwd, file))) {
      throw new IOError(`File not found: ${file}`);
    }
  }

  if (files.length > 1) {
    return createArchive(files, { cwd });
  }

  try {
    return await readFile(resolve(cwd, files[0]));
  } catch (error) {
    throw new IOError(`Failed to read file ${files[0]}`, { cause: error });
  }
}

async function fetchBlob(tag: string, storage: ObjectStore): Promise<Buffer> {
  try {
    return await storage.download(tag);
  } catch (error) {
    if (error instanceof NotFoundError) {
      throw new NotFoundError(`Tag '${tag}' not found in storage`, { cause: error, hint: LIST_HINT });
    }
    throw new IOError(`Failed to download tag '${tag}'`, { cause: error });
  }
}

function openBlob(tag: string, blob: Buffer, context: SyncContext): Buffer {
  const key = requireKey(context);
  if (!key) return blob;

  try {
    return decrypt(blob, key);
  } catch (error) {
    if (error instanceof AuthenticationError && context.encryption.allowPlaintext) {
      loggerFor(context).warn(`⚠️  Could not decrypt tag '${tag}'; using it as unencrypted data`);
      return blob;
    }
    throw new AuthenticationError(`Failed to decrypt tag '${tag}'`, {
      cause: error,
      hint: 'Check that the encryption key matches the one used to push this tag'
    });
  }
}

/**
 * Uploads the configured files under `tag`: one file goes up as raw bytes,
 * several as an archive; either is sealed first when encryption is on. An
 * existing tag is overwritten with a warning.
 */
export async function pushFiles(tag: string, context: SyncContext): Promise<PushResult> {
  const logger = loggerFor(context);
  const key = requireKey(context);

  if (context.files.length > 1) {
    logger.log(`Reading ${context.files.length} environment files...`);
  } else {
    logger.log(`Reading environment file: ${context.files[0] ?? '(none)'}`);
  }
  let payload = await readPayload(context);

  if (key) {
    logger.log('Encrypting data...');
    payload = encrypt(payload, key);
  }

  const overwritten = await context.storage.exists(tag);
  if (overwritten) {
    logger.warn(`⚠️  Tag '${tag}' already exists in storage. This will overwrite the existing version.`);
  }

  await context.storage.upload(tag, payload);

  return {
    tag,
    files: [...context.files],
    bytes: payload.length,
    archived: context.files.length > 1,
    encrypted: key !== undefined,
    overwritten
  };
}

/**
 * Downloads `tag` and writes it over the configured files. Nothing is written
 * when the confirmation is declined.
 */
export async function pullFiles(tag: string, context: SyncContext, options: PullOptions = {}): Promise<PullResult> {
  const cwd = context.cwd ?? process.cwd();
  const logger = loggerFor(context);
  requireKey(context);

  if (!(await context.storage.exists(tag))) {
    throw new NotFoundError(`Tag '${tag}' not found in storage`, { hint: LIST_HINT });
  }

  if (!options.force) {
    const existing = context.files.filter(file => existsSync(resolve(cwd, file)));
    if (existing.length > 0) {
      const message =
        existing.length === 1
          ? `Local file '${existing[0]}' already exists and will be overwritten. Continue?`
          : `${existing.length} local files already exist and will be overwritten. Continue?`;
      const confirmed = options.confirm ? await options.confirm(message) : false;
      if (!confirmed) {
        return { tag, status: 'cancelled', files: [] };
      }
    }
  }

  const data = openBlob(tag, await fetchBlob(tag, context.storage), context);

  if (context.files.length === 1) {
    const [file] = context.files;
    logger.log(`Writing to environment file: ${file}`);
    try {
      await writeFile(resolve(cwd, file), data, { mode: 0o600 });
    } catch (error) {
      throw new IOError(`Failed to write file ${file}`, { cause: error });
    }
    return { tag, status: 'written', files: [file] };
  }

  logger.log(`Extracting ${context.files.length} environment files...`);
  const files = await extractArchiveToFiles(data, { cwd });
  return { tag, status: 'written', files };
}

/** Downloads `tag` into memory and parses it, without touching local files. */
export async function loadEnvMap(tag: string, context: SyncContext): Promise<EnvMap> {
  requireKey(context);
  const data = openBlob(tag, await fetchBlob(tag, context.storage), context);

  if (context.files.length <= 1) {
    return parseEnvContent(data);
  }

  try {
    return parseEnvEntries(await extractArchive(data));
  } catch (error) {
    throw new FormatError(`Failed to unpack tag '${tag}'`, { cause: error });
  }
}

export async function diffTags(fromTag: string, toTag: string, context: SyncContext): Promise<EnvDiff> {
  const logger = loggerFor(context);
  logger.log(`Downloading ${fromTag}...`);
  const oldMap = await loadEnvMap(fromTag, context);
  logger.log(`Downloading ${toTag}...`);
  const newMap = await loadEnvMap(toTag, context);
  return diffEnvMaps(oldMap, newMap);
}

/** Stored tags, newest-looking first. */
export async function listTags(storage: ObjectStore): Promise<string[]> {
  const tags = await storage.list();
  return tags.sort().reverse();
}

export async function removeTag(tag: string, storage: ObjectStore): Promise<void> {
  if (!(await storage.exists(tag))) {
    throw new NotFoundError(`Tag '${tag}' not found in storage`, { hint: LIST_HINT });
  }
  await storage.delete(tag);
}
