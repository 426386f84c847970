import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';
import { readFile, writeFile } from 'fs/promises';
import { AuthenticationError, FormatError, IOError } from '../errors';

const ALGORITHM = 'aes-256-gcm';
export const KEY_LENGTH = 32;
export const NONCE_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

export function generateKey(): Buffer {
  return randomBytes(KEY_LENGTH);
}

export function encodeKey(key: Buffer): string {
  return key.toString('hex');
}

export function decodeKey(keyHex: string): Buffer {
  if (!HEX_PATTERN.test(keyHex)) {
    throw new FormatError('Invalid encryption key: not a hex string');
  }
  if (keyHex.length !== KEY_LENGTH * 2) {
    throw new FormatError(
      `Invalid encryption key: expected ${KEY_LENGTH * 2} hex characters, got ${keyHex.length}`
    );
  }
  return Buffer.from(keyHex, 'hex');
}

function assertKey(key: Buffer): void {
  if (key.length !== KEY_LENGTH) {
    throw new FormatError(`Invalid encryption key: expected ${KEY_LENGTH} bytes, got ${key.length}`);
  }
}

/**
 * Seals `plaintext` with AES-256-GCM. The envelope is
 * `nonce || ciphertext || authTag`, with a fresh nonce on every call.
 */
export function encrypt(plaintext: Buffer, key: Buffer): Buffer {
  assertKey(key);
  const nonce = randomBytes(NONCE_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, nonce);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]);
}

export function decrypt(envelope: Buffer, key: Buffer): Buffer {
  assertKey(key);
  if (envelope.length < NONCE_LENGTH + AUTH_TAG_LENGTH) {
    throw new AuthenticationError('Decryption failed: ciphertext too short');
  }

  const nonce = envelope.subarray(0, NONCE_LENGTH);
  const authTag = envelope.subarray(envelope.length - AUTH_TAG_LENGTH);
  const ciphertext = envelope.subarray(NONCE_LENGTH, envelope.length - AUTH_TAG_LENGTH);

  const decipher = createDecipheriv(ALGORITHM, key, nonce);
  decipher.setAuthTag(authTag);

  try {
    const head = decipher.update(ciphertext);
    return Buffer.concat([head, decipher.final()]);
  } catch (error) {
    throw new AuthenticationError('Decryption failed: wrong key or corrupted data', { cause: error });
  }
}

export async function saveKeyFile(keyPath: string, key: Buffer): Promise<void> {
  assertKey(key);
  try {
    await writeFile(keyPath, encodeKey(key), { encoding: 'utf-8', mode: 0o600 });
  } catch (error) {
    throw new IOError(`Failed to save key file ${keyPath}`, { cause: error });
  }
}

export async function loadKeyFile(keyPath: string): Promise<Buffer> {
  let content: string;
  try {
    content = await readFile(keyPath, 'utf-8');
  } catch (error) {
    throw new IOError(`Failed to read key file ${keyPath}`, { cause: error });
  }

  try {
    return decodeKey(content);
  } catch (error) {
    throw new FormatError(`Invalid key file ${keyPath}`, { cause: error });
  }
}

export async function encryptFile(filePath: string, key: Buffer): Promise<Buffer> {
  let data: Buffer;
  try {
    data = await readFile(filePath);
  } catch (error) {
    throw new IOError(`Failed to read file ${filePath}`, { cause: error });
  }
  return encrypt(data, key);
}

export async function decryptToFile(envelope: Buffer, key: Buffer, filePath: string): Promise<void> {
  const plaintext = decrypt(envelope, key);
  try {
    await writeFile(filePath, plaintext, { mode: 0o600 });
  } catch (error) {
    throw new IOError(`Failed to write file ${filePath}`, { cause: error });
  }
}
