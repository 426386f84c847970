import { basename } from 'path';
import type { EnvMap, FileEntry } from '../types';

export function isEnvFileName(filePath: string): boolean {
  const fileName = basename(filePath);
  return fileName.startsWith('.env') || fileName.endsWith('.env');
}

/**
 * Parses KEY=VALUE lines. Blank lines, `#` comments and lines without `=`
 * are skipped; the split happens on the first `=` and both sides are trimmed.
 * A line such as `=value` yields the empty key.
 */
export function parseEnvContent(content: string | Buffer): EnvMap {
  const text = typeof content === 'string' ? content : content.toString('utf-8');
  const entries = new Map<string, string>();

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const separator = trimmed.indexOf('=');
    if (separator === -1) continue;

    entries.set(trimmed.slice(0, separator).trim(), trimmed.slice(separator + 1).trim());
  }

  return Object.fromEntries(entries);
}

/**
 * Parses every env file in an archive and merges them in archive order;
 * later files win on key collisions.
 */
export function parseEnvEntries(entries: FileEntry[]): EnvMap {
  const merged = new Map<string, string>();
  for (const entry of entries) {
    if (!isEnvFileName(entry.path)) continue;
    for (const [key, value] of Object.entries(parseEnvContent(entry.content))) {
      merged.set(key, value);
    }
  }
  return Object.fromEntries(merged);
}
