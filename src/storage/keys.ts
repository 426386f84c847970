export const STORAGE_KEY_SUFFIX = '.env';

/**
 * `prefix + tag + ".env"`. No separator is inserted and the tag is not
 * escaped.
 */
export function buildStorageKey(prefix: string | undefined, tag: string): string {
  return `${prefix ?? ''}${tag}${STORAGE_KEY_SUFFIX}`;
}

/** Inverse of `buildStorageKey`; undefined for keys that do not name a tag. */
export function tagFromStorageKey(prefix: string | undefined, key: string): string | undefined {
  const head = prefix ?? '';
  if (!key.startsWith(head) || !key.endsWith(STORAGE_KEY_SUFFIX)) {
    return undefined;
  }
  const tag = key.slice(head.length, key.length - STORAGE_KEY_SUFFIX.length);
  return tag || undefined;
}

export function tagsFromStorageKeys(prefix: string | undefined, keys: Iterable<string>): string[] {
  const tags: string[] = [];
  for (const key of keys) {
    const tag = tagFromStorageKey(prefix, key);
    if (tag !== undefined) tags.push(tag);
  }
  return tags;
}

export function isNotFoundStatus(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const status =
    ('statusCode' in error && error.statusCode) ||
    ('code' in error && error.code) ||
    ('$metadata' in error &&
      typeof error.$metadata === 'object' &&
      error.$metadata !== null &&
      'httpStatusCode' in error.$metadata &&
      error.$metadata.httpStatusCode);
  return status === 404;
}
