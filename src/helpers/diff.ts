import { compare } from 'fast-json-patch';
import type { Operation } from 'fast-json-patch';
import type { EnvChange, EnvDiff, EnvMap } from '../types';

function keyFromPointer(path: string): string {
  return path.slice(1).replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Compares two env maps. Keys only in `newMap` are added, keys only in
 * `oldMap` are removed, keys in both with different values are changed.
 */
export function diffEnvMaps(oldMap: EnvMap, newMap: EnvMap): EnvDiff {
  const added: [string, string][] = [];
  const removed: [string, string][] = [];
  const changed: [string, EnvChange][] = [];

  const patches: Operation[] = compare(oldMap, newMap);
  for (const patch of patches) {
    const key = keyFromPointer(patch.path);
    switch (patch.op) {
      case 'add':
        added.push([key, newMap[key]]);
        break;
      case 'remove':
        removed.push([key, oldMap[key]]);
        break;
      case 'replace':
        changed.push([key, { oldValue: oldMap[key], newValue: newMap[key] }]);
        break;
      default:
        break;
    }
  }

  return {
    added: Object.fromEntries(added),
    removed: Object.fromEntries(removed),
    changed: Object.fromEntries(changed)
  };
}

export function hasChanges(diff: EnvDiff): boolean {
  return (
    Object.keys(diff.added).length > 0 ||
    Object.keys(diff.removed).length > 0 ||
    Object.keys(diff.changed).length > 0
  );
}

export function generateReadableDiff(diff: EnvDiff): string[] {
  const lines: string[] = [];
  for (const key of Object.keys(diff.added).sort()) {
    lines.push(`+ ${key}=${diff.added[key]}`);
  }
  for (const key of Object.keys(diff.removed).sort()) {
    lines.push(`- ${key}=${diff.removed[key]}`);
  }
  for (const key of Object.keys(diff.changed).sort()) {
    const change = diff.changed[key];
    lines.push(`~ ${key}: ${change.oldValue} -> ${change.newValue}`);
  }
  return lines;
}

export function summarizeDiff(diff: EnvDiff): string {
  const added = Object.keys(diff.added).length;
  const removed = Object.keys(diff.removed).length;
  const changed = Object.keys(diff.changed).length;
  return `+${added} -${removed} ~${changed}`;
}
