import { mkdir, readdir, readFile, rm, stat, writeFile } from 'fs/promises';
import { dirname, join, relative, sep } from 'path';
import type { ObjectStore } from '../types';
import { IOError, NotFoundError } from '../errors';
import { buildStorageKey, tagsFromStorageKeys } from './keys';

function isMissing(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores each tag as a file under `directory`; the storage key is the path
 * relative to it, so a prefix such as `envs/` becomes a subdirectory.
 */
export class LocalStorage implements ObjectStore {
  constructor(
    private readonly directory: string,
    private readonly prefix: string = ''
  ) {}

  private pathFor(tag: string): string {
    return join(this.directory, buildStorageKey(this.prefix, tag));
  }

  async upload(tag: string, data: Buffer): Promise<void> {
    const target = this.pathFor(tag);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, data, { mode: 0o600 });
    } catch (error) {
      throw new IOError(`Failed to store tag '${tag}' in ${this.directory}`, { cause: error });
    }
  }

  async download(tag: string): Promise<Buffer> {
    try {
      return await readFile(this.pathFor(tag));
    } catch (error) {
      if (isMissing(error)) {
        throw new NotFoundError(`Tag '${tag}' not found`, { cause: error });
      }
      throw new IOError(`Failed to read tag '${tag}' from ${this.directory}`, { cause: error });
    }
  }

  async list(): Promise<string[]> {
    let files: string[];
    try {
      files = await this.walk(this.directory);
    } catch (error) {
      if (isMissing(error)) return [];
      throw new IOError(`Failed to list ${this.directory}`, { cause: error });
    }
    const keys = files.map(file => relative(this.directory, file).split(sep).join('/'));
    return tagsFromStorageKeys(this.prefix, keys);
  }

  async exists(tag: string): Promise<boolean> {
    try {
      const stats = await stat(this.pathFor(tag));
      return stats.isFile();
    } catch (error) {
      if (isMissing(error)) return false;
      throw new IOError(`Failed to check tag '${tag}' in ${this.directory}`, { cause: error });
    }
  }

  async delete(tag: string): Promise<void> {
    try {
      await rm(this.pathFor(tag), { force: true });
    } catch (error) {
      throw new IOError(`Failed to delete tag '${tag}' from ${this.directory}`, { cause: error });
    }
  }

  private async walk(directory: string): Promise<string[]> {
    const files: string[] = [];
    const entries = await readdir(directory, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(directory, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(fullPath)));
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
    return files;
  }
}
