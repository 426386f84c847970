import { Mutex } from 'async-mutex';
import type { ObjectStore } from '../types';
import { NotFoundError } from '../errors';
import { buildStorageKey, tagsFromStorageKeys } from './keys';

/**
 * In-process store. One mutex guards the whole map, so concurrent callers
 * never observe a half-applied operation. Buffers are copied in and out.
 */
export class MemoryStorage implements ObjectStore {
  private data = new Map<string, Buffer>();
  private readonly mutex = new Mutex();
  private failure: Error | null = null;

  constructor(private readonly prefix: string = '') {}

  /** Makes every subsequent operation reject with `error` until `reset()`. */
  failWith(error: Error): void {
    this.failure = error;
  }

  reset(): Promise<void> {
    return this.mutex.runExclusive(() => {
      this.data = new Map();
      this.failure = null;
    });
  }

  get size(): number {
    return this.data.size;
  }

  private run<T>(operation: () => T): Promise<T> {
    return this.mutex.runExclusive(() => {
      if (this.failure) throw this.failure;
      return operation();
    });
  }

  upload(tag: string, data: Buffer): Promise<void> {
    return this.run(() => {
      this.data.set(buildStorageKey(this.prefix, tag), Buffer.from(data));
    });
  }

  download(tag: string): Promise<Buffer> {
    return this.run(() => {
      const stored = this.data.get(buildStorageKey(this.prefix, tag));
      if (!stored) {
        throw new NotFoundError(`Tag '${tag}' not found`);
      }
      return Buffer.from(stored);
    });
  }

  list(): Promise<string[]> {
    return this.run(() => tagsFromStorageKeys(this.prefix, this.data.keys()));
  }

  exists(tag: string): Promise<boolean> {
    return this.run(() => this.data.has(buildStorageKey(this.prefix, tag)));
  }

  delete(tag: string): Promise<void> {
    return this.run(() => {
      this.data.delete(buildStorageKey(this.prefix, tag));
    });
  }
}
