import { resolve } from 'path';
import type { ObjectStore, StorageConfig } from '../types';
import { AzureStorage } from './azure';
import { GcsStorage } from './gcs';
import { LocalStorage } from './local';
import { S3Storage } from './s3';

export interface CreateStorageOptions {
  /** Base for a relative `local` storage directory. */
  baseDir?: string;
}

export function createStorage(config: StorageConfig, options: CreateStorageOptions = {}): ObjectStore {
  switch (config.type) {
    case 's3':
      return new S3Storage(config);
    case 'azure':
      return new AzureStorage(config);
    case 'gcs':
      return new GcsStorage(config);
    case 'local':
      return new LocalStorage(resolve(options.baseDir ?? process.cwd(), config.directory), config.prefix);
  }
}

export function describeStorage(config: StorageConfig): string {
  switch (config.type) {
    case 's3':
      return `s3://${config.bucket}/${config.prefix ?? ''}`;
    case 'azure':
      return `azure://${config.accountName}/${config.containerName}/${config.prefix ?? ''}`;
    case 'gcs':
      return `gs://${config.bucketName}/${config.prefix ?? ''}`;
    case 'local':
      return `${config.directory}/${config.prefix ?? ''}`;
  }
}

export { buildStorageKey, tagFromStorageKey } from './keys';
export { MemoryStorage } from './memory';
export { LocalStorage, S3Storage, AzureStorage, GcsStorage };
