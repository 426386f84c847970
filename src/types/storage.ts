export type StorageType = 's3' | 'azure' | 'gcs' | 'local';

export const STORAGE_TYPES: readonly StorageType[] = ['s3', 'azure', 'gcs', 'local'];

interface BaseStorageConfig {
  prefix?: string;
}

export interface S3StorageConfig extends BaseStorageConfig {
  type: 's3';
  bucket: string;
  region: string;
  endpoint?: string;
}

export interface AzureStorageConfig extends BaseStorageConfig {
  type: 'azure';
  accountName: string;
  containerName: string;
}

export interface GcsStorageConfig extends BaseStorageConfig {
  type: 'gcs';
  projectId: string;
  bucketName: string;
}

export interface LocalStorageConfig extends BaseStorageConfig {
  type: 'local';
  directory: string;
}

export type StorageConfig =
  | S3StorageConfig
  | AzureStorageConfig
  | GcsStorageConfig
  | LocalStorageConfig;

/**
 * Blob store keyed by tag. Every backend derives its object key with
 * `buildStorageKey(prefix, tag)`.
 */
export interface ObjectStore {
  upload(tag: string, data: Buffer): Promise<void>;
  /** Rejects with `NotFoundError` when the tag is absent. */
  download(tag: string): Promise<Buffer>;
  list(): Promise<string[]>;
  exists(tag: string): Promise<boolean>;
  delete(tag: string): Promise<void>;
}
