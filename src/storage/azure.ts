import { BlobServiceClient } from '@azure/storage-blob';
import type { ContainerClient } from '@azure/storage-blob';
import type { AzureStorageConfig, ObjectStore } from '../types';
import { ConfigError, IOError, NotFoundError } from '../errors';
import { buildStorageKey, isNotFoundStatus, tagsFromStorageKeys } from './keys';

export const AZURE_CONNECTION_STRING_VAR = 'AZURE_STORAGE_CONNECTION_STRING';

function containerFromEnv(config: AzureStorageConfig): ContainerClient {
  const connectionString = process.env[AZURE_CONNECTION_STRING_VAR];
  if (!connectionString) {
    throw new ConfigError(`${AZURE_CONNECTION_STRING_VAR} environment variable not set`, {
      hint: `Export the connection string for storage account ${config.accountName}`
    });
  }
  return BlobServiceClient.fromConnectionString(connectionString).getContainerClient(config.containerName);
}

export class AzureStorage implements ObjectStore {
  private readonly prefix: string;

  constructor(
    config: AzureStorageConfig,
    private readonly container: ContainerClient = containerFromEnv(config)
  ) {
    this.prefix = config.prefix ?? '';
  }

  async upload(tag: string, data: Buffer): Promise<void> {
    try {
      await this.container.getBlockBlobClient(buildStorageKey(this.prefix, tag)).uploadData(data);
    } catch (error) {
      throw new IOError(`Failed to upload tag '${tag}' to Azure`, { cause: error });
    }
  }

  async download(tag: string): Promise<Buffer> {
    try {
      return await this.container.getBlobClient(buildStorageKey(this.prefix, tag)).downloadToBuffer();
    } catch (error) {
      if (isNotFoundStatus(error)) {
        throw new NotFoundError(`Tag '${tag}' not found`, { cause: error });
      }
      throw new IOError(`Failed to download tag '${tag}' from Azure`, { cause: error });
    }
  }

  async list(): Promise<string[]> {
    const keys: string[] = [];
    try {
      for await (const blob of this.container.listBlobsFlat({ prefix: this.prefix || undefined })) {
        keys.push(blob.name);
      }
    } catch (error) {
      throw new IOError('Failed to list Azure blobs', { cause: error });
    }
    return tagsFromStorageKeys(this.prefix, keys);
  }

  async exists(tag: string): Promise<boolean> {
    try {
      return await this.container.getBlobClient(buildStorageKey(this.prefix, tag)).exists();
    } catch (error) {
      throw new IOError(`Failed to check tag '${tag}' in Azure`, { cause: error });
    }
  }

  async delete(tag: string): Promise<void> {
    try {
      await this.container.getBlobClient(buildStorageKey(this.prefix, tag)).deleteIfExists();
    } catch (error) {
      throw new IOError(`Failed to delete tag '${tag}' from Azure`, { cause: error });
    }
  }
}
