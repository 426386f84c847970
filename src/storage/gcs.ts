import { Storage } from '@google-cloud/storage';
import type { Bucket } from '@google-cloud/storage';
import type { GcsStorageConfig, ObjectStore } from '../types';
import { IOError, NotFoundError } from '../errors';
import { buildStorageKey, isNotFoundStatus, tagsFromStorageKeys } from './keys';

export class GcsStorage implements ObjectStore {
  private readonly prefix: string;

  constructor(
    config: GcsStorageConfig,
    private readonly bucket: Bucket = new Storage({ projectId: config.projectId }).bucket(config.bucketName)
  ) {
    this.prefix = config.prefix ?? '';
  }

  async upload(tag: string, data: Buffer): Promise<void> {
    try {
      await this.bucket.file(buildStorageKey(this.prefix, tag)).save(data);
    } catch (error) {
      throw new IOError(`Failed to upload tag '${tag}' to GCS`, { cause: error });
    }
  }

  async download(tag: string): Promise<Buffer> {
    try {
      const [contents] = await this.bucket.file(buildStorageKey(this.prefix, tag)).download();
      return contents;
    } catch (error) {
      if (isNotFoundStatus(error)) {
        throw new NotFoundError(`Tag '${tag}' not found`, { cause: error });
      }
      throw new IOError(`Failed to download tag '${tag}' from GCS`, { cause: error });
    }
  }

  async list(): Promise<string[]> {
    try {
      const [files] = await this.bucket.getFiles({ prefix: this.prefix || undefined });
      return tagsFromStorageKeys(this.prefix, files.map(file => file.name));
    } catch (error) {
      throw new IOError('Failed to list GCS objects', { cause: error });
    }
  }

  async exists(tag: string): Promise<boolean> {
    try {
      const [found] = await this.bucket.file(buildStorageKey(this.prefix, tag)).exists();
      return found;
    } catch (error) {
      throw new IOError(`Failed to check tag '${tag}' in GCS`, { cause: error });
    }
  }

  async delete(tag: string): Promise<void> {
    try {
      await this.bucket.file(buildStorageKey(this.prefix, tag)).delete({ ignoreNotFound: true });
    } catch (error) {
      throw new IOError(`Failed to delete tag '${tag}' from GCS`, { cause: error });
    }
  }
}
