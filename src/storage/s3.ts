import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  paginateListObjectsV2
} from '@aws-sdk/client-s3';
import type { ObjectStore, S3StorageConfig } from '../types';
import { IOError, NotFoundError } from '../errors';
import { buildStorageKey, isNotFoundStatus, tagsFromStorageKeys } from './keys';

export class S3Storage implements ObjectStore {
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(
    config: S3StorageConfig,
    private readonly client: S3Client = new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.endpoint !== undefined
    })
  ) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? '';
  }

  async upload(tag: string, data: Buffer): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({ Bucket: this.bucket, Key: buildStorageKey(this.prefix, tag), Body: data })
      );
    } catch (error) {
      throw new IOError(`Failed to upload tag '${tag}' to S3`, { cause: error });
    }
  }

  async download(tag: string): Promise<Buffer> {
    try {
      const result = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: buildStorageKey(this.prefix, tag) })
      );
      if (!result.Body) {
        throw new Error('empty response body');
      }
      return Buffer.from(await result.Body.transformToByteArray());
    } catch (error) {
      if (isNotFoundStatus(error)) {
        throw new NotFoundError(`Tag '${tag}' not found`, { cause: error });
      }
      throw new IOError(`Failed to download tag '${tag}' from S3`, { cause: error });
    }
  }

  async list(): Promise<string[]> {
    const keys: string[] = [];
    try {
      const pages = paginateListObjectsV2(
        { client: this.client },
        { Bucket: this.bucket, Prefix: this.prefix || undefined }
      );
      for await (const page of pages) {
        for (const object of page.Contents ?? []) {
          if (object.Key) keys.push(object.Key);
        }
      }
    } catch (error) {
      throw new IOError('Failed to list S3 objects', { cause: error });
    }
    return tagsFromStorageKeys(this.prefix, keys);
  }

  async exists(tag: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: buildStorageKey(this.prefix, tag) })
      );
      return true;
    } catch (error) {
      if (isNotFoundStatus(error)) return false;
      throw new IOError(`Failed to check tag '${tag}' in S3`, { cause: error });
    }
  }

  async delete(tag: string): Promise<void> {
    try {
      await this.client.send(
        new DeleteObjectCommand({ Bucket: this.bucket, Key: buildStorageKey(this.prefix, tag) })
      );
    } catch (error) {
      throw new IOError(`Failed to delete tag '${tag}' from S3`, { cause: error });
    }
  }
}
