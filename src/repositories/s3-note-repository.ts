import {
  DeleteObjectCommand,
  GetObjectCommand,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';

import type { S3StorageConfig } from '../types/index.js';
import type { NoteRepository } from './note-repository.js';
import logger from '../utils/logger.js';

/**
 * S3-backed NoteRepository implementation.
 * Stores one object per note under `<prefix>/<id>`, holding the raw note bytes.
 */
export class S3NoteRepository implements NoteRepository {
  readonly backend = 's3';
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(client: S3Client, bucket: string, prefix: string) {
    this.client = client;
    this.bucket = bucket;
    this.prefix = prefix.replace(/\/+$/, '');
  }

  static fromConfig(config: S3StorageConfig): S3NoteRepository {
    const client = new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.endpoint !== undefined,
    });
    return new S3NoteRepository(client, config.bucket, config.prefix);
  }

  objectKey(id: string): string {
    return `${this.prefix}/${id}`;
  }

  async read(id: string, signal?: AbortSignal): Promise<Buffer> {
    const key = this.objectKey(id);
    try {
      const result = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
        { abortSignal: signal }
      );
      const content = result.Body
        ? Buffer.from(await result.Body.transformToByteArray())
        : Buffer.alloc(0);
      logger.debug({ id, key, bytes: content.length }, 'Note read from S3');
      return content;
    } catch (error) {
      if (isMissingObject(error)) {
        logger.debug({ id, key }, 'Note object does not exist');
        return Buffer.alloc(0);
      }
      logger.error({ err: error, id, key, bucket: this.bucket }, 'Failed to read note from S3');
      throw error;
    }
  }

  async write(id: string, content: Buffer, signal?: AbortSignal): Promise<void> {
    const key = this.objectKey(id);
    try {
      await this.client.send(
        new PutObjectCommand({ Bucket: this.bucket, Key: key, Body: content }),
        { abortSignal: signal }
      );
      logger.debug({ id, key, bytes: content.length }, 'Note written to S3');
    } catch (error) {
      logger.error({ err: error, id, key, bucket: this.bucket }, 'Failed to write note to S3');
      throw error;
    }
  }

  async delete(id: string, signal?: AbortSignal): Promise<void> {
    const key = this.objectKey(id);
    try {
      // DeleteObject succeeds for keys that do not exist
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }), {
        abortSignal: signal,
      });
      logger.debug({ id, key }, 'Note removed from S3');
    } catch (error) {
      logger.error({ err: error, id, key, bucket: this.bucket }, 'Failed to delete note from S3');
      throw error;
    }
  }
}

function isMissingObject(error: unknown): boolean {
  return error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound');
}
