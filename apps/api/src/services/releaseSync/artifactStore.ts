import { DeleteObjectsCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { StorageError, errorMessage } from './errors';
import type { ArtifactStore } from './types';

// S3 DeleteObjects accepts at most 1000 keys per request
const DELETE_BATCH_SIZE = 1000;

export interface S3ArtifactStoreOptions {
  bucket: string;
  region: string;
  endpoint?: string;
  /** Base URL objects are publicly served from, e.g. a CDN in front of the bucket. */
  publicBaseUrl?: string;
  timeoutMs: number;
}

export interface S3ClientOptions {
  region: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

export function createS3Client(options: S3ClientOptions): S3Client {
  const credentials = options.accessKeyId && options.secretAccessKey
    ? { accessKeyId: options.accessKeyId, secretAccessKey: options.secretAccessKey }
    : undefined;

  return new S3Client({
    endpoint: options.endpoint || undefined,
    region: options.region,
    // Without explicit keys the SDK falls back to its default provider chain
    credentials,
    // Required for MinIO and other S3-compatible providers that use path-style URLs
    forcePathStyle: Boolean(options.endpoint)
  });
}

function encodeKey(key: string): string {
  return key.split('/').map(encodeURIComponent).join('/');
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class S3ArtifactStore implements ArtifactStore {
  constructor(
    private readonly client: S3Client,
    private readonly options: S3ArtifactStoreOptions
  ) {}

  publicUrl(key: string): string {
    const { bucket, region, endpoint, publicBaseUrl } = this.options;
    const encoded = encodeKey(key);

    if (publicBaseUrl) {
      return `${publicBaseUrl.replace(/\/+$/, '')}/${encoded}`;
    }
    if (endpoint) {
      return `${endpoint.replace(/\/+$/, '')}/${bucket}/${encoded}`;
    }
    return `https://${bucket}.s3.${region}.amazonaws.com/${encoded}`;
  }

  async upload(files: string[], destinationPrefix: string): Promise<string[]> {
    const urls: string[] = [];

    for (const file of files) {
      const key = `${destinationPrefix}/${basename(file)}`;

      try {
        const { size } = await stat(file);
        await this.client.send(
          new PutObjectCommand({
            Bucket: this.options.bucket,
            Key: key,
            Body: createReadStream(file),
            ContentLength: size,
            ContentType: 'application/octet-stream',
            ACL: 'public-read'
          }),
          { abortSignal: AbortSignal.timeout(this.options.timeoutMs) }
        );
      } catch (error) {
        throw new StorageError(`Failed to upload ${file} to ${key}: ${errorMessage(error)}`, { cause: error });
      }

      urls.push(this.publicUrl(key));
    }

    return urls;
  }

  async deleteByKeys(keys: string[]): Promise<void> {
    for (const batch of chunk(keys, DELETE_BATCH_SIZE)) {
      let failed: string[];

      try {
        const response = await this.client.send(
          new DeleteObjectsCommand({
            Bucket: this.options.bucket,
            Delete: {
              Objects: batch.map((key) => ({ Key: key })),
              Quiet: true
            }
          }),
          { abortSignal: AbortSignal.timeout(this.options.timeoutMs) }
        );
        failed = (response.Errors ?? []).map((entry) => `${entry.Key ?? '?'} (${entry.Code ?? 'unknown'})`);
      } catch (error) {
        throw new StorageError(`Failed to delete ${batch.length} object(s): ${errorMessage(error)}`, { cause: error });
      }

      if (failed.length > 0) {
        throw new StorageError(`Failed to delete ${failed.length} object(s): ${failed.join(', ')}`);
      }
    }
  }
}
