import { Readable } from 'node:stream';
import {
  S3Client,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { StorageClientError, mapS3Error } from '../errors.js';
import type { ObjectMetadata, ObjectStore, ObjectStoreOptions } from './types.js';

export interface S3ObjectStoreConfig extends ObjectStoreOptions {
  /** Use a prebuilt client instead of constructing one from the options. */
  client?: S3Client;
}

export function buildS3ClientConfig(options: ObjectStoreOptions): S3ClientConfig {
  const base: S3ClientConfig = {
    region: options.region,
    endpoint: options.endpoint,
    // Virtual-host style by default; MinIO and similar need path-style.
    forcePathStyle: options.forcePathStyle ?? false,
  };
  if (options.credentials) {
    return { ...base, credentials: options.credentials };
  }
  // Anonymous access: requests go out unsigned.
  return {
    ...base,
    credentials: { accessKeyId: '', secretAccessKey: '' },
    signer: { sign: async (request) => request },
  };
}

export function createS3ObjectStore(config: S3ObjectStoreConfig): ObjectStore {
  const client = config.client ?? new S3Client(buildS3ClientConfig(config));
  const bucket = config.bucket;

  return {
    bucket,

    async head(key: string): Promise<ObjectMetadata> {
      try {
        const res = await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
        return {
          key,
          size: res.ContentLength ?? 0,
          lastModified: res.LastModified ?? new Date(0),
        };
      } catch (error) {
        throw mapS3Error(error, key);
      }
    },

    async read(key: string): Promise<Readable> {
      let body: unknown;
      try {
        const res = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
        body = res.Body;
      } catch (error) {
        throw mapS3Error(error, key);
      }
      if (body instanceof Readable) return body;
      throw new StorageClientError(
        body ? `Unsupported response body for key ${key}` : `Empty response body for key ${key}`
      );
    },

    async write(key: string, body: Readable | Buffer, contentLength: number): Promise<void> {
      try {
        await client.send(
          new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: body,
            ContentLength: contentLength,
          })
        );
      } catch (error) {
        throw mapS3Error(error, key);
      }
    },

    async list(prefix: string): Promise<string[]> {
      const keys: string[] = [];
      let continuationToken: string | undefined;
      try {
        do {
          const res = await client.send(
            new ListObjectsV2Command({
              Bucket: bucket,
              Prefix: prefix,
              ContinuationToken: continuationToken,
            })
          );
          for (const object of res.Contents ?? []) {
            if (object.Key != null) keys.push(object.Key);
          }
          continuationToken = res.IsTruncated ? res.NextContinuationToken : undefined;
        } while (continuationToken);
      } catch (error) {
        throw mapS3Error(error, prefix);
      }
      return keys;
    },
  };
}
