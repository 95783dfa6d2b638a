import { Readable } from 'node:stream';
import { ResourceNotFoundError, StorageClientError } from '../../src/errors.js';
import type { ObjectMetadata, ObjectStore, ObjectStoreOptions } from '../../src/storage/types.js';

interface StoredObject {
  data: Buffer;
  lastModified: Date;
}

export interface MemoryObjectStore extends ObjectStore {
  readonly objects: Map<string, StoredObject>;
  readonly writes: Array<{ key: string; contentLength: number }>;
  /** Make the next calls of `operation` fail with `error`. */
  failNext(operation: 'head' | 'read' | 'write' | 'list', error: Error): void;
  now: () => Date;
}

export function createMemoryObjectStore(bucket = 'test-bucket'): MemoryObjectStore {
  const objects = new Map<string, StoredObject>();
  const writes: Array<{ key: string; contentLength: number }> = [];
  const failures = new Map<string, Error>();

  function takeFailure(operation: string): void {
    const error = failures.get(operation);
    if (error) {
      failures.delete(operation);
      throw error;
    }
  }

  function lookup(key: string): StoredObject {
    const object = objects.get(key);
    if (!object) throw new ResourceNotFoundError(`Object not found for key ${key}`);
    return object;
  }

  const store: MemoryObjectStore = {
    bucket,
    objects,
    writes,
    now: () => new Date(),

    failNext(operation, error) {
      failures.set(operation, error);
    },

    async head(key: string): Promise<ObjectMetadata> {
      takeFailure('head');
      const object = lookup(key);
      return { key, size: object.data.length, lastModified: object.lastModified };
    },

    async read(key: string): Promise<Readable> {
      takeFailure('read');
      return Readable.from(lookup(key).data);
    },

    async write(key: string, body: Readable | Buffer, contentLength: number): Promise<void> {
      takeFailure('write');
      let data: Buffer;
      if (Buffer.isBuffer(body)) {
        data = body;
      } else {
        const chunks: Buffer[] = [];
        for await (const chunk of body) {
          chunks.push(Buffer.from(chunk));
        }
        data = Buffer.concat(chunks);
      }
      if (data.length !== contentLength) {
        throw new StorageClientError(
          `Content length mismatch for ${key}: declared ${contentLength}, received ${data.length}`
        );
      }
      writes.push({ key, contentLength });
      objects.set(key, { data, lastModified: store.now() });
    },

    async list(prefix: string): Promise<string[]> {
      takeFailure('list');
      return [...objects.keys()].filter((key) => key.startsWith(prefix));
    },
  };
  return store;
}

/** A store factory that hands out `store` and records the options it was built with. */
export function factoryFor(store: ObjectStore) {
  const calls: ObjectStoreOptions[] = [];
  const factory = (options: ObjectStoreOptions): ObjectStore => {
    calls.push(options);
    return store;
  };
  return { factory, calls };
}
