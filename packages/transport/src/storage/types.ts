import type { Readable } from 'node:stream';

export interface ObjectMetadata {
  key: string;
  size: number;
  lastModified: Date;
}

/**
 * The calls the transport makes against a bucket. Implementations map their
 * own failures onto the transport error taxonomy.
 */
export interface ObjectStore {
  readonly bucket: string;

  /** Fetch object metadata. Throws ResourceNotFoundError when absent. */
  head(key: string): Promise<ObjectMetadata>;

  /** Open the object's content as a byte stream. */
  read(key: string): Promise<Readable>;

  /** Store one object. `contentLength` must match the bytes in `body`. */
  write(key: string, body: Readable | Buffer, contentLength: number): Promise<void>;

  /** Every key starting with `prefix`, flat, in the order the store reports. */
  list(prefix: string): Promise<string[]>;
}

export interface ObjectStoreOptions {
  bucket: string;
  region: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
}

export type ObjectStoreFactory = (options: ObjectStoreOptions) => ObjectStore;
