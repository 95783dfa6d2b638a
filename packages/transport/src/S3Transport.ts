import { createReadStream, createWriteStream } from 'node:fs';
import { mkdir, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { pipeline, type Readable } from 'node:stream';
import { toCredentials, type AuthenticationInfo } from './auth.js';
import { loadTransportConfig } from './config.js';
import {
  AuthenticationError,
  ResourceNotFoundError,
  TransportError,
  mapS3Error,
  toLocalIOError,
} from './errors.js';
import {
  ListenerSet,
  type SessionEvent,
  type SessionListener,
  type TransferEvent,
  type TransferEventType,
  type TransferListener,
} from './events.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { basePathOf, type RepositoryDescriptor } from './repository.js';
import { SessionHolder } from './session.js';
import { createS3ObjectStore } from './storage/s3.js';
import type { ObjectStore, ObjectStoreFactory } from './storage/types.js';
import {
  bestEffortClose,
  copyWithProgress,
  fixedChunks,
  progressTap,
  type TransferProgress,
} from './transfer.js';
import type { Transport } from './types.js';

export interface S3TransportOptions {
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  chunkSize?: number;
  /** Builds the store for a session; defaults to the AWS SDK backed store. */
  storeFactory?: ObjectStoreFactory;
  logger?: Logger;
  /** Environment to read defaults from; `process.env` when omitted. */
  env?: Record<string, string | undefined>;
}

interface S3Session {
  repository: RepositoryDescriptor;
  store: ObjectStore;
  basePath: string;
}

type TransferSubject = Omit<TransferEvent, 'type' | 'bytes' | 'error'>;

/**
 * Keys of the zero-length directory markers for every parent of `destination`,
 * root first: `a/b/c.txt` gives `a/` then `a/b/`.
 */
export function markerKeys(basePath: string, destination: string): string[] {
  const parents = destination.split('/').slice(0, -1);
  const keys: string[] = [];
  let path = '';
  for (const segment of parents) {
    path += `${segment}/`;
    keys.push(basePath + path);
  }
  return keys;
}

/**
 * Whether metadata for `key` can be fetched. Every failure, including
 * transient ones, reads as "absent".
 */
export async function probeExistence(store: ObjectStore, key: string, log?: Logger): Promise<boolean> {
  try {
    await store.head(key);
    return true;
  } catch (error) {
    log?.debug({ err: error, key }, 'existence probe failed; reporting absent');
    return false;
  }
}

export class S3Transport implements Transport {
  readonly protocol = 's3';

  private readonly session = new SessionHolder<S3Session>();
  private readonly transferListeners: ListenerSet<TransferEvent>;
  private readonly sessionListeners: ListenerSet<SessionEvent>;
  private readonly log: Logger;
  private readonly region: string;
  private readonly endpoint?: string;
  private readonly forcePathStyle: boolean;
  private readonly chunkSize: number;
  private readonly defaultAuth: AuthenticationInfo | null;
  private readonly storeFactory: ObjectStoreFactory;

  constructor(options: S3TransportOptions = {}) {
    const config = loadTransportConfig(options.env);
    this.log = options.logger ?? rootLogger.child({ transport: 's3' }, { level: config.logLevel });
    this.region = options.region ?? config.region;
    this.endpoint = options.endpoint ?? config.endpoint;
    this.forcePathStyle = options.forcePathStyle ?? config.forcePathStyle;
    this.chunkSize = Math.max(1, options.chunkSize ?? config.chunkSize);
    this.defaultAuth =
      config.accessKeyId || config.secretAccessKey
        ? { username: config.accessKeyId, password: config.secretAccessKey }
        : null;
    this.storeFactory = options.storeFactory ?? createS3ObjectStore;
    this.transferListeners = new ListenerSet<TransferEvent>(this.log);
    this.sessionListeners = new ListenerSet<SessionEvent>(this.log);
  }

  get isConnected(): boolean {
    return this.session.isOpen;
  }

  async connect(repository: RepositoryDescriptor, auth?: AuthenticationInfo | null): Promise<void> {
    this.sessionListeners.emit({ type: 'opening', repository });
    let session: S3Session;
    try {
      session = this.openSession(repository, auth ?? this.defaultAuth);
    } catch (error) {
      this.sessionListeners.emit({ type: 'connectionRefused', repository });
      throw error;
    }
    this.session.open(session);
    this.log.info(
      { bucket: repository.host, basePath: session.basePath },
      'connected to repository'
    );
    this.sessionListeners.emit({ type: 'opened', repository });
  }

  async disconnect(): Promise<void> {
    if (!this.session.isOpen) return;
    const { repository } = this.session.require();
    this.sessionListeners.emit({ type: 'disconnecting', repository });
    this.session.close();
    this.log.info({ bucket: repository.host }, 'disconnected from repository');
    this.sessionListeners.emit({ type: 'disconnected', repository });
  }

  async exists(resourceName: string): Promise<boolean> {
    const { store, basePath } = this.session.require();
    return probeExistence(store, basePath + resourceName, this.log);
  }

  async get(resourceName: string, destination: string, progress?: TransferProgress): Promise<void> {
    const { store, basePath } = this.session.require();
    const key = basePath + resourceName;
    const subject: TransferSubject = { requestType: 'get', resourceName, localFile: destination };
    this.emitTransfer('initiated', subject);

    try {
      const source = await this.openRemote(store, key, resourceName);
      await this.prepareDestination(source, destination);
      this.emitTransfer('started', subject);
      const bytes = await copyWithProgress(source, createWriteStream(destination), {
        chunkSize: this.chunkSize,
        progress: this.reportingProgress(subject, progress),
        log: this.log,
        sourceError: (error) => mapS3Error(error, key),
        destinationError: (error) => toLocalIOError(destination, error),
      });
      this.log.info({ key, destination, bytes }, 'downloaded resource');
      this.emitTransfer('completed', subject, { bytes });
    } catch (error) {
      throw this.failTransfer(subject, error, key);
    }
  }

  async getIfNewer(
    resourceName: string,
    destination: string,
    timestamp: number,
    progress?: TransferProgress
  ): Promise<boolean> {
    if (!(await this.isNewer(resourceName, timestamp))) return false;
    await this.get(resourceName, destination, progress);
    return true;
  }

  async isNewer(resourceName: string, timestamp: number): Promise<boolean> {
    const { store, basePath } = this.session.require();
    const metadata = await store.head(basePath + resourceName);
    return metadata.lastModified.getTime() > timestamp;
  }

  async list(directory: string): Promise<string[]> {
    const { store, basePath } = this.session.require();
    const prefix = basePath + directory;
    const keys = await store.list(prefix);
    this.log.debug({ prefix, count: keys.length }, 'listed objects');
    return keys;
  }

  async put(source: string, destination: string, progress?: TransferProgress): Promise<void> {
    const { store, basePath } = this.session.require();
    const key = basePath + destination;
    const subject: TransferSubject = { requestType: 'put', resourceName: destination, localFile: source };
    this.emitTransfer('initiated', subject);

    try {
      const size = await this.sizeOf(source);
      for (const marker of markerKeys(basePath, destination)) {
        this.log.debug({ key: marker }, 'writing directory marker');
        await store.write(marker, Buffer.alloc(0), 0);
      }
      this.emitTransfer('started', subject);
      await this.upload(store, key, source, size, this.reportingProgress(subject, progress));
      this.log.info({ key, source, bytes: size }, 'uploaded resource');
      this.emitTransfer('completed', subject, { bytes: size });
    } catch (error) {
      throw this.failTransfer(subject, error, key);
    }
  }

  addTransferListener(listener: TransferListener): void {
    this.transferListeners.add(listener);
  }

  removeTransferListener(listener: TransferListener): boolean {
    return this.transferListeners.remove(listener);
  }

  addSessionListener(listener: SessionListener): void {
    this.sessionListeners.add(listener);
  }

  removeSessionListener(listener: SessionListener): boolean {
    return this.sessionListeners.remove(listener);
  }

  private openSession(repository: RepositoryDescriptor, auth: AuthenticationInfo | null): S3Session {
    const credentials = toCredentials(auth);
    let store: ObjectStore;
    try {
      store = this.storeFactory({
        bucket: repository.host,
        region: this.region,
        endpoint: this.endpoint,
        forcePathStyle: this.forcePathStyle,
        credentials,
      });
    } catch (error) {
      if (error instanceof TransportError) throw error;
      throw new AuthenticationError('Cannot authenticate with current credentials', { cause: error });
    }
    return { repository, store, basePath: basePathOf(repository.basedir) };
  }

  private async openRemote(store: ObjectStore, key: string, resourceName: string): Promise<Readable> {
    try {
      return await store.read(key);
    } catch (error) {
      throw new ResourceNotFoundError(
        `Resource ${resourceName} does not exist in the repository`,
        { cause: error }
      );
    }
  }

  private async prepareDestination(source: Readable, destination: string): Promise<void> {
    try {
      await mkdir(dirname(destination), { recursive: true });
    } catch (error) {
      bestEffortClose(source, this.log);
      throw toLocalIOError(destination, error);
    }
  }

  private async sizeOf(path: string): Promise<number> {
    try {
      const info = await stat(path);
      return info.size;
    } catch (error) {
      throw toLocalIOError(path, error);
    }
  }

  private async upload(
    store: ObjectStore,
    key: string,
    source: string,
    size: number,
    progress: TransferProgress
  ): Promise<void> {
    const input = createReadStream(source, { highWaterMark: this.chunkSize });
    const failure: { local?: unknown } = {};
    input.once('error', (error) => {
      failure.local ??= error;
    });
    const body = pipeline(input, fixedChunks(this.chunkSize), progressTap(progress), (error) => {
      if (error) this.log.debug({ err: error, key }, 'upload body stream ended with error');
    });

    try {
      await store.write(key, body, size);
    } catch (error) {
      if (failure.local !== undefined) throw toLocalIOError(source, failure.local);
      throw error;
    } finally {
      bestEffortClose(input, this.log);
      bestEffortClose(body, this.log);
    }
  }

  private reportingProgress(subject: TransferSubject, progress?: TransferProgress): TransferProgress {
    return (chunk) => {
      this.emitTransfer('progress', subject, { bytes: chunk.length });
      progress?.(chunk);
    };
  }

  private emitTransfer(
    type: TransferEventType,
    subject: TransferSubject,
    extra: Pick<TransferEvent, 'bytes' | 'error'> = {}
  ): void {
    this.transferListeners.emit({ ...subject, ...extra, type });
  }

  private failTransfer(subject: TransferSubject, error: unknown, key: string): TransportError {
    const failure = error instanceof TransportError ? error : mapS3Error(error, key);
    this.log.warn({ err: failure, key, requestType: subject.requestType }, 'transfer failed');
    this.emitTransfer('error', subject, { error: failure });
    return failure;
  }
}
