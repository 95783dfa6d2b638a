import type { AuthenticationInfo } from './auth.js';
import type { SessionListener, TransferListener } from './events.js';
import type { RepositoryDescriptor } from './repository.js';
import type { TransferProgress } from './transfer.js';

/**
 * Repository access operations a build-artifact client drives through a
 * transport provider. Everything except connect/disconnect requires an open
 * session.
 */
export interface Transport {
  readonly protocol: string;
  readonly isConnected: boolean;

  connect(repository: RepositoryDescriptor, auth?: AuthenticationInfo | null): Promise<void>;
  disconnect(): Promise<void>;

  exists(resourceName: string): Promise<boolean>;
  get(resourceName: string, destination: string, progress?: TransferProgress): Promise<void>;
  /** Downloads only when the remote copy changed after `timestamp`; returns whether it did. */
  getIfNewer(
    resourceName: string,
    destination: string,
    timestamp: number,
    progress?: TransferProgress
  ): Promise<boolean>;
  put(source: string, destination: string, progress?: TransferProgress): Promise<void>;
  list(directory: string): Promise<string[]>;
  isNewer(resourceName: string, timestamp: number): Promise<boolean>;

  addTransferListener(listener: TransferListener): void;
  removeTransferListener(listener: TransferListener): boolean;
  addSessionListener(listener: SessionListener): void;
  removeSessionListener(listener: SessionListener): boolean;
}
