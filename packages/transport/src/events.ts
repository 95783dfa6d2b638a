import type { Logger } from './logger.js';
import type { RepositoryDescriptor } from './repository.js';
import type { TransportError } from './errors.js';

export type RequestType = 'get' | 'put';

export type TransferEventType = 'initiated' | 'started' | 'progress' | 'completed' | 'error';

export interface TransferEvent {
  type: TransferEventType;
  requestType: RequestType;
  resourceName: string;
  localFile: string;
  /** Bytes in this chunk for `progress`, total bytes moved for `completed`. */
  bytes?: number;
  error?: TransportError;
}

export type SessionEventType =
  | 'opening'
  | 'opened'
  | 'connectionRefused'
  | 'disconnecting'
  | 'disconnected';

export interface SessionEvent {
  type: SessionEventType;
  repository: RepositoryDescriptor;
}

export type TransferListener = (event: TransferEvent) => void;
export type SessionListener = (event: SessionEvent) => void;

export class ListenerSet<E extends { type: string }> {
  private readonly listeners = new Set<(event: E) => void>();

  constructor(private readonly log: Logger) {}

  add(listener: (event: E) => void): void {
    this.listeners.add(listener);
  }

  remove(listener: (event: E) => void): boolean {
    return this.listeners.delete(listener);
  }

  emit(event: E): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.log.warn({ err: error, event: event.type }, 'listener threw; continuing');
      }
    }
  }
}
