import type { AuthenticationInfo } from './auth.js';
import { TransportStateError } from './errors.js';
import type { RepositoryDescriptor } from './repository.js';
import type { Transport } from './types.js';

/** Holds the state of a connected transport; empty while disconnected. */
export class SessionHolder<T> {
  private current: T | null = null;

  get isOpen(): boolean {
    return this.current !== null;
  }

  open(value: T): void {
    this.current = value;
  }

  /** Returns the previous session, if any. */
  close(): T | null {
    const previous = this.current;
    this.current = null;
    return previous;
  }

  require(): T {
    if (this.current === null) {
      throw new TransportStateError();
    }
    return this.current;
  }
}

/** Runs `fn` inside one connect/disconnect cycle; disconnects on every exit path. */
export async function withConnection<T>(
  transport: Transport,
  repository: RepositoryDescriptor,
  auth: AuthenticationInfo | null | undefined,
  fn: (transport: Transport) => Promise<T>
): Promise<T> {
  await transport.connect(repository, auth);
  try {
    return await fn(transport);
  } finally {
    await transport.disconnect();
  }
}
