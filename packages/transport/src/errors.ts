export type TransportErrorCode =
  | 'AUTHENTICATION'
  | 'NOT_FOUND'
  | 'STORAGE_CLIENT'
  | 'LOCAL_IO'
  | 'NOT_CONNECTED'
  | 'INVALID_REPOSITORY'
  | 'UNSUPPORTED_PROTOCOL';

export class TransportError extends Error {
  readonly code: TransportErrorCode;

  constructor(code: TransportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.code = code;
  }
}

export class AuthenticationError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AUTHENTICATION', message, options);
    this.name = 'AuthenticationError';
  }
}

export class ResourceNotFoundError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NOT_FOUND', message, options);
    this.name = 'ResourceNotFoundError';
  }
}

export class StorageClientError extends TransportError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('STORAGE_CLIENT', message, options);
    this.name = 'StorageClientError';
    this.status = options?.status;
  }
}

export class LocalIOError extends TransportError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('LOCAL_IO', message, options);
    this.name = 'LocalIOError';
    this.path = path;
  }
}

export class TransportStateError extends TransportError {
  constructor(message = 'Transport is not connected') {
    super('NOT_CONNECTED', message);
    this.name = 'TransportStateError';
  }
}

export class RepositoryError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_REPOSITORY', message, options);
    this.name = 'RepositoryError';
  }
}

export class UnsupportedProtocolError extends TransportError {
  readonly protocol: string;

  constructor(protocol: string) {
    super('UNSUPPORTED_PROTOCOL', `No transport registered for protocol "${protocol}"`);
    this.name = 'UnsupportedProtocolError';
    this.protocol = protocol;
  }
}

interface ClientErrorShape {
  name?: unknown;
  Code?: unknown;
  code?: unknown;
  message?: unknown;
  $metadata?: { httpStatusCode?: unknown };
}

function asShape(error: unknown): ClientErrorShape {
  return typeof error === 'object' && error !== null ? error : {};
}

function statusOf(shape: ClientErrorShape): number | undefined {
  const status = shape.$metadata?.httpStatusCode;
  return typeof status === 'number' ? status : undefined;
}

const NOT_FOUND_NAMES = new Set(['NoSuchKey', 'NotFound']);
const AUTH_NAMES = new Set([
  'AccessDenied',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'CredentialsProviderError',
]);

/** Map an AWS SDK v3 failure onto the transport error taxonomy. */
export function mapS3Error(error: unknown, key?: string): TransportError {
  if (error instanceof TransportError) return error;

  const shape = asShape(error);
  const name = String(shape.name ?? shape.Code ?? shape.code ?? '');
  const status = statusOf(shape);
  const detail = typeof shape.message === 'string' && shape.message ? shape.message : String(error);
  const subject = key ? ` for key ${key}` : '';

  if (NOT_FOUND_NAMES.has(name) || status === 404) {
    return new ResourceNotFoundError(`Object not found${subject}: ${detail}`, { cause: error });
  }
  if (AUTH_NAMES.has(name) || status === 401 || status === 403) {
    return new AuthenticationError(`Storage rejected credentials${subject}: ${detail}`, {
      cause: error,
    });
  }
  return new StorageClientError(`Storage request failed${subject}: ${detail}`, {
    cause: error,
    status,
  });
}

/** Wrap a filesystem failure as a LocalIOError. */
export function toLocalIOError(path: string, error: unknown): TransportError {
  if (error instanceof TransportError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new LocalIOError(path, `Local I/O failed for ${path}: ${message}`, { cause: error });
}
