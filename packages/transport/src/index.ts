export * from './errors.js';
export type { Transport } from './types.js';
export { S3Transport, markerKeys, probeExistence, type S3TransportOptions } from './S3Transport.js';
export { createTransport, registerTransport, supportedProtocols, type TransportFactory } from './registry.js';
export { parseRepositoryUrl, basePathOf, type RepositoryDescriptor } from './repository.js';
export { toCredentials, type AuthenticationInfo, type StaticCredentials } from './auth.js';
export * from './events.js';
export {
  DEFAULT_CHUNK_SIZE,
  bestEffortClose,
  copyWithProgress,
  fixedChunks,
  progressTap,
  type CopyOptions,
  type TransferProgress,
} from './transfer.js';
export { SessionHolder, withConnection } from './session.js';
export * from './storage/types.js';
export { createS3ObjectStore, buildS3ClientConfig, type S3ObjectStoreConfig } from './storage/s3.js';
export { loadTransportConfig, type TransportConfig } from './config.js';
export { readEnv, readEnvBool, readEnvInt } from './utils/env.js';
export { logger, type Logger } from './logger.js';
