import { readEnv, readEnvBool, readEnvInt } from './utils/env.js';
import { DEFAULT_CHUNK_SIZE } from './transfer.js';

export interface TransportConfig {
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
  chunkSize: number;
  accessKeyId?: string;
  secretAccessKey?: string;
  logLevel: string;
}

export function loadTransportConfig(
  env: Record<string, string | undefined> = process.env
): TransportConfig {
  return {
    region: readEnv('S3_REGION', 'us-east-1', env),
    endpoint: readEnv('S3_ENDPOINT', '', env) || undefined,
    forcePathStyle: readEnvBool('S3_FORCE_PATH_STYLE', false, env),
    chunkSize: readEnvInt('TRANSFER_CHUNK_SIZE', DEFAULT_CHUNK_SIZE, 1, env),
    accessKeyId: readEnv('S3_ACCESS_KEY_ID', '', env) || undefined,
    secretAccessKey: readEnv('S3_SECRET_ACCESS_KEY', '', env) || undefined,
    logLevel: readEnv('LOG_LEVEL', 'info', env),
  };
}
