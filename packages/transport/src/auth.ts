import { AuthenticationError } from './errors.js';

export interface AuthenticationInfo {
  username?: string;
  password?: string;
}

export interface StaticCredentials {
  accessKeyId: string;
  secretAccessKey: string;
}

/** `undefined` means anonymous access. */
export function toCredentials(info?: AuthenticationInfo | null): StaticCredentials | undefined {
  if (!info) return undefined;
  const accessKeyId = info.username ?? '';
  const secretAccessKey = info.password ?? '';
  if (!accessKeyId && !secretAccessKey) return undefined;
  if (!accessKeyId || !secretAccessKey) {
    throw new AuthenticationError('S3 requires both a username and a password to be set');
  }
  return { accessKeyId, secretAccessKey };
}
