import { RepositoryError } from './errors.js';

/** Where the host wants artifacts to live, e.g. `s3://bucket-name/releases`. */
export interface RepositoryDescriptor {
  id?: string;
  url: string;
  protocol: string;
  /** Bucket name for object-storage repositories. */
  host: string;
  /** Always starts with `/`; `/` for the bucket root. */
  basedir: string;
}

export function parseRepositoryUrl(url: string, id?: string): RepositoryDescriptor {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch (error) {
    throw new RepositoryError(`Invalid repository URL: ${url}`, { cause: error });
  }

  const protocol = parsed.protocol.replace(/:$/, '').toLowerCase();
  if (!parsed.hostname) {
    throw new RepositoryError(`Repository URL has no bucket: ${url}`);
  }

  let path: string;
  try {
    path = decodeURIComponent(parsed.pathname || '/');
  } catch (error) {
    throw new RepositoryError(`Repository URL has a malformed path: ${url}`, { cause: error });
  }
  return {
    id,
    url,
    protocol,
    host: parsed.hostname,
    basedir: path.startsWith('/') ? path : `/${path}`,
  };
}

/**
 * Key prefix for a repository base directory: no leading separator and exactly
 * one trailing separator. The bucket root maps to the empty prefix.
 */
export function basePathOf(basedir: string): string {
  const trimmed = basedir.replace(/^\/+/, '').replace(/\/+$/, '');
  return trimmed ? `${trimmed}/` : '';
}
