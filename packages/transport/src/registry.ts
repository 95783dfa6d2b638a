import { UnsupportedProtocolError } from './errors.js';
import { S3Transport, type S3TransportOptions } from './S3Transport.js';
import type { Transport } from './types.js';

export type TransportFactory = (options?: S3TransportOptions) => Transport;

const factories = new Map<string, TransportFactory>([
  ['s3', (options) => new S3Transport(options)],
]);

function protocolOf(protocolOrUrl: string): string {
  const idx = protocolOrUrl.indexOf('://');
  const protocol = idx >= 0 ? protocolOrUrl.slice(0, idx) : protocolOrUrl;
  return protocol.replace(/:$/, '').trim().toLowerCase();
}

/** Registers `factory` for `protocol`; the returned function restores the previous entry. */
export function registerTransport(protocol: string, factory: TransportFactory): () => void {
  const key = protocolOf(protocol);
  const previous = factories.get(key);
  factories.set(key, factory);
  return () => {
    if (factories.get(key) !== factory) return;
    if (previous) factories.set(key, previous);
    else factories.delete(key);
  };
}

export function supportedProtocols(): string[] {
  return [...factories.keys()];
}

/** Accepts either a protocol (`s3`) or a repository URL (`s3://bucket/path`). */
export function createTransport(protocolOrUrl: string, options?: S3TransportOptions): Transport {
  const protocol = protocolOf(protocolOrUrl);
  const factory = factories.get(protocol);
  if (!factory) {
    throw new UnsupportedProtocolError(protocol);
  }
  return factory(options);
}
