import { Transform, type Readable, type Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { Logger } from './logger.js';
import type { TransportError } from './errors.js';

export const DEFAULT_CHUNK_SIZE = 1024;

/** Called once per chunk of bytes moved. */
export type TransferProgress = (chunk: Uint8Array) => void;

/** Re-slices a byte stream into chunks of exactly `chunkSize` (the last may be shorter). */
export function fixedChunks(chunkSize: number): Transform {
  let pending: Buffer = Buffer.alloc(0);
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      pending = pending.length > 0 ? Buffer.concat([pending, chunk]) : chunk;
      while (pending.length >= chunkSize) {
        this.push(pending.subarray(0, chunkSize));
        pending = pending.subarray(chunkSize);
      }
      callback();
    },
    flush(callback) {
      if (pending.length > 0) this.push(pending);
      callback();
    },
  });
}

export function progressTap(progress?: TransferProgress): Transform {
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      try {
        progress?.(chunk);
      } catch (error) {
        callback(error instanceof Error ? error : new Error(String(error)));
        return;
      }
      callback(null, chunk);
    },
  });
}

/**
 * Closes a stream, discarding any error raised while closing.
 * Returns false when the close itself failed.
 */
export function bestEffortClose(stream: Readable | Writable, log?: Logger): boolean {
  try {
    if (!stream.destroyed) stream.destroy();
    return true;
  } catch (error) {
    log?.warn({ err: error }, 'ignoring failure while closing stream');
    return false;
  }
}

export interface CopyOptions {
  chunkSize: number;
  progress?: TransferProgress;
  log?: Logger;
  /** Classify a failure raised by the source stream. */
  sourceError: (error: unknown) => TransportError;
  /** Classify a failure raised by the destination stream. */
  destinationError: (error: unknown) => TransportError;
}

/** Streams `source` into `destination` chunk by chunk; both are closed on every path. */
export async function copyWithProgress(
  source: Readable,
  destination: Writable,
  options: CopyOptions
): Promise<number> {
  const failure: { side?: 'source' | 'destination' } = {};
  source.once('error', () => {
    failure.side ??= 'source';
  });
  destination.once('error', () => {
    failure.side ??= 'destination';
  });

  let bytes = 0;
  const count: TransferProgress = (chunk) => {
    bytes += chunk.length;
    options.progress?.(chunk);
  };

  try {
    await pipeline(source, fixedChunks(options.chunkSize), progressTap(count), destination);
    return bytes;
  } catch (error) {
    throw failure.side === 'destination'
      ? options.destinationError(error)
      : options.sourceError(error);
  } finally {
    bestEffortClose(source, options.log);
    bestEffortClose(destination, options.log);
  }
}
