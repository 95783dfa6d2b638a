import { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { LocalIOError, StorageClientError } from '../src/errors.js';
import { bestEffortClose, copyWithProgress, fixedChunks } from '../src/transfer.js';

function collector(into: string[]): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      into.push(chunk.toString());
      callback();
    },
  });
}

const classify = {
  sourceError: (error: unknown) => new StorageClientError(`source: ${String(error)}`),
  destinationError: (error: unknown) => new LocalIOError('/dest', `destination: ${String(error)}`),
};

describe('fixedChunks', () => {
  test('re-slices input into fixed-size chunks', async () => {
    const out: string[] = [];
    await pipeline(
      Readable.from([Buffer.from('abcde'), Buffer.from('fg')]),
      fixedChunks(3),
      collector(out)
    );
    expect(out).toEqual(['abc', 'def', 'g']);
  });
});

describe('copyWithProgress', () => {
  test('copies every byte and reports each chunk', async () => {
    const out: string[] = [];
    const seen: number[] = [];

    const total = await copyWithProgress(Readable.from(Buffer.from('hello world')), collector(out), {
      ...classify,
      chunkSize: 4,
      progress: (chunk) => seen.push(chunk.length),
    });

    expect(total).toBe(11);
    expect(out.join('')).toBe('hello world');
    expect(seen).toEqual([4, 4, 3]);
  });

  test('classifies a destination failure as local I/O', async () => {
    const failing = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('disk full'));
      },
    });

    await expect(
      copyWithProgress(Readable.from(Buffer.from('abc')), failing, { ...classify, chunkSize: 2 })
    ).rejects.toBeInstanceOf(LocalIOError);
  });

  test('classifies a source failure as a storage error', async () => {
    const source = new Readable({
      read() {
        this.destroy(new Error('connection reset'));
      },
    });
    const out: string[] = [];

    await expect(copyWithProgress(source, collector(out), { ...classify, chunkSize: 2 })).rejects.toThrow(
      'source: Error: connection reset'
    );
  });
});

describe('bestEffortClose', () => {
  test('closes an open stream', () => {
    const stream = new Readable({ read() {} });
    expect(bestEffortClose(stream)).toBe(true);
    expect(stream.destroyed).toBe(true);
  });

  test('swallows a failing close', () => {
    const stream = new Readable({ read() {} });
    stream.destroy = () => {
      throw new Error('close failed');
    };
    expect(bestEffortClose(stream)).toBe(false);
  });
});
