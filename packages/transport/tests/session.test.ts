import pino from 'pino';
import { ResourceNotFoundError, TransportStateError } from '../src/errors.js';
import { parseRepositoryUrl } from '../src/repository.js';
import { S3Transport } from '../src/S3Transport.js';
import { SessionHolder, withConnection } from '../src/session.js';
import { createMemoryObjectStore, factoryFor } from './support/memoryObjectStore.js';

describe('SessionHolder', () => {
  test('requires an open session', () => {
    const holder = new SessionHolder<{ bucket: string }>();
    expect(() => holder.require()).toThrow(TransportStateError);

    holder.open({ bucket: 'test-bucket' });
    expect(holder.isOpen).toBe(true);
    expect(holder.require()).toEqual({ bucket: 'test-bucket' });

    expect(holder.close()).toEqual({ bucket: 'test-bucket' });
    expect(holder.isOpen).toBe(false);
    expect(holder.close()).toBeNull();
  });
});

describe('withConnection', () => {
  const repository = parseRepositoryUrl('s3://test-bucket/releases');

  function transport(): S3Transport {
    const { factory } = factoryFor(createMemoryObjectStore());
    return new S3Transport({ storeFactory: factory, env: {}, logger: pino({ level: 'silent' }) });
  }

  test('returns the result and disconnects', async () => {
    const subject = transport();
    const result = await withConnection(subject, repository, null, async (connected) => {
      expect(connected.isConnected).toBe(true);
      return connected.exists('a.jar');
    });

    expect(result).toBe(false);
    expect(subject.isConnected).toBe(false);
  });

  test('disconnects when the operation fails', async () => {
    const subject = transport();
    await expect(
      withConnection(subject, repository, undefined, async (connected) => {
        await connected.isNewer('missing.jar', 0);
      })
    ).rejects.toBeInstanceOf(ResourceNotFoundError);

    expect(subject.isConnected).toBe(false);
  });
});
