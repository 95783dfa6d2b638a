import { toCredentials } from '../src/auth.js';
import { AuthenticationError } from '../src/errors.js';

describe('toCredentials', () => {
  test('returns static credentials for a full pair', () => {
    expect(toCredentials({ username: 'test-key', password: 'test-secret' })).toEqual({
      accessKeyId: 'test-key',
      secretAccessKey: 'test-secret',
    });
  });

  test.each([undefined, null, {}, { username: '', password: '' }])(
    'is anonymous for %p',
    (info) => {
      expect(toCredentials(info)).toBeUndefined();
    }
  );

  test.each([
    { username: 'test-key' },
    { password: 'test-secret' },
    { username: 'test-key', password: '' },
    { username: '', password: 'test-secret' },
  ])('rejects a partial pair %p', (info) => {
    expect(() => toCredentials(info)).toThrow(
      new AuthenticationError('S3 requires both a username and a password to be set')
    );
  });
});
