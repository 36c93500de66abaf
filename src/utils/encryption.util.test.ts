import { describe, it, expect, vi } from 'vitest';
import { ENCRYPTION_KEY_ENV, KEYRING_ACCOUNT, KEYRING_SERVICE, KeyringProvider, TokenEncryption } from './encryption.util';
import { InvalidTokenError } from './errors';

describe('TokenEncryption', () => {
  it('round-trips bytes, including an empty buffer', () => {
    const encryption = new TokenEncryption({ key: 'test-key' });

    for (const plaintext of [Buffer.from('hello world'), Buffer.alloc(0)]) {
      const frame = encryption.encrypt(plaintext);
      expect(encryption.decrypt(frame).equals(plaintext)).toBe(true);
    }
  });

  it('writes version, iv and tag ahead of the ciphertext', () => {
    const encryption = new TokenEncryption({ key: 'test-key' });
    const frame = encryption.encrypt(Buffer.from('abc'));

    expect(frame[0]).toBe(0x01);
    expect(frame.length).toBe(1 + 12 + 16 + 3);
  });

  it('uses a fresh iv for every encryption', () => {
    const encryption = new TokenEncryption({ key: 'test-key' });
    const a = encryption.encrypt(Buffer.from('same'));
    const b = encryption.encrypt(Buffer.from('same'));
    expect(a.equals(b)).toBe(false);
  });

  it('rejects data encrypted under a different key', () => {
    const frame = new TokenEncryption({ key: 'key-one' }).encrypt(Buffer.from('secret'));
    expect(() => new TokenEncryption({ key: 'key-two' }).decrypt(frame)).toThrow(InvalidTokenError);
  });

  it('rejects tampered and truncated frames', () => {
    const encryption = new TokenEncryption({ key: 'test-key' });
    const frame = encryption.encrypt(Buffer.from('secret data'));

    const flipped = Buffer.from(frame);
    flipped[flipped.length - 1] ^= 0xff;

    expect(() => encryption.decrypt(flipped)).toThrow(InvalidTokenError);
    expect(() => encryption.decrypt(frame.subarray(0, 10))).toThrow(InvalidTokenError);
  });

  it('round-trips JSON and strings', () => {
    const encryption = new TokenEncryption({ key: 'test-key' });
    expect(encryption.decryptJson(encryption.encryptJson({ a: 1, b: ['x'] }))).toEqual({ a: 1, b: ['x'] });
    expect(encryption.decryptString(encryption.encryptString('webhook-secret'))).toBe('webhook-secret');
  });

  it('prefers an explicit key over the environment', () => {
    const env = { [ENCRYPTION_KEY_ENV]: 'env-key' };
    const explicit = new TokenEncryption({ key: 'explicit-key', env });
    const fromEnv = new TokenEncryption({ env });

    expect(explicit.keySource).toBe('explicit');
    expect(fromEnv.keySource).toBe('environment');

    const frame = fromEnv.encrypt(Buffer.from('x'));
    expect(new TokenEncryption({ key: 'env-key' }).decrypt(frame).toString()).toBe('x');
    expect(() => explicit.decrypt(frame)).toThrow(InvalidTokenError);
  });

  it('falls back to an ephemeral key when nothing is configured', () => {
    const encryption = new TokenEncryption({ env: {} });
    expect(encryption.keySource).toBe('ephemeral');
  });

  it('generates url-safe 32-byte keys', () => {
    const key = TokenEncryption.generateKey();
    expect(Buffer.from(key, 'base64url')).toHaveLength(32);
    expect(key).toMatch(/^[A-Za-z0-9_-]+$/);
  });

  describe('create() with a keyring', () => {
    it('reads an existing key from the keyring', async () => {
      const keyring: KeyringProvider = {
        getPassword: vi.fn(() => 'stored-key'),
        setPassword: vi.fn(),
      };

      const encryption = await TokenEncryption.create({ env: {}, keyring });

      expect(encryption.keySource).toBe('keyring');
      expect(keyring.getPassword).toHaveBeenCalledWith(KEYRING_SERVICE, KEYRING_ACCOUNT);
      expect(keyring.setPassword).not.toHaveBeenCalled();
      const frame = encryption.encrypt(Buffer.from('x'));
      expect(new TokenEncryption({ key: 'stored-key' }).decrypt(frame).toString()).toBe('x');
    });

    it('saves a generated key when the keyring is empty', async () => {
      const setPassword = vi.fn();
      const encryption = await TokenEncryption.create({ env: {}, keyring: { getPassword: () => null, setPassword } });

      expect(encryption.keySource).toBe('keyring');
      expect(setPassword).toHaveBeenCalledTimes(1);
      expect(setPassword.mock.calls[0][0]).toBe(KEYRING_SERVICE);
      expect(setPassword.mock.calls[0][1]).toBe(KEYRING_ACCOUNT);
    });

    it('falls through to an ephemeral key when the keyring fails', async () => {
      const encryption = await TokenEncryption.create({
        env: {},
        keyring: {
          getPassword: () => {
            throw new Error('keyring locked');
          },
          setPassword: vi.fn(),
        },
      });
      expect(encryption.keySource).toBe('ephemeral');
    });

    it('does not consult the keyring when the environment has a key', async () => {
      const getPassword = vi.fn(() => 'stored-key');
      const encryption = await TokenEncryption.create({
        env: { [ENCRYPTION_KEY_ENV]: 'env-key' },
        keyring: { getPassword, setPassword: vi.fn() },
      });
      expect(encryption.keySource).toBe('environment');
      expect(getPassword).not.toHaveBeenCalled();
    });
  });
});
