import crypto from 'crypto';
import { InvalidTokenError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('encryption');

export const ENCRYPTION_KEY_ENV = 'FRAMEIO_AUTH_ENCRYPTION_KEY';

const ALGORITHM = 'aes-256-gcm';
const FORMAT_VERSION = 0x01;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const HEADER_LENGTH = 1 + IV_LENGTH + AUTH_TAG_LENGTH;
const KEY_SALT = 'frameio-event-kit-salt'; // Static salt for consistent key derivation

/**
 * Optional OS keyring used as a development convenience.
 * Wrap any keyring library in this shape and pass it to TokenEncryption.create().
 */
export interface KeyringProvider {
  getPassword(service: string, account: string): string | null | Promise<string | null>;
  setPassword(service: string, account: string, password: string): void | Promise<void>;
}

export const KEYRING_SERVICE = 'frameio-event-kit';
export const KEYRING_ACCOUNT = 'encryption-key';

export interface TokenEncryptionOptions {
  key?: string;
  env?: NodeJS.ProcessEnv;
}

export interface TokenEncryptionCreateOptions extends TokenEncryptionOptions {
  keyring?: KeyringProvider;
}

export type KeySource = 'explicit' | 'environment' | 'keyring' | 'ephemeral';

type KeyLookup = (options: TokenEncryptionOptions) => { key: string; source: KeySource } | null;

const keySources: KeyLookup[] = [
  (options) => (options.key ? { key: options.key, source: 'explicit' } : null),
  (options) => {
    const fromEnv = (options.env ?? process.env)[ENCRYPTION_KEY_ENV];
    return fromEnv ? { key: fromEnv, source: 'environment' } : null;
  },
];

/**
 * Authenticated symmetric encryption for tokens and signing secrets at rest.
 *
 * Uses AES-256-GCM. Each ciphertext frame is `version | iv | authTag | data`,
 * so tampering, truncation and wrong keys are all detected on decrypt.
 *
 * Key sources, first match wins: explicit key, FRAMEIO_AUTH_ENCRYPTION_KEY,
 * a keyring provider (see {@link TokenEncryption.create}), then an ephemeral
 * key with a warning. Data encrypted under an ephemeral key is lost on restart.
 */
export class TokenEncryption {
  private source: KeySource;
  private key: Buffer;

  constructor(options: TokenEncryptionOptions = {}) {
    const resolved = resolveKeySync(options);
    this.source = resolved.source;
    this.key = deriveKey(resolved.key);
  }

  get keySource(): KeySource {
    return this.source;
  }

  /**
   * Async factory that can also consult a keyring. A keyring that is empty
   * receives a freshly generated key; a keyring that fails is skipped.
   */
  static async create(options: TokenEncryptionCreateOptions = {}): Promise<TokenEncryption> {
    for (const lookup of keySources) {
      if (lookup(options)) return new TokenEncryption(options);
    }

    if (options.keyring) {
      const fromKeyring = await loadKeyFromKeyring(options.keyring);
      if (fromKeyring) {
        const encryption = new TokenEncryption({ ...options, key: fromKeyring });
        encryption.source = 'keyring';
        return encryption;
      }
    }

    return new TokenEncryption(options);
  }

  /**
   * Generate a random key suitable for FRAMEIO_AUTH_ENCRYPTION_KEY.
   */
  static generateKey(): string {
    return crypto.randomBytes(32).toString('base64url');
  }

  encrypt(plaintext: Buffer): Buffer {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, iv, { authTagLength: AUTH_TAG_LENGTH });

    const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    const authTag = cipher.getAuthTag();

    return Buffer.concat([Buffer.from([FORMAT_VERSION]), iv, authTag, encrypted]);
  }

  decrypt(frame: Buffer): Buffer {
    if (frame.length < HEADER_LENGTH || frame[0] !== FORMAT_VERSION) {
      throw new InvalidTokenError();
    }

    const iv = frame.subarray(1, 1 + IV_LENGTH);
    const authTag = frame.subarray(1 + IV_LENGTH, HEADER_LENGTH);
    const encrypted = frame.subarray(HEADER_LENGTH);

    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, this.key, iv, { authTagLength: AUTH_TAG_LENGTH });
      decipher.setAuthTag(authTag);
      // final() throws if the auth tag doesn't match
      return Buffer.concat([decipher.update(encrypted), decipher.final()]);
    } catch (error) {
      throw new InvalidTokenError(undefined, { cause: error });
    }
  }

  encryptJson(value: unknown): Buffer {
    return this.encrypt(Buffer.from(JSON.stringify(value), 'utf8'));
  }

  decryptJson(frame: Buffer): unknown {
    const plaintext = this.decrypt(frame).toString('utf8');
    try {
      return JSON.parse(plaintext);
    } catch (error) {
      throw new InvalidTokenError('Decrypted data is not valid JSON', { cause: error });
    }
  }

  /** Encrypt a string and return it base64-framed for storage. */
  encryptString(value: string): string {
    return this.encrypt(Buffer.from(value, 'utf8')).toString('base64');
  }

  decryptString(value: string): string {
    return this.decrypt(Buffer.from(value, 'base64')).toString('utf8');
  }
}

function resolveKeySync(options: TokenEncryptionOptions): { key: string; source: KeySource } {
  for (const lookup of keySources) {
    const found = lookup(options);
    if (found) return found;
  }

  logger.warn(
    'No encryption key configured. Using ephemeral key - tokens will be lost on restart. ' +
      `Set ${ENCRYPTION_KEY_ENV} in production.`
  );
  return { key: TokenEncryption.generateKey(), source: 'ephemeral' };
}

async function loadKeyFromKeyring(keyring: KeyringProvider): Promise<string | null> {
  try {
    const existing = await keyring.getPassword(KEYRING_SERVICE, KEYRING_ACCOUNT);
    if (existing) {
      logger.debug('Loaded encryption key from keyring');
      return existing;
    }

    const created = TokenEncryption.generateKey();
    await keyring.setPassword(KEYRING_SERVICE, KEYRING_ACCOUNT, created);
    logger.info('Generated a new encryption key and saved it to the keyring');
    return created;
  } catch (error) {
    logger.warn('Keyring unavailable, falling back to an ephemeral key:', error instanceof Error ? error.message : error);
    return null;
  }
}

function deriveKey(secret: string): Buffer {
  return crypto.scryptSync(secret, KEY_SALT, 32);
}
