import { Storage } from './storage';
import { TokenEncryption } from '../utils/encryption.util';
import { InvalidTokenError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import {
  TokenData,
  StoredToken,
  storedTokenSchema,
  encryptedEnvelopeSchema,
} from '../types/oauth.types';

const logger = createLogger('oauth-token-repository');

/**
 * Repository for OAuth tokens with encryption.
 * Tokens are encrypted at rest using AES-256-GCM under `user:<user_id>`.
 */
export class OAuthTokenRepository {
  constructor(
    private readonly storage: Storage,
    private readonly encryption: TokenEncryption
  ) {}

  static key(userId: string): string {
    return `user:${userId}`;
  }

  /**
   * Encrypt and write the token record, replacing any previous one.
   */
  async upsert(token: TokenData, ttlSeconds: number): Promise<void> {
    const record: StoredToken = {
      access_token: token.accessToken,
      refresh_token: token.refreshToken,
      expires_at: token.expiresAt.toISOString(),
      scopes: token.scopes,
      user_id: token.userId,
    };

    const encrypted = this.encryption.encryptJson(record);
    await this.storage.put(
      OAuthTokenRepository.key(token.userId),
      { encrypted_token: encrypted.toString('base64') },
      { ttl: ttlSeconds }
    );
  }

  /**
   * Decrypt and return the stored token, or null when none is stored.
   */
  async findByUserId(userId: string): Promise<TokenData | null> {
    const stored = await this.storage.get(OAuthTokenRepository.key(userId));
    if (!stored) return null;

    const envelope = encryptedEnvelopeSchema.safeParse(stored);
    if (!envelope.success) {
      logger.error(`Malformed token envelope for user ${userId}`);
      throw new InvalidTokenError('Stored token record is malformed');
    }

    const decrypted = this.encryption.decryptJson(Buffer.from(envelope.data.encrypted_token, 'base64'));
    const record = storedTokenSchema.safeParse(decrypted);
    if (!record.success) {
      throw new InvalidTokenError('Stored token record is malformed');
    }

    return {
      accessToken: record.data.access_token,
      refreshToken: record.data.refresh_token,
      expiresAt: new Date(record.data.expires_at),
      scopes: record.data.scopes,
      userId: record.data.user_id,
    };
  }

  /**
   * Delete token (for logout/revocation). No error if absent.
   */
  async delete(userId: string): Promise<void> {
    await this.storage.delete(OAuthTokenRepository.key(userId));
  }
}
