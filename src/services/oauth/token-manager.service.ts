import { OAuthTokenRepository } from '../../repositories/oauth-token.repository';
import { Storage } from '../../repositories/storage';
import { TokenData } from '../../types/oauth.types';
import { TokenEncryption } from '../../utils/encryption.util';
import { InvalidTokenError, TokenRefreshError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { OAuthClient } from './oauth-client.service';

const logger = createLogger('token-manager');

export const DEFAULT_REFRESH_BUFFER_SECONDS = 300;
/** Storage TTL slack beyond the token's own lifetime, so storage expiry never races a refresh. */
export const STORAGE_TTL_BUFFER_SECONDS = 86_400;

export interface TokenManagerOptions {
  storage: Storage;
  encryption: TokenEncryption;
  oauthClient: Pick<OAuthClient, 'refreshToken'>;
  refreshBufferSeconds?: number;
  now?: () => Date;
}

/**
 * Owns each user's OAuth token lifecycle: encrypted storage, retrieval with
 * proactive refresh, and removal.
 *
 * States per user: no token → valid → needs refresh (inside the buffer) →
 * valid again, or purged when the refresh fails.
 */
export class TokenManager {
  readonly refreshBufferSeconds: number;

  private readonly repository: OAuthTokenRepository;
  private readonly oauthClient: Pick<OAuthClient, 'refreshToken'>;
  private readonly now: () => Date;

  constructor(options: TokenManagerOptions) {
    this.repository = new OAuthTokenRepository(options.storage, options.encryption);
    this.oauthClient = options.oauthClient;
    this.refreshBufferSeconds = options.refreshBufferSeconds ?? DEFAULT_REFRESH_BUFFER_SECONDS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Get a token valid for at least the refresh buffer, refreshing first when
   * needed. Returns null when the user never authorized, or when the stored
   * record can no longer be decrypted (it is purged so the user signs in again).
   *
   * @throws TokenRefreshError when a refresh fails. The stored token has been
   * deleted by then; send the user through authorization again.
   */
  async getToken(userId: string): Promise<TokenData | null> {
    let token: TokenData | null;
    try {
      token = await this.repository.findByUserId(userId);
    } catch (error) {
      if (!(error instanceof InvalidTokenError)) throw error;
      await this.repository.delete(userId);
      logger.warn(`Stored token for user ${userId} is unreadable (${error.message}); removed`);
      return null;
    }
    if (!token) return null;

    if (!this.needsRefresh(token)) {
      return token;
    }

    let refreshed: TokenData;
    try {
      refreshed = await this.oauthClient.refreshToken(token.refreshToken);
    } catch (error) {
      await this.repository.delete(userId);
      logger.warn(`Token refresh failed for user ${userId}; stored token removed`);
      throw new TokenRefreshError(`Failed to refresh token for user ${userId}`, { cause: error });
    }

    const next: TokenData = { ...refreshed, userId };
    await this.storeToken(userId, next);
    logger.info(`🔄 Token refreshed for user ${userId}`);
    return next;
  }

  /**
   * Shortcut for handlers that only need the bearer string.
   */
  async getAccessToken(userId: string): Promise<string | null> {
    const token = await this.getToken(userId);
    return token ? token.accessToken : null;
  }

  /**
   * Encrypt and store a token, owned by `userId` regardless of its own field.
   */
  async storeToken(userId: string, tokenData: TokenData): Promise<void> {
    const token: TokenData = { ...tokenData, userId };
    const lifetimeSeconds = Math.floor((token.expiresAt.getTime() - this.now().getTime()) / 1000);
    const ttl = Math.max(0, lifetimeSeconds + STORAGE_TTL_BUFFER_SECONDS);

    await this.repository.upsert(token, ttl);
  }

  /**
   * Remove a user's token (logout). Idempotent.
   */
  async deleteToken(userId: string): Promise<void> {
    await this.repository.delete(userId);
  }

  needsRefresh(token: TokenData): boolean {
    return this.now().getTime() >= token.expiresAt.getTime() - this.refreshBufferSeconds * 1000;
  }
}
