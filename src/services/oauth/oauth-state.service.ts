import crypto from 'crypto';
import { Storage } from '../../repositories/storage';
import { OAuthState, oauthStateSchema } from '../../types/oauth.types';
import { createLogger } from '../../utils/logger';

const logger = createLogger('oauth-state');

export const OAUTH_STATE_TTL_SECONDS = 600;

export type NewOAuthState = Omit<OAuthState, 'created_at'>;

/**
 * CSRF state for the authorization-code flow. Each state token is stored
 * for ten minutes and can be consumed exactly once.
 */
export class OAuthStateService {
  constructor(
    private readonly storage: Storage,
    private readonly now: () => Date = () => new Date()
  ) {}

  static key(token: string): string {
    return `oauth_state:${token}`;
  }

  async create(state: NewOAuthState): Promise<string> {
    const token = crypto.randomBytes(32).toString('base64url');
    const record: OAuthState = { ...state, created_at: this.now().toISOString() };

    await this.storage.put(OAuthStateService.key(token), record, { ttl: OAUTH_STATE_TTL_SECONDS });
    return token;
  }

  /**
   * Look up and delete a state token. Returns null for unknown, expired or
   * malformed state. The record is gone afterwards whatever happens next.
   */
  async consume(token: string): Promise<OAuthState | null> {
    const key = OAuthStateService.key(token);
    const stored = await this.storage.get(key);
    if (!stored) return null;

    await this.storage.delete(key);

    const parsed = oauthStateSchema.safeParse(stored);
    if (!parsed.success) {
      logger.warn('Discarding malformed OAuth state record');
      return null;
    }
    return parsed.data;
  }
}
