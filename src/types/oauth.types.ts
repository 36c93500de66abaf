import { z } from 'zod';

/**
 * One user's OAuth grant. Owned by the token manager; handlers only ever
 * receive `accessToken`.
 */
export interface TokenData {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
  scopes: string[];
  userId: string;
}

/**
 * Serialized form of TokenData inside the encrypted envelope.
 */
export const storedTokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_at: z.string().datetime({ offset: true }),
  scopes: z.array(z.string()),
  user_id: z.string(),
});

export type StoredToken = z.infer<typeof storedTokenSchema>;

/**
 * Storage envelope for an encrypted token: `user:<user_id>` → `{ encrypted_token }`.
 */
export const encryptedEnvelopeSchema = z.object({
  encrypted_token: z.string().min(1),
});

/**
 * Token endpoint response (RFC 6749 §5.1). Only what we read is modelled;
 * field-level checks happen in the OAuth client so errors can be specific.
 */
export const tokenResponseSchema = z
  .object({
    access_token: z.unknown(),
    refresh_token: z.unknown(),
    expires_in: z.unknown(),
    scope: z.unknown(),
    token_type: z.unknown(),
  })
  .partial();

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

/**
 * CSRF state persisted as `oauth_state:<token>` while the user is at the
 * identity provider.
 */
export const oauthStateSchema = z.object({
  flow: z.enum(['user_auth', 'installation']),
  user_id: z.string().nullable(),
  interaction_id: z.string().nullable(),
  redirect_uri: z.string().url(),
  created_at: z.string(),
});

export type OAuthState = z.infer<typeof oauthStateSchema>;

/**
 * OAuth callback query parameters from Adobe IMS
 */
export interface OAuthCallbackParams {
  code?: string;
  state?: string;
  error?: string;
  error_description?: string;
}
