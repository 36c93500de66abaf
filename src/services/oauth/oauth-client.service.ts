import { TokenData, TokenResponse, tokenResponseSchema } from '../../types/oauth.types';
import { OAuthHttpError, TokenExchangeError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('oauth-client');

export const DEFAULT_IMS_URL = 'https://ims-na1.adobelogin.com';
export const DEFAULT_SCOPES = ['openid', 'AdobeID', 'frameio.api', 'offline_access', 'additional_info.roles'];
export const DEFAULT_EXPIRES_IN_SECONDS = 3600;
export const OAUTH_HTTP_TIMEOUT_MS = 30_000;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface OAuthClientOptions {
  clientId: string;
  clientSecret: string;
  scopes: string[];
  imsUrl?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  now?: () => Date;
}

type Grant = 'authorization_code' | 'refresh_token';

/**
 * OAuth 2.0 client for Adobe IMS.
 * Builds authorization URLs, exchanges codes and refreshes tokens.
 *
 * Transport failures and non-2xx answers propagate to the caller; malformed
 * token responses become {@link TokenExchangeError}.
 */
export class OAuthClient {
  readonly clientId: string;
  readonly scopes: string[];
  readonly authorizationEndpoint: string;
  readonly tokenEndpoint: string;

  private readonly clientSecret: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: OAuthClientOptions) {
    const imsUrl = (options.imsUrl || DEFAULT_IMS_URL).replace(/\/+$/, '');

    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.scopes = options.scopes;
    this.authorizationEndpoint = `${imsUrl}/ims/authorize/v2`;
    this.tokenEndpoint = `${imsUrl}/ims/token/v3`;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? OAUTH_HTTP_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Generate the authorization URL for user consent.
   * `state` is an opaque CSRF token generated and checked by the caller.
   */
  getAuthorizationUrl(state: string, redirectUri: string): string {
    const params = new URLSearchParams({
      client_id: this.clientId,
      redirect_uri: redirectUri,
      scope: this.scopes.join(' '),
      response_type: 'code',
      state,
    });
    return `${this.authorizationEndpoint}?${params.toString()}`;
  }

  /**
   * Exchange an authorization code for tokens.
   * `redirectUri` must match the one used to build the authorization URL.
   */
  async exchangeCode(code: string, redirectUri: string): Promise<TokenData> {
    const body = await this.postToken('authorization_code', {
      code,
      redirect_uri: redirectUri,
    });
    return this.toTokenData(body, 'authorization_code');
  }

  /**
   * Refresh an access token. Providers that don't rotate refresh tokens
   * omit `refresh_token`; the one passed in is kept in that case.
   */
  async refreshToken(refreshToken: string): Promise<TokenData> {
    const body = await this.postToken('refresh_token', { refresh_token: refreshToken });
    return this.toTokenData(body, 'refresh_token', refreshToken);
  }

  private async postToken(grant: Grant, fields: Record<string, string>): Promise<TokenResponse> {
    const response = await this.fetchImpl(this.tokenEndpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: new URLSearchParams({
        grant_type: grant,
        client_id: this.clientId,
        client_secret: this.clientSecret,
        ...fields,
      }).toString(),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new OAuthHttpError(response.status, `Token ${grant} request failed with HTTP ${response.status}`);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new TokenExchangeError('Token response is not valid JSON', { cause: error });
    }

    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new TokenExchangeError('Token response is not a JSON object');
    }
    return parsed.data;
  }

  private toTokenData(body: TokenResponse, grant: Grant, previousRefreshToken?: string): TokenData {
    const accessToken = nonEmptyString(body.access_token);
    if (!accessToken) {
      throw new TokenExchangeError('Token response missing access_token');
    }

    const refreshToken = nonEmptyString(body.refresh_token) ?? previousRefreshToken;
    if (!refreshToken) {
      throw new TokenExchangeError(`Token response for ${grant} missing refresh_token`);
    }

    const expiresIn = parseExpiresIn(body.expires_in);

    return {
      accessToken,
      refreshToken,
      expiresAt: new Date(this.now().getTime() + expiresIn * 1000),
      scopes: parseScopes(body.scope),
      userId: '',
    };
  }
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function parseExpiresIn(value: unknown): number {
  if (value === undefined || value === null) {
    logger.warn(`Token response missing expires_in, assuming ${DEFAULT_EXPIRES_IN_SECONDS}s`);
    return DEFAULT_EXPIRES_IN_SECONDS;
  }

  const seconds = typeof value === 'number'
    ? value
    : typeof value === 'string' && value.trim() !== ''
      ? Number(value)
      : NaN;

  if (!Number.isFinite(seconds)) {
    throw new TokenExchangeError('Token response has a non-numeric expires_in');
  }
  if (seconds <= 0) {
    throw new TokenExchangeError('Token response has a non-positive expires_in');
  }
  return seconds;
}

function parseScopes(value: unknown): string[] {
  if (typeof value !== 'string') return [];
  return value.split(/\s+/).filter((scope) => scope.length > 0);
}
