import { Request, Response } from 'express';
import { EventApp } from '../services/dispatch/event-app';
import { OAuthCallbackParams } from '../types/oauth.types';
import { createLogger } from '../utils/logger';
import { renderAuthError, renderAuthSuccess } from '../views/auth.views';
import { requestBaseUrl } from './events.controller';

const logger = createLogger('auth');

export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * User sign-in for actions registered with `requireUserAuth`.
 */
export class AuthController {
  constructor(private readonly app: EventApp) {}

  private redirectUri(req: Request): string {
    return this.app.oauthRedirectUri || `${this.app.resolveBaseUrl(requestBaseUrl(req))}/auth/callback`;
  }

  /**
   * GET /auth/login?user_id=&interaction_id=
   */
  async login(req: Request, res: Response): Promise<void> {
    const client = this.app.oauthClient;
    if (!client) {
      res.status(503).json({ error: 'OAuth is not configured' });
      return;
    }

    const userId = queryString(req, 'user_id');
    if (!userId) {
      res.status(400).json({ error: 'Missing user_id parameter' });
      return;
    }

    try {
      const redirectUri = this.redirectUri(req);
      const state = await this.app.oauthState.create({
        flow: 'user_auth',
        user_id: userId,
        interaction_id: queryString(req, 'interaction_id') ?? null,
        redirect_uri: redirectUri,
      });
      res.redirect(client.getAuthorizationUrl(state, redirectUri));
    } catch (error) {
      logger.error('Auth login error:', error);
      res.status(500).json({ error: 'Failed to start sign-in' });
    }
  }

  /**
   * GET /auth/callback?code=&state=&error=
   */
  async callback(req: Request, res: Response): Promise<void> {
    const client = this.app.oauthClient;
    const tokens = this.app.tokenManager;
    if (!client || !tokens) {
      res.status(503).json({ error: 'OAuth is not configured' });
      return;
    }

    const params: OAuthCallbackParams = {
      code: queryString(req, 'code'),
      state: queryString(req, 'state'),
      error: queryString(req, 'error'),
      error_description: queryString(req, 'error_description'),
    };

    if (params.error) {
      logger.warn(`Authorization denied: ${params.error}`);
      res.status(400).send(renderAuthError(this.app.pageChrome, 'Authorization Failed', params.error_description || params.error));
      return;
    }

    if (!params.code || !params.state) {
      res.status(400).send(renderAuthError(this.app.pageChrome, 'Invalid Request', 'Missing authorization code or state.'));
      return;
    }

    const state = await this.app.oauthState.consume(params.state);
    if (!state || state.flow !== 'user_auth' || !state.user_id) {
      res.status(400).send(renderAuthError(this.app.pageChrome, 'Invalid Request', 'The sign-in link is invalid or has expired.'));
      return;
    }

    try {
      const token = await client.exchangeCode(params.code, state.redirect_uri);
      await tokens.storeToken(state.user_id, token);
      logger.info(`✓ User ${state.user_id} signed in`);
      res.send(renderAuthSuccess(this.app.pageChrome));
    } catch (error) {
      logger.error('Auth callback error:', error);
      res.status(500).send(renderAuthError(this.app.pageChrome, 'Authentication Failed', 'Could not complete sign-in.'));
    }
  }
}
