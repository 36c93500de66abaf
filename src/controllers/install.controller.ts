import { Request, Response } from 'express';
import { z } from 'zod';
import { EventApp } from '../services/dispatch/event-app';
import { INSTALL_SESSION_COOKIE, InstallSession } from '../services/install/install-session.service';
import { PlatformApi } from '../services/platform/frameio-api.service';
import { InstallationExistsError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import {
  renderAccountSelection,
  renderInstallError,
  renderInstallLanding,
  renderInstallResult,
  renderWorkspaceSelection,
} from '../views/install.views';
import { PageChrome } from '../views/layout';
import { queryString } from './auth.controller';
import { requestBaseUrl } from './events.controller';

const logger = createLogger('install');

const workspaceFormSchema = z.object({
  account_id: z.string().uuid(),
  workspace_id: z.string().uuid(),
});

/**
 * Self-service installation pages: sign in as a workspace admin, pick
 * workspaces, install, update or uninstall.
 */
export class InstallController {
  constructor(private readonly app: EventApp) {}

  private get chrome(): PageChrome {
    return this.app.pageChrome;
  }

  private baseUrl(req: Request): string {
    return this.app.resolveBaseUrl(requestBaseUrl(req));
  }

  private cookie(req: Request): string | undefined {
    const value: unknown = req.cookies?.[INSTALL_SESSION_COOKIE];
    return typeof value === 'string' ? value : undefined;
  }

  /** Loads the session or redirects to the landing page. */
  private async requireSession(req: Request, res: Response): Promise<InstallSession | null> {
    const sessions = this.app.installSessions;
    const session = sessions ? await sessions.load(this.cookie(req)) : null;
    if (!session) {
      res.redirect('/install');
      return null;
    }
    return session;
  }

  private api(session: InstallSession): PlatformApi | null {
    return this.app.platform ? this.app.platform(session.accessToken) : null;
  }

  /**
   * GET /install
   */
  async landing(req: Request, res: Response): Promise<void> {
    const sessions = this.app.installSessions;
    const session = sessions ? await sessions.load(this.cookie(req)) : null;

    if (!session) {
      res.send(renderInstallLanding(this.chrome, this.app.installOptions?.appDescription ?? '', this.app.manifest));
      return;
    }

    try {
      const accounts = (await this.api(session)?.listAccounts()) ?? [];
      res.send(renderAccountSelection(this.chrome, accounts));
    } catch (error) {
      logger.error('Failed to list accounts:', error);
      res.status(502).send(renderInstallError(this.chrome, 'Could not load your Frame.io accounts.'));
    }
  }

  /**
   * GET /install/login
   */
  async login(req: Request, res: Response): Promise<void> {
    const client = this.app.oauthClient;
    if (!client) {
      res.status(503).send(renderInstallError(this.chrome, 'OAuth is not configured.'));
      return;
    }

    try {
      const redirectUri = `${this.baseUrl(req)}/install/callback`;
      const state = await this.app.oauthState.create({
        flow: 'installation',
        user_id: null,
        interaction_id: null,
        redirect_uri: redirectUri,
      });
      res.redirect(client.getAuthorizationUrl(state, redirectUri));
    } catch (error) {
      logger.error('Install login error:', error);
      res.status(500).send(renderInstallError(this.chrome, 'Failed to start sign-in.'));
    }
  }

  /**
   * GET /install/callback?code=&state=&error=
   */
  async callback(req: Request, res: Response): Promise<void> {
    const client = this.app.oauthClient;
    const sessions = this.app.installSessions;
    if (!client || !sessions) {
      res.status(503).send(renderInstallError(this.chrome, 'Installation is not configured.'));
      return;
    }

    const error = queryString(req, 'error');
    if (error) {
      res.status(400).send(renderInstallError(this.chrome, `Authorization failed: ${error}`));
      return;
    }

    const code = queryString(req, 'code');
    const stateToken = queryString(req, 'state');
    if (!code || !stateToken) {
      res.status(400).send(renderInstallError(this.chrome, 'Missing authorization code or state.'));
      return;
    }

    const state = await this.app.oauthState.consume(stateToken);
    if (!state || state.flow !== 'installation') {
      res.status(400).send(renderInstallError(this.chrome, 'The sign-in link is invalid or has expired.'));
      return;
    }

    try {
      const token = await client.exchangeCode(code, state.redirect_uri);
      const user = this.app.platform ? await this.app.platform(token.accessToken).getCurrentUser() : null;
      const cookie = await sessions.create(token.accessToken, user?.id ?? '');
      sessions.setCookie(res, cookie);
      logger.info(`✓ Install session started${user ? ` for user ${user.id}` : ''}`);
      res.redirect('/install');
    } catch (err) {
      logger.error('Install callback error:', err);
      res.status(500).send(renderInstallError(this.chrome, 'Could not complete sign-in.'));
    }
  }

  /**
   * GET /install/workspaces?account_id=
   */
  async workspaces(req: Request, res: Response): Promise<void> {
    const session = await this.requireSession(req, res);
    if (!session) return;

    const accountId = z.string().uuid().safeParse(req.query.account_id);
    if (!accountId.success) {
      res.status(400).send(renderInstallError(this.chrome, 'Invalid account ID.'));
      return;
    }

    const manager = this.app.installationManager;
    const api = this.api(session);
    if (!manager || !api) {
      res.status(503).send(renderInstallError(this.chrome, 'Installation is not configured.'));
      return;
    }

    try {
      const manifest = this.app.manifest;
      const workspaces = await api.listWorkspaces(accountId.data);
      const rows = await Promise.all(
        workspaces.map(async (workspace) => ({
          workspace,
          status: await manager.getStatus(accountId.data, workspace.id, manifest),
        }))
      );
      res.send(renderWorkspaceSelection(this.chrome, accountId.data, rows));
    } catch (error) {
      logger.error('Failed to list workspaces:', error);
      res.status(502).send(renderInstallError(this.chrome, 'Could not load workspaces.'));
    }
  }

  /**
   * GET /install/status?account_id=&workspace_id=
   */
  async status(req: Request, res: Response): Promise<void> {
    const session = await this.requireSession(req, res);
    if (!session) return;

    const params = workspaceFormSchema.safeParse(req.query);
    const manager = this.app.installationManager;
    if (!params.success) {
      res.status(400).json({ error: 'account_id and workspace_id must be UUIDs' });
      return;
    }
    if (!manager) {
      res.status(503).json({ error: 'Installation is not configured' });
      return;
    }

    const { account_id, workspace_id } = params.data;
    const status = await manager.getStatus(account_id, workspace_id, this.app.manifest);
    res.json({ account_id, workspace_id, status });
  }

  /**
   * POST /install/execute
   * Installs into the workspace, or updates an existing installation.
   */
  async execute(req: Request, res: Response): Promise<void> {
    const session = await this.requireSession(req, res);
    if (!session) return;

    const params = workspaceFormSchema.safeParse(req.body);
    const manager = this.app.installationManager;
    if (!params.success) {
      res.status(400).send(renderInstallError(this.chrome, 'Invalid account or workspace ID.'));
      return;
    }
    if (!manager) {
      res.status(503).send(renderInstallError(this.chrome, 'Installation is not configured.'));
      return;
    }

    const { account_id: accountId, workspace_id: workspaceId } = params.data;
    const manifest = this.app.manifest;

    try {
      const existing = await manager.getInstallation(accountId, workspaceId);
      if (existing && existing.status === 'active') {
        if (!manager.needsUpdate(manifest, existing)) {
          res.send(renderInstallResult(this.chrome, 'unchanged', existing));
          return;
        }
        const updated = await manager.update({
          accessToken: session.accessToken,
          accountId,
          workspaceId,
          baseUrl: this.baseUrl(req),
          manifest,
          existing,
        });
        res.send(renderInstallResult(this.chrome, 'updated', updated));
        return;
      }

      const installation = await manager.install({
        accessToken: session.accessToken,
        accountId,
        workspaceId,
        userId: session.userId,
        baseUrl: this.baseUrl(req),
        manifest,
      });
      res.send(renderInstallResult(this.chrome, 'installed', installation));
    } catch (error) {
      if (error instanceof InstallationExistsError) {
        res.status(409).send(renderInstallError(this.chrome, error.message));
        return;
      }
      logger.error(`Install into workspace ${workspaceId} failed:`, error);
      res.status(502).send(renderInstallError(this.chrome, 'Installation failed. Please try again.'));
    }
  }

  /**
   * POST /install/uninstall
   */
  async uninstall(req: Request, res: Response): Promise<void> {
    const session = await this.requireSession(req, res);
    if (!session) return;

    const params = workspaceFormSchema.safeParse(req.body);
    const manager = this.app.installationManager;
    if (!params.success) {
      res.status(400).send(renderInstallError(this.chrome, 'Invalid account or workspace ID.'));
      return;
    }
    if (!manager) {
      res.status(503).send(renderInstallError(this.chrome, 'Installation is not configured.'));
      return;
    }

    const { account_id: accountId, workspace_id: workspaceId } = params.data;

    try {
      const existing = await manager.getInstallation(accountId, workspaceId);
      if (!existing || existing.status !== 'active') {
        res.status(404).send(renderInstallError(this.chrome, 'This workspace has no active installation.'));
        return;
      }
      const installation = await manager.uninstall({
        accessToken: session.accessToken,
        accountId,
        workspaceId,
        existing,
      });
      res.send(renderInstallResult(this.chrome, 'uninstalled', installation));
    } catch (error) {
      logger.error(`Uninstall from workspace ${workspaceId} failed:`, error);
      res.status(500).send(renderInstallError(this.chrome, 'Uninstall failed. Please try again.'));
    }
  }

  /**
   * POST /install/logout
   */
  async logout(req: Request, res: Response): Promise<void> {
    const sessions = this.app.installSessions;
    if (sessions) {
      await sessions.destroy(this.cookie(req));
      sessions.clearCookie(res);
    }
    res.redirect('/install');
  }
}
