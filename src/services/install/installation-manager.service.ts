import { Storage } from '../../repositories/storage';
import { InstallationRepository } from '../../repositories/installation.repository';
import { TokenEncryption } from '../../utils/encryption.util';
import { InstallationExistsError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import {
  ActionManifestEntry,
  ActionRecord,
  HandlerManifest,
  Installation,
  InstallationDiff,
  WebhookRecord,
  WorkspaceInstallStatus,
} from '../../types/installation.types';
import { PlatformApi, PlatformApiFactory } from '../platform/frameio-api.service';
import { buildManifest, computeDiff } from './installation-diff';

const logger = createLogger('installation-manager');

export interface InstallationManagerOptions {
  storage: Storage;
  encryption: TokenEncryption;
  platform: PlatformApiFactory;
  /** Display name used for the consolidated webhook. */
  appName?: string;
  now?: () => Date;
}

export interface InstallParams {
  accessToken: string;
  accountId: string;
  workspaceId: string;
  userId: string;
  baseUrl: string;
  manifest: HandlerManifest;
}

export interface UpdateParams {
  accessToken: string;
  accountId: string;
  workspaceId: string;
  baseUrl: string;
  manifest: HandlerManifest;
  existing: Installation;
}

export interface UninstallParams {
  accessToken: string;
  accountId: string;
  workspaceId: string;
  existing: Installation;
}

/** Events are delivered to the app's root endpoint. */
export function eventEndpoint(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/`;
}

/**
 * Creates, diffs, updates and removes the webhook and custom actions a
 * workspace has registered for this app, and keeps the local record.
 */
export class InstallationManager {
  private readonly repository: InstallationRepository;
  private readonly platform: PlatformApiFactory;
  private readonly appName: string;
  private readonly now: () => Date;
  private readyPromise: Promise<void> | null = null;
  private ensured = false;

  constructor(private readonly options: InstallationManagerOptions) {
    this.repository = new InstallationRepository(options.storage, options.encryption);
    this.platform = options.platform;
    this.appName = options.appName || 'Frame.io App';
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run the storage backend's one-time provisioning. Concurrent callers share
   * a single in-flight call; a failed attempt may be retried.
   */
  async ensureReady(): Promise<void> {
    if (this.ensured) return;
    if (!this.readyPromise) {
      const storage = this.options.storage;
      this.readyPromise = (async () => {
        if (storage.ensureReady) await storage.ensureReady();
        this.ensured = true;
      })().finally(() => {
        this.readyPromise = null;
      });
    }
    await this.readyPromise;
  }

  /** Active or uninstalled record for the workspace, or null. */
  async getInstallation(accountId: string, workspaceId: string): Promise<Installation | null> {
    await this.ensureReady();
    return this.repository.find(accountId, workspaceId);
  }

  async listInstalledWorkspaces(userId: string): Promise<string[]> {
    await this.ensureReady();
    return this.repository.listWorkspaceIds(userId);
  }

  buildManifest(webhookEventTypes: Iterable<string>, actions: Iterable<ActionManifestEntry>): HandlerManifest {
    return buildManifest(webhookEventTypes, actions);
  }

  computeDiff(manifest: HandlerManifest, existing: Installation): InstallationDiff {
    return computeDiff(manifest, existing);
  }

  needsUpdate(manifest: HandlerManifest, existing: Installation): boolean {
    return computeDiff(manifest, existing).hasChanges;
  }

  async getStatus(accountId: string, workspaceId: string, manifest: HandlerManifest): Promise<WorkspaceInstallStatus> {
    const existing = await this.getInstallation(accountId, workspaceId);
    if (!existing || existing.status !== 'active') return 'not_installed';
    return this.needsUpdate(manifest, existing) ? 'update_available' : 'installed';
  }

  /**
   * Register one webhook covering every declared event type plus one custom
   * action per declared action. Fails when the workspace already has an
   * active installation; an uninstalled record is replaced.
   */
  async install(params: InstallParams): Promise<Installation> {
    const { accessToken, accountId, workspaceId, userId, baseUrl, manifest } = params;
    const existing = await this.getInstallation(accountId, workspaceId);
    if (existing && existing.status === 'active') {
      throw new InstallationExistsError(`Workspace ${workspaceId} already has an installation; use update instead`);
    }

    const api = this.platform(accessToken);
    const url = eventEndpoint(baseUrl);
    let webhook: WebhookRecord | null = null;
    const actions: ActionRecord[] = [];

    try {
      if (manifest.webhookEvents.length > 0) {
        webhook = await this.createWebhook(api, accountId, workspaceId, url, manifest.webhookEvents);
      }
      for (const entry of manifest.actions) {
        actions.push(await this.createAction(api, accountId, workspaceId, url, entry));
      }
    } catch (error) {
      logger.error(`Install into workspace ${workspaceId} failed, rolling back created resources`);
      await this.deleteRemote(api, accountId, webhook, actions);
      throw error;
    }

    const timestamp = this.now();
    const installation: Installation = {
      accountId,
      workspaceId,
      installedAt: timestamp,
      updatedAt: timestamp,
      installedByUserId: userId,
      status: 'active',
      webhook,
      actions,
    };

    await this.repository.save(installation);
    await this.repository.addToIndex(userId, workspaceId);
    logger.info(`Installed into workspace ${workspaceId}: webhook=${webhook ? 'yes' : 'no'}, actions=${actions.length}`);
    return installation;
  }

  /**
   * Bring a registered installation in line with the manifest. Unchanged
   * resources keep their ids and secrets.
   *
   * New resources are created before old ones are removed. If a create or
   * patch fails, whatever was already created is saved before the error
   * propagates, so a retry picks up from there. Removals run last and a
   * failed delete only logs a warning.
   */
  async update(params: UpdateParams): Promise<Installation> {
    const { accessToken, accountId, workspaceId, baseUrl, manifest, existing } = params;
    const diff = computeDiff(manifest, existing);
    const api = this.platform(accessToken);
    const url = eventEndpoint(baseUrl);

    const actions: ActionRecord[] = [...existing.actions];
    let webhook = existing.webhook;
    try {
      for (const entry of diff.actionsAdded) {
        actions.push(await this.createAction(api, accountId, workspaceId, url, entry));
      }
      for (const change of diff.actionsModified) {
        const index = actions.findIndex((action) => action.eventType === change.eventType);
        if (index < 0) continue;
        const current = actions[index];
        await api.updateAction(accountId, current.actionId, { name: change.name, description: change.description });
        actions[index] = { ...current, name: change.name, description: change.description };
      }
      if (manifest.webhookEvents.length > 0) {
        if (!webhook) {
          webhook = await this.createWebhook(api, accountId, workspaceId, url, manifest.webhookEvents);
        } else if (diff.webhookEventsAdded.length > 0 || diff.webhookEventsRemoved.length > 0) {
          const events = [...manifest.webhookEvents];
          await api.updateWebhook(accountId, webhook.webhookId, { events });
          webhook = { ...webhook, events };
        }
      }
    } catch (error) {
      await this.repository.save({ ...existing, updatedAt: this.now(), webhook, actions });
      logger.warn(`Update of workspace ${workspaceId} stopped part way, progress saved: ${describe(error)}`);
      throw error;
    }

    const staleWebhook = manifest.webhookEvents.length === 0 ? webhook : null;
    const removed = new Set(diff.actionsRemoved.map((action) => action.actionId));
    await this.deleteRemote(api, accountId, staleWebhook, diff.actionsRemoved);
    if (staleWebhook) webhook = null;

    const installation: Installation = {
      ...existing,
      status: 'active',
      updatedAt: this.now(),
      webhook,
      actions: actions.filter((action) => !removed.has(action.actionId)),
    };

    await this.repository.save(installation);
    logger.info(
      `Updated workspace ${workspaceId}: +${diff.actionsAdded.length} -${diff.actionsRemoved.length} ` +
        `~${diff.actionsModified.length} actions, webhook events +${diff.webhookEventsAdded.length} ` +
        `-${diff.webhookEventsRemoved.length}`
    );
    return installation;
  }

  /**
   * Delete every remote resource, ignoring individual failures, then mark the
   * record uninstalled. The record itself is kept.
   */
  async uninstall(params: UninstallParams): Promise<Installation> {
    const { accessToken, accountId, workspaceId, existing } = params;
    const api = this.platform(accessToken);
    await this.deleteRemote(api, accountId, existing.webhook, existing.actions);

    const installation: Installation = {
      ...existing,
      status: 'uninstalled',
      updatedAt: this.now(),
    };

    await this.repository.save(installation);
    await this.repository.removeFromIndex(existing.installedByUserId, workspaceId);
    logger.info(`Uninstalled from workspace ${workspaceId}`);
    return installation;
  }

  private async createWebhook(
    api: PlatformApi,
    accountId: string,
    workspaceId: string,
    url: string,
    events: string[]
  ): Promise<WebhookRecord> {
    const created = await api.createWebhook(accountId, workspaceId, { name: this.appName, url, events: [...events] });
    return { webhookId: created.id, secret: created.secret, events: [...events], url };
  }

  private async createAction(
    api: PlatformApi,
    accountId: string,
    workspaceId: string,
    url: string,
    entry: ActionManifestEntry
  ): Promise<ActionRecord> {
    const created = await api.createAction(accountId, workspaceId, {
      name: entry.name,
      description: entry.description,
      event: entry.eventType,
      url,
    });
    return {
      actionId: created.id,
      secret: created.secret,
      eventType: entry.eventType,
      name: entry.name,
      description: entry.description,
      url,
    };
  }

  private async deleteRemote(
    api: PlatformApi,
    accountId: string,
    webhook: WebhookRecord | null,
    actions: ActionRecord[]
  ): Promise<void> {
    if (webhook) {
      try {
        await api.deleteWebhook(accountId, webhook.webhookId);
      } catch (error) {
        logger.warn(`Failed to delete webhook ${webhook.webhookId}: ${describe(error)}`);
      }
    }
    for (const action of actions) {
      try {
        await api.deleteAction(accountId, action.actionId);
      } catch (error) {
        logger.warn(`Failed to delete action ${action.actionId}: ${describe(error)}`);
      }
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
