import { z } from 'zod';
import { Storage, StoredValue } from './storage';
import { TokenEncryption } from '../utils/encryption.util';
import { InstallationError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { Installation, installationSchema } from '../types/installation.types';

const logger = createLogger('installation-repository');

const indexSchema = z.object({ workspace_ids: z.array(z.string()) });

/**
 * Installation records, one per workspace under `install:<workspace_id>`.
 *
 * Webhook and action secrets are encrypted individually; everything else is
 * stored in the clear so records stay inspectable. A per-user index
 * (`install:index:<user_id>`) lists the workspaces a user installed into.
 */
export class InstallationRepository {
  constructor(
    private readonly storage: Storage,
    private readonly encryption: TokenEncryption
  ) {}

  static key(workspaceId: string): string {
    return `install:${workspaceId}`;
  }

  static indexKey(userId: string): string {
    return `install:index:${userId}`;
  }

  async save(installation: Installation): Promise<void> {
    const record: StoredValue = {
      accountId: installation.accountId,
      workspaceId: installation.workspaceId,
      installedAt: installation.installedAt.toISOString(),
      updatedAt: installation.updatedAt.toISOString(),
      installedByUserId: installation.installedByUserId,
      status: installation.status,
      webhook: installation.webhook
        ? { ...installation.webhook, secret: this.encryption.encryptString(installation.webhook.secret) }
        : null,
      actions: installation.actions.map((action) => ({
        ...action,
        secret: this.encryption.encryptString(action.secret),
      })),
    };

    await this.storage.put(InstallationRepository.key(installation.workspaceId), record);
  }

  /**
   * Returns the record for the workspace, or null when none is stored or it
   * belongs to a different account.
   */
  async find(accountId: string, workspaceId: string): Promise<Installation | null> {
    const stored = await this.storage.get(InstallationRepository.key(workspaceId));
    if (!stored) return null;

    const parsed = installationSchema.safeParse(stored);
    if (!parsed.success) {
      logger.error(`Malformed installation record for workspace ${workspaceId}`);
      throw new InstallationError('Stored installation record is malformed');
    }

    const record = parsed.data;
    if (record.accountId !== accountId) {
      logger.warn(`Installation for workspace ${workspaceId} belongs to another account`);
      return null;
    }

    return {
      ...record,
      webhook: record.webhook
        ? { ...record.webhook, secret: this.encryption.decryptString(record.webhook.secret) }
        : null,
      actions: record.actions.map((action) => ({
        ...action,
        secret: this.encryption.decryptString(action.secret),
      })),
    };
  }

  async listWorkspaceIds(userId: string): Promise<string[]> {
    const stored = await this.storage.get(InstallationRepository.indexKey(userId));
    const parsed = indexSchema.safeParse(stored);
    return parsed.success ? parsed.data.workspace_ids : [];
  }

  async addToIndex(userId: string, workspaceId: string): Promise<void> {
    const ids = await this.listWorkspaceIds(userId);
    if (ids.includes(workspaceId)) return;
    await this.storage.put(InstallationRepository.indexKey(userId), { workspace_ids: [...ids, workspaceId] });
  }

  async removeFromIndex(userId: string, workspaceId: string): Promise<void> {
    const ids = await this.listWorkspaceIds(userId);
    if (!ids.includes(workspaceId)) return;
    await this.storage.put(InstallationRepository.indexKey(userId), {
      workspace_ids: ids.filter((id) => id !== workspaceId),
    });
  }
}
