import { describe, it, expect, vi } from 'vitest';
import { ACCOUNT_ID, WORKSPACE_ID, actionEvent, webhookEvent } from '../../test-utils/events';
import { Installation } from '../../types/installation.types';
import { InstallationNotFoundError } from '../../utils/errors';
import { InstallationSecretResolver } from './installation-secret-resolver.service';

function installation(overrides: Partial<Installation> = {}): Installation {
  return {
    accountId: ACCOUNT_ID,
    workspaceId: WORKSPACE_ID,
    installedAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
    installedByUserId: 'admin-1',
    status: 'active',
    webhook: { webhookId: 'wh-1', secret: 'wh-secret-1', events: ['file.ready'], url: 'https://app.example.test/' },
    actions: [
      {
        actionId: 'act-1',
        secret: 'act-secret-1',
        eventType: 'my_app.transcribe',
        name: 'Transcribe',
        description: '',
        url: 'https://app.example.test/',
      },
    ],
    ...overrides,
  };
}

function resolverFor(record: Installation | null) {
  const getInstallation = vi.fn(async (_accountId: string, _workspaceId: string) => record);
  return { resolver: new InstallationSecretResolver({ getInstallation }), getInstallation };
}

describe('InstallationSecretResolver', () => {
  it('returns the webhook secret of the event workspace', async () => {
    const { resolver, getInstallation } = resolverFor(installation());

    expect(await resolver.getWebhookSecret(webhookEvent())).toBe('wh-secret-1');
    expect(getInstallation).toHaveBeenCalledWith(ACCOUNT_ID, WORKSPACE_ID);
  });

  it('returns the secret of the action matching the event type', async () => {
    const { resolver } = resolverFor(installation());
    expect(await resolver.getActionSecret(actionEvent())).toBe('act-secret-1');
  });

  it('fails when the workspace has no installation', async () => {
    const { resolver } = resolverFor(null);
    await expect(resolver.getWebhookSecret(webhookEvent())).rejects.toBeInstanceOf(InstallationNotFoundError);
  });

  it('treats an uninstalled record as missing', async () => {
    const { resolver } = resolverFor(installation({ status: 'uninstalled' }));
    await expect(resolver.getActionSecret(actionEvent())).rejects.toBeInstanceOf(InstallationNotFoundError);
  });

  it('fails when the installation has no webhook', async () => {
    const { resolver } = resolverFor(installation({ webhook: null }));
    await expect(resolver.getWebhookSecret(webhookEvent())).rejects.toThrow(
      `No webhook registered for workspace ${WORKSPACE_ID}`
    );
  });

  it('fails for an action type that was never registered', async () => {
    const { resolver } = resolverFor(installation());
    await expect(resolver.getActionSecret(actionEvent({ type: 'my_app.other' }))).rejects.toThrow(
      `No action registered for 'my_app.other' in workspace ${WORKSPACE_ID}`
    );
  });
});
