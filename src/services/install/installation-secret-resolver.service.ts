import { ActionEvent, WebhookEvent } from '../../types/event.types';
import { InstallationNotFoundError } from '../../utils/errors';
import { SecretResolver } from '../secrets/secret-resolution.service';
import { InstallationManager } from './installation-manager.service';

/**
 * App-level secret resolver backed by installation records. Uninstalled
 * records are treated as absent.
 */
export class InstallationSecretResolver implements SecretResolver {
  constructor(private readonly manager: Pick<InstallationManager, 'getInstallation'>) {}

  async getWebhookSecret(event: WebhookEvent): Promise<string> {
    const installation = await this.findActive(event.accountId, event.workspaceId);
    if (!installation.webhook) {
      throw new InstallationNotFoundError(`No webhook registered for workspace ${event.workspaceId}`);
    }
    return installation.webhook.secret;
  }

  async getActionSecret(event: ActionEvent): Promise<string> {
    const installation = await this.findActive(event.accountId, event.workspaceId);
    const action = installation.actions.find((record) => record.eventType === event.type);
    if (!action) {
      throw new InstallationNotFoundError(
        `No action registered for '${event.type}' in workspace ${event.workspaceId}`
      );
    }
    return action.secret;
  }

  private async findActive(accountId: string, workspaceId: string) {
    const installation = await this.manager.getInstallation(accountId, workspaceId);
    if (!installation || installation.status !== 'active') {
      throw new InstallationNotFoundError(`No installation for workspace ${workspaceId}`);
    }
    return installation;
  }
}
