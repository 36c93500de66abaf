import { PlatformApiError } from '../utils/errors';
import {
  CreatedResource,
  PlatformAccount,
  PlatformApi,
  PlatformUser,
  PlatformWorkspace,
} from '../services/platform/frameio-api.service';

export type PlatformCall =
  | { op: 'createWebhook'; workspaceId: string; events: string[]; url: string }
  | { op: 'updateWebhook'; id: string; events: string[] }
  | { op: 'deleteWebhook'; id: string }
  | { op: 'createAction'; workspaceId: string; event: string; name: string; description: string }
  | { op: 'updateAction'; id: string; name: string; description: string }
  | { op: 'deleteAction'; id: string };

/**
 * In-memory Frame.io stand-in. Ids and secrets are sequential so tests can
 * predict them: wh-1/wh-secret-1, act-1/act-secret-1, ...
 */
export class FakePlatform implements PlatformApi {
  readonly calls: PlatformCall[] = [];
  readonly tokens: string[] = [];
  /** Resource ids whose deletion fails. */
  readonly failDeletes = new Set<string>();
  /** Action event types whose creation fails. */
  readonly failCreates = new Set<string>();
  accounts: PlatformAccount[] = [];
  workspaces: Record<string, PlatformWorkspace[]> = {};
  user: PlatformUser = { id: 'admin-1', email: 'admin@example.test' };

  private webhookSeq = 0;
  private actionSeq = 0;

  factory = (accessToken: string): PlatformApi => {
    this.tokens.push(accessToken);
    return this;
  };

  async createWebhook(_accountId: string, workspaceId: string, data: { name: string; url: string; events: string[] }): Promise<CreatedResource> {
    this.webhookSeq += 1;
    this.calls.push({ op: 'createWebhook', workspaceId, events: [...data.events], url: data.url });
    return { id: `wh-${this.webhookSeq}`, secret: `wh-secret-${this.webhookSeq}` };
  }

  async updateWebhook(_accountId: string, webhookId: string, data: { events: string[] }): Promise<void> {
    this.calls.push({ op: 'updateWebhook', id: webhookId, events: [...data.events] });
  }

  async deleteWebhook(_accountId: string, webhookId: string): Promise<void> {
    this.calls.push({ op: 'deleteWebhook', id: webhookId });
    if (this.failDeletes.has(webhookId)) throw new PlatformApiError(404, 'webhook not found');
  }

  async createAction(
    _accountId: string,
    workspaceId: string,
    data: { name: string; description: string; event: string; url: string }
  ): Promise<CreatedResource> {
    if (this.failCreates.has(data.event)) throw new PlatformApiError(500, 'create failed');
    this.actionSeq += 1;
    this.calls.push({ op: 'createAction', workspaceId, event: data.event, name: data.name, description: data.description });
    return { id: `act-${this.actionSeq}`, secret: `act-secret-${this.actionSeq}` };
  }

  async updateAction(_accountId: string, actionId: string, data: { name: string; description: string }): Promise<void> {
    this.calls.push({ op: 'updateAction', id: actionId, name: data.name, description: data.description });
  }

  async deleteAction(_accountId: string, actionId: string): Promise<void> {
    this.calls.push({ op: 'deleteAction', id: actionId });
    if (this.failDeletes.has(actionId)) throw new PlatformApiError(404, 'action not found');
  }

  async getCurrentUser(): Promise<PlatformUser> {
    return this.user;
  }

  async listAccounts(): Promise<PlatformAccount[]> {
    return this.accounts;
  }

  async listWorkspaces(accountId: string): Promise<PlatformWorkspace[]> {
    return this.workspaces[accountId] ?? [];
  }

  ops(): string[] {
    return this.calls.map((call) => call.op);
  }
}
