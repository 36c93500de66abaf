import { z } from 'zod';
import { PlatformApiError } from '../../utils/errors';
import type { FetchLike } from '../oauth/oauth-client.service';

export const DEFAULT_API_BASE_URL = 'https://api.frame.io/v4';

export interface CreatedResource {
  id: string;
  secret: string;
}

export interface PlatformAccount {
  id: string;
  displayName: string;
}

export interface PlatformUser {
  id: string;
  email: string | null;
}

export interface PlatformWorkspace {
  id: string;
  name: string;
}

/**
 * The slice of the Frame.io API that installation needs, bound to one
 * user's access token.
 */
export interface PlatformApi {
  createWebhook(accountId: string, workspaceId: string, data: { name: string; url: string; events: string[] }): Promise<CreatedResource>;
  updateWebhook(accountId: string, webhookId: string, data: { events: string[] }): Promise<void>;
  deleteWebhook(accountId: string, webhookId: string): Promise<void>;
  createAction(
    accountId: string,
    workspaceId: string,
    data: { name: string; description: string; event: string; url: string }
  ): Promise<CreatedResource>;
  updateAction(accountId: string, actionId: string, data: { name: string; description: string }): Promise<void>;
  deleteAction(accountId: string, actionId: string): Promise<void>;
  getCurrentUser(): Promise<PlatformUser>;
  listAccounts(): Promise<PlatformAccount[]>;
  listWorkspaces(accountId: string): Promise<PlatformWorkspace[]>;
}

export type PlatformApiFactory = (accessToken: string) => PlatformApi;

const createdSchema = z.object({
  data: z.object({ id: z.string().min(1), secret: z.string().min(1) }),
});

const meSchema = z.object({
  data: z.object({ id: z.string().min(1), email: z.string().nullish() }),
});

const accountsSchema = z.object({
  data: z.array(z.object({ id: z.string(), display_name: z.string().nullish() })),
});

const workspacesSchema = z.object({
  data: z.array(z.object({ id: z.string(), name: z.string().nullish() })),
});

export interface FrameioApiClientOptions {
  baseUrl?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
}

/**
 * Minimal Frame.io v4 REST client. Custom actions live behind the
 * experimental API version header.
 */
export class FrameioApiClient implements PlatformApi {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(
    private readonly accessToken: string,
    options: FrameioApiClientOptions = {}
  ) {
    this.baseUrl = (options.baseUrl || DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  static factory(options: FrameioApiClientOptions = {}): PlatformApiFactory {
    return (accessToken) => new FrameioApiClient(accessToken, options);
  }

  async createWebhook(accountId: string, workspaceId: string, data: { name: string; url: string; events: string[] }) {
    const body = await this.request('POST', `/accounts/${accountId}/workspaces/${workspaceId}/webhooks`, { data });
    return createdSchema.parse(body).data;
  }

  async updateWebhook(accountId: string, webhookId: string, data: { events: string[] }) {
    await this.request('PATCH', `/accounts/${accountId}/webhooks/${webhookId}`, { data });
  }

  async deleteWebhook(accountId: string, webhookId: string) {
    await this.request('DELETE', `/accounts/${accountId}/webhooks/${webhookId}`);
  }

  async createAction(
    accountId: string,
    workspaceId: string,
    data: { name: string; description: string; event: string; url: string }
  ) {
    const body = await this.request('POST', `/accounts/${accountId}/workspaces/${workspaceId}/actions`, { data }, true);
    return createdSchema.parse(body).data;
  }

  async updateAction(accountId: string, actionId: string, data: { name: string; description: string }) {
    await this.request('PATCH', `/accounts/${accountId}/actions/${actionId}`, { data }, true);
  }

  async deleteAction(accountId: string, actionId: string) {
    await this.request('DELETE', `/accounts/${accountId}/actions/${actionId}`, undefined, true);
  }

  async getCurrentUser(): Promise<PlatformUser> {
    const body = await this.request('GET', '/me');
    const { id, email } = meSchema.parse(body).data;
    return { id, email: email ?? null };
  }

  async listAccounts(): Promise<PlatformAccount[]> {
    const body = await this.request('GET', '/accounts');
    return accountsSchema.parse(body).data.map((a) => ({ id: a.id, displayName: a.display_name || a.id }));
  }

  async listWorkspaces(accountId: string): Promise<PlatformWorkspace[]> {
    const body = await this.request('GET', `/accounts/${accountId}/workspaces`);
    return workspacesSchema.parse(body).data.map((w) => ({ id: w.id, name: w.name || w.id }));
  }

  private async request(method: string, path: string, payload?: unknown, experimental = false): Promise<unknown> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.accessToken}`,
      Accept: 'application/json',
    };
    if (payload !== undefined) headers['Content-Type'] = 'application/json';
    if (experimental) headers['api-version'] = 'experimental';

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: payload === undefined ? undefined : JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new PlatformApiError(response.status, `${method} ${path} failed with HTTP ${response.status}`);
    }
    if (response.status === 204) return null;

    const text = await response.text();
    return text ? JSON.parse(text) : null;
  }
}
