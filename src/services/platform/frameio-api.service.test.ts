import { describe, it, expect } from 'vitest';
import { PlatformApiError } from '../../utils/errors';
import { createFakeFetch, jsonResponse } from '../../test-utils/fetch';
import { FrameioApiClient } from './frameio-api.service';

function clientWith(...responses: Response[]) {
  const fake = createFakeFetch(...responses);
  const client = new FrameioApiClient('admin-token', { baseUrl: 'https://api.example.test/v4/', fetch: fake.fetch });
  return { client, ...fake };
}

describe('FrameioApiClient', () => {
  it('creates a workspace webhook and returns its id and secret', async () => {
    const { client, requests } = clientWith(jsonResponse({ data: { id: 'wh-1', secret: 'wh-secret', name: 'Test App' } }));

    const created = await client.createWebhook('acc-1', 'ws-1', {
      name: 'Test App',
      url: 'https://app.example.test/',
      events: ['file.ready'],
    });

    expect(created).toEqual({ id: 'wh-1', secret: 'wh-secret' });
    expect(requests[0].url).toBe('https://api.example.test/v4/accounts/acc-1/workspaces/ws-1/webhooks');
    expect(requests[0].method).toBe('POST');
    expect(requests[0].headers.authorization).toBe('Bearer admin-token');
    expect(requests[0].headers['content-type']).toBe('application/json');
    expect(requests[0].headers['api-version']).toBeUndefined();
    expect(JSON.parse(requests[0].body)).toEqual({
      data: { name: 'Test App', url: 'https://app.example.test/', events: ['file.ready'] },
    });
  });

  it('sends custom action calls with the experimental api version', async () => {
    const { client, requests } = clientWith(
      jsonResponse({ data: { id: 'act-1', secret: 'act-secret' } }),
      jsonResponse({ data: { id: 'act-1' } }),
      new Response(null, { status: 204 })
    );

    await client.createAction('acc-1', 'ws-1', {
      name: 'Transcribe',
      description: '',
      event: 'my_app.transcribe',
      url: 'https://app.example.test/',
    });
    await client.updateAction('acc-1', 'act-1', { name: 'Transcribe v2', description: 'New' });
    await client.deleteAction('acc-1', 'act-1');

    expect(requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      'POST https://api.example.test/v4/accounts/acc-1/workspaces/ws-1/actions',
      'PATCH https://api.example.test/v4/accounts/acc-1/actions/act-1',
      'DELETE https://api.example.test/v4/accounts/acc-1/actions/act-1',
    ]);
    expect(requests.map((r) => r.headers['api-version'])).toEqual(['experimental', 'experimental', 'experimental']);
    expect(requests[2].body).toBe('');
  });

  it('patches webhook events', async () => {
    const { client, requests } = clientWith(jsonResponse({ data: { id: 'wh-1' } }));

    await client.updateWebhook('acc-1', 'wh-1', { events: ['comment.created', 'file.ready'] });

    expect(requests[0].method).toBe('PATCH');
    expect(JSON.parse(requests[0].body)).toEqual({ data: { events: ['comment.created', 'file.ready'] } });
  });

  it('maps accounts, workspaces and the current user', async () => {
    const { client } = clientWith(
      jsonResponse({ data: { id: 'user-1', email: 'admin@example.test' } }),
      jsonResponse({ data: [{ id: 'acc-1', display_name: 'Acme Post' }, { id: 'acc-2', display_name: null }] }),
      jsonResponse({ data: [{ id: 'ws-1', name: 'Dailies' }] })
    );

    expect(await client.getCurrentUser()).toEqual({ id: 'user-1', email: 'admin@example.test' });
    expect(await client.listAccounts()).toEqual([
      { id: 'acc-1', displayName: 'Acme Post' },
      { id: 'acc-2', displayName: 'acc-2' },
    ]);
    expect(await client.listWorkspaces('acc-1')).toEqual([{ id: 'ws-1', name: 'Dailies' }]);
  });

  it('throws PlatformApiError with the status on failure', async () => {
    const { client } = clientWith(jsonResponse({ errors: [{ detail: 'forbidden' }] }, 403));

    const error = await client.deleteWebhook('acc-1', 'wh-1').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PlatformApiError);
    expect(error instanceof PlatformApiError && error.status).toBe(403);
    expect(error instanceof PlatformApiError && error.message).toBe('DELETE /accounts/acc-1/webhooks/wh-1 failed with HTTP 403');
  });

  it('rejects a create response without a secret', async () => {
    const { client } = clientWith(jsonResponse({ data: { id: 'wh-1' } }));

    await expect(
      client.createWebhook('acc-1', 'ws-1', { name: 'Test App', url: 'https://app.example.test/', events: [] })
    ).rejects.toThrow();
  });
});
