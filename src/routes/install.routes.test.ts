import { beforeEach, describe, it, expect } from 'vitest';
import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../app';
import { MemoryStorage } from '../repositories/memory.storage';
import { EventApp } from '../services/dispatch/event-app';
import { INSTALL_SESSION_COOKIE } from '../services/install/install-session.service';
import { ACCOUNT_ID, WORKSPACE_ID } from '../test-utils/events';
import { FakePlatform } from '../test-utils/fake-platform';
import { createFakeFetch, jsonResponse } from '../test-utils/fetch';

const BASE_URL = 'https://app.example.test';

describe('/install', () => {
  let platform: FakePlatform;
  let app: EventApp;
  let server: Express;
  let requests: ReturnType<typeof createFakeFetch>['requests'];

  beforeEach(() => {
    platform = new FakePlatform();
    platform.accounts = [{ id: ACCOUNT_ID, displayName: 'Acme Post' }];
    platform.workspaces = { [ACCOUNT_ID]: [{ id: WORKSPACE_ID, name: 'Dailies' }] };

    const fake = createFakeFetch(jsonResponse({ access_token: 'admin-token', refresh_token: 'rt', expires_in: 3600 }));
    requests = fake.requests;
    app = new EventApp({
      baseUrl: BASE_URL,
      encryptionKey: 'test-key',
      storage: new MemoryStorage(),
      env: {},
      oauth: { clientId: 'client-id', clientSecret: 'test-secret', imsUrl: 'https://ims.example.test', fetch: fake.fetch },
      install: {
        appName: 'Test App',
        appDescription: 'Transcribes uploads',
        sessionSecret: 'test-secret',
        platform: platform.factory,
      },
    });
    app.onWebhook('file.ready', () => undefined);
    app.onAction('my_app.transcribe', () => undefined, { name: 'Transcribe' });
    server = createApp(app);
  });

  async function sessionCookie(): Promise<string> {
    const value = await app.installSessions?.create('admin-token', 'admin-1');
    return `${INSTALL_SESSION_COOKIE}=${value ?? ''}`;
  }

  const form = `account_id=${ACCOUNT_ID}&workspace_id=${WORKSPACE_ID}`;

  it('shows the landing page with the manifest when signed out', async () => {
    const res = await request(server).get('/install');

    expect(res.status).toBe(200);
    expect(res.text).toContain('<p>Transcribes uploads</p>');
    expect(res.text).toContain('<li><code>file.ready</code></li>');
    expect(res.text).toContain('<li><strong>Transcribe</strong></li>');
    expect(res.text).toContain('href="/install/login"');
  });

  it('renders the landing page with the configured branding', async () => {
    const branded = new EventApp({
      baseUrl: BASE_URL,
      encryptionKey: 'test-key',
      storage: new MemoryStorage(),
      env: {},
      oauth: { clientId: 'client-id', clientSecret: 'test-secret', imsUrl: 'https://ims.example.test' },
      install: {
        appName: 'Test App',
        sessionSecret: 'test-secret',
        platform: platform.factory,
        branding: { logoUrl: 'https://cdn.example.test/logo.png', primaryColor: '#0f0f0f', showPoweredBy: false },
      },
    });

    const res = await request(createApp(branded)).get('/install');

    expect(res.status).toBe(200);
    expect(res.text).toContain('<header><img src="https://cdn.example.test/logo.png" alt=""><h1>Test App</h1></header>');
    expect(res.text).toContain('button, .button { background: #0f0f0f;');
    expect(res.text).not.toContain('Powered by');
  });

  it('redirects pages that need a session back to the landing page', async () => {
    const res = await request(server).get(`/install/workspaces?account_id=${ACCOUNT_ID}`);

    expect(res.status).toBe(302);
    expect(res.headers.location).toBe('/install');
  });

  it('signs the admin in and sets the session cookie', async () => {
    const login = await request(server).get('/install/login');
    const location = new URL(login.headers.location);
    expect(location.searchParams.get('redirect_uri')).toBe('https://app.example.test/install/callback');

    const res = await request(server).get(`/install/callback?code=code-1&state=${location.searchParams.get('state') ?? ''}`);

    expect(res.status).toBe(302);
    expect(res.headers.location).toBe('/install');
    expect(new URLSearchParams(requests[0].body).get('redirect_uri')).toBe('https://app.example.test/install/callback');
    expect(platform.tokens).toEqual(['admin-token']);
    const [setCookie] = res.get('Set-Cookie') ?? [];
    expect(setCookie).toMatch(new RegExp(`^${INSTALL_SESSION_COOKIE}=`));
    expect(setCookie).toContain('Path=/install');
    expect(setCookie).toContain('HttpOnly');
  });

  it('lists accounts once signed in', async () => {
    const res = await request(server).get('/install').set('Cookie', await sessionCookie());

    expect(res.status).toBe(200);
    expect(res.text).toContain(`<a href="/install/workspaces?account_id=${ACCOUNT_ID}">Acme Post</a>`);
  });

  it('lists workspaces with their status', async () => {
    const res = await request(server).get(`/install/workspaces?account_id=${ACCOUNT_ID}`).set('Cookie', await sessionCookie());

    expect(res.status).toBe(200);
    expect(res.text).toContain('<td>Dailies</td><td>Not installed</td>');
  });

  it('rejects an account id that is not a UUID', async () => {
    const res = await request(server).get('/install/workspaces?account_id=nope').set('Cookie', await sessionCookie());
    expect(res.status).toBe(400);
  });

  it('installs, then reports the workspace as up to date', async () => {
    const cookie = await sessionCookie();

    const first = await request(server).post('/install/execute').set('Cookie', cookie).type('form').send(form);
    expect(first.status).toBe(200);
    expect(first.text).toContain(`Successfully installed in workspace ${WORKSPACE_ID}.`);
    expect(platform.ops()).toEqual(['createWebhook', 'createAction']);

    const second = await request(server).post('/install/execute').set('Cookie', cookie).type('form').send(form);
    expect(second.text).toContain('This workspace is already up to date.');
    expect(platform.ops()).toEqual(['createWebhook', 'createAction']);

    const status = await request(server)
      .get(`/install/status?account_id=${ACCOUNT_ID}&workspace_id=${WORKSPACE_ID}`)
      .set('Cookie', cookie);
    expect(status.body).toEqual({ account_id: ACCOUNT_ID, workspace_id: WORKSPACE_ID, status: 'installed' });
  });

  it('updates an installation after handlers change', async () => {
    const cookie = await sessionCookie();
    await request(server).post('/install/execute').set('Cookie', cookie).type('form').send(form);

    app.onAction('my_app.summarize', () => undefined, { name: 'Summarize' });
    const res = await request(server).post('/install/execute').set('Cookie', cookie).type('form').send(form);

    expect(res.text).toContain(`Successfully updated in workspace ${WORKSPACE_ID}.`);
    expect(platform.ops()).toEqual(['createWebhook', 'createAction', 'createAction']);
  });

  it('rejects malformed form input', async () => {
    const res = await request(server)
      .post('/install/execute')
      .set('Cookie', await sessionCookie())
      .type('form')
      .send('account_id=abc&workspace_id=def');

    expect(res.status).toBe(400);
    expect(res.text).toContain('Invalid account or workspace ID.');
  });

  it('answers 502 when the platform rejects the install', async () => {
    platform.failCreates.add('my_app.transcribe');

    const res = await request(server).post('/install/execute').set('Cookie', await sessionCookie()).type('form').send(form);

    expect(res.status).toBe(502);
    expect(res.text).toContain('Installation failed. Please try again.');
  });

  it('uninstalls an active installation once', async () => {
    const cookie = await sessionCookie();
    await request(server).post('/install/execute').set('Cookie', cookie).type('form').send(form);

    const res = await request(server).post('/install/uninstall').set('Cookie', cookie).type('form').send(form);
    expect(res.status).toBe(200);
    expect(res.text).toContain(`Successfully uninstalled in workspace ${WORKSPACE_ID}.`);
    expect(platform.ops().slice(-2)).toEqual(['deleteWebhook', 'deleteAction']);

    const again = await request(server).post('/install/uninstall').set('Cookie', cookie).type('form').send(form);
    expect(again.status).toBe(404);
  });

  it('ends the session on logout', async () => {
    const cookie = await sessionCookie();

    const res = await request(server).post('/install/logout').set('Cookie', cookie);
    expect(res.status).toBe(302);
    expect(res.headers.location).toBe('/install');

    const after = await request(server).get(`/install/workspaces?account_id=${ACCOUNT_ID}`).set('Cookie', cookie);
    expect(after.status).toBe(302);
  });
});
