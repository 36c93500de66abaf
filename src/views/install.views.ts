import { HandlerManifest, Installation, WorkspaceInstallStatus } from '../types/installation.types';
import { PlatformAccount, PlatformWorkspace } from '../services/platform/frameio-api.service';
import { escapeHtml, PageChrome, renderPage } from './layout';

export interface WorkspaceRow {
  workspace: PlatformWorkspace;
  status: WorkspaceInstallStatus;
}

const STATUS_LABELS: Record<WorkspaceInstallStatus, string> = {
  not_installed: 'Not installed',
  installed: 'Installed',
  update_available: 'Update available',
};

function renderManifest(manifest: HandlerManifest): string {
  const events = manifest.webhookEvents.map((event) => `<li><code>${escapeHtml(event)}</code></li>`).join('');
  const actions = manifest.actions
    .map(
      (action) =>
        `<li><strong>${escapeHtml(action.name)}</strong>` +
        (action.description ? ` <span class="muted">${escapeHtml(action.description)}</span>` : '') +
        '</li>'
    )
    .join('');

  return [
    events ? `<h3>Webhook events</h3><ul>${events}</ul>` : '',
    actions ? `<h3>Custom actions</h3><ul>${actions}</ul>` : '',
  ].join('');
}

export function renderInstallLanding(chrome: PageChrome, description: string, manifest: HandlerManifest): string {
  return renderPage(
    'Install',
    chrome,
    `${description ? `<p>${escapeHtml(description)}</p>` : ''}
    <p class="muted">Installing registers the following in the workspaces you choose:</p>
    ${renderManifest(manifest)}
    <p><a class="button" href="/install/login">Sign in with Adobe</a></p>`
  );
}

export function renderAccountSelection(chrome: PageChrome, accounts: PlatformAccount[]): string {
  const items = accounts
    .map(
      (account) =>
        `<li><a href="/install/workspaces?account_id=${encodeURIComponent(account.id)}">${escapeHtml(account.displayName)}</a></li>`
    )
    .join('');

  return renderPage(
    'Choose an account',
    chrome,
    accounts.length > 0
      ? `<h2>Choose an account</h2><ul>${items}</ul>`
      : '<p class="muted">No Frame.io accounts are available for this user.</p>'
  );
}

function workspaceActions(accountId: string, row: WorkspaceRow): string {
  const hidden =
    `<input type="hidden" name="account_id" value="${escapeHtml(accountId)}">` +
    `<input type="hidden" name="workspace_id" value="${escapeHtml(row.workspace.id)}">`;
  const install =
    row.status === 'installed'
      ? ''
      : `<form method="post" action="/install/execute">${hidden}<button type="submit">${
          row.status === 'update_available' ? 'Update' : 'Install'
        }</button></form>`;
  const uninstall =
    row.status === 'not_installed'
      ? ''
      : `<form method="post" action="/install/uninstall">${hidden}<button class="secondary" type="submit">Uninstall</button></form>`;
  return `${install} ${uninstall}`.trim();
}

export function renderWorkspaceSelection(chrome: PageChrome, accountId: string, rows: WorkspaceRow[]): string {
  const body = rows
    .map(
      (row) =>
        `<tr><td>${escapeHtml(row.workspace.name)}</td><td>${STATUS_LABELS[row.status]}</td><td>${workspaceActions(
          accountId,
          row
        )}</td></tr>`
    )
    .join('');

  return renderPage(
    'Choose workspaces',
    chrome,
    rows.length > 0
      ? `<h2>Workspaces</h2><table><thead><tr><th>Workspace</th><th>Status</th><th></th></tr></thead><tbody>${body}</tbody></table>
    <p><a href="/install">Back to accounts</a></p>`
      : '<p class="muted">This account has no workspaces.</p><p><a href="/install">Back to accounts</a></p>'
  );
}

export function renderInstallResult(
  chrome: PageChrome,
  verb: 'installed' | 'updated' | 'uninstalled' | 'unchanged',
  installation: Installation
): string {
  const summary =
    verb === 'unchanged'
      ? 'This workspace is already up to date.'
      : `Successfully ${verb} in workspace ${installation.workspaceId}.`;
  const active = installation.status === 'active';

  return renderPage(
    'Done',
    chrome,
    `<h2 class="success">${escapeHtml(summary)}</h2>
    <p class="muted">Webhook: ${active && installation.webhook ? 'registered' : 'none'}. Custom actions: ${
      active ? installation.actions.length : 0
    }.</p>
    <p><a href="/install/workspaces?account_id=${encodeURIComponent(installation.accountId)}">Back to workspaces</a></p>`
  );
}

export function renderInstallError(chrome: PageChrome, message: string): string {
  return renderPage(
    'Installation failed',
    chrome,
    `<h2 class="error">Something went wrong</h2>
    <p>${escapeHtml(message)}</p>
    <p><a href="/install">Start over</a></p>`
  );
}
