import { escapeHtml, PageChrome, renderPage } from './layout';

export function renderAuthSuccess(chrome: PageChrome): string {
  return renderPage(
    'Authentication Successful',
    chrome,
    `<h2 class="success">Authentication Successful!</h2>
    <p class="muted">You have successfully signed in. You can close this window and return to Frame.io.</p>`
  );
}

export function renderAuthError(chrome: PageChrome, title: string, message: string): string {
  return renderPage(
    title,
    chrome,
    `<h2 class="error">${escapeHtml(title)}</h2>
    <p>${escapeHtml(message)}</p>
    <p class="muted">Please close this window and try again.</p>`
  );
}
