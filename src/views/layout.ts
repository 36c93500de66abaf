import { InstallBranding } from '../types/installation.types';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export const DEFAULT_PRIMARY_COLOR = '#6366f1';
export const DEFAULT_ACCENT_COLOR = '#8b5cf6';

const HEX_COLOR = /^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i;

export interface PageChrome {
  appName: string;
  branding?: InstallBranding;
}

function hexOr(value: string | undefined, fallback: string): string {
  return value !== undefined && HEX_COLOR.test(value) ? value : fallback;
}

function logoUrl(value: string | undefined): string | null {
  if (!value || !URL.canParse(value)) return null;
  const url = new URL(value);
  return url.protocol === 'https:' || url.protocol === 'http:' ? url.href : null;
}

function styles(primary: string, accent: string): string {
  return `
  body { font-family: system-ui, sans-serif; background: #f8fafc; color: #1e293b; margin: 0; padding: 2rem; }
  main { max-width: 40rem; margin: 0 auto; background: #fff; border-radius: 12px; padding: 1.5rem 2rem; box-shadow: 0 2px 8px rgba(0,0,0,0.08); }
  header { border-bottom: 3px solid ${accent}; margin-bottom: 1.5rem; }
  header img { max-height: 48px; }
  a { color: ${accent}; }
  .muted { color: #64748b; }
  .error { color: #ef4444; }
  .success { color: #16a34a; }
  table { width: 100%; border-collapse: collapse; }
  td, th { text-align: left; padding: 0.5rem 0.25rem; border-bottom: 1px solid #e2e8f0; }
  form { display: inline; }
  button, .button { background: ${primary}; color: #fff; border: 0; border-radius: 6px; padding: 0.4rem 0.9rem; text-decoration: none; cursor: pointer; }
  button.secondary { background: #e2e8f0; color: #1e293b; }
  footer { margin-top: 1.5rem; font-size: 0.8rem; text-align: center; }
`;
}

/**
 * Wrap body markup in the shared page chrome. `title` and `appName` are
 * escaped here; `body` must already be safe.
 *
 * Branding colours that are not hex values fall back to the defaults, and
 * a logo URL is only used when it is http(s).
 */
export function renderPage(title: string, chrome: PageChrome, body: string): string {
  const { appName, branding = {} } = chrome;
  const css = styles(hexOr(branding.primaryColor, DEFAULT_PRIMARY_COLOR), hexOr(branding.accentColor, DEFAULT_ACCENT_COLOR));
  // a closing tag inside custom CSS would end the style element
  const customCss = branding.customCss ? `\n  <style>${branding.customCss.replace(/<\/style/gi, '<\\/style')}</style>` : '';
  const logo = logoUrl(branding.logoUrl);
  const footer = (branding.showPoweredBy ?? true) ? '\n    <footer class="muted">Powered by frameio-event-kit</footer>' : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)} - ${escapeHtml(appName)}</title>
  <style>${css}</style>${customCss}
</head>
<body>
  <main>
    <header>${logo ? `<img src="${escapeHtml(logo)}" alt="">` : ''}<h1>${escapeHtml(appName)}</h1></header>
    ${body}${footer}
  </main>
</body>
</html>`;
}
