import dotenv from 'dotenv';
import { DEFAULT_SCOPES } from '../services/oauth/oauth-client.service';

dotenv.config();

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value.split(/[\s,]+/).filter((scope) => scope.length > 0);
}

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3000', 10),
  baseUrl: process.env.BASE_URL || '',

  // Redis (empty means in-memory storage)
  redisUrl: process.env.REDIS_URL || '',

  // Frame.io
  frameio: {
    apiBaseUrl: process.env.FRAMEIO_API_URL || 'https://api.frame.io/v4',
  },

  // Adobe IMS OAuth
  oauth: {
    clientId: process.env.ADOBE_CLIENT_ID || '',
    clientSecret: process.env.ADOBE_CLIENT_SECRET || '',
    redirectUri: process.env.OAUTH_REDIRECT_URI || '',
    imsUrl: process.env.ADOBE_IMS_URL || 'https://ims-na1.adobelogin.com',
    scopes: parseList(process.env.OAUTH_SCOPES, DEFAULT_SCOPES),
    tokenRefreshBufferSeconds: parseInt(process.env.TOKEN_REFRESH_BUFFER_SECONDS || '300', 10),
  },

  // Encryption (for OAuth tokens and signing secrets)
  encryptionKey: process.env.FRAMEIO_AUTH_ENCRYPTION_KEY || '',

  // Self-service installation
  install: {
    appName: process.env.INSTALL_APP_NAME || '',
    appDescription: process.env.INSTALL_APP_DESCRIPTION || '',
    sessionTtl: parseInt(process.env.INSTALL_SESSION_TTL || '1800', 10),
    sessionSecret: process.env.INSTALL_SESSION_SECRET || '',
    logoUrl: process.env.INSTALL_LOGO_URL || '',
    primaryColor: process.env.INSTALL_PRIMARY_COLOR || '',
    accentColor: process.env.INSTALL_ACCENT_COLOR || '',
    showPoweredBy: process.env.INSTALL_SHOW_POWERED_BY !== 'false',
  },

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',
};

export type AppConfig = typeof config;

/**
 * Check the environment for the settings the configured features need.
 * Returns the list of problems; the caller decides whether to exit.
 */
export function validateConfig(cfg: AppConfig = config): string[] {
  const problems: string[] = [];
  const oauthEnabled = Boolean(cfg.oauth.clientId || cfg.oauth.clientSecret);

  if (oauthEnabled) {
    if (!cfg.oauth.clientId) problems.push('ADOBE_CLIENT_ID is required when OAuth is enabled');
    if (!cfg.oauth.clientSecret) problems.push('ADOBE_CLIENT_SECRET is required when OAuth is enabled');
  }

  if (cfg.install.appName) {
    if (!oauthEnabled) problems.push('Self-service installation requires ADOBE_CLIENT_ID and ADOBE_CLIENT_SECRET');
    if (!cfg.install.sessionSecret) problems.push('INSTALL_SESSION_SECRET is required for self-service installation');
  }

  if (cfg.nodeEnv === 'production' && oauthEnabled && !cfg.encryptionKey) {
    problems.push('FRAMEIO_AUTH_ENCRYPTION_KEY must be set in production');
  }

  if (!Number.isFinite(cfg.oauth.tokenRefreshBufferSeconds) || cfg.oauth.tokenRefreshBufferSeconds < 0) {
    problems.push('TOKEN_REFRESH_BUFFER_SECONDS must be a non-negative integer');
  }

  return problems;
}

export default config;
