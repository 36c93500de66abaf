import crypto from 'crypto';
import jwt from 'jsonwebtoken';
import { Response } from 'express';
import { z } from 'zod';
import { Storage } from '../../repositories/storage';
import { TokenEncryption } from '../../utils/encryption.util';
import { createLogger } from '../../utils/logger';

const logger = createLogger('install-session');

export const INSTALL_SESSION_COOKIE = 'frameio_install_session';

const claimsSchema = z.object({ sid: z.string().min(1) });

const sessionRecordSchema = z.object({
  access_token: z.string().min(1),
  user_id: z.string(),
  created_at: z.string(),
});

export interface InstallSession {
  sessionId: string;
  accessToken: string;
  userId: string;
}

export interface InstallSessionOptions {
  storage: Storage;
  encryption: TokenEncryption;
  /** Signing secret for the session cookie. */
  secret: string;
  ttlSeconds: number;
  secureCookie?: boolean;
}

/**
 * Admin sessions for the install pages. The cookie is a signed JWT that only
 * names a storage record; the access token stays server side, encrypted.
 */
export class InstallSessionService {
  constructor(private readonly options: InstallSessionOptions) {}

  static key(sessionId: string): string {
    return `install_session:${sessionId}`;
  }

  /** Persist a session and return the signed cookie value. */
  async create(accessToken: string, userId: string): Promise<string> {
    const sessionId = crypto.randomBytes(24).toString('base64url');
    await this.options.storage.put(
      InstallSessionService.key(sessionId),
      {
        access_token: this.options.encryption.encryptString(accessToken),
        user_id: userId,
        created_at: new Date().toISOString(),
      },
      { ttl: this.options.ttlSeconds }
    );
    return jwt.sign({ sid: sessionId }, this.options.secret, { expiresIn: this.options.ttlSeconds });
  }

  /** Returns null for a missing, forged or expired session. */
  async load(cookieValue: string | undefined): Promise<InstallSession | null> {
    const sessionId = this.verify(cookieValue);
    if (!sessionId) return null;

    const stored = await this.options.storage.get(InstallSessionService.key(sessionId));
    const record = sessionRecordSchema.safeParse(stored);
    if (!record.success) return null;

    try {
      return {
        sessionId,
        accessToken: this.options.encryption.decryptString(record.data.access_token),
        userId: record.data.user_id,
      };
    } catch (error) {
      logger.warn(`Dropping undecryptable install session: ${error instanceof Error ? error.message : error}`);
      await this.options.storage.delete(InstallSessionService.key(sessionId));
      return null;
    }
  }

  async destroy(cookieValue: string | undefined): Promise<void> {
    const sessionId = this.verify(cookieValue);
    if (sessionId) await this.options.storage.delete(InstallSessionService.key(sessionId));
  }

  setCookie(res: Response, cookieValue: string): void {
    res.cookie(INSTALL_SESSION_COOKIE, cookieValue, {
      httpOnly: true,
      secure: this.options.secureCookie ?? false,
      sameSite: 'lax',
      maxAge: this.options.ttlSeconds * 1000,
      path: '/install',
    });
  }

  clearCookie(res: Response): void {
    res.clearCookie(INSTALL_SESSION_COOKIE, { path: '/install' });
  }

  private verify(cookieValue: string | undefined): string | null {
    if (!cookieValue) return null;
    try {
      const claims = claimsSchema.safeParse(jwt.verify(cookieValue, this.options.secret));
      return claims.success ? claims.data.sid : null;
    } catch {
      return null;
    }
  }
}
