import type { CookieOptions, Request, Response } from 'express';
import { z } from 'zod';
import type { DataProtector } from './auth/stateFormat.js';
import type { ClaimsIdentity, SessionManager } from './auth/types.js';

export const SESSION_LIFETIME = '8h';
const SESSION_MAX_AGE_MS = 8 * 60 * 60 * 1000;

const claimsIdentitySchema = z.object({
  authenticationType: z.string(),
  claims: z.array(
    z.object({
      type: z.string(),
      value: z.string(),
      valueType: z.string(),
      issuer: z.string(),
    })
  ),
});

export interface CookieSessionManager extends SessionManager {
  read(req: Request): Promise<ClaimsIdentity | null>;
  signOut(req: Request, res: Response): void;
}

/**
 * Minimal session for the demo app: the signed-in identity lives in one
 * encrypted, httpOnly cookie. The protector should expire with the cookie.
 */
export function createCookieSessionManager(
  protector: DataProtector,
  options: { cookieName?: string } = {}
): CookieSessionManager {
  const cookieName = options.cookieName ?? 'session';

  const cookieOptions = (req: Request): CookieOptions => ({
    httpOnly: true,
    secure: req.secure,
    sameSite: 'lax',
    path: '/',
  });

  return {
    async signIn(req, res, identity) {
      res.cookie(cookieName, await protector.protect(JSON.stringify(identity)), {
        ...cookieOptions(req),
        maxAge: SESSION_MAX_AGE_MS,
      });
    },

    async read(req) {
      const cookies: unknown = req.cookies;
      if (typeof cookies !== 'object' || cookies === null) {
        return null;
      }
      const value: unknown = Reflect.get(cookies, cookieName);
      if (typeof value !== 'string') {
        return null;
      }
      const json = await protector.unprotect(value);
      if (json === null) {
        return null;
      }
      let raw: unknown;
      try {
        raw = JSON.parse(json);
      } catch {
        return null;
      }
      const parsed = claimsIdentitySchema.safeParse(raw);
      return parsed.success ? parsed.data : null;
    },

    signOut(req, res) {
      res.clearCookie(cookieName, cookieOptions(req));
    },
  };
}
