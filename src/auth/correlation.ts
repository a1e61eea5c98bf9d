import crypto from 'crypto';
import type { CookieOptions, Request, Response } from 'express';
import type { AuthProperties } from './types.js';

/** Key of the correlation id inside {@link AuthProperties.items}. */
export const CORRELATION_KEY = '.xsrf';

const CORRELATION_MAX_AGE_MS = 15 * 60 * 1000;

export function correlationCookieName(authenticationType: string): string {
  return `.slack.correlation.${authenticationType}`;
}

function correlationCookieOptions(req: Request, pathBase: string): CookieOptions {
  return {
    httpOnly: true,
    secure: req.secure,
    sameSite: 'lax',
    path: pathBase || '/',
  };
}

function readCookie(req: Request, name: string): string | undefined {
  const cookies: unknown = req.cookies;
  if (typeof cookies !== 'object' || cookies === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(cookies, name);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Binds a fresh random id to the attempt: once in the properties (and so in
 * `state`), once in a short-lived cookie on the browser that started it.
 */
export function generateCorrelationId(
  req: Request,
  res: Response,
  properties: AuthProperties,
  options: { authenticationType: string; pathBase: string }
): string {
  const correlationId = crypto.randomBytes(32).toString('base64url');
  res.cookie(correlationCookieName(options.authenticationType), correlationId, {
    ...correlationCookieOptions(req, options.pathBase),
    maxAge: CORRELATION_MAX_AGE_MS,
  });
  properties.items[CORRELATION_KEY] = correlationId;
  return correlationId;
}

/** Clears the correlation cookie if the browser sent one. */
export function clearCorrelationCookie(
  req: Request,
  res: Response,
  options: { authenticationType: string; pathBase: string }
): void {
  const cookieName = correlationCookieName(options.authenticationType);
  if (readCookie(req, cookieName) !== undefined) {
    res.clearCookie(cookieName, correlationCookieOptions(req, options.pathBase));
  }
}

/**
 * Consumes the correlation cookie and the matching entry in `properties`.
 * The cookie is cleared whatever the outcome.
 */
export function validateCorrelationId(
  req: Request,
  res: Response,
  properties: AuthProperties,
  options: { authenticationType: string; pathBase: string }
): boolean {
  const cookieName = correlationCookieName(options.authenticationType);
  const cookieValue = readCookie(req, cookieName);
  if (cookieValue === undefined) {
    console.warn(`Correlation cookie ${cookieName} not found`);
    return false;
  }

  res.clearCookie(cookieName, correlationCookieOptions(req, options.pathBase));

  const correlationId = properties.items[CORRELATION_KEY];
  if (correlationId === undefined) {
    console.warn('Correlation id missing from state');
    return false;
  }
  delete properties.items[CORRELATION_KEY];

  const expected = Buffer.from(cookieValue);
  const actual = Buffer.from(correlationId);
  if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
    console.warn('Correlation cookie does not match state');
    return false;
  }
  return true;
}
