import type { Request } from 'express';

/** scheme://host, honouring Express' `trust proxy` setting. */
export function requestOrigin(req: Request): string {
  return `${req.protocol}://${req.get('host') ?? ''}`;
}

/** Absolute URI of the current request, query string included. */
export function currentUri(req: Request): string {
  return requestOrigin(req) + req.originalUrl;
}

/** The `redirect_uri` sent to Slack; must be identical at challenge and token exchange. */
export function callbackUri(req: Request, pathBase: string, callbackPath: string): string {
  return requestOrigin(req) + pathBase + callbackPath;
}

/** Path of the current request relative to the host root, without the query string. */
export function requestPath(req: Request): string {
  const queryStart = req.originalUrl.indexOf('?');
  return queryStart === -1 ? req.originalUrl : req.originalUrl.slice(0, queryStart);
}

/**
 * Appends query parameters to a possibly relative URI, keeping any fragment at
 * the end.
 */
export function addQueryString(uri: string, params: Record<string, string>): string {
  const query = new URLSearchParams(params).toString();
  if (!query) {
    return uri;
  }
  const hashStart = uri.indexOf('#');
  const base = hashStart === -1 ? uri : uri.slice(0, hashStart);
  const fragment = hashStart === -1 ? '' : uri.slice(hashStart);
  const separator = base.includes('?') ? '&' : '?';
  return `${base}${separator}${query}${fragment}`;
}
