import type { Request, Response } from 'express';
import { generateCorrelationId } from './correlation.js';
import type { AuthProperties, SlackAuthenticationOptions } from './types.js';
import { addQueryString, callbackUri, currentUri } from './urls.js';

export const AUTHORIZE_ENDPOINT = 'https://slack.com/oauth/v2/authorize';

const REQUIRED_SCOPE = 'identify';

/** Deduplicates scopes in order and makes sure `identify` is requested. */
export function normalizeScopes(scopes: readonly string[]): string[] {
  const result: string[] = [];
  for (const scope of scopes) {
    const trimmed = scope.trim();
    if (trimmed && !result.includes(trimmed)) {
      result.push(trimmed);
    }
  }
  if (!result.includes(REQUIRED_SCOPE)) {
    result.push(REQUIRED_SCOPE);
  }
  return result;
}

/** Removes `name` from the bag and returns it, so it travels in the URL rather than in `state`. */
function takeItem(properties: AuthProperties, name: string): string | undefined {
  const value = properties.items[name];
  if (value !== undefined) {
    delete properties.items[name];
  }
  return value;
}

export type ChallengeOptions = Pick<
  SlackAuthenticationOptions,
  | 'clientId'
  | 'scopes'
  | 'team'
  | 'callbackPath'
  | 'pathBase'
  | 'authenticationType'
  | 'stateDataFormat'
>;

/**
 * Builds the Slack authorize URL for this request. Fills in the redirect
 * target, sets the correlation cookie and seals `properties` into `state`;
 * makes no network calls.
 */
export async function buildAuthorizationUrl(
  req: Request,
  res: Response,
  options: ChallengeOptions,
  requested?: AuthProperties
): Promise<{ url: string; properties: AuthProperties }> {
  const properties: AuthProperties = {
    redirectUri: requested?.redirectUri || currentUri(req),
    items: { ...requested?.items },
  };

  generateCorrelationId(req, res, properties, options);

  const scopeOverride = takeItem(properties, 'scope');
  const scopes = normalizeScopes(scopeOverride ? scopeOverride.split(' ') : options.scopes);
  const team = takeItem(properties, 'team') ?? options.team;

  const query: Record<string, string> = {
    response_type: 'code',
    client_id: options.clientId,
    redirect_uri: callbackUri(req, options.pathBase, options.callbackPath),
    scope: scopes.join(' '),
  };
  // preselects the workspace on the consent screen
  if (team) {
    query.team = team;
  }
  query.state = await options.stateDataFormat.protect(properties);

  return { url: addQueryString(AUTHORIZE_ENDPOINT, query), properties };
}

export async function challenge(
  req: Request,
  res: Response,
  options: ChallengeOptions & Pick<SlackAuthenticationOptions, 'provider'>,
  requested?: AuthProperties
): Promise<void> {
  const { url, properties } = await buildAuthorizationUrl(req, res, options, requested);
  options.provider.applyRedirect({ req, res, redirectUri: url, properties });
}
