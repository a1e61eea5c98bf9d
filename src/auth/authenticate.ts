import * as Sentry from '@sentry/node';
import type { Request, Response } from 'express';
import { exchangeCodeForToken, fetchUserInfo } from '../slack/oauthClient.js';
import { buildClaimsIdentity } from './claims.js';
import { clearCorrelationCookie, validateCorrelationId } from './correlation.js';
import { isExpectedFailure, SlackAuthError, toSlackAuthError } from './errors.js';
import { buildSlackIdentity } from './identity.js';
import type {
  AuthenticationTicket,
  AuthProperties,
  SlackAuthenticatedContext,
  SlackAuthenticationOptions,
  UserInfo,
} from './types.js';
import { callbackUri } from './urls.js';

/** A query parameter that appears exactly once, otherwise undefined. */
function singleQueryValue(req: Request, name: string): string | undefined {
  const value: unknown = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

function failedTicket(properties: AuthProperties, failure: SlackAuthError): AuthenticationTicket {
  if (isExpectedFailure(failure)) {
    console.warn('Slack sign-in rejected:', failure.code, failure.message);
  } else {
    console.error('Slack sign-in failed:', failure.code, failure.message);
    Sentry.captureException(failure);
  }
  return { identity: null, properties, failure };
}

/**
 * Handles the callback leg of the authorization-code flow. Returns null when
 * `state` cannot be recovered; every other failure, thrown or not, yields a
 * ticket without identity that keeps the recovered properties.
 */
export async function authenticate(
  req: Request,
  res: Response,
  options: SlackAuthenticationOptions,
  signal?: AbortSignal
): Promise<AuthenticationTicket | null> {
  let properties: AuthProperties | null = null;

  try {
    properties = await options.stateDataFormat.unprotect(singleQueryValue(req, 'state'));
    if (!properties) {
      console.warn('Slack sign-in rejected: missing or invalid state');
      return null;
    }

    if (req.query.error !== undefined) {
      const error = singleQueryValue(req, 'error') ?? 'unknown';
      clearCorrelationCookie(req, res, options);
      return failedTicket(
        properties,
        new SlackAuthError('ProviderDenied', `Slack returned error: ${error}`)
      );
    }

    // RFC 6749 section 10.12
    if (!validateCorrelationId(req, res, properties, options)) {
      return failedTicket(
        properties,
        new SlackAuthError('CsrfValidationFailed', 'Correlation id does not match')
      );
    }

    const code = singleQueryValue(req, 'code');
    if (!code) {
      return failedTicket(
        properties,
        new SlackAuthError('TokenExchangeFailed', 'Callback carries no single authorization code')
      );
    }

    const tokenResponse = await exchangeCodeForToken(options.slackClient, {
      code,
      redirectUri: callbackUri(req, options.pathBase, options.callbackPath),
      clientId: options.clientId,
      clientSecret: options.clientSecret,
      signal,
    });

    let user: UserInfo | undefined;
    const authedUserId = tokenResponse.authed_user?.id;
    if (authedUserId) {
      try {
        user = await fetchUserInfo(options.slackClient, {
          token: tokenResponse.access_token,
          user: authedUserId,
          signal,
        });
      } catch (error) {
        if (!(error instanceof SlackAuthError) || error.code !== 'ProfileFetchFailed') {
          throw error;
        }
        console.warn('Continuing Slack sign-in without profile:', error.message);
      }
    }

    const slackIdentity = buildSlackIdentity(tokenResponse, user);
    const context: SlackAuthenticatedContext = {
      req,
      res,
      slackIdentity,
      tokenResponse,
      identity: buildClaimsIdentity(slackIdentity, options.authenticationType),
      properties,
    };

    await options.provider.onAuthenticated(context);

    return { identity: context.identity, properties: context.properties, slackIdentity };
  } catch (error) {
    const failure = toSlackAuthError(error);
    if (!properties) {
      console.error('Slack sign-in failed before state was recovered:', failure.message);
      Sentry.captureException(failure);
      return null;
    }
    return failedTicket(properties, failure);
  }
}
