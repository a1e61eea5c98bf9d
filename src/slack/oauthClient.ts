import { webApi } from '@slack/bolt';
import { SlackAuthError } from '../auth/errors.js';
import { decodeTokenResponse, decodeUserInfo } from '../auth/identity.js';
import type { SlackOAuthClient, TokenResponse, UserInfo } from '../auth/types.js';
import { withSlackApiSpan } from './span.js';

export interface SlackOAuthClientOptions {
  timeoutMs: number;
}

/**
 * WebClient for the backchannel calls of the sign-in flow. Retries are left to
 * the caller, and a rate-limited call fails instead of waiting.
 */
export function createSlackOAuthClient(options: SlackOAuthClientOptions): SlackOAuthClient {
  return new webApi.WebClient(undefined, {
    timeout: options.timeoutMs,
    retryConfig: { retries: 0 },
    rejectRateLimitedCalls: true,
  });
}

/** Rejects with the signal's reason as soon as it aborts. */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export interface ExchangeCodeParams {
  code: string;
  redirectUri: string;
  clientId: string;
  clientSecret: string;
  signal?: AbortSignal;
}

/** `oauth.v2.access`. Any failure is a {@link SlackAuthError} with code `TokenExchangeFailed`. */
export async function exchangeCodeForToken(
  client: SlackOAuthClient,
  params: ExchangeCodeParams
): Promise<TokenResponse> {
  let payload: unknown;
  try {
    payload = await withSlackApiSpan('oauth.v2.access', { 'slack.client_id': params.clientId }, () =>
      raceAbort(
        client.oauth.v2.access({
          grant_type: 'authorization_code',
          code: params.code,
          redirect_uri: params.redirectUri,
          client_id: params.clientId,
          client_secret: params.clientSecret,
        }),
        params.signal
      )
    );
  } catch (error) {
    if (params.signal?.aborted) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new SlackAuthError('TokenExchangeFailed', `Token exchange failed: ${message}`, {
      cause: error,
    });
  }
  return decodeTokenResponse(payload);
}

/** `users.info` for the user who just authorized the app. */
export async function fetchUserInfo(
  client: SlackOAuthClient,
  params: { token: string; user: string; signal?: AbortSignal }
): Promise<UserInfo> {
  let payload: unknown;
  try {
    payload = await withSlackApiSpan('users.info', { 'slack.user': params.user }, () =>
      raceAbort(client.users.info({ token: params.token, user: params.user }), params.signal)
    );
  } catch (error) {
    if (params.signal?.aborted) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new SlackAuthError('ProfileFetchFailed', `User info lookup failed: ${message}`, {
      cause: error,
    });
  }
  return decodeUserInfo(payload);
}
