import { z } from 'zod';
import { SlackAuthError } from './errors.js';
import type { SlackIdentity, TokenResponse, UserInfo } from './types.js';

const optionalString = z.string().optional().catch(undefined);

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: optionalString,
  scope: optionalString,
  bot_user_id: optionalString,
  app_id: optionalString,
  authed_user: z
    .object({
      id: optionalString,
      scope: optionalString,
      access_token: optionalString,
      token_type: optionalString,
    })
    .optional()
    .catch(undefined),
  incoming_webhook: z
    .object({
      channel: optionalString,
      channel_id: optionalString,
      configuration_url: optionalString,
      url: optionalString,
    })
    .optional()
    .catch(undefined),
  team: z.object({ id: optionalString, name: optionalString }).optional().catch(undefined),
  enterprise: z.object({ id: optionalString, name: optionalString }).optional().catch(undefined),
});

const userInfoSchema = z.object({
  user: z.object({ id: optionalString, name: optionalString }).optional().catch(undefined),
});

/**
 * Decodes an `oauth.v2.access` payload. Malformed optional fields are dropped;
 * a missing access token is a failed exchange.
 */
export function decodeTokenResponse(payload: unknown): TokenResponse {
  const parsed = tokenResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SlackAuthError('TokenExchangeFailed', 'Token response has no access_token', {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function decodeUserInfo(payload: unknown): UserInfo {
  const parsed = userInfoSchema.safeParse(payload);
  return parsed.success ? (parsed.data.user ?? {}) : {};
}

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

/**
 * Normalizes the token response, refined by the `users.info` result when there
 * is one. Team and user ids from the token exchange stay authoritative when the
 * profile lookup failed.
 */
export function buildSlackIdentity(token: TokenResponse, user?: UserInfo): SlackIdentity {
  const teamId = nonEmpty(token.team?.id);
  const userId = nonEmpty(user?.id) ?? nonEmpty(token.authed_user?.id);
  const botUserId = nonEmpty(token.bot_user_id);

  return {
    accessToken: token.access_token,
    tokenType: nonEmpty(token.token_type),
    scope: nonEmpty(token.scope),
    teamId,
    teamName: nonEmpty(token.team?.name),
    enterpriseId: nonEmpty(token.enterprise?.id),
    userId,
    userName: nonEmpty(user?.name),
    userAccessToken: nonEmpty(token.authed_user?.access_token),
    botUserId,
    // v2 hands out the bot token as the top-level access token
    botAccessToken: botUserId ? token.access_token : undefined,
    incomingWebhookChannel: nonEmpty(token.incoming_webhook?.channel),
    incomingWebhookChannelId: nonEmpty(token.incoming_webhook?.channel_id),
    incomingWebhookConfigUrl: nonEmpty(token.incoming_webhook?.configuration_url),
    incomingWebhookUrl: nonEmpty(token.incoming_webhook?.url),
    userSub: teamId && userId ? `${teamId}_${userId}` : undefined,
    botUserSub: teamId && botUserId ? `${teamId}_${botUserId}` : undefined,
  };
}
