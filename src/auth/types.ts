import type { webApi } from '@slack/bolt';
import type { Request, Response } from 'express';
import type { SlackAuthError } from './errors.js';

/** Per-attempt state carried through Slack in the `state` parameter. */
export interface AuthProperties {
  redirectUri?: string;
  items: Record<string, string>;
}

export interface Claim {
  type: string;
  value: string;
  valueType: string;
  issuer: string;
}

export interface ClaimsIdentity {
  authenticationType: string;
  claims: Claim[];
}

/** Fields of an `oauth.v2.access` payload we read; everything is optional except the token. */
export interface TokenResponse {
  access_token: string;
  token_type?: string;
  scope?: string;
  bot_user_id?: string;
  app_id?: string;
  authed_user?: {
    id?: string;
    scope?: string;
    access_token?: string;
    token_type?: string;
  };
  incoming_webhook?: {
    channel?: string;
    channel_id?: string;
    configuration_url?: string;
    url?: string;
  };
  team?: { id?: string; name?: string };
  enterprise?: { id?: string; name?: string };
}

/** Subset of a `users.info` payload. */
export interface UserInfo {
  id?: string;
  name?: string;
}

export interface SlackIdentity {
  accessToken: string;
  tokenType?: string;
  scope?: string;
  teamId?: string;
  teamName?: string;
  enterpriseId?: string;
  userId?: string;
  userName?: string;
  userAccessToken?: string;
  botUserId?: string;
  botAccessToken?: string;
  incomingWebhookChannel?: string;
  incomingWebhookChannelId?: string;
  incomingWebhookConfigUrl?: string;
  incomingWebhookUrl?: string;
  /** `{teamId}_{userId}` */
  userSub?: string;
  /** `{teamId}_{botUserId}`, only when a bot user was installed */
  botUserSub?: string;
}

export interface AuthenticationTicket {
  identity: ClaimsIdentity | null;
  properties: AuthProperties;
  slackIdentity?: SlackIdentity;
  failure?: SlackAuthError;
}

export interface SlackAuthenticatedContext {
  req: Request;
  res: Response;
  slackIdentity: SlackIdentity;
  tokenResponse: TokenResponse;
  identity: ClaimsIdentity;
  properties: AuthProperties;
}

export interface SlackReturnEndpointContext {
  req: Request;
  res: Response;
  ticket: AuthenticationTicket;
  identity: ClaimsIdentity | null;
  properties: AuthProperties;
  signInAsAuthenticationType?: string;
  redirectUri?: string;
  /** Set to true when the hook has written the response itself. */
  isRequestCompleted: boolean;
}

export interface SlackApplyRedirectContext {
  req: Request;
  res: Response;
  redirectUri: string;
  properties: AuthProperties;
}

/** Hooks the host can use to take part in the sign-in flow. */
export interface SlackAuthenticationProvider {
  onAuthenticated(context: SlackAuthenticatedContext): Promise<void>;
  onReturnEndpoint(context: SlackReturnEndpointContext): Promise<void>;
  applyRedirect(context: SlackApplyRedirectContext): void;
}

/** Serializes and protects {@link AuthProperties} for the `state` parameter. */
export interface StateDataFormat {
  protect(properties: AuthProperties): Promise<string>;
  unprotect(state: string | undefined): Promise<AuthProperties | null>;
}

/** The host's session layer. */
export interface SessionManager {
  signIn(
    req: Request,
    res: Response,
    identity: ClaimsIdentity,
    properties: AuthProperties,
  ): void | Promise<void>;
}

export type SlackOAuthClient = Pick<webApi.WebClient, 'oauth' | 'users'>;

export interface SlackAuthConfig {
  clientId: string;
  clientSecret: string;
  scopes: string[];
  team?: string;
  callbackPath: string;
  pathBase: string;
  signInAsAuthenticationType?: string;
  authenticationType: string;
  backchannelTimeoutMs: number;
}

export interface SlackAuthenticationOptions extends SlackAuthConfig {
  stateDataFormat: StateDataFormat;
  provider: SlackAuthenticationProvider;
  slackClient: SlackOAuthClient;
  sessionManager: SessionManager;
}
