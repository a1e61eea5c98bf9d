import { createSlackAuthentication, type SlackAuthentication } from '../middleware/slackAuthentication.js';
import { createSlackOAuthClient } from '../slack/oauthClient.js';
import { createSlackAuthenticationProvider } from './provider.js';
import { createDataProtector, createStateDataFormat } from './stateFormat.js';
import type {
  SessionManager,
  SlackAuthConfig,
  SlackAuthenticationProvider,
  SlackOAuthClient,
  StateDataFormat,
} from './types.js';

export type * from './types.js';
export { SlackAuthError, type SlackAuthErrorCode } from './errors.js';
export { AUTHORIZE_ENDPOINT, buildAuthorizationUrl, normalizeScopes } from './challenge.js';
export { buildClaims, buildClaimsIdentity, ClaimTypes, cloneIdentity, findClaim } from './claims.js';
export { buildSlackIdentity, decodeTokenResponse } from './identity.js';
export { createSlackAuthenticationProvider } from './provider.js';
export { createDataProtector, createStateDataFormat, type DataProtector } from './stateFormat.js';
export { createSlackAuthentication, type SlackAuthentication } from '../middleware/slackAuthentication.js';

/** Matches the lifetime of the correlation cookie. */
const STATE_LIFETIME = '15m';

export interface SlackSignInOptions extends SlackAuthConfig {
  /** Key material for the default state protector. */
  stateSecret: string;
  stateDataFormat?: StateDataFormat;
  provider?: Partial<SlackAuthenticationProvider>;
  slackClient?: SlackOAuthClient;
  sessionManager: SessionManager;
}

/** Wires the default collaborators around {@link createSlackAuthentication}. */
export function slackSignIn(options: SlackSignInOptions): SlackAuthentication {
  const { stateSecret, stateDataFormat, provider, slackClient, ...config } = options;

  return createSlackAuthentication({
    ...config,
    stateDataFormat:
      stateDataFormat ??
      createStateDataFormat(
        createDataProtector(stateSecret, `slack-signin.state.${config.authenticationType}`, {
          expiresIn: STATE_LIFETIME,
        })
      ),
    provider: createSlackAuthenticationProvider(provider),
    slackClient:
      slackClient ?? createSlackOAuthClient({ timeoutMs: config.backchannelTimeoutMs }),
  });
}
