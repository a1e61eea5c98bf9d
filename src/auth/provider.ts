import type { SlackAuthenticationProvider } from './types.js';

/**
 * Hooks with defaults: nothing happens after authentication or at the return
 * endpoint, and the challenge is a plain 302 to Slack.
 */
export function createSlackAuthenticationProvider(
  overrides?: Partial<SlackAuthenticationProvider>
): SlackAuthenticationProvider {
  return {
    onAuthenticated: async () => {},
    onReturnEndpoint: async () => {},
    applyRedirect: (context) => context.res.redirect(context.redirectUri),
    ...overrides,
  };
}
