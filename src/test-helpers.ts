import type { Request, Response } from 'express';
import { vi } from 'vitest';
import { createSlackAuthenticationProvider } from './auth/provider.js';
import { createDataProtector, createStateDataFormat } from './auth/stateFormat.js';
import type { AuthProperties, SlackAuthenticationOptions, SlackOAuthClient } from './auth/types.js';
import type { AppConfig } from './config.js';

export const TEST_STATE_SECRET = 'test-state-secret-0000';

export const TEST_CONFIG: AppConfig = {
  clientId: 'test-client-id',
  clientSecret: 'test-client-secret',
  stateSecret: TEST_STATE_SECRET,
  scopes: ['identify'],
  callbackPath: '/signin-slack',
  pathBase: '',
  signInAsAuthenticationType: 'Cookies',
  authenticationType: 'Slack',
  backchannelTimeoutMs: 5_000,
  port: 3000,
};

export const TEST_CORRELATION_COOKIE = '.slack.correlation.Slack';

/** Stand-in for the two WebClient methods the sign-in flow calls. */
export function createFakeSlackClient() {
  const access = vi.fn();
  const info = vi.fn();
  const client = { oauth: { v2: { access } }, users: { info } } as unknown as SlackOAuthClient;
  return { client, access, info };
}

export function testStateDataFormat() {
  return createStateDataFormat(
    createDataProtector(TEST_STATE_SECRET, 'slack-signin.state.Slack', { expiresIn: '15m' })
  );
}

export function testOptions(
  slackClient: SlackOAuthClient,
  overrides: Partial<SlackAuthenticationOptions> = {}
): SlackAuthenticationOptions {
  return {
    ...TEST_CONFIG,
    stateDataFormat: testStateDataFormat(),
    provider: createSlackAuthenticationProvider(),
    slackClient,
    sessionManager: { signIn: vi.fn() },
    ...overrides,
  };
}

/** Sealed `state` for properties carrying the given correlation id. */
export function sealState(properties: AuthProperties, correlationId?: string): Promise<string> {
  const items = { ...properties.items };
  if (correlationId !== undefined) {
    items['.xsrf'] = correlationId;
  }
  return testStateDataFormat().protect({ ...properties, items });
}

export function fakeRequest(init: {
  originalUrl?: string;
  query?: Record<string, string | string[]>;
  cookies?: Record<string, string>;
}): Request {
  const originalUrl = init.originalUrl ?? '/signin-slack';
  return {
    protocol: 'https',
    secure: true,
    originalUrl,
    query: init.query ?? {},
    cookies: init.cookies ?? {},
    get: (name: string) => (name.toLowerCase() === 'host' ? 'app.example.test' : undefined),
  } as unknown as Request;
}

export function fakeResponse() {
  const res = {
    cookie: vi.fn(),
    clearCookie: vi.fn(),
    redirect: vi.fn(),
  };
  return { res: res as unknown as Response, mocks: res };
}
