import { describe, expect, it, vi } from 'vitest';
import {
  createFakeSlackClient,
  fakeRequest,
  fakeResponse,
  testOptions,
  testStateDataFormat,
  TEST_CORRELATION_COOKIE,
} from '../test-helpers.js';
import { AUTHORIZE_ENDPOINT, buildAuthorizationUrl, challenge, normalizeScopes } from './challenge.js';
import { CORRELATION_KEY } from './correlation.js';
import { createSlackAuthenticationProvider } from './provider.js';

function options(overrides: Parameters<typeof testOptions>[1] = {}) {
  return testOptions(createFakeSlackClient().client, overrides);
}

describe('normalizeScopes', () => {
  it('appends identify when missing', () => {
    expect(normalizeScopes(['users:read'])).toEqual(['users:read', 'identify']);
  });

  it('keeps identify exactly once and drops blanks', () => {
    expect(normalizeScopes(['identify', 'users:read', 'identify', ' ', 'users:read'])).toEqual([
      'identify',
      'users:read',
    ]);
  });

  it('returns identify alone for no scopes', () => {
    expect(normalizeScopes([])).toEqual(['identify']);
  });
});

describe('buildAuthorizationUrl', () => {
  it('builds the authorize URL with the standard parameters', async () => {
    const { res } = fakeResponse();
    const { url } = await buildAuthorizationUrl(
      fakeRequest({ originalUrl: '/reports?page=2' }),
      res,
      options({ scopes: ['users:read'] })
    );

    const parsed = new URL(url);
    expect(`${parsed.origin}${parsed.pathname}`).toBe(AUTHORIZE_ENDPOINT);
    expect(parsed.searchParams.get('response_type')).toBe('code');
    expect(parsed.searchParams.get('client_id')).toBe('test-client-id');
    expect(parsed.searchParams.get('redirect_uri')).toBe('https://app.example.test/signin-slack');
    expect(parsed.searchParams.get('scope')).toBe('users:read identify');
    expect(parsed.searchParams.has('team')).toBe(false);
    expect(parsed.searchParams.get('state')).toBeTruthy();
  });

  it('defaults the redirect target to the current URL', async () => {
    const { res } = fakeResponse();
    const { properties } = await buildAuthorizationUrl(
      fakeRequest({ originalUrl: '/reports?page=2' }),
      res,
      options()
    );

    expect(properties.redirectUri).toBe('https://app.example.test/reports?page=2');
  });

  it('keeps a requested redirect target', async () => {
    const { res } = fakeResponse();
    const { properties } = await buildAuthorizationUrl(fakeRequest({}), res, options(), {
      redirectUri: '/dashboard',
      items: {},
    });

    expect(properties.redirectUri).toBe('/dashboard');
  });

  it('seals a state whose correlation id matches the cookie', async () => {
    const { res, mocks } = fakeResponse();
    const { url } = await buildAuthorizationUrl(fakeRequest({}), res, options());

    const state = new URL(url).searchParams.get('state') ?? undefined;
    const recovered = await testStateDataFormat().unprotect(state);
    const cookieValue: unknown = mocks.cookie.mock.calls[0]?.[1];

    expect(mocks.cookie.mock.calls[0]?.[0]).toBe(TEST_CORRELATION_COOKIE);
    expect(recovered?.items[CORRELATION_KEY]).toBe(cookieValue);
  });

  it('sends the configured team hint', async () => {
    const { res } = fakeResponse();
    const { url } = await buildAuthorizationUrl(fakeRequest({}), res, options({ team: 'T1' }));

    expect(new URL(url).searchParams.get('team')).toBe('T1');
  });

  it('moves scope and team items into the query and out of the state', async () => {
    const { res } = fakeResponse();
    const { url, properties } = await buildAuthorizationUrl(fakeRequest({}), res, options({ team: 'T1' }), {
      items: { scope: 'channels:read identify', team: 'T2', tab: 'billing' },
    });

    const params = new URL(url).searchParams;
    expect(params.get('scope')).toBe('channels:read identify');
    expect(params.get('team')).toBe('T2');

    const recovered = await testStateDataFormat().unprotect(params.get('state') ?? undefined);
    expect(Object.keys(recovered?.items ?? {}).sort()).toEqual([CORRELATION_KEY, 'tab']);
    expect(properties.items.scope).toBeUndefined();
  });

  it('uses the path base in the callback URI', async () => {
    const { res } = fakeResponse();
    const { url } = await buildAuthorizationUrl(fakeRequest({}), res, options({ pathBase: '/app' }));

    expect(new URL(url).searchParams.get('redirect_uri')).toBe(
      'https://app.example.test/app/signin-slack'
    );
  });

  it('does not mutate the requested properties', async () => {
    const { res } = fakeResponse();
    const requested = { items: { team: 'T2' } };
    await buildAuthorizationUrl(fakeRequest({}), res, options(), requested);

    expect(requested).toEqual({ items: { team: 'T2' } });
  });
});

describe('challenge', () => {
  it('redirects through the default provider', async () => {
    const { res, mocks } = fakeResponse();
    await challenge(fakeRequest({}), res, options());

    expect(mocks.redirect).toHaveBeenCalledWith(expect.stringMatching(/^https:\/\/slack\.com\/oauth\/v2\/authorize\?/));
  });

  it('lets the provider take over the redirect', async () => {
    const applyRedirect = vi.fn();
    const { res, mocks } = fakeResponse();
    await challenge(
      fakeRequest({}),
      res,
      options({ provider: createSlackAuthenticationProvider({ applyRedirect }) }),
      { redirectUri: '/dashboard', items: {} }
    );

    expect(mocks.redirect).not.toHaveBeenCalled();
    expect(applyRedirect).toHaveBeenCalledWith(
      expect.objectContaining({
        redirectUri: expect.stringContaining('response_type=code'),
        properties: expect.objectContaining({ redirectUri: '/dashboard' }),
      })
    );
  });
});
