import { describe, expect, it } from 'vitest';
import { loadSlackAuthConfig } from './config.js';

const requiredEnv = {
  SLACK_CLIENT_ID: 'test-client-id',
  SLACK_CLIENT_SECRET: 'test-client-secret',
  SLACK_AUTH_STATE_SECRET: 'test-state-secret-0000',
};

describe('loadSlackAuthConfig', () => {
  it('applies defaults', () => {
    expect(loadSlackAuthConfig(requiredEnv)).toEqual({
      clientId: 'test-client-id',
      clientSecret: 'test-client-secret',
      stateSecret: 'test-state-secret-0000',
      scopes: ['identify'],
      team: undefined,
      callbackPath: '/signin-slack',
      pathBase: '',
      signInAsAuthenticationType: 'Cookies',
      authenticationType: 'Slack',
      backchannelTimeoutMs: 60_000,
      port: 3000,
    });
  });

  it('reads optional settings', () => {
    const config = loadSlackAuthConfig({
      ...requiredEnv,
      SLACK_SCOPES: 'users:read, identify,team:read',
      SLACK_TEAM: 'T1',
      SLACK_CALLBACK_PATH: '/auth/slack/callback',
      SLACK_PATH_BASE: '/app',
      SLACK_BACKCHANNEL_TIMEOUT_MS: '2500',
      PORT: '8080',
    });

    expect(config.scopes).toEqual(['users:read', 'identify', 'team:read']);
    expect(config.team).toBe('T1');
    expect(config.callbackPath).toBe('/auth/slack/callback');
    expect(config.pathBase).toBe('/app');
    expect(config.backchannelTimeoutMs).toBe(2500);
    expect(config.port).toBe(8080);
  });

  it('treats blank variables as unset', () => {
    const config = loadSlackAuthConfig({ ...requiredEnv, SLACK_TEAM: '  ', SLACK_CALLBACK_PATH: '' });

    expect(config.team).toBeUndefined();
    expect(config.callbackPath).toBe('/signin-slack');
  });

  it('treats a root path base as no path base', () => {
    expect(loadSlackAuthConfig({ ...requiredEnv, SLACK_PATH_BASE: '/' }).pathBase).toBe('');
  });

  it('lists every invalid variable', () => {
    expect(() =>
      loadSlackAuthConfig({ SLACK_AUTH_STATE_SECRET: 'short', SLACK_CALLBACK_PATH: 'signin' })
    ).toThrow(
      /Invalid Slack sign-in configuration:\nSLACK_CLIENT_ID: Required\nSLACK_CLIENT_SECRET: Required\nSLACK_AUTH_STATE_SECRET: .*\nSLACK_CALLBACK_PATH: must start with "\/" and not end with "\/"/
    );
  });
});
