import { z } from 'zod';
import { normalizeScopes } from './auth/challenge.js';
import type { SlackAuthConfig } from './auth/types.js';

const pathSchema = z.string().regex(/^\/.*[^/]$|^\/$/, 'must start with "/" and not end with "/"');

const envSchema = z.object({
  SLACK_CLIENT_ID: z.string().min(1),
  SLACK_CLIENT_SECRET: z.string().min(1),
  SLACK_AUTH_STATE_SECRET: z.string().min(16),
  SLACK_SCOPES: z.string().optional(),
  SLACK_TEAM: z.string().optional(),
  SLACK_CALLBACK_PATH: pathSchema.default('/signin-slack'),
  SLACK_PATH_BASE: pathSchema.optional(),
  SLACK_SIGN_IN_SCHEME: z.string().min(1).default('Cookies'),
  SLACK_AUTHENTICATION_TYPE: z.string().min(1).default('Slack'),
  SLACK_BACKCHANNEL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  PORT: z.coerce.number().int().positive().default(3000),
});

export interface AppConfig extends SlackAuthConfig {
  stateSecret: string;
  port: number;
}

function emptyToUndefined(env: Record<string, string | undefined>) {
  return Object.fromEntries(
    Object.entries(env).map(([key, value]) => [key, value?.trim() ? value.trim() : undefined])
  );
}

/** Reads the sign-in configuration from environment variables. */
export function loadSlackAuthConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(emptyToUndefined(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid Slack sign-in configuration:\n${problems.join('\n')}`);
  }
  const vars = parsed.data;

  return {
    clientId: vars.SLACK_CLIENT_ID,
    clientSecret: vars.SLACK_CLIENT_SECRET,
    stateSecret: vars.SLACK_AUTH_STATE_SECRET,
    scopes: normalizeScopes(vars.SLACK_SCOPES?.split(/[\s,]+/) ?? []),
    team: vars.SLACK_TEAM,
    callbackPath: vars.SLACK_CALLBACK_PATH,
    pathBase: vars.SLACK_PATH_BASE === '/' ? '' : (vars.SLACK_PATH_BASE ?? ''),
    signInAsAuthenticationType: vars.SLACK_SIGN_IN_SCHEME,
    authenticationType: vars.SLACK_AUTHENTICATION_TYPE,
    backchannelTimeoutMs: vars.SLACK_BACKCHANNEL_TIMEOUT_MS,
    port: vars.PORT,
  };
}
