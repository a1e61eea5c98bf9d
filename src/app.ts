import * as Sentry from '@sentry/node';
import cookieParser from 'cookie-parser';
import express, { NextFunction, Request, Response } from 'express';
import { ClaimTypes, findClaim } from './auth/claims.js';
import { slackSignIn } from './auth/index.js';
import { createDataProtector } from './auth/stateFormat.js';
import type { SlackAuthenticationProvider, SlackOAuthClient } from './auth/types.js';
import type { AppConfig } from './config.js';
import { httpErrorHandler } from './middleware/index.js';
import { createCookieSessionManager, SESSION_LIFETIME } from './session.js';
import { HttpError } from './types.js';

export interface CreateAppOptions {
  config: AppConfig;
  slackClient?: SlackOAuthClient;
  provider?: Partial<SlackAuthenticationProvider>;
}

/** Only same-site paths are accepted as a post-login target. */
function safeReturnUrl(value: unknown): string | undefined {
  if (typeof value !== 'string' || !value.startsWith('/') || value.startsWith('//')) {
    return undefined;
  }
  return value;
}

export function createApp(options: CreateAppOptions) {
  const { config } = options;
  const app = express();
  const sessions = createCookieSessionManager(
    createDataProtector(config.stateSecret, 'slack-signin.session', { expiresIn: SESSION_LIFETIME }),
  );
  const slackAuth = slackSignIn({
    ...config,
    slackClient: options.slackClient,
    provider: options.provider,
    sessionManager: sessions,
  });

  app.use(cookieParser());
  app.use(slackAuth.middleware);

  app.get('/login', (req: Request, res: Response, next: NextFunction) => {
    const returnUrl = safeReturnUrl(req.query.returnUrl) ?? '/me';
    slackAuth.challenge(req, res, { redirectUri: returnUrl, items: {} }).catch(next);
  });

  app.get('/me', (req: Request, res: Response, next: NextFunction) => {
    sessions
      .read(req)
      .then((identity) => {
        if (!identity) {
          throw new HttpError(401, 'Not signed in');
        }
        res.status(200).json({
          authenticationType: identity.authenticationType,
          id: findClaim(identity, ClaimTypes.nameIdentifier),
          name: findClaim(identity, ClaimTypes.name),
          teamId: findClaim(identity, ClaimTypes.teamId),
          teamName: findClaim(identity, ClaimTypes.teamName),
        });
      })
      .catch(next);
  });

  app.post('/logout', (req: Request, res: Response) => {
    sessions.signOut(req, res);
    res.status(204).end();
  });

  app.get('/api/health', (req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  app.use(httpErrorHandler);

  Sentry.setupExpressErrorHandler(app);

  return app;
}
