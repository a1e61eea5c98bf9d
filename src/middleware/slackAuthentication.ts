import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { authenticate } from '../auth/authenticate.js';
import { challenge } from '../auth/challenge.js';
import { cloneIdentity } from '../auth/claims.js';
import type {
  AuthenticationTicket,
  AuthProperties,
  SlackAuthenticationOptions,
  SlackReturnEndpointContext,
} from '../auth/types.js';
import { addQueryString, requestPath } from '../auth/urls.js';
import { HttpError } from '../types.js';

export interface SlackAuthentication {
  /** Handles requests to the callback path; passes everything else on. */
  middleware: RequestHandler;
  /** Redirects the browser to Slack to start a sign-in. */
  challenge(req: Request, res: Response, properties?: AuthProperties): Promise<void>;
  authenticate(
    req: Request,
    res: Response,
    signal?: AbortSignal
  ): Promise<AuthenticationTicket | null>;
}

/** Aborted when the client goes away before we have answered. */
function requestAbortSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableFinished) {
      controller.abort(new Error('Client closed the connection'));
    }
  });
  return controller.signal;
}

export function createSlackAuthentication(options: SlackAuthenticationOptions): SlackAuthentication {
  const callbackPath = (options.pathBase + options.callbackPath).toLowerCase();

  async function invokeReturnEndpoint(
    req: Request,
    res: Response,
    ticket: AuthenticationTicket
  ): Promise<boolean> {
    const context: SlackReturnEndpointContext = {
      req,
      res,
      ticket,
      identity: ticket.identity,
      properties: ticket.properties,
      signInAsAuthenticationType: options.signInAsAuthenticationType,
      redirectUri: ticket.properties.redirectUri,
      isRequestCompleted: false,
    };

    await options.provider.onReturnEndpoint(context);

    if (context.identity) {
      let grantIdentity = context.identity;
      const signInAs = context.signInAsAuthenticationType;
      if (signInAs && grantIdentity.authenticationType !== signInAs) {
        grantIdentity = cloneIdentity(grantIdentity, signInAs);
      }
      await options.sessionManager.signIn(req, res, grantIdentity, context.properties);
    }

    if (!context.isRequestCompleted && context.redirectUri) {
      let redirectUri = context.redirectUri;
      if (!context.identity) {
        redirectUri = addQueryString(redirectUri, { error: 'access_denied' });
      }
      res.redirect(redirectUri);
      context.isRequestCompleted = true;
    }

    return context.isRequestCompleted;
  }

  async function handle(req: Request, res: Response, next: NextFunction): Promise<void> {
    if (requestPath(req).toLowerCase() !== callbackPath) {
      next();
      return;
    }

    const ticket = await authenticate(req, res, options, requestAbortSignal(res));
    if (!ticket) {
      next(new HttpError(500, 'Invalid return state, unable to redirect.', 'InvalidState'));
      return;
    }

    if (!(await invokeReturnEndpoint(req, res, ticket))) {
      next();
    }
  }

  return {
    middleware: (req, res, next) => {
      handle(req, res, next).catch(next);
    },
    challenge: (req, res, properties) => challenge(req, res, options, properties),
    authenticate: (req, res, signal) => authenticate(req, res, options, signal),
  };
}
