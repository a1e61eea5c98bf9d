export type SlackAuthErrorCode =
  | 'InvalidState'
  | 'ProviderDenied'
  | 'CsrfValidationFailed'
  | 'TokenExchangeFailed'
  | 'ProfileFetchFailed'
  | 'UnexpectedFailure';

/** Why a sign-in attempt produced no identity. Never thrown past the callback handler. */
export class SlackAuthError extends Error {
  constructor(
    public readonly code: SlackAuthErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SlackAuthError';
  }
}

/** Failures that are part of normal operation and not worth a Sentry report. */
export function isExpectedFailure(error: SlackAuthError): boolean {
  return (
    error.code === 'InvalidState' ||
    error.code === 'ProviderDenied' ||
    error.code === 'CsrfValidationFailed'
  );
}

export function toSlackAuthError(error: unknown): SlackAuthError {
  if (error instanceof SlackAuthError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SlackAuthError('UnexpectedFailure', message, { cause: error });
}
