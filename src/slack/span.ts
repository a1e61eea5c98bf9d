import * as Sentry from '@sentry/node';

/**
 * Runs a Slack Web API call inside a client span. Only non-secret attributes
 * belong in `attributes`: never tokens, codes or client secrets.
 */
export async function withSlackApiSpan<T>(
  method: string,
  attributes: Record<string, string>,
  fn: () => Promise<T>
): Promise<T> {
  return Sentry.startSpan(
    {
      op: 'http.client',
      name: `slack ${method}`,
      attributes: { 'slack.method': method, ...attributes },
    },
    () => fn()
  );
}
