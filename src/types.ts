/** Error the app responds with on purpose: its status goes to the client as-is, no Sentry report */
export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly code?: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}
